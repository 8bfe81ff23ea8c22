import { Request, Response, NextFunction } from 'express';
import { v4 as uuidv4 } from 'uuid';

export const requestIdMiddleware = (req: Request, res: Response, next: NextFunction) => {
  // Attach request ID from header or generate UUID
  const header = req.headers['x-request-id'];
  const provided = Array.isArray(header) ? header[0] : header;
  req.id = provided || uuidv4();
  res.setHeader('x-request-id', req.id);
  next();
};
