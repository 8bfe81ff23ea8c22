import { Request, Response, NextFunction, RequestHandler } from 'express';
import { createExecutionContext } from '../core/context';

export class ClientClosedError extends Error {
  constructor() {
    super('Client closed the connection');
    this.name = 'ClientClosedError';
  }
}

/**
 * Give every request an execution context that aborts after `timeoutMs` or
 * when the client goes away before the response is written.
 */
export const deadlineMiddleware = (timeoutMs: number): RequestHandler => {
  return (req: Request, res: Response, next: NextFunction) => {
    const handle = createExecutionContext({ timeoutMs, requestId: req.id });
    req.ctx = handle.context;

    res.on('close', () => {
      if (!res.writableFinished) {
        handle.abort(new ClientClosedError());
      } else {
        handle.dispose();
      }
    });

    next();
  };
};
