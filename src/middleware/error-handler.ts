import { Request, Response, NextFunction } from 'express';
import { z } from 'zod';
import { logger } from '../core/logger';
import { DomainError, ErrorFactory } from '../core/errors';
import { ErrorResponse } from '../core/types';

const handleZodValidationError = (error: z.ZodError, res: Response) => {
  const fieldErrors = error.errors.map(err => ({
    field: err.path.join('.'),
    message: err.message,
  }));

  const body: ErrorResponse = {
    success: false,
    error: {
      name: 'ValidationError',
      message: `Validation failed: ${fieldErrors.map(e => `${e.field}: ${e.message}`).join(', ')}`,
      code: 'VALIDATION_ERROR',
      statusCode: 400,
      timestamp: new Date().toISOString(),
      details: { fieldErrors }
    },
  };
  return res.status(400).json(body);
};

const handleGenericError = (error: Error, res: Response) => {
  const isDevelopment = process.env['NODE_ENV'] === 'development';
  const body: ErrorResponse = {
    success: false,
    error: {
      name: 'InternalServerError',
      message: 'Internal server error',
      code: 'INTERNAL_SERVER_ERROR',
      statusCode: 500,
      timestamp: new Date().toISOString(),
      ...(isDevelopment && { stack: error.stack }),
    },
  };
  return res.status(500).json(body);
};

export const errorHandler = (error: Error, req: Request, res: Response, _next?: NextFunction) => {
  const context = { req: { id: req.id, method: req.method, url: req.url } };

  if (error instanceof DomainError) {
    if (error.statusCode >= 500) {
      logger.error({ error, ...context }, 'Request error');
    } else {
      logger.info({ error, ...context }, 'Request rejected');
    }
    return res.status(error.statusCode).json(ErrorFactory.createErrorResponse(error));
  }

  if (error instanceof z.ZodError) {
    logger.info({ issues: error.errors, ...context }, 'Request validation failed');
    return handleZodValidationError(error, res);
  }

  logger.error({ error, ...context }, 'Request error');
  return handleGenericError(error, res);
};
