import express, { Application, Request, Response, NextFunction } from 'express';
import { ValidationError } from './core/errors';
import { ErrorResponse } from './core/types';
import { deadlineMiddleware } from './middleware/deadline';
import { errorHandler } from './middleware/error-handler';
import { requestIdMiddleware } from './middleware/request-id';
import { requestLoggerMiddleware } from './middleware/request-logger';
import { createHealthRoutes } from './routes/health.routes';
import { metricsRoutes } from './routes/metrics.routes';
import { createWarehouseRoutes } from './routes/warehouse.routes';
import { InventoryEngine } from './services/inventory.service';

export const API_PREFIX = '/warehouse/v1';

export interface AppOptions {
  backendTimeoutMs: number;
}

export function createApp(engine: InventoryEngine, options: AppOptions): Application {
  const app = express();

  // Middleware
  app.use(requestIdMiddleware);
  app.use(requestLoggerMiddleware);
  app.use(express.json({ limit: '5mb' }));

  // Malformed JSON bodies
  app.use((error: Error, _req: Request, _res: Response, next: NextFunction) => {
    if (error instanceof SyntaxError && 'body' in error) {
      next(ValidationError.malformedJson(error.message));
      return;
    }
    next(error);
  });

  app.use(deadlineMiddleware(options.backendTimeoutMs));

  // Routes
  app.use(`${API_PREFIX}/health`, createHealthRoutes(engine));
  app.use(`${API_PREFIX}/metrics`, metricsRoutes);
  app.use(API_PREFIX, createWarehouseRoutes(engine));

  // 404 handler for unknown routes
  app.use('*', (_req: Request, res: Response) => {
    const body: ErrorResponse = {
      success: false,
      error: {
        name: 'NotFoundError',
        message: 'Route not found',
        code: 'NOT_FOUND',
        statusCode: 404,
        timestamp: new Date().toISOString(),
      },
    };
    res.status(404).json(body);
  });

  // Error handling
  app.use(errorHandler);

  return app;
}
