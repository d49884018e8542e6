import express, { type Express, type NextFunction, type Request, type Response } from 'express';
import cors from 'cors';

import type { RateLimitConfig } from './config/auth.js';
import { LeaveController, type LeaveControllerDependencies } from './controllers/leave.controller.js';
import { createLeaveRouter } from './routes/leave.routes.js';
import { LeaveError } from './types/errors.js';
import type { ApiErrorResponse } from './types/index.js';

export interface AppDependencies extends LeaveControllerDependencies {
  readonly rateLimit: RateLimitConfig;
}

/**
 * Create and configure Express application
 *
 * Sets up middleware, the leave routes and error handling around an already
 * wired engine, executor, context and report services.
 */
export function createApp(deps: AppDependencies): Express {
  const app = express();

  // Middleware
  app.use(cors());
  app.use(express.json());
  app.use(express.urlencoded({ extended: true }));

  // Request logging middleware
  app.use((req: Request, res: Response, next: NextFunction) => {
    const start = Date.now();
    res.on('finish', () => {
      const duration = Date.now() - start;
      console.log(
        `[${new Date().toISOString()}] ${req.method} ${req.path} ${res.statusCode} ${duration}ms`
      );
    });
    next();
  });

  // Health check endpoint
  app.get('/health', (_req: Request, res: Response) => {
    res.json({
      status: 'ok',
      timestamp: new Date().toISOString(),
      uptime: process.uptime(),
    });
  });

  // API Routes
  app.use('/api/leave', createLeaveRouter(new LeaveController(deps), deps.rateLimit));

  // 404 handler
  app.use((req: Request, res: Response) => {
    res.status(404).json({
      success: false,
      code: 'NOT_FOUND',
      message: `Route ${req.method} ${req.path} not found`,
      timestamp: new Date().toISOString(),
    });
  });

  // Global error handler
  app.use((err: unknown, _req: Request, res: Response, _next: NextFunction) => {
    console.error('[ERROR]', err);

    let payload: ApiErrorResponse;
    let statusCode: number;

    if (err instanceof LeaveError) {
      statusCode = err.statusCode;
      payload = {
        success: false,
        code: err.code,
        message: err.message,
        details: err.details,
        timestamp: new Date().toISOString(),
      };
    } else if (err instanceof SyntaxError) {
      // express.json() rejects malformed bodies with a SyntaxError
      statusCode = 400;
      payload = {
        success: false,
        code: 'INVALID_JSON',
        message: 'Request body is not valid JSON',
        timestamp: new Date().toISOString(),
      };
    } else {
      statusCode = 500;
      payload = {
        success: false,
        code: 'INTERNAL_SERVER_ERROR',
        message: 'An unexpected error occurred',
        timestamp: new Date().toISOString(),
      };
    }

    res.status(statusCode).json(payload);
  });

  return app;
}
