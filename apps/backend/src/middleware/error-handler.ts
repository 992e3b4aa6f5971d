/**
 * Error Handler Middleware
 *
 * Global error handler for errors thrown or passed on by routes.
 * Answers JSON under /api and an HTML error page everywhere else.
 */

import type { Request, Response, NextFunction, ErrorRequestHandler } from 'express';
import { isAppError } from '../lib/errors.js';
import { renderErrorPage } from '../views/render.js';

interface ErrorHandlerConfig {
  exposeStack: boolean;
}

interface ResolvedError {
  statusCode: number;
  message: string;
  code?: string;
}

function resolveError(err: unknown): ResolvedError {
  if (isAppError(err)) {
    return { statusCode: err.statusCode, message: err.message, code: err.code };
  }
  // body-parser failures carry their own 4xx status
  if (err instanceof Error && 'status' in err && typeof err.status === 'number' && err.status < 500) {
    return { statusCode: err.status, message: err.message };
  }
  return { statusCode: 500, message: 'Internal Server Error' };
}

export function createErrorHandler({ exposeStack }: ErrorHandlerConfig): ErrorRequestHandler {
  return function errorHandler(err: unknown, req: Request, res: Response, next: NextFunction) {
    const { statusCode, message, code } = resolveError(err);
    const stack = exposeStack && err instanceof Error ? err.stack : undefined;

    if (statusCode >= 500) {
      console.error('[Error]', req.method, req.originalUrl, err);
    } else {
      console.warn('[Error]', req.method, req.originalUrl, statusCode, message);
    }

    if (res.headersSent) {
      next(err);
      return;
    }

    if (req.path.startsWith('/api')) {
      res.status(statusCode).json({
        error: message,
        ...(code ? { code } : {}),
        ...(stack ? { stack } : {}),
      });
      return;
    }

    res.status(statusCode).type('html').send(renderErrorPage(statusCode, message, stack));
  };
}
