/**
 * Request Logger Middleware
 *
 * Logs failed requests always and every request when verbose.
 */

import type { Request, Response, NextFunction } from 'express';
import type { MiddlewareFunction } from './types.js';

interface RequestLoggerConfig {
  verbose: boolean;
}

export function createRequestLogger({ verbose }: RequestLoggerConfig): MiddlewareFunction {
  return function requestLogger(req: Request, res: Response, next: NextFunction) {
    const start = Date.now();

    res.on('finish', () => {
      const duration = Date.now() - start;
      const log = `[${new Date().toISOString()}] ${req.method} ${req.originalUrl} ${res.statusCode} - ${duration}ms`;

      if (res.statusCode >= 400) {
        console.error(log);
      } else if (verbose) {
        console.log(log);
      }
    });

    next();
  };
}
