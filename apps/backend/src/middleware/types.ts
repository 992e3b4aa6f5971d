/**
 * Middleware Types
 *
 * Shared type definitions for Express middleware.
 */

import type { Request, Response, NextFunction } from 'express';
import { AppError } from '../lib/errors.js';

/**
 * Identity resolved from the session cookie or bearer token
 */
export interface RequestUser {
  id: string;
  username: string;
}

declare global {
  namespace Express {
    interface Request {
      user?: RequestUser;
    }
  }
}

/**
 * Standard middleware function signature
 */
export type MiddlewareFunction = (
  req: Request,
  res: Response,
  next: NextFunction
) => void | Promise<void>;

/**
 * The authenticated user's id; only call behind an auth guard.
 */
export function requireUserId(req: Request): string {
  if (!req.user) {
    throw new AppError('Authentication required', 401, 'NotAuthenticated');
  }
  return req.user.id;
}
