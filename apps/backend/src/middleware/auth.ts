/**
 * Auth Middleware
 *
 * Resolves the user from the session cookie (pages) or a bearer token (API)
 * and guards routes that need one.
 */

import type { Request, Response, NextFunction } from 'express';
import type { AuthService } from '../services/auth-service.js';
import type { MiddlewareFunction } from './types.js';

interface AuthMiddlewareConfig {
  authService: AuthService;
  cookieName: string;
}

function readToken(req: Request, cookieName: string): string | undefined {
  const header = req.headers.authorization ?? '';
  if (header.startsWith('Bearer ')) {
    return header.slice(7);
  }
  const cookies: Record<string, unknown> = req.cookies ?? {};
  const cookie = cookies[cookieName];
  return typeof cookie === 'string' && cookie ? cookie : undefined;
}

/**
 * Attaches `req.user` when the token belongs to an account that still exists
 * and is active. Never rejects on its own.
 */
export function createAttachUser({ authService, cookieName }: AuthMiddlewareConfig): MiddlewareFunction {
  return async function attachUser(req: Request, _res: Response, next: NextFunction) {
    const token = readToken(req, cookieName);
    if (!token) {
      next();
      return;
    }

    try {
      const user = await authService.authenticate(token);
      if (user) {
        req.user = { id: user.id, username: user.username };
      }
      next();
    } catch (error) {
      next(error);
    }
  };
}

/**
 * Page guard: anonymous visitors are sent to the login form.
 */
export function createRequirePageUser(): MiddlewareFunction {
  return function requirePageUser(req: Request, res: Response, next: NextFunction) {
    if (!req.user) {
      res.redirect(302, '/login/');
      return;
    }
    next();
  };
}

/**
 * API guard: answers 401 without a valid identity.
 */
export function createRequireApiUser(): MiddlewareFunction {
  return function requireApiUser(req: Request, res: Response, next: NextFunction) {
    if (!req.user) {
      res.status(401).json({ error: 'Unauthorized: No valid token provided' });
      return;
    }
    next();
  };
}
