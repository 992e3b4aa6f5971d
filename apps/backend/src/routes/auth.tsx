import type { Express, NextFunction, Request, Response } from 'express';
import { parseJoinRequest, parseLoginRequest } from '@chessboard/shared';
import type { AuthService } from '../services/auth-service.js';
import { createRateLimiter } from '../middleware/index.js';
import { isAppError } from '../lib/errors.js';
import { readFormFields } from '../lib/form.js';
import { clearSessionCookie, setSessionCookie } from '../lib/session.js';
import type { SessionCookieConfig } from '../lib/session.js';
import { JoinPage, LoginPage, renderPage } from '../views/index.js';
import type { JoinFormValues } from '../views/index.js';

interface Dependencies {
  app: Express;
  authService: AuthService;
  session: SessionCookieConfig;
  rateLimit: { windowMs: number; maxRequests: number };
}

function joinValues(fields: Record<string, string>): JoinFormValues {
  return {
    firstName: fields.firstName,
    lastName: fields.lastName,
    username: fields.username,
    email: fields.email,
  };
}

/** Client errors from the auth service are shown on the form; anything else goes to the error handler. */
function formError(error: unknown): { statusCode: number; message: string } | null {
  return isAppError(error) && error.statusCode < 500
    ? { statusCode: error.statusCode, message: error.message }
    : null;
}

export function registerAuthRoutes({ app, authService, session, rateLimit }: Dependencies): void {
  const tooMany = (retryAfter: number) => `Too many attempts. Try again in ${retryAfter} seconds.`;
  const loginLimiter = createRateLimiter({
    windowMs: rateLimit.windowMs,
    maxRequests: rateLimit.maxRequests,
    onLimited: (_req, res, retryAfter) => {
      res.status(429).send(renderPage(<LoginPage error={tooMany(retryAfter)} />));
    },
  });
  const joinLimiter = createRateLimiter({
    windowMs: rateLimit.windowMs,
    maxRequests: rateLimit.maxRequests,
    onLimited: (req, res, retryAfter) => {
      res.status(429).send(renderPage(<JoinPage values={joinValues(readFormFields(req.body))} error={tooMany(retryAfter)} />));
    },
  });
  const apiLimiter = createRateLimiter({ windowMs: rateLimit.windowMs, maxRequests: rateLimit.maxRequests });

  // ============================================
  // PAGES
  // ============================================

  app.get('/login/', (req: Request, res: Response) => {
    if (req.user) {
      res.redirect(302, '/');
      return;
    }
    res.send(renderPage(<LoginPage />));
  });

  app.post('/login/', loginLimiter, async (req: Request, res: Response, next: NextFunction) => {
    const parsed = parseLoginRequest(req.body);
    if (!parsed.ok) {
      res
        .status(400)
        .send(renderPage(<LoginPage username={readFormFields(req.body).username} fieldErrors={parsed.fieldErrors} />));
      return;
    }

    try {
      const result = await authService.login(parsed.data.username, parsed.data.password);
      setSessionCookie(res, session, result.token);
      res.redirect(302, '/');
    } catch (error) {
      const shown = formError(error);
      if (!shown) {
        next(error);
        return;
      }
      console.warn(`[Auth] Login failed for ${parsed.data.username}`);
      res.status(shown.statusCode).send(renderPage(<LoginPage username={parsed.data.username} error={shown.message} />));
    }
  });

  app.get('/join/', (_req: Request, res: Response) => {
    res.send(renderPage(<JoinPage />));
  });

  app.post('/join/', joinLimiter, async (req: Request, res: Response, next: NextFunction) => {
    const values = joinValues(readFormFields(req.body));
    const parsed = parseJoinRequest(req.body);
    if (!parsed.ok) {
      res.status(400).send(renderPage(<JoinPage values={values} fieldErrors={parsed.fieldErrors} />));
      return;
    }

    try {
      const result = await authService.join(parsed.data);
      setSessionCookie(res, session, result.token);
      res.redirect(302, '/');
    } catch (error) {
      const shown = formError(error);
      if (!shown) {
        next(error);
        return;
      }
      res.status(shown.statusCode).send(renderPage(<JoinPage values={values} error={shown.message} />));
    }
  });

  const logout = (_req: Request, res: Response) => {
    clearSessionCookie(res, session);
    res.redirect(302, '/login/');
  };
  app.get('/logout/', logout);
  app.post('/logout/', logout);

  // ============================================
  // JSON API
  // ============================================

  app.post('/api/auth/join', apiLimiter, async (req: Request, res: Response, next: NextFunction) => {
    const parsed = parseJoinRequest(req.body);
    if (!parsed.ok) {
      res.status(400).json({ error: 'Validation failed', fieldErrors: parsed.fieldErrors });
      return;
    }

    try {
      const result = await authService.join(parsed.data);
      res.status(201).json(result);
    } catch (error) {
      next(error);
    }
  });

  app.post('/api/auth/login', apiLimiter, async (req: Request, res: Response, next: NextFunction) => {
    const parsed = parseLoginRequest(req.body);
    if (!parsed.ok) {
      res.status(400).json({ error: 'Validation failed', fieldErrors: parsed.fieldErrors });
      return;
    }

    try {
      const result = await authService.login(parsed.data.username, parsed.data.password);
      res.json(result);
    } catch (error) {
      next(error);
    }
  });
}
