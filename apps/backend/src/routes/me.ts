import type { Express, NextFunction, Request, RequestHandler, Response } from 'express';
import type { AuthService } from '../services/auth-service.js';
import { requireUserId } from '../middleware/types.js';

interface Dependencies {
  app: Express;
  authService: AuthService;
  requireApiUser: RequestHandler;
}

export function registerMeRoutes({ app, authService, requireApiUser }: Dependencies): void {
  app.get('/api/me', requireApiUser, async (req: Request, res: Response, next: NextFunction) => {
    try {
      const user = await authService.getUser(requireUserId(req));
      if (!user) {
        res.status(404).json({ error: 'User not found' });
        return;
      }
      res.json({ user });
    } catch (error) {
      next(error);
    }
  });
}
