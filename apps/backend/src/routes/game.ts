import type { Express, NextFunction, Request, RequestHandler, Response } from 'express';
import type { GameService } from '../services/game-service.js';
import { moveErrorStatus } from '../services/game-service.js';
import { requireUserId } from '../middleware/types.js';

interface Dependencies {
  app: Express;
  gameService: GameService;
  requireApiUser: RequestHandler;
}

export function registerGameRoutes({ app, gameService, requireApiUser }: Dependencies): void {
  // Current board, created on first access
  app.get('/api/game', requireApiUser, async (req: Request, res: Response, next: NextFunction) => {
    try {
      const board = await gameService.getOrCreate(requireUserId(req));
      res.json({ board });
    } catch (error) {
      next(error);
    }
  });

  app.post('/api/game/moves', requireApiUser, async (req: Request, res: Response, next: NextFunction) => {
    try {
      const outcome = await gameService.submitMove(requireUserId(req), req.body);
      if (outcome.ok) {
        res.json({ board: outcome.board });
        return;
      }

      const { error, board } = outcome;
      res.status(moveErrorStatus(error.kind)).json({
        error: error.kind,
        message: error.message,
        ...(error.kind === 'MalformedRequest' ? { fieldErrors: error.fieldErrors } : {}),
        board,
      });
    } catch (error) {
      next(error);
    }
  });

  app.post('/api/game/new', requireApiUser, async (req: Request, res: Response, next: NextFunction) => {
    try {
      const board = await gameService.startNewGame(requireUserId(req));
      res.json({ board });
    } catch (error) {
      next(error);
    }
  });

  app.get('/api/game/history', requireApiUser, async (req: Request, res: Response, next: NextFunction) => {
    try {
      res.json(await gameService.getHistory(requireUserId(req)));
    } catch (error) {
      next(error);
    }
  });
}
