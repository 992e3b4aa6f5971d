import type { Express, NextFunction, Request, RequestHandler, Response } from 'express';
import type { GameService } from '../services/game-service.js';
import { moveErrorStatus } from '../services/game-service.js';
import { requireUserId } from '../middleware/types.js';
import type { RequestUser } from '../middleware/types.js';
import { AboutPage, ChessPage, HistoryPage, RulesPage, renderPage } from '../views/index.js';
import type { MoveFormValues } from '../views/index.js';
import { readFormFields } from '../lib/form.js';

interface Dependencies {
  app: Express;
  gameService: GameService;
  requirePageUser: RequestHandler;
}

function pageUser(req: Request): RequestUser {
  return { id: requireUserId(req), username: req.user?.username ?? '' };
}

export function registerPageRoutes({ app, gameService, requirePageUser }: Dependencies): void {
  const showBoard = async (req: Request, res: Response, next: NextFunction) => {
    try {
      const user = pageUser(req);
      const board = await gameService.getOrCreate(user.id);
      res.send(renderPage(<ChessPage user={user} board={board} />));
    } catch (error) {
      next(error);
    }
  };

  const playMove = async (req: Request, res: Response, next: NextFunction) => {
    try {
      const user = pageUser(req);
      const fields = readFormFields(req.body);

      if ('new_game' in fields || 'reset' in fields) {
        const board = await gameService.startNewGame(user.id);
        res.send(renderPage(<ChessPage user={user} board={board} notice="A new game has started." />));
        return;
      }

      const values: MoveFormValues = {
        source: fields.source,
        destination: fields.destination,
        promotion: fields.promotion,
      };
      const outcome = await gameService.submitMove(user.id, values);

      if (outcome.ok) {
        res.send(renderPage(<ChessPage user={user} board={outcome.board} />));
        return;
      }

      const board = outcome.board ?? (await gameService.getOrCreate(user.id));
      console.log(`[Pages] Move rejected for ${user.username}: ${outcome.error.kind}`);
      res
        .status(moveErrorStatus(outcome.error.kind))
        .send(renderPage(<ChessPage user={user} board={board} error={outcome.error} values={values} />));
    } catch (error) {
      next(error);
    }
  };

  app.get(['/', '/chess/'], requirePageUser, showBoard);
  app.post(['/', '/chess/'], requirePageUser, playMove);

  app.get('/history/', requirePageUser, async (req: Request, res: Response, next: NextFunction) => {
    try {
      const user = pageUser(req);
      const { gameNumber, history } = await gameService.getHistory(user.id);
      res.send(renderPage(<HistoryPage user={user} gameNumber={gameNumber} history={history} />));
    } catch (error) {
      next(error);
    }
  });

  app.get('/rules/', (req: Request, res: Response) => {
    res.send(renderPage(<RulesPage user={req.user ?? null} />));
  });

  app.get('/about/', (req: Request, res: Response) => {
    res.send(renderPage(<AboutPage user={req.user ?? null} />));
  });
}
