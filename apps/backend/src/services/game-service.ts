import type { Chess } from 'chess.js';
import { parseMoveRequest } from '@chessboard/shared';
import type {
  BoardState,
  GameStatus,
  MoveOutcome,
  MoveRecord,
  MoveValidationError,
  MoveValidationErrorKind
} from '@chessboard/shared';
import type { GameRepository, GameWrite, StoredGame } from '../db/game-repository.js';
import type { StoredGameStatus } from '../db/schema.js';
import {
  attemptMove,
  createStartingGame,
  describeSquares,
  describeStatus,
  describeTurn,
  replayGame
} from '../chess/rules.js';
import { AppError } from '../lib/errors.js';

interface GameServiceDeps {
  repository: GameRepository;
}

export interface GameHistory {
  gameNumber: number;
  history: MoveRecord[];
}

/** Attempts per write: the first try plus one retry after a version miss. */
const MAX_WRITE_ATTEMPTS = 2;

const CONCURRENT_MESSAGE = 'The game was changed by another request. Please try again.';

const MOVE_ERROR_STATUS: Record<MoveValidationErrorKind, number> = {
  NotAuthenticated: 401,
  MalformedRequest: 400,
  EmptySource: 422,
  OutOfTurn: 422,
  IllegalDestination: 422,
  GameOver: 409,
  ConcurrentModification: 409
};

export function moveErrorStatus(kind: MoveValidationErrorKind): number {
  return MOVE_ERROR_STATUS[kind];
}

export function toStoredStatus(status: GameStatus): StoredGameStatus {
  switch (status.kind) {
    case 'inProgress':
      return 'in_progress';
    case 'checkmate':
      return 'checkmate';
    case 'stalemate':
      return 'stalemate';
    case 'draw':
      return 'draw';
  }
}

function freshGame(gameNumber: number): GameWrite {
  return {
    gameNumber,
    fen: createStartingGame().fen(),
    history: [],
    status: 'in_progress'
  };
}

/**
 * Projects a stored game into the shape pages and the API render.
 * `game` may be passed when the caller already replayed the history.
 * The move history is authoritative; the stored position and status only
 * have to agree with it.
 */
export function toBoardState(stored: StoredGame, game: Chess = replayGame(stored.history)): BoardState {
  const status = describeStatus(game);
  if (stored.fen !== game.fen() || stored.status !== toStoredStatus(status)) {
    console.warn(`[GameService] Game ${stored.id} has a stale position snapshot; using its move history`);
  }

  return {
    id: stored.id,
    owner: stored.ownerId,
    gameNumber: stored.gameNumber,
    squares: describeSquares(game),
    turn: describeTurn(game),
    history: stored.history,
    status,
    inCheck: game.inCheck(),
    fen: game.fen(),
    version: stored.version,
    createdAt: stored.createdAt.toISOString(),
    updatedAt: stored.updatedAt.toISOString()
  };
}

export class GameService {
  private readonly repository: GameRepository;

  constructor({ repository }: GameServiceDeps) {
    this.repository = repository;
  }

  async getOrCreate(owner: string): Promise<BoardState> {
    return toBoardState(await this.loadOrCreate(owner));
  }

  async getHistory(owner: string): Promise<GameHistory> {
    const stored = await this.loadOrCreate(owner);
    return { gameNumber: stored.gameNumber, history: stored.history };
  }

  /**
   * Validates an untrusted move submission and, when it is legal, applies and
   * persists it. Rejections are returned, not thrown, and write nothing.
   */
  async submitMove(owner: string | null | undefined, input: unknown): Promise<MoveOutcome> {
    if (!owner) {
      return {
        ok: false,
        error: { kind: 'NotAuthenticated', message: 'You must be logged in to play.' },
        board: null
      };
    }

    let stored = await this.loadOrCreate(owner);

    const parsed = parseMoveRequest(input);
    if (!parsed.ok) {
      return {
        ok: false,
        error: { kind: 'MalformedRequest', message: parsed.message, fieldErrors: parsed.fieldErrors },
        board: toBoardState(stored)
      };
    }

    for (let attempt = 1; attempt <= MAX_WRITE_ATTEMPTS; attempt++) {
      if (attempt > 1) {
        stored = await this.loadOrCreate(owner);
      }

      const game = replayGame(stored.history);
      const result = attemptMove(game, parsed.request);
      if (!result.ok) {
        return { ok: false, error: result.error, board: toBoardState(stored, game) };
      }

      const updated = await this.repository.compareAndUpdate(owner, stored.version, {
        gameNumber: stored.gameNumber,
        fen: game.fen(),
        history: [...stored.history, result.record],
        status: toStoredStatus(describeStatus(game))
      });

      if (updated) {
        return { ok: true, board: toBoardState(updated, game) };
      }

      console.warn(`[GameService] Version ${stored.version} of game for ${owner} is stale (attempt ${attempt})`);
    }

    const error: MoveValidationError = { kind: 'ConcurrentModification', message: CONCURRENT_MESSAGE };
    return { ok: false, error, board: toBoardState(await this.loadOrCreate(owner)) };
  }

  async startNewGame(owner: string): Promise<BoardState> {
    for (let attempt = 1; attempt <= MAX_WRITE_ATTEMPTS; attempt++) {
      const stored = await this.loadOrCreate(owner);
      const updated = await this.repository.compareAndUpdate(
        owner,
        stored.version,
        freshGame(stored.gameNumber + 1)
      );

      if (updated) {
        console.log(`[GameService] Started game ${updated.gameNumber} for ${owner}`);
        return toBoardState(updated);
      }

      console.warn(`[GameService] Version ${stored.version} of game for ${owner} is stale (attempt ${attempt})`);
    }

    throw new AppError(CONCURRENT_MESSAGE, 409, 'ConcurrentModification');
  }

  private async loadOrCreate(owner: string): Promise<StoredGame> {
    const existing = await this.repository.findByOwner(owner);
    if (existing) {
      return existing;
    }
    return this.repository.create(owner, freshGame(1));
  }
}
