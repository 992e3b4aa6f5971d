import { and, eq, sql } from 'drizzle-orm';
import type { MoveRecord } from '@chessboard/shared';
import * as schema from './schema.js';
import type { StoredGameStatus } from './schema.js';
import type { Database } from './client.js';

export interface StoredGame {
  id: string;
  ownerId: string;
  gameNumber: number;
  fen: string;
  history: MoveRecord[];
  status: StoredGameStatus;
  version: number;
  createdAt: Date;
  updatedAt: Date;
}

/** The part of a game a move or a reset rewrites. */
export interface GameWrite {
  gameNumber: number;
  fen: string;
  history: MoveRecord[];
  status: StoredGameStatus;
}

/**
 * Durable storage for the one game each user owns.
 */
export interface GameRepository {
  findByOwner(ownerId: string): Promise<StoredGame | null>;
  /**
   * Inserts the owner's game unless one already exists; in both cases
   * resolves with the game now stored for that owner.
   */
  create(ownerId: string, game: GameWrite): Promise<StoredGame>;
  /**
   * Writes `next` only if the stored version still equals `expectedVersion`.
   * Resolves with null when another write got there first.
   */
  compareAndUpdate(ownerId: string, expectedVersion: number, next: GameWrite): Promise<StoredGame | null>;
}

function toStoredGame(row: schema.GameRow): StoredGame {
  return {
    id: row.id,
    ownerId: row.userId,
    gameNumber: row.gameNumber,
    fen: row.fen,
    history: row.history,
    status: row.status,
    version: row.version,
    createdAt: row.createdAt,
    updatedAt: row.updatedAt
  };
}

export class DrizzleGameRepository implements GameRepository {
  private readonly db: Database;

  constructor(db: Database) {
    this.db = db;
  }

  async findByOwner(ownerId: string): Promise<StoredGame | null> {
    const [row] = await this.db
      .select()
      .from(schema.games)
      .where(eq(schema.games.userId, ownerId));

    return row ? toStoredGame(row) : null;
  }

  async create(ownerId: string, game: GameWrite): Promise<StoredGame> {
    const [inserted] = await this.db
      .insert(schema.games)
      .values({
        userId: ownerId,
        gameNumber: game.gameNumber,
        fen: game.fen,
        history: game.history,
        status: game.status
      })
      .onConflictDoNothing({ target: schema.games.userId })
      .returning();

    if (inserted) {
      return toStoredGame(inserted);
    }

    // Lost the race against a concurrent first visit: use the winner's row.
    const existing = await this.findByOwner(ownerId);
    if (!existing) {
      throw new Error(`Game for user ${ownerId} vanished after insert conflict`);
    }
    return existing;
  }

  async compareAndUpdate(ownerId: string, expectedVersion: number, next: GameWrite): Promise<StoredGame | null> {
    const [row] = await this.db
      .update(schema.games)
      .set({
        gameNumber: next.gameNumber,
        fen: next.fen,
        history: next.history,
        status: next.status,
        version: sql`${schema.games.version} + 1`,
        updatedAt: new Date()
      })
      .where(and(eq(schema.games.userId, ownerId), eq(schema.games.version, expectedVersion)))
      .returning();

    return row ? toStoredGame(row) : null;
  }
}
