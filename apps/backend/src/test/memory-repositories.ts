import { randomUUID } from 'node:crypto';
import type { GameRepository, GameWrite, StoredGame } from '../db/game-repository.js';
import type { NewUser, UserRecord, UserRepository } from '../db/user-repository.js';

/**
 * In-process stand-ins for the Postgres repositories. Values are cloned on the
 * way in and out so callers cannot mutate stored state by accident.
 */

export class InMemoryGameRepository implements GameRepository {
  private readonly games = new Map<string, StoredGame>();

  /** Runs at the start of every compare-and-update; tests use it to slip in a competing write. */
  beforeUpdate: ((ownerId: string) => void) | null = null;

  async findByOwner(ownerId: string): Promise<StoredGame | null> {
    const game = this.games.get(ownerId);
    return game ? structuredClone(game) : null;
  }

  async create(ownerId: string, game: GameWrite): Promise<StoredGame> {
    const existing = this.games.get(ownerId);
    if (existing) {
      return structuredClone(existing);
    }

    const now = new Date();
    const stored: StoredGame = {
      id: randomUUID(),
      ownerId,
      ...structuredClone(game),
      version: 0,
      createdAt: now,
      updatedAt: now
    };
    this.games.set(ownerId, stored);
    return structuredClone(stored);
  }

  async compareAndUpdate(ownerId: string, expectedVersion: number, next: GameWrite): Promise<StoredGame | null> {
    this.beforeUpdate?.(ownerId);

    const current = this.games.get(ownerId);
    if (!current || current.version !== expectedVersion) {
      return null;
    }

    const updated: StoredGame = {
      ...current,
      ...structuredClone(next),
      version: current.version + 1,
      updatedAt: new Date()
    };
    this.games.set(ownerId, updated);
    return structuredClone(updated);
  }

  /** Bumps the stored version as if another request had written the game. */
  touch(ownerId: string): void {
    const current = this.games.get(ownerId);
    if (current) {
      this.games.set(ownerId, { ...current, version: current.version + 1, updatedAt: new Date() });
    }
  }
}

export class InMemoryUserRepository implements UserRepository {
  private readonly users = new Map<string, UserRecord>();
  readonly logins: string[] = [];

  async findById(id: string): Promise<UserRecord | null> {
    const user = this.users.get(id);
    return user ? { ...user } : null;
  }

  async findByUsername(username: string): Promise<UserRecord | null> {
    for (const user of this.users.values()) {
      if (user.username === username) return { ...user };
    }
    return null;
  }

  async create(user: NewUser): Promise<UserRecord | null> {
    if (await this.findByUsername(user.username)) {
      return null;
    }
    const record: UserRecord = { ...user, id: randomUUID(), isActive: true, createdAt: new Date() };
    this.users.set(record.id, record);
    return { ...record };
  }

  async recordLogin(id: string): Promise<void> {
    this.logins.push(id);
  }

  deactivate(id: string): void {
    const user = this.users.get(id);
    if (user) {
      this.users.set(id, { ...user, isActive: false });
    }
  }
}
