import { eq } from 'drizzle-orm';
import * as schema from './schema.js';
import type { Database } from './client.js';

export interface UserRecord {
  id: string;
  username: string;
  email: string;
  firstName: string;
  lastName: string;
  passwordHash: string;
  isActive: boolean;
  createdAt: Date;
}

export interface NewUser {
  username: string;
  email: string;
  firstName: string;
  lastName: string;
  passwordHash: string;
}

export interface UserRepository {
  findById(id: string): Promise<UserRecord | null>;
  findByUsername(username: string): Promise<UserRecord | null>;
  /** Resolves with null when the username is already taken. */
  create(user: NewUser): Promise<UserRecord | null>;
  recordLogin(id: string): Promise<void>;
}

function toUserRecord(row: schema.UserRow): UserRecord {
  return {
    id: row.id,
    username: row.username,
    email: row.email,
    firstName: row.firstName,
    lastName: row.lastName,
    passwordHash: row.passwordHash,
    isActive: row.isActive,
    createdAt: row.createdAt
  };
}

export class DrizzleUserRepository implements UserRepository {
  private readonly db: Database;

  constructor(db: Database) {
    this.db = db;
  }

  async findById(id: string): Promise<UserRecord | null> {
    const user = await this.db.query.users.findFirst({
      where: eq(schema.users.id, id)
    });
    return user ? toUserRecord(user) : null;
  }

  async findByUsername(username: string): Promise<UserRecord | null> {
    const user = await this.db.query.users.findFirst({
      where: eq(schema.users.username, username)
    });
    return user ? toUserRecord(user) : null;
  }

  async create(user: NewUser): Promise<UserRecord | null> {
    const [row] = await this.db
      .insert(schema.users)
      .values(user)
      .onConflictDoNothing({ target: schema.users.username })
      .returning();
    return row ? toUserRecord(row) : null;
  }

  async recordLogin(id: string): Promise<void> {
    const now = new Date();
    await this.db
      .update(schema.users)
      .set({ lastLoginAt: now, updatedAt: now })
      .where(eq(schema.users.id, id));
  }
}
