import { pgTable, uuid, text, timestamp, jsonb, integer, uniqueIndex, boolean, pgEnum } from 'drizzle-orm/pg-core';
import { sql } from 'drizzle-orm';
import type { MoveRecord } from '@chessboard/shared';

// ============================================
// ENUMS
// ============================================

export const gameStatusEnum = pgEnum('game_status', [
  'in_progress',
  'checkmate',
  'stalemate',
  'draw'
]);

// ============================================
// USERS TABLE
// ============================================

export const users = pgTable('users', {
  id: uuid('id').primaryKey().defaultRandom(),
  username: text('username').unique().notNull(),
  email: text('email').notNull(),
  firstName: text('first_name').notNull().default(''),
  lastName: text('last_name').notNull().default(''),
  passwordHash: text('password_hash').notNull(),
  isActive: boolean('is_active').notNull().default(true),

  lastLoginAt: timestamp('last_login_at', { withTimezone: true }),

  createdAt: timestamp('created_at', { withTimezone: true })
    .notNull()
    .default(sql`now()`),
  updatedAt: timestamp('updated_at', { withTimezone: true })
    .notNull()
    .default(sql`now()`)
});

// ============================================
// GAMES TABLE (one row per user)
// ============================================

export const games = pgTable('games', {
  id: uuid('id').primaryKey().defaultRandom(),
  userId: uuid('user_id')
    .notNull()
    .references(() => users.id, { onDelete: 'cascade' }),
  gameNumber: integer('game_number').notNull().default(1),
  // fen and status are a snapshot of replaying history, kept for queries and checked on read
  fen: text('fen').notNull(),
  history: jsonb('history').$type<MoveRecord[]>().notNull().default([]),
  status: gameStatusEnum('status').notNull().default('in_progress'),
  // Bumped on every write; compared on update to detect concurrent moves
  version: integer('version').notNull().default(0),
  createdAt: timestamp('created_at', { withTimezone: true })
    .notNull()
    .default(sql`now()`),
  updatedAt: timestamp('updated_at', { withTimezone: true })
    .notNull()
    .default(sql`now()`)
}, (t) => ({
  userIdIdx: uniqueIndex('idx_games_user_id').on(t.userId)
}));

export type UserRow = typeof users.$inferSelect;
export type GameRow = typeof games.$inferSelect;
export type StoredGameStatus = (typeof gameStatusEnum.enumValues)[number];
