import pg from 'pg';

const { Pool } = pg;

const schema = `
DO $$ BEGIN
  CREATE TYPE game_status AS ENUM ('in_progress', 'checkmate', 'stalemate', 'draw');
EXCEPTION
  WHEN duplicate_object THEN NULL;
END $$;

-- Users table
CREATE TABLE IF NOT EXISTS users (
  id UUID PRIMARY KEY DEFAULT gen_random_uuid(),
  username TEXT UNIQUE NOT NULL,
  email TEXT NOT NULL,
  first_name TEXT NOT NULL DEFAULT '',
  last_name TEXT NOT NULL DEFAULT '',
  password_hash TEXT NOT NULL,
  is_active BOOLEAN NOT NULL DEFAULT true,
  last_login_at TIMESTAMPTZ,
  created_at TIMESTAMPTZ NOT NULL DEFAULT now(),
  updated_at TIMESTAMPTZ NOT NULL DEFAULT now()
);

-- Games table: one active board per user
CREATE TABLE IF NOT EXISTS games (
  id UUID PRIMARY KEY DEFAULT gen_random_uuid(),
  user_id UUID NOT NULL REFERENCES users(id) ON DELETE CASCADE,
  game_number INTEGER NOT NULL DEFAULT 1,
  fen TEXT NOT NULL,
  history JSONB NOT NULL DEFAULT '[]',
  status game_status NOT NULL DEFAULT 'in_progress',
  version INTEGER NOT NULL DEFAULT 0,
  created_at TIMESTAMPTZ NOT NULL DEFAULT now(),
  updated_at TIMESTAMPTZ NOT NULL DEFAULT now()
);

-- Indexes
CREATE UNIQUE INDEX IF NOT EXISTS idx_games_user_id ON games(user_id);
`;

export async function runMigrations(databaseUrl: string): Promise<void> {
  console.log('[db] Running database migrations...');

  const pool = new Pool({ connectionString: databaseUrl });

  try {
    await pool.query(schema);
    console.log('[db] Database migrations completed successfully');
  } catch (error) {
    console.error('[db] Migration failed:', error);
    throw error;
  } finally {
    await pool.end();
  }
}
