import { drizzle } from 'drizzle-orm/node-postgres';
import type { NodePgDatabase } from 'drizzle-orm/node-postgres';
import pg from 'pg';
import type { Pool as PgPool } from 'pg';
import * as schema from './schema.js';
import type { EnvConfig } from '../lib/env.js';

const { Pool } = pg;

export type Database = NodePgDatabase<typeof schema>;

let pool: PgPool | null = null;
let db: Database | null = null;

export function getDb(config: Pick<EnvConfig, 'databaseUrl'>): Database {
  if (!db) {
    const connectionString = config.databaseUrl;
    const shouldUseSsl =
      /sslmode=require/i.test(connectionString) ||
      (process.env.DATABASE_SSL || '').toLowerCase() === 'true';

    pool = new Pool({
      connectionString,
      ...(shouldUseSsl
        ? {
            ssl: {
              // Managed Postgres proxies terminate TLS with certificates slim images cannot verify.
              rejectUnauthorized: false,
            },
          }
        : null),
    });
    pool.on('error', (error) => {
      console.error('[db] Idle client error', error);
    });
    db = drizzle(pool, { schema });
  }
  return db;
}

export async function closeDb(): Promise<void> {
  const current = pool;
  pool = null;
  db = null;
  if (current) {
    await current.end();
  }
}
