import { sql } from 'drizzle-orm';
import { loadEnv } from '../src/lib/env.js';
import { getDb, closeDb } from '../src/db/client.js';

const config = loadEnv();
const db = getDb(config);

async function reset() {
  console.log('[db] Resetting database...');
  // games follow through ON DELETE CASCADE
  await db.execute(sql`TRUNCATE TABLE users CASCADE`);
  console.log('[db] Database reset complete.');
}

reset()
  .then(() => closeDb())
  .catch(async (err: unknown) => {
    console.error('[db] Reset failed', err);
    await closeDb();
    process.exitCode = 1;
  });
