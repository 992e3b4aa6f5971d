/**
 * Backend Entry Point
 *
 * Runs migrations, wires the services and starts the HTTP server.
 */

import { loadEnv } from './lib/env.js';
import { getDb, closeDb } from './db/client.js';
import { runMigrations } from './db/migrate.js';
import { DrizzleGameRepository } from './db/game-repository.js';
import { DrizzleUserRepository } from './db/user-repository.js';
import { AuthService } from './services/auth-service.js';
import { GameService } from './services/game-service.js';
import { createApp } from './app.js';

async function bootstrap() {
  const config = loadEnv();
  console.log('Allowed CORS Origins:', config.corsOrigin);

  if (config.runMigrations) {
    await runMigrations(config.databaseUrl);
  }

  const db = getDb(config);

  // Initialize services
  const authService = new AuthService({
    users: new DrizzleUserRepository(db),
    jwtSecret: config.jwtSecret,
    jwtTtlSeconds: config.jwtTtlSeconds,
    bcryptRounds: config.bcryptRounds,
  });
  const gameService = new GameService({ repository: new DrizzleGameRepository(db) });

  const app = createApp({ config, authService, gameService });

  // Start server
  const server = app.listen(config.port, () => {
    console.log(`Chessboard listening on http://localhost:${config.port}`);
  });

  const shutdown = (signal: string) => {
    console.log(`[server] ${signal} received, shutting down`);
    server.close(() => {
      closeDb()
        .then(() => process.exit(0))
        .catch((error: unknown) => {
          console.error('[db] Failed to close pool', error);
          process.exit(1);
        });
    });
  };

  process.on('SIGTERM', () => shutdown('SIGTERM'));
  process.on('SIGINT', () => shutdown('SIGINT'));
}

bootstrap().catch((error) => {
  console.error('Failed to start backend', error);
  process.exit(1);
});
