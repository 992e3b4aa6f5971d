/**
 * Express application: middleware, page routes and the JSON API.
 * Kept apart from the entry point so tests can mount it on an ephemeral port.
 */

import express from 'express';
import type { Express } from 'express';
import helmet from 'helmet';
import cookieParser from 'cookie-parser';
import { registerPageRoutes } from './routes/pages.js';
import { registerAuthRoutes } from './routes/auth.js';
import { registerGameRoutes } from './routes/game.js';
import { registerMeRoutes } from './routes/me.js';
import type { EnvConfig } from './lib/env.js';
import { renderErrorPage } from './views/index.js';
import type { AuthService } from './services/auth-service.js';
import type { GameService } from './services/game-service.js';
import {
  createAttachUser,
  createCorsMiddleware,
  createErrorHandler,
  createRequestLogger,
  createRequireApiUser,
  createRequirePageUser,
} from './middleware/index.js';

interface AppDependencies {
  config: EnvConfig;
  authService: AuthService;
  gameService: GameService;
}

export function createApp({ config, authService, gameService }: AppDependencies): Express {
  const app = express();

  // Create middleware instances
  const attachUser = createAttachUser({ authService, cookieName: config.sessionCookieName });
  const requirePageUser = createRequirePageUser();
  const requireApiUser = createRequireApiUser();
  const corsMiddleware = createCorsMiddleware({ allowedOrigins: config.corsOrigin });
  const requestLogger = createRequestLogger({ verbose: config.nodeEnv === 'development' });
  const errorHandler = createErrorHandler({ exposeStack: config.nodeEnv === 'development' });

  // Apply global middleware
  app.disable('x-powered-by');
  app.use(helmet());
  app.use(requestLogger);
  app.use('/api', corsMiddleware);
  app.use(express.urlencoded({ extended: false, limit: '16kb' }));
  app.use(express.json({ limit: '16kb' }));
  app.use(cookieParser());
  app.use(attachUser);

  app.get('/api/health', (_req, res) => {
    res.json({ status: 'ok', timestamp: new Date().toISOString() });
  });

  // Register routes
  registerAuthRoutes({
    app,
    authService,
    session: {
      cookieName: config.sessionCookieName,
      ttlSeconds: config.jwtTtlSeconds,
      secure: config.isProduction,
    },
    rateLimit: { windowMs: config.authRateLimitWindowMs, maxRequests: config.authRateLimitMax },
  });
  registerMeRoutes({ app, authService, requireApiUser });
  registerGameRoutes({ app, gameService, requireApiUser });
  registerPageRoutes({ app, gameService, requirePageUser });

  app.use('/api', (_req, res) => {
    res.status(404).json({ error: 'Not found' });
  });
  app.use((_req, res) => {
    res.status(404).type('html').send(renderErrorPage(404, 'Page not found.'));
  });

  // Error handler must be last
  app.use(errorHandler);

  return app;
}
