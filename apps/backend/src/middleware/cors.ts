/**
 * CORS Middleware
 *
 * Configures Cross-Origin Resource Sharing for the JSON API.
 */

import cors from 'cors';
import type { CorsOptions } from 'cors';
import type { EnvConfig } from '../lib/env.js';

interface CorsConfig {
  allowedOrigins: EnvConfig['corsOrigin'];
}

export function createCorsMiddleware(config: CorsConfig) {
  const options: CorsOptions = {
    origin: config.allowedOrigins,
    credentials: true,
    methods: ['GET', 'POST', 'OPTIONS'],
    allowedHeaders: ['Content-Type', 'Authorization'],
  };

  return cors(options);
}
