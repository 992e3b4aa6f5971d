/**
 * Middleware Index
 *
 * Exports all middleware factories for use in route configuration.
 * Each middleware is in its own file.
 */

// Types
export type { MiddlewareFunction, RequestUser } from './types.js';
export { requireUserId } from './types.js';

// Auth middleware
export { createAttachUser, createRequirePageUser, createRequireApiUser } from './auth.js';

// CORS middleware
export { createCorsMiddleware } from './cors.js';

// Error handling middleware
export { createErrorHandler } from './error-handler.js';

// Request logging middleware
export { createRequestLogger } from './request-logger.js';

// Rate limiting middleware
export { createRateLimiter } from './rate-limiter.js';

