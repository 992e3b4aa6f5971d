/**
 * Rate Limiter Middleware
 *
 * Fixed-window limit on requests per client IP, used on login and join.
 */

import type { Request, Response, NextFunction } from 'express';
import type { MiddlewareFunction } from './types.js';

interface RateLimitConfig {
  windowMs: number;  // Time window in milliseconds
  maxRequests: number;  // Max requests per window
  /** Answers a throttled request; defaults to a JSON 429. */
  onLimited?: (req: Request, res: Response, retryAfter: number) => void;
}

interface RateLimitEntry {
  count: number;
  resetTime: number;
}

function defaultOnLimited(_req: Request, res: Response, retryAfter: number): void {
  res.status(429).json({
    error: 'Too many requests',
    retryAfter,
  });
}

export function createRateLimiter(config: RateLimitConfig): MiddlewareFunction {
  const { windowMs, maxRequests, onLimited = defaultOnLimited } = config;
  const store = new Map<string, RateLimitEntry>();

  // Cleanup old entries periodically
  const cleanup = setInterval(() => {
    const now = Date.now();
    for (const [key, entry] of store.entries()) {
      if (entry.resetTime < now) {
        store.delete(key);
      }
    }
  }, windowMs);
  cleanup.unref();

  return function rateLimiter(req: Request, res: Response, next: NextFunction) {
    const ip = req.ip || req.socket.remoteAddress || 'unknown';
    const now = Date.now();

    const entry = store.get(ip);

    if (!entry || entry.resetTime < now) {
      store.set(ip, { count: 1, resetTime: now + windowMs });
      next();
      return;
    }

    entry.count++;

    if (entry.count > maxRequests) {
      const retryAfter = Math.ceil((entry.resetTime - now) / 1000);
      res.set('Retry-After', String(retryAfter));
      onLimited(req, res, retryAfter);
      return;
    }

    next();
  };
}
