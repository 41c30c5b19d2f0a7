/**
 * Rate Limiting Middleware
 *
 * Per-client, per-route admission control using express-rate-limit.
 * Each route gets its own counter: the key is "<client ip>:<METHOD>:<route path>",
 * with the route template rather than the concrete URL so /contacts/1 and
 * /contacts/2 share a budget.
 *
 * Counters live in the injected store: rate-limit-redis over the shared
 * Redis client in production, the library's memory store otherwise.
 * Mounted on each route before requireAuth, so rejected requests never touch
 * the database or the cache.
 */

import rateLimit, { Store } from 'express-rate-limit';
import { Request, RequestHandler } from 'express';
import { RATE_LIMITS } from '@/config/businessRules';
import { RateLimitExceededError } from '@/errors';
import { logger } from '@/adapters/logging/LoggerFactory';
import { routePath } from '@/utils/routePath';

export interface RateLimiterOptions {
  max: number;
  windowMs: number;
  store?: Store;
}

/**
 * Client address as resolved by Express
 *
 * X-Forwarded-For is only honoured through the app's "trust proxy" setting
 * (TRUST_PROXY), so a client cannot pick its own key by sending the header.
 */
export function getClientIp(req: Request): string {
  return req.ip ?? req.socket.remoteAddress ?? 'unknown';
}

export function rateLimitKey(req: Request): string {
  return `${getClientIp(req)}:${req.method}:${routePath(req)}`;
}

/**
 * One limiter per app; each route mounts the same instance and is counted separately by key
 */
export function createRateLimiter(options: RateLimiterOptions): RequestHandler {
  return rateLimit({
    windowMs: options.windowMs,
    limit: options.max,
    store: options.store,
    standardHeaders: 'draft-7',
    legacyHeaders: false,
    keyGenerator: rateLimitKey,
    // Proxy trust is an explicit setting; a stray X-Forwarded-For is not a misconfiguration
    validate: { xForwardedForHeader: false },
    handler: (req, _res, next) => {
      logger.warn(
        {
          type: 'RATE_LIMIT_EXCEEDED',
          key: rateLimitKey(req),
          limit: options.max,
        },
        'Rate limit exceeded'
      );
      next(new RateLimitExceededError(options.max));
    },
  });
}

export function rateLimiterFromConfig(store?: Store): RequestHandler {
  return createRateLimiter({
    max: RATE_LIMITS.MAX_REQUESTS_PER_ROUTE,
    windowMs: RATE_LIMITS.WINDOW_MS,
    store,
  });
}
