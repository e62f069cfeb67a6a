import type { Request, Response, NextFunction, RequestHandler } from 'express';
import type { AuthenticatedUser } from './auth';

interface RateLimitConfig {
  windowMs: number;  // Time window in milliseconds
  maxRequests: number;  // Max requests per window
  keyGenerator?: (req: Request) => string;
}

interface RateLimitRecord {
  count: number;
  resetTime: number;
}

export interface RateLimiter extends RequestHandler {
  reset(): void;
}

const CLEANUP_INTERVAL_MS = 5 * 60 * 1000;

const defaultKey = (req: Request): string => {
  const user: AuthenticatedUser | undefined = req.user;
  return user?.id || req.ip || 'anonymous';
};

/**
 * Fixed-window, per-key limiter kept in process memory.
 */
export function rateLimit(config: RateLimitConfig): RateLimiter {
  const { windowMs, maxRequests, keyGenerator = defaultKey } = config;
  const store = new Map<string, RateLimitRecord>();

  // Drop expired windows; never keeps the process alive on its own
  setInterval(() => {
    const now = Date.now();
    store.forEach((record, key) => {
      if (record.resetTime < now) store.delete(key);
    });
  }, CLEANUP_INTERVAL_MS).unref();

  const limiter = (req: Request, res: Response, next: NextFunction) => {
    const key = keyGenerator(req);
    const now = Date.now();

    let record = store.get(key);
    if (!record || record.resetTime < now) {
      record = { count: 0, resetTime: now + windowMs };
      store.set(key, record);
    }

    record.count++;

    res.setHeader('X-RateLimit-Limit', maxRequests);
    res.setHeader('X-RateLimit-Remaining', Math.max(0, maxRequests - record.count));
    res.setHeader('X-RateLimit-Reset', new Date(record.resetTime).toISOString());

    if (record.count > maxRequests) {
      const retryAfter = Math.ceil((record.resetTime - now) / 1000);
      res.setHeader('Retry-After', retryAfter);
      res.status(429).json({
        message: 'Too many requests. Please try again later.',
        retryAfter,
        limit: maxRequests,
        windowMs,
      });
      return;
    }

    next();
  };

  return Object.assign(limiter, { reset: () => store.clear() });
}

/**
 * Submissions run inference and a paid recommendation call
 */
export function createAnalysisRateLimit(): RateLimiter {
  return rateLimit({
    windowMs: 60 * 1000,
    maxRequests: 10,
  });
}
