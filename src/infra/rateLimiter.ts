import type { Request, Response, NextFunction, RequestHandler } from 'express';

type RateLimitOptions = {
  windowMs: number;
  max: number;
  now?: () => number;
};

type RateLimitWindow = {
  count: number;
  resetAt: number;
};

/**
 * Fixed-window limiter keyed by client IP
 * A non-positive window or max disables limiting.
 */
export function createRateLimiter({ windowMs, max, now = Date.now }: RateLimitOptions): RequestHandler {
  if (windowMs <= 0 || max <= 0) {
    return (_req: Request, _res: Response, next: NextFunction) => next();
  }

  const windows = new Map<string, RateLimitWindow>();

  return (req: Request, res: Response, next: NextFunction) => {
    const timestamp = now();
    const key = req.ip ?? 'unknown';

    let window = windows.get(key);
    if (!window || timestamp >= window.resetAt) {
      window = { count: 0, resetAt: timestamp + windowMs };
      windows.set(key, window);
    }
    window.count += 1;

    res.setHeader('X-RateLimit-Limit', String(max));
    res.setHeader('X-RateLimit-Remaining', String(Math.max(0, max - window.count)));
    res.setHeader('X-RateLimit-Reset', String(window.resetAt));

    if (window.count > max) {
      res.setHeader('Retry-After', String(Math.ceil((window.resetAt - timestamp) / 1000)));
      res.status(429).json({
        error: 'RATE_LIMITED',
        message: 'Too many job submissions. Please retry later.',
      });
      return;
    }

    next();
  };
}
