/**
 * Sliding-window rate limiting for the login route.
 *
 * State lives in process memory, so each process in a multi-process
 * deployment counts on its own.
 */

import { Request, Response, NextFunction, RequestHandler } from 'express';
import { ServiceError, rateLimitError } from '../domain/errors';

export interface RateLimitDecision {
  allowed: boolean;
  remaining: number;
  /** Milliseconds until the oldest hit leaves the window; 0 when allowed. */
  retryAfterMs: number;
}

/** Counts hits per key over a trailing window. */
export class SlidingWindowLimiter {
  private hits = new Map<string, number[]>();

  constructor(
    readonly maxRequests: number,
    readonly windowMs: number,
  ) {}

  /** Record a hit for `key` unless it is over the limit. */
  hit(key: string, now = Date.now()): RateLimitDecision {
    const recent = this.recent(key, now);
    if (recent.length >= this.maxRequests) {
      return { allowed: false, remaining: 0, retryAfterMs: recent[0] + this.windowMs - now };
    }
    recent.push(now);
    this.hits.set(key, recent);
    return { allowed: true, remaining: this.maxRequests - recent.length, retryAfterMs: 0 };
  }

  /** Drop keys with no hits inside the window. */
  prune(now = Date.now()): void {
    for (const key of Array.from(this.hits.keys())) {
      if (this.recent(key, now).length === 0) this.hits.delete(key);
    }
  }

  private recent(key: string, now: number): number[] {
    const cutoff = now - this.windowMs;
    const recent = (this.hits.get(key) ?? []).filter((t) => t > cutoff);
    this.hits.set(key, recent);
    return recent;
  }
}

export interface RateLimitOptions {
  maxRequests: number;
  windowMs: number;
  /** Bucket key for a request. Default: client IP. */
  keyFor?: (req: Request) => string;
}

export function clientIp(req: Request): string {
  return req.ip ?? req.socket.remoteAddress ?? 'unknown';
}

/**
 * Middleware that passes RATE_LIMIT.EXCEEDED to the error handler once a
 * key is over its limit. Sets RateLimit-Limit and RateLimit-Remaining on
 * every response and Retry-After on refusals.
 */
export function rateLimit(options: RateLimitOptions): RequestHandler {
  const limiter = new SlidingWindowLimiter(options.maxRequests, options.windowMs);
  const keyFor = options.keyFor ?? clientIp;
  setInterval(() => limiter.prune(), options.windowMs).unref();

  return (req: Request, res: Response, next: NextFunction) => {
    const decision = limiter.hit(keyFor(req));
    res.set('RateLimit-Limit', String(limiter.maxRequests));
    res.set('RateLimit-Remaining', String(decision.remaining));
    if (!decision.allowed) {
      res.set('Retry-After', String(Math.ceil(decision.retryAfterMs / 1000)));
      next(new ServiceError(rateLimitError(decision.retryAfterMs, limiter.maxRequests, limiter.windowMs)));
      return;
    }
    next();
  };
}
