import type { Request, Response, NextFunction } from 'express';

export interface RateLimitConfig {
  /** Attempts allowed per window for one client and e-mail. Default: 20 */
  readonly maxRequests: number;
  /** Window size in milliseconds. Default: 60_000 (1 minute) */
  readonly windowMs: number;
}

export const DEFAULT_RATE_LIMIT: RateLimitConfig = {
  maxRequests: 20,
  windowMs: 60_000,
};

/**
 * Parse rate limit configuration from environment.
 *
 * - COMMONROOM_RATE_LIMIT: attempts per window (default: 20)
 * - COMMONROOM_RATE_WINDOW_MS: window in ms (default: 60000)
 */
export function parseRateLimitConfig(env: Record<string, string | undefined>): RateLimitConfig {
  return {
    maxRequests: positiveInt(env['COMMONROOM_RATE_LIMIT']) ?? DEFAULT_RATE_LIMIT.maxRequests,
    windowMs: positiveInt(env['COMMONROOM_RATE_WINDOW_MS']) ?? DEFAULT_RATE_LIMIT.windowMs,
  };
}

function positiveInt(raw: string | undefined): number | undefined {
  const value = Number.parseInt(raw ?? '', 10);
  return Number.isFinite(value) && value > 0 ? value : undefined;
}

interface AttemptWindow {
  readonly openedAt: number;
  count: number;
}

export type AttemptOutcome =
  | { readonly allowed: true; readonly remaining: number }
  | { readonly allowed: false; readonly retryAfterSeconds: number };

/**
 * Fixed-window attempt counter. Windows older than `windowMs` are dropped,
 * at most once per window, so the map only holds keys seen recently.
 */
export class AttemptLimiter {
  private readonly windows = new Map<string, AttemptWindow>();
  private lastSweep: number;

  constructor(
    readonly config: RateLimitConfig = DEFAULT_RATE_LIMIT,
    private readonly now: () => number = Date.now,
  ) {
    this.lastSweep = now();
  }

  /** Number of keys currently tracked. */
  get size(): number {
    return this.windows.size;
  }

  attempt(key: string): AttemptOutcome {
    const at = this.now();
    if (at - this.lastSweep >= this.config.windowMs) this.sweep(at);

    let window = this.windows.get(key);
    if (!window || this.expired(window, at)) {
      window = { openedAt: at, count: 0 };
      this.windows.set(key, window);
    }

    if (window.count >= this.config.maxRequests) {
      const waitMs = window.openedAt + this.config.windowMs - at;
      return { allowed: false, retryAfterSeconds: Math.max(1, Math.ceil(waitMs / 1000)) };
    }

    window.count += 1;
    return { allowed: true, remaining: this.config.maxRequests - window.count };
  }

  sweep(at: number = this.now()): void {
    for (const [key, window] of this.windows) {
      if (this.expired(window, at)) this.windows.delete(key);
    }
    this.lastSweep = at;
  }

  private expired(window: AttemptWindow, at: number): boolean {
    return at - window.openedAt >= this.config.windowMs;
  }
}

/**
 * Limits credential attempts per client IP and submitted e-mail, so guessing
 * one account's password is capped without locking out a shared address.
 * Requests without an e-mail (confirm, logout) count against the IP alone.
 *
 * When the limit is exceeded, returns 429 with a Retry-After header.
 */
export function createRateLimitMiddleware(
  limiter: AttemptLimiter = new AttemptLimiter(),
): (req: Request, res: Response, next: NextFunction) => void {
  const limit = String(limiter.config.maxRequests);

  return (req: Request, res: Response, next: NextFunction): void => {
    const outcome = limiter.attempt(attemptKey(req));
    res.setHeader('X-RateLimit-Limit', limit);

    if (!outcome.allowed) {
      res.setHeader('Retry-After', String(outcome.retryAfterSeconds));
      res.setHeader('X-RateLimit-Remaining', '0');
      res.status(429).json({
        error: 'Too Many Requests',
        message: `Too many attempts. Try again in ${outcome.retryAfterSeconds} second(s).`,
        retry_after: outcome.retryAfterSeconds,
      });
      return;
    }

    res.setHeader('X-RateLimit-Remaining', String(outcome.remaining));
    next();
  };
}

export function attemptKey(req: Request): string {
  const ip = req.ip ?? req.socket.remoteAddress ?? 'unknown';
  const body: unknown = req.body;
  if (typeof body === 'object' && body !== null && 'email' in body && typeof body.email === 'string') {
    const email = body.email.trim().toLowerCase();
    if (email) return `${ip}|${email}`;
  }
  return ip;
}
