import type { Context, Next } from 'hono';
import logger from '../lib/logger.js';

const MAX_WINDOWS = 50_000;
const MAX_TRACKED_SCOPES = 200;
const MAX_CLIENT_KEY_LENGTH = 128;

export interface RateLimitOptions {
  maxRequests: number;
  windowMs: number;
  /** Key on the first X-Forwarded-For hop; otherwise all callers share one bucket */
  trustProxy?: boolean;
}

export interface RateLimitDecision {
  allowed: boolean;
  count: number;
  remaining: number;
  /** Whole seconds until the window resets, at least 1 */
  reset_seconds: number;
}

interface Window {
  count: number;
  resetAt: number;
}

/**
 * Fixed-window counters keyed by caller and route. Windows live in memory;
 * once `maxWindows` are open, expired windows are dropped first, then the
 * least recently used.
 */
export class FixedWindowLimiter {
  private readonly windows = new Map<string, Window>();

  constructor(private readonly maxWindows = MAX_WINDOWS) {}

  get size(): number {
    return this.windows.size;
  }

  take(key: string, maxRequests: number, windowMs: number, now = Date.now()): RateLimitDecision {
    let window = this.windows.get(key);
    if (window && now < window.resetAt) {
      // Re-insert so iteration order tracks recency
      this.windows.delete(key);
    } else {
      this.makeRoom(now);
      window = { count: 0, resetAt: now + windowMs };
    }
    this.windows.set(key, window);

    window.count += 1;
    return {
      allowed: window.count <= maxRequests,
      count: window.count,
      remaining: Math.max(0, maxRequests - window.count),
      reset_seconds: Math.max(1, Math.ceil((window.resetAt - now) / 1000)),
    };
  }

  clear(): void {
    this.windows.clear();
  }

  private makeRoom(now: number): void {
    if (this.windows.size < this.maxWindows) return;
    for (const [key, window] of this.windows) {
      if (now >= window.resetAt) this.windows.delete(key);
    }
    for (const key of this.windows.keys()) {
      if (this.windows.size < this.maxWindows) break;
      this.windows.delete(key);
    }
  }
}

const limiter = new FixedWindowLimiter();
const stats = { allowed: 0, denied: 0, deniedByScope: new Map<string, number>() };

function recordDecision(scope: string, allowed: boolean): void {
  if (allowed) {
    stats.allowed += 1;
    return;
  }
  stats.denied += 1;
  const { deniedByScope } = stats;
  deniedByScope.set(scope, (deniedByScope.get(scope) ?? 0) + 1);
  for (const oldest of deniedByScope.keys()) {
    if (deniedByScope.size <= MAX_TRACKED_SCOPES) break;
    deniedByScope.delete(oldest);
  }
}

export function getRateLimitStats() {
  const denied_by_scope = [...stats.deniedByScope.entries()]
    .sort((a, b) => b[1] - a[1])
    .slice(0, 10)
    .map(([scope, count]) => ({ scope, count }));
  return {
    active_buckets: limiter.size,
    max_buckets: MAX_WINDOWS,
    allowed_decisions: stats.allowed,
    denied_decisions: stats.denied,
    denied_by_scope,
  };
}

export function resetRateLimitStateForTests() {
  limiter.clear();
  stats.allowed = 0;
  stats.denied = 0;
  stats.deniedByScope.clear();
}

function clientKey(c: Context, trustProxy: boolean): string {
  if (!trustProxy) return 'anonymous';
  const forwarded = c.req.header('x-forwarded-for')?.split(',')[0]?.trim();
  return `ip:${(forwarded || 'anonymous').slice(0, MAX_CLIENT_KEY_LENGTH)}`;
}

export function rateLimitMiddleware(options: RateLimitOptions) {
  const { maxRequests, windowMs, trustProxy = false } = options;

  return async (c: Context, next: Next) => {
    const scope = `${c.req.method}:${c.req.path}`;
    const key = `${clientKey(c, trustProxy)}:${scope}`;
    const decision = limiter.take(key, maxRequests, windowMs);

    c.header('X-RateLimit-Limit', String(maxRequests));
    c.header('X-RateLimit-Remaining', String(decision.remaining));
    c.header('X-RateLimit-Reset', String(decision.reset_seconds));
    recordDecision(scope, decision.allowed);

    if (!decision.allowed) {
      c.header('Retry-After', String(decision.reset_seconds));
      logger.warn({ bucket: key, scope, count: decision.count, max: maxRequests }, 'Rate limit exceeded');
      return c.json({ error: 'Too many requests. Please try again later.' }, 429);
    }
    await next();
  };
}
