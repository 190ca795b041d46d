/**
 * Per-client sliding-window rate limiter.
 *
 * Each client keeps the timestamps of its accepted requests inside the
 * window. Rejected requests are not recorded, so a client that keeps
 * retrying is admitted again as soon as its oldest request ages out.
 */

import { LRUCache } from 'lru-cache';
import { RateLimitError } from '@/lib/errors';
import { loggers, logSecurityEvent } from '@/lib/logger';

const log = loggers.security.child({ service: 'RateLimiter' });

// =============================================================================
// Types
// =============================================================================

export interface RateLimitDecision {
  allowed: boolean;
  /** Requests still available in the current window */
  remaining: number;
  /** 0 when allowed */
  retryAfterMs: number;
}

export interface RateLimiterOptions {
  /** Clients tracked at once; the least recently seen is evicted first */
  maxClients?: number;
  now?: () => number;
}

// =============================================================================
// Limiter
// =============================================================================

export class SlidingWindowRateLimiter {
  private readonly clients: LRUCache<string, number[]>;
  private readonly now: () => number;

  constructor(
    private readonly limit: number,
    private readonly windowMs: number = 60_000,
    options: RateLimiterOptions = {}
  ) {
    if (!Number.isInteger(limit) || limit <= 0) {
      throw new Error(`Rate limit must be a positive integer, got ${limit}`);
    }
    this.now = options.now ?? Date.now;
    this.clients = new LRUCache<string, number[]>({ max: options.maxClients ?? 10_000 });
  }

  /**
   * Record a request for the client if it fits in the window.
   */
  check(clientId: string): RateLimitDecision {
    const now = this.now();
    const windowStart = now - this.windowMs;
    const recent = (this.clients.get(clientId) ?? []).filter((t) => t > windowStart);

    if (recent.length >= this.limit) {
      this.clients.set(clientId, recent);
      const retryAfterMs = recent[0] + this.windowMs - now;
      logSecurityEvent(log, 'rate_limit', { clientId, reason: `limit ${this.limit}/${this.windowMs}ms` });
      return { allowed: false, remaining: 0, retryAfterMs };
    }

    recent.push(now);
    this.clients.set(clientId, recent);
    return { allowed: true, remaining: this.limit - recent.length, retryAfterMs: 0 };
  }

  /**
   * Like check(), but throws when the client is over its limit.
   *
   * @throws RateLimitError
   */
  consume(clientId: string): RateLimitDecision {
    const decision = this.check(clientId);
    if (!decision.allowed) {
      throw new RateLimitError(clientId, decision.retryAfterMs);
    }
    return decision;
  }

  /**
   * Forget one client, or every client when no id is given.
   */
  reset(clientId?: string): void {
    if (clientId === undefined) {
      this.clients.clear();
    } else {
      this.clients.delete(clientId);
    }
  }
}
