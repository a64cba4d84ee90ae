/**
 * Sliding-window rate limiting for the API entry point.
 *
 * Each client key owns the ordered timestamps of its admitted requests inside
 * the trailing window. A check evicts timestamps older than `now - window`,
 * rejects when the remaining count has reached the quota, otherwise records
 * `now`.
 *
 * Notes / tradeoffs:
 * - All mutation runs under one lock per limiter instance (not per key); an
 *   admission check is O(window occupancy).
 * - Keys live in an LRU bounded by `maxKeys`, each with a TTL of one window,
 *   so idle or spoofed client keys do not accumulate.
 * - State is local to the process and lost on restart.
 *
 * Example:
 * const limiter = new SlidingWindowRateLimiter({ requests: 60, windowMs: 60_000 })
 * const quota = await limiter.hit(limiter.identify(forwardedFor, peerAddress))
 * // throws RateLimitExceeded when over quota
 */

import { LRUCache } from 'lru-cache';
import { RateLimitExceeded } from './errors';
import { incRateLimited, incRequests } from './metrics';

export { RateLimitExceeded };

export interface RateLimitQuota {
  remaining: number;
  resetAfterMs: number;
}

export interface RateLimiterOptions {
  requests: number;
  windowMs: number;
  maxKeys?: number;
  trustForwardedFor?: boolean;
  now?: () => number;
}

const DEFAULT_MAX_KEYS = 10_000;

export class SlidingWindowRateLimiter {
  readonly requests: number;
  readonly windowMs: number;
  private readonly trustForwardedFor: boolean;
  private readonly now: () => number;
  private readonly entries: LRUCache<string, number[]>;
  private lock: Promise<void> = Promise.resolve();

  constructor(opts: RateLimiterOptions) {
    this.requests = Math.max(1, Math.floor(opts.requests));
    this.windowMs = Math.max(1, opts.windowMs);
    this.trustForwardedFor = opts.trustForwardedFor ?? false;
    this.now = opts.now ?? (() => performance.now());
    this.entries = new LRUCache<string, number[]>({
      max: opts.maxKeys ?? DEFAULT_MAX_KEYS,
      ttl: this.windowMs,
    });
  }

  /** Client key: first X-Forwarded-For hop when trusted, else the peer address. */
  identify(forwardedFor: string | null | undefined, peerAddress: string | null | undefined): string {
    if (this.trustForwardedFor && forwardedFor) {
      const first = forwardedFor.split(',', 1)[0].trim();
      if (first) return first;
    }
    return peerAddress || 'unknown';
  }

  /** Admit one request for `key` or throw `RateLimitExceeded`. */
  hit(key: string): Promise<RateLimitQuota> {
    return this.exclusive(() => this.hitLocked(key));
  }

  get trackedKeys(): number {
    return this.entries.size;
  }

  private exclusive<T>(fn: () => T): Promise<T> {
    const run = this.lock.then(fn);
    this.lock = run.then(
      () => undefined,
      () => undefined,
    );
    return run;
  }

  private hitLocked(key: string): RateLimitQuota {
    incRequests();
    const now = this.now();
    const bucket = this.entries.get(key) ?? [];
    const windowStart = now - this.windowMs;
    while (bucket.length > 0 && bucket[0] <= windowStart) {
      bucket.shift();
    }

    if (bucket.length >= this.requests) {
      const retryAfterMs = bucket.length > 0 ? this.windowMs - (now - bucket[0]) : this.windowMs;
      this.entries.set(key, bucket);
      incRateLimited();
      throw new RateLimitExceeded(retryAfterMs);
    }

    bucket.push(now);
    this.entries.set(key, bucket);
    return {
      remaining: this.requests - bucket.length,
      resetAfterMs: Math.max(0, this.windowMs - (now - bucket[0])),
    };
  }
}

export function quotaHeaders(quota: RateLimitQuota | null): Record<string, string> {
  if (!quota) return {};
  return {
    'X-RateLimit-Remaining': String(Math.max(0, quota.remaining)),
    'X-RateLimit-Reset': String(Math.max(0, Math.ceil(quota.resetAfterMs / 1000))),
  };
}

export default SlidingWindowRateLimiter;
