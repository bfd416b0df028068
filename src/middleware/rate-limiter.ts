import type { Context, MiddlewareHandler } from 'hono';
import { getConnInfo } from '@hono/node-server/conninfo';
import type { AppEnv, RateLimitInfo } from '../types/hono.js';
import { ApiError } from '../errors/api-error.js';
import { RATE_LIMIT_TIERS } from '../config/constants.js';

export type RateLimitTier = 'sensitive' | 'auth' | 'general';

export interface TierLimits {
  ratePerSecond: number;
  burst: number;
}

export interface TokenBucketRateLimiterOptions {
  tiers?: Record<RateLimitTier, TierLimits>;
  /** Milliseconds clock */
  now?: () => number;
}

interface Bucket {
  tokens: number;
  lastRefill: number;
}

/**
 * Per-key token buckets, one set per tier. Buckets start full and refill
 * continuously up to the burst size.
 */
export class TokenBucketRateLimiter {
  private readonly tiers: Record<RateLimitTier, TierLimits>;
  private readonly now: () => number;
  private readonly buckets = new Map<string, Bucket>();

  constructor(options: TokenBucketRateLimiterOptions = {}) {
    this.tiers = options.tiers ?? RATE_LIMIT_TIERS;
    this.now = options.now ?? Date.now;
  }

  tryConsume(tier: RateLimitTier, key: string): RateLimitInfo {
    const { ratePerSecond, burst } = this.tiers[tier];
    const bucketKey = `${tier}:${key}`;
    const now = this.now();

    const bucket = this.buckets.get(bucketKey) ?? { tokens: burst, lastRefill: now };
    const elapsedSeconds = Math.max(0, now - bucket.lastRefill) / 1000;
    bucket.tokens = Math.min(burst, bucket.tokens + elapsedSeconds * ratePerSecond);
    bucket.lastRefill = now;
    this.buckets.set(bucketKey, bucket);

    if (bucket.tokens >= 1) {
      bucket.tokens -= 1;
      return { allowed: true, limit: burst, remaining: Math.floor(bucket.tokens), retryAfterMs: 0 };
    }

    const retryAfterMs = Math.ceil(((1 - bucket.tokens) / ratePerSecond) * 1000);
    return { allowed: false, limit: burst, remaining: 0, retryAfterMs };
  }

  /**
   * Drop buckets that have refilled completely; they equal a fresh bucket
   */
  sweep(): number {
    const now = this.now();
    let removed = 0;
    for (const [bucketKey, bucket] of this.buckets) {
      const tier = this.tierOf(bucketKey);
      if (!tier) continue;
      const { ratePerSecond, burst } = this.tiers[tier];
      const tokens = bucket.tokens + (Math.max(0, now - bucket.lastRefill) / 1000) * ratePerSecond;
      if (tokens >= burst) {
        this.buckets.delete(bucketKey);
        removed++;
      }
    }
    return removed;
  }

  get size(): number {
    return this.buckets.size;
  }

  private tierOf(bucketKey: string): RateLimitTier | null {
    const tier = bucketKey.slice(0, bucketKey.indexOf(':'));
    return tier === 'sensitive' || tier === 'auth' || tier === 'general' ? tier : null;
  }
}

/**
 * Client address: first X-Forwarded-For hop, then X-Real-IP, then the socket
 */
export function clientIp(c: Context): string {
  const forwarded = c.req.header('x-forwarded-for')?.split(',')[0]?.trim();
  if (forwarded) {
    return forwarded;
  }

  const realIp = c.req.header('x-real-ip')?.trim();
  if (realIp) {
    return realIp;
  }

  try {
    return getConnInfo(c).remote.address ?? 'unknown';
  } catch {
    // Not running behind @hono/node-server (e.g. app.request in tests)
    return 'unknown';
  }
}

/**
 * Reject with 429 before the handler runs when the caller's bucket is empty
 */
export function rateLimit(limiter: TokenBucketRateLimiter, tier: RateLimitTier): MiddlewareHandler<AppEnv> {
  return async (c, next) => {
    const info = limiter.tryConsume(tier, clientIp(c));

    c.header('X-RateLimit-Limit', String(info.limit));
    c.header('X-RateLimit-Remaining', String(info.remaining));

    if (!info.allowed) {
      throw ApiError.rateLimited(Math.ceil(info.retryAfterMs / 1000));
    }

    await next();
  };
}
