/**
 * Rate Limiting Service
 *
 * In-memory limiters keyed per client. Two tiers:
 * - general: every /v1 request
 * - expensive: chat and ingestion, which call the model backends
 */

import { RateLimiterMemory, RateLimiterRes } from 'rate-limiter-flexible';
import { describeError, logger } from '@/utils/logger';

export enum RateLimitTier {
  GENERAL = 'general',
  EXPENSIVE = 'expensive',
}

const RATE_LIMIT_CONFIG: Record<RateLimitTier, { points: number; duration: number; blockDuration: number }> = {
  [RateLimitTier.GENERAL]: {
    points: 300, // 300 requests
    duration: 60, // per 60 seconds
    blockDuration: 60,
  },
  [RateLimitTier.EXPENSIVE]: {
    points: 30,
    duration: 60,
    blockDuration: 60,
  },
};

function createLimiters(): Record<RateLimitTier, RateLimiterMemory> {
  return {
    [RateLimitTier.GENERAL]: new RateLimiterMemory(RATE_LIMIT_CONFIG[RateLimitTier.GENERAL]),
    [RateLimitTier.EXPENSIVE]: new RateLimiterMemory(RATE_LIMIT_CONFIG[RateLimitTier.EXPENSIVE]),
  };
}

let rateLimiters = createLimiters();

export interface RateLimitResult {
  allowed: boolean;
  tier: RateLimitTier;
  limit: number;
  remainingPoints: number;
  resetTime: number; // Unix timestamp when limit resets
  retryAfter?: number; // Seconds to wait before retry
}

export async function consumeRateLimit(key: string, tier: RateLimitTier): Promise<RateLimitResult> {
  const config = RATE_LIMIT_CONFIG[tier];

  try {
    const result = await rateLimiters[tier].consume(key);
    return {
      allowed: true,
      tier,
      limit: config.points,
      remainingPoints: result.remainingPoints,
      resetTime: Math.floor((Date.now() + result.msBeforeNext) / 1000),
    };
  } catch (error) {
    if (error instanceof RateLimiterRes) {
      return {
        allowed: false,
        tier,
        limit: config.points,
        remainingPoints: 0,
        resetTime: Math.floor((Date.now() + error.msBeforeNext) / 1000),
        retryAfter: Math.ceil(error.msBeforeNext / 1000),
      };
    }

    // Limiter failure: fail open, but log
    logger.error('Rate limiter error', { tier, ...describeError(error) });
    return {
      allowed: true,
      tier,
      limit: config.points,
      remainingPoints: config.points,
      resetTime: Math.floor(Date.now() / 1000) + config.duration,
    };
  }
}

/**
 * Key requests by forwarded client address, falling back to a shared bucket
 */
export function getRateLimitKey(headers: { forwardedFor?: string; realIp?: string }): string {
  const ip = headers.forwardedFor?.split(',')[0].trim() || headers.realIp || 'unknown';
  return `ip:${ip}`;
}

/**
 * Reset all rate limiters (for testing only)
 */
export function resetAllRateLimits(): void {
  rateLimiters = createLimiters();
}
