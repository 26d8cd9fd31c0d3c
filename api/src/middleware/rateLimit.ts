/**
 * Rate Limiting Middleware
 *
 * Returns 429 RATE_LIMIT_EXCEEDED with Retry-After when a client runs out of
 * points. This is the service's own limit, distinct from the upstream
 * RATE_LIMITED error.
 */

import type { Context, Next } from 'hono';
import { consumeRateLimit, getRateLimitKey, RateLimitTier } from '@/services/rateLimit.service';

function clientKey(c: Context): string {
  return getRateLimitKey({
    forwardedFor: c.req.header('x-forwarded-for'),
    realIp: c.req.header('x-real-ip'),
  });
}

async function enforce(c: Context, next: Next, tier: RateLimitTier, headerSuffix: string) {
  const result = await consumeRateLimit(clientKey(c), tier);

  c.header(`X-RateLimit-Limit${headerSuffix}`, String(result.limit));
  c.header(`X-RateLimit-Remaining${headerSuffix}`, String(result.remainingPoints));
  c.header(`X-RateLimit-Reset${headerSuffix}`, String(result.resetTime));

  if (!result.allowed) {
    c.header('Retry-After', String(result.retryAfter ?? 60));
    return c.json(
      {
        error: {
          code: 'RATE_LIMIT_EXCEEDED',
          message: 'Too many requests. Please try again later.',
          retryAfter: result.retryAfter,
          tier,
        },
      },
      429
    );
  }

  return next();
}

export async function rateLimitMiddleware(c: Context, next: Next) {
  return enforce(c, next, RateLimitTier.GENERAL, '');
}

/**
 * Stricter limit for routes that call the model backends
 */
export async function expensiveOperationRateLimit(c: Context, next: Next) {
  return enforce(c, next, RateLimitTier.EXPENSIVE, '-Expensive');
}
