/**
 * Authentication Middleware
 *
 * Optional shared API key for the /v1 routes. The key may arrive as:
 * - Bearer token (Authorization header)
 * - X-API-Key header
 *
 * When no key is configured every request passes through.
 */

import type { MiddlewareHandler } from 'hono';
import crypto from 'crypto';
import { logger } from '@/utils/logger';

/**
 * Compare two secrets in constant time.
 * Both sides are hashed first so lengths always match.
 */
export function secretsMatch(presented: string, expected: string): boolean {
  const a = crypto.createHash('sha256').update(presented).digest();
  const b = crypto.createHash('sha256').update(expected).digest();
  return crypto.timingSafeEqual(a, b);
}

function readPresentedKey(authorization: string | undefined, apiKeyHeader: string | undefined): string | undefined {
  if (authorization?.startsWith('Bearer ')) {
    return authorization.substring(7);
  }
  return apiKeyHeader || undefined;
}

export function createApiKeyAuth(expectedKey: string | undefined): MiddlewareHandler {
  return async (c, next) => {
    if (!expectedKey) {
      return next();
    }

    const presented = readPresentedKey(c.req.header('Authorization'), c.req.header('X-API-Key'));
    if (!presented || !secretsMatch(presented, expectedKey)) {
      logger.debug('API key rejected', { path: c.req.path, presented: Boolean(presented) });
      c.header('WWW-Authenticate', 'Bearer');
      return c.json(
        {
          error: {
            code: 'UNAUTHENTICATED',
            message: 'A valid API key is required',
          },
        },
        401
      );
    }

    return next();
  };
}
