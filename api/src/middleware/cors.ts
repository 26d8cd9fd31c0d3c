/**
 * CORS Middleware
 *
 * Permissive API policy: requests without an Origin (CLI tools, server-side
 * SDK use) get a wildcard, browser origins are echoed back. Credentials are
 * only allowed for the configured CORS_ORIGIN.
 */

import type { MiddlewareHandler } from 'hono';

const CORS_HEADERS: Record<string, string> = {
  'Access-Control-Allow-Methods': 'GET, POST, DELETE, OPTIONS',
  'Access-Control-Allow-Headers': 'Content-Type, Authorization, X-API-Key',
  'Access-Control-Expose-Headers': 'Content-Length, Retry-After, X-RateLimit-Remaining',
  'Access-Control-Max-Age': '86400',
};

export function createCorsMiddleware(allowedOrigin?: string): MiddlewareHandler {
  return async (c, next) => {
    const origin = c.req.header('Origin');
    const headers: Record<string, string> = { ...CORS_HEADERS };

    if (!origin) {
      headers['Access-Control-Allow-Origin'] = '*';
    } else {
      headers['Access-Control-Allow-Origin'] = origin;
      headers['Vary'] = 'Origin';
      if (allowedOrigin && origin === allowedOrigin) {
        headers['Access-Control-Allow-Credentials'] = 'true';
      }
    }

    // Preflight: answer directly
    if (c.req.method === 'OPTIONS') {
      return new Response(null, { status: 204, headers });
    }

    for (const [key, value] of Object.entries(headers)) {
      c.header(key, value);
    }
    return next();
  };
}
