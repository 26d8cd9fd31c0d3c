/**
 * HTTP application
 *
 * Built from already-wired services so tests can mount it with an
 * in-memory store and fake backends.
 */

import { Hono } from 'hono';
import type { AppConfig } from '@/config';
import type { AppServices } from '@/services/container';
import { securityHeaders } from '@/middleware/securityHeaders';
import { createCorsMiddleware } from '@/middleware/cors';
import { errorHandler, handleError } from '@/middleware/errorHandler';
import { createApiKeyAuth } from '@/middleware/auth';
import { rateLimitMiddleware } from '@/middleware/rateLimit';
import { createChatRoutes } from '@/routes/chat';
import { createConversationRoutes } from '@/routes/conversations';
import { createDocumentRoutes } from '@/routes/documents';
import { createStatsRoutes } from '@/routes/stats';

export const APP_VERSION = '1.0.0';

export function createApp(services: AppServices, security: AppConfig['security']) {
  const app = new Hono();

  // Global middleware chain
  app.use('*', securityHeaders);
  app.use('*', createCorsMiddleware(security.corsOrigin));
  app.use('*', errorHandler);
  app.use('/v1/*', createApiKeyAuth(security.apiKey));
  app.use('/v1/*', rateLimitMiddleware);

  // Health check endpoint
  app.get('/health', (c) => {
    return c.json({
      status: 'ok',
      timestamp: new Date().toISOString(),
      version: APP_VERSION,
    });
  });

  app.route('/v1/stats', createStatsRoutes(services));
  app.route('/v1/documents', createDocumentRoutes(services));
  app.route('/v1/chat', createChatRoutes(services));
  app.route('/v1/conversations', createConversationRoutes(services));

  app.onError(handleError);

  app.notFound((c) => {
    return c.json(
      {
        error: {
          code: 'NOT_FOUND',
          message: 'Endpoint not found',
        },
      },
      404
    );
  });

  return app;
}

export type App = ReturnType<typeof createApp>;
