/**
 * Context Chat API Server
 *
 * Hono server for document ingestion and retrieval-augmented chat (/v1/*)
 */

import 'dotenv/config';
import { serve } from '@hono/node-server';
import { createApp } from '@/app';
import { getConfig } from '@/config';
import { closeDatabase, ensureSchema } from '@/db/client';
import { createServices } from '@/services/container';
import { describeError, logger } from '@/utils/logger';

async function main(): Promise<void> {
  const config = getConfig();
  const services = createServices(config);

  if (config.storage.driver === 'postgres') {
    await ensureSchema();
  }

  const app = createApp(services, config.security);
  const server = serve({
    fetch: app.fetch,
    port: config.port,
  });

  logger.info('API server listening', {
    url: `http://localhost:${config.port}`,
    storage: config.storage.driver,
    chatModel: config.llm.chatModel,
    embeddingModel: config.llm.embeddingModel,
    auth: config.security.apiKey ? 'api_key' : 'none',
  });

  // Graceful shutdown with request drain
  function gracefulShutdown(signal: string) {
    logger.info(`${signal} received: shutting down gracefully...`);
    server.close(() => {
      logger.info('HTTP server closed');
      closeDatabase().then(() => {
        logger.info('Database connections closed');
        process.exit(0);
      }).catch((err) => {
        logger.error('Error closing database', describeError(err));
        process.exit(1);
      });
    });
    // Force exit after 10 seconds if drain takes too long
    setTimeout(() => {
      logger.error('Forced shutdown after 10s timeout');
      process.exit(1);
    }, 10_000).unref();
  }

  process.on('SIGTERM', () => gracefulShutdown('SIGTERM'));
  process.on('SIGINT', () => gracefulShutdown('SIGINT'));
}

// Start server (skip in test mode)
if (process.env.NODE_ENV !== 'test') {
  main().catch((error) => {
    logger.error('Failed to start API server', describeError(error));
    process.exit(1);
  });
}
