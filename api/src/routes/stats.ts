/**
 * Stats Route
 */

import { Hono } from 'hono';
import type { AppServices } from '@/services/container';

export function createStatsRoutes(services: AppServices) {
  const stats = new Hono();

  /**
   * GET /v1/stats
   */
  stats.get('/', async (c) => {
    const counts = await services.ingestion.stats();
    return c.json({ status: 'ok', ...counts });
  });

  return stats;
}
