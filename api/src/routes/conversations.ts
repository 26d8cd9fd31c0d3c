/**
 * Conversation Routes
 */

import { Hono } from 'hono';
import { zValidator } from '@hono/zod-validator';
import type { AppServices } from '@/services/container';
import { paginationQuerySchema, rejectInvalid } from '@/validators/common';
import { conversationIdParamSchema } from '@/validators/chat';

export function createConversationRoutes(services: AppServices) {
  const conversations = new Hono();

  /**
   * GET /v1/conversations/:id/messages
   *
   * Turns oldest first. An unknown conversation is simply empty.
   */
  conversations.get(
    '/:id/messages',
    zValidator('param', conversationIdParamSchema, rejectInvalid),
    zValidator('query', paginationQuerySchema, rejectInvalid),
    async (c) => {
      const { id } = c.req.valid('param');
      const { limit, offset } = c.req.valid('query');
      const { turns, total } = await services.store.listTurns(id, { limit, offset });

      return c.json({
        data: turns,
        meta: { total, limit, offset },
      });
    }
  );

  return conversations;
}
