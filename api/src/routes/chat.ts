/**
 * Chat Routes
 */

import { Hono } from 'hono';
import { zValidator } from '@hono/zod-validator';
import type { AppServices } from '@/services/container';
import { expensiveOperationRateLimit } from '@/middleware/rateLimit';
import { rejectInvalid } from '@/validators/common';
import { chatRequestSchema } from '@/validators/chat';

export function createChatRoutes(services: AppServices) {
  const chat = new Hono();

  /**
   * POST /v1/chat
   *
   * One user turn in, one assistant turn out
   */
  chat.post(
    '/',
    expensiveOperationRateLimit,
    zValidator('json', chatRequestSchema, rejectInvalid),
    async (c) => {
      const { conversationId, message } = c.req.valid('json');
      const { responseText } = await services.chat.chat(conversationId, message);

      return c.json({
        data: {
          conversationId,
          response: responseText,
        },
      });
    }
  );

  return chat;
}
