/**
 * Chat Validation Schemas
 */

import { z } from 'zod';

const conversationId = z.string().trim().min(1).max(200);

/**
 * POST /v1/chat
 */
export const chatRequestSchema = z.object({
  conversationId,
  message: z.string().max(32_000).refine((value) => value.trim().length > 0, {
    message: 'message must not be empty',
  }),
}).strict();

/**
 * GET /v1/conversations/:id/messages
 */
export const conversationIdParamSchema = z.object({
  id: conversationId,
}).strict();
