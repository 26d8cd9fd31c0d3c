/**
 * Shared Validation Schemas
 */

import { z, type ZodError } from 'zod';

/**
 * zValidator hook: rethrow the ZodError so the error handler renders the
 * standard VALIDATION_ERROR envelope
 */
export function rejectInvalid(result: { success: boolean; error?: ZodError }): void {
  if (!result.success && result.error) {
    throw result.error;
  }
}

/**
 * ?limit=&offset= query params
 */
export const paginationQuerySchema = z.object({
  limit: z.coerce.number().int().positive().max(100).default(50),
  offset: z.coerce.number().int().min(0).default(0),
}).strict();

export type PaginationQuery = z.infer<typeof paginationQuerySchema>;
