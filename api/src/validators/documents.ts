/**
 * Document Validation Schemas
 */

import { z } from 'zod';

/**
 * POST /v1/documents
 */
export const createDocumentSchema = z.object({
  name: z.string().trim().min(1).max(200),
  text: z.string().max(2_000_000),
}).strict();

/**
 * Document ID path parameter
 */
export const documentIdSchema = z.object({
  id: z.string().uuid(),
}).strict();
