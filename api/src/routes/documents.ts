/**
 * Document Routes
 *
 * Ingest, browse and delete source documents
 */

import { Hono } from 'hono';
import { zValidator } from '@hono/zod-validator';
import type { AppServices } from '@/services/container';
import { ServiceError } from '@/errors/serviceError';
import { expensiveOperationRateLimit } from '@/middleware/rateLimit';
import { paginationQuerySchema, rejectInvalid } from '@/validators/common';
import { createDocumentSchema, documentIdSchema } from '@/validators/documents';

export function createDocumentRoutes(services: AppServices) {
  const documents = new Hono();

  /**
   * POST /v1/documents
   *
   * Split, embed and store a document
   */
  documents.post(
    '/',
    expensiveOperationRateLimit,
    zValidator('json', createDocumentSchema, rejectInvalid),
    async (c) => {
      const { name, text } = c.req.valid('json');
      const result = await services.ingestion.ingest(name, text);
      return c.json({ data: result }, 201);
    }
  );

  /**
   * GET /v1/documents
   *
   * Newest first, with chunk counts
   */
  documents.get('/', zValidator('query', paginationQuerySchema, rejectInvalid), async (c) => {
    const { limit, offset } = c.req.valid('query');
    const { documents: entries, total } = await services.store.listDocuments({ limit, offset });

    return c.json({
      data: entries,
      meta: { total, limit, offset },
    });
  });

  /**
   * GET /v1/documents/:id
   */
  documents.get('/:id', zValidator('param', documentIdSchema, rejectInvalid), async (c) => {
    const { id } = c.req.valid('param');
    const document = await services.store.getDocument(id);
    if (!document) {
      throw new ServiceError('NOT_FOUND', `Document ${id} not found`);
    }
    return c.json({ data: document });
  });

  /**
   * DELETE /v1/documents/:id
   *
   * Removes the document and all of its chunks
   */
  documents.delete('/:id', zValidator('param', documentIdSchema, rejectInvalid), async (c) => {
    const { id } = c.req.valid('param');
    const deleted = await services.store.deleteDocument(id);
    if (!deleted) {
      throw new ServiceError('NOT_FOUND', `Document ${id} not found`);
    }
    return c.json({ data: { deleted: true } });
  });

  return documents;
}
