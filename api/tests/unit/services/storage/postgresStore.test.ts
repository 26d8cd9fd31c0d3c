import { describe, it, expect } from 'vitest';
import { PostgresStore } from '@/services/storage/postgresStore';
import { ServiceError } from '@/errors/serviceError';
import { createScriptedDatabase, type QueryResponder } from '../../../helpers/db';

const DOC_ID = '11111111-1111-4111-8111-111111111111';

function storeWith(respond: QueryResponder) {
  const { db, issued } = createScriptedDatabase(respond);
  return { store: new PostgresStore(db), issued };
}

function driverError(code: string) {
  return Object.assign(new Error('driver failure'), { code });
}

describe('PostgresStore', () => {
  describe('addChunk', () => {
    it('rejects an embedding whose dimension differs from the stored chunks', async () => {
      const { store, issued } = storeWith((query) => (query.includes('array_length') ? [[4]] : []));

      const error = await store.addChunk(DOC_ID, 'text', [1, 2, 3]).catch((caught: unknown) => caught);

      expect(error).toBeInstanceOf(ServiceError);
      expect(error).toMatchObject({
        code: 'INVALID_INPUT',
        message: 'Embedding dimension 3 does not match stored dimension 4',
      });
      expect(issued).toHaveLength(1);
      expect(issued[0].query).toContain('array_length');
    });

    it('inserts when the stored dimension matches', async () => {
      const { store, issued } = storeWith((query) => (query.includes('array_length') ? [[3]] : []));

      await store.addChunk(DOC_ID, 'text', [1, 2, 3]);

      expect(issued).toHaveLength(2);
      expect(issued[1].query).toMatch(/^insert into "chunks"/);
    });

    it('inserts the first chunk of an empty store', async () => {
      const { store, issued } = storeWith(() => []);

      await store.addChunk(DOC_ID, 'text', [0.5, 0.5]);

      expect(issued).toHaveLength(2);
      expect(issued[1].query).toMatch(/^insert into "chunks"/);
    });

    it('numbers the chunk from the highest position of its own document', async () => {
      const { store, issued } = storeWith(() => []);

      await store.addChunk(DOC_ID, 'text', [1, 0]);

      const insert = issued[1];
      expect(insert.query).toContain('COALESCE(MAX(');
      expect(insert.query).toContain(', -1) + 1 FROM "chunks" WHERE');
      // once for the document_id column, once inside the position subquery
      expect(insert.params.filter((param) => param === DOC_ID)).toHaveLength(2);
    });

    it('reports a missing document as NOT_FOUND', async () => {
      const { store } = storeWith((query) => {
        if (query.startsWith('insert')) throw driverError('23503');
        return [];
      });

      await expect(store.addChunk(DOC_ID, 'text', [1, 0])).rejects.toMatchObject({
        code: 'NOT_FOUND',
      });
    });

    it('rejects empty content before touching the database', async () => {
      const { store, issued } = storeWith(() => []);

      await expect(store.addChunk(DOC_ID, '', [1, 0])).rejects.toMatchObject({
        code: 'INVALID_INPUT',
      });
      expect(issued).toHaveLength(0);
    });
  });

  describe('recentTurns', () => {
    it('reads newest first with a limit and returns the turns oldest first', async () => {
      const { store, issued } = storeWith(() => [
        ['assistant', 'third'],
        ['user', 'second'],
      ]);

      const turns = await store.recentTurns('c1', 2);

      expect(turns).toEqual([
        { role: 'user', content: 'second' },
        { role: 'assistant', content: 'third' },
      ]);
      expect(issued[0].query).toMatch(/order by "messages"\."id" desc limit \$2$/);
      expect(issued[0].params).toEqual(['c1', 2]);
    });

    it('returns an empty list for an unknown conversation', async () => {
      const { store } = storeWith(() => []);

      await expect(store.recentTurns('unknown', 20)).resolves.toEqual([]);
    });
  });

  describe('counts', () => {
    it('maps the three count queries onto documents, chunks and turns', async () => {
      const { store } = storeWith((query) => {
        if (query.includes('from "documents"')) return [['2']];
        if (query.includes('from "chunks"')) return [['7']];
        return [['5']];
      });

      await expect(store.counts()).resolves.toEqual({ documents: 2, chunks: 7, turns: 5 });
    });

    it('falls back to zero when a count query returns no row', async () => {
      const { store } = storeWith(() => []);

      await expect(store.counts()).resolves.toEqual({ documents: 0, chunks: 0, turns: 0 });
    });
  });

  describe('allChunks', () => {
    it('returns content with its embedding', async () => {
      const { store } = storeWith(() => [['alpha', [1, 0, 0]]]);

      await expect(store.allChunks()).resolves.toEqual([{ content: 'alpha', embedding: [1, 0, 0] }]);
    });
  });

  describe('deleteDocument', () => {
    it('is true only when a row was removed', async () => {
      const removed = storeWith(() => [[DOC_ID]]);
      const missing = storeWith(() => []);

      await expect(removed.store.deleteDocument(DOC_ID)).resolves.toBe(true);
      await expect(missing.store.deleteDocument(DOC_ID)).resolves.toBe(false);
    });
  });

  it('classifies a refused connection as STORAGE_UNAVAILABLE', async () => {
    const { store } = storeWith(() => {
      throw driverError('ECONNREFUSED');
    });

    await expect(store.appendTurn('c1', 'user', 'hi')).rejects.toMatchObject({
      code: 'STORAGE_UNAVAILABLE',
      message: 'Storage unavailable during appendTurn',
    });
  });
});
