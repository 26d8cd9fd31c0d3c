import { describe, it, expect, beforeEach } from 'vitest';
import { InMemoryStore } from '@/services/storage/memoryStore';

describe('InMemoryStore', () => {
  let store: InMemoryStore;

  beforeEach(() => {
    store = new InMemoryStore();
  });

  describe('documents', () => {
    it('assigns positions in insertion order per document', async () => {
      const a = await store.createDocument('a');
      const b = await store.createDocument('b');
      await store.addChunk(a, 'a0', [1, 0]);
      await store.addChunk(b, 'b0', [0, 1]);
      await store.addChunk(a, 'a1', [1, 1]);

      const document = await store.getDocument(a);
      expect(document?.chunks.map(({ position, content }) => ({ position, content }))).toEqual([
        { position: 0, content: 'a0' },
        { position: 1, content: 'a1' },
      ]);
      expect(await store.allChunks()).toEqual([
        { content: 'a0', embedding: [1, 0] },
        { content: 'b0', embedding: [0, 1] },
        { content: 'a1', embedding: [1, 1] },
      ]);
    });

    it('rejects a chunk for a missing document', async () => {
      await expect(
        store.addChunk('00000000-0000-4000-8000-000000000000', 'orphan', [1])
      ).rejects.toMatchObject({ code: 'NOT_FOUND' });
    });

    it('rejects empty content and empty or non-finite embeddings', async () => {
      const id = await store.createDocument('doc');
      await expect(store.addChunk(id, '', [1])).rejects.toMatchObject({ code: 'INVALID_INPUT' });
      await expect(store.addChunk(id, 'text', [])).rejects.toMatchObject({ code: 'INVALID_INPUT' });
      await expect(store.addChunk(id, 'text', [Number.NaN])).rejects.toMatchObject({
        code: 'INVALID_INPUT',
      });
    });

    it('keeps one embedding dimension across the store', async () => {
      const id = await store.createDocument('doc');
      await store.addChunk(id, 'first', [1, 0, 0]);
      await expect(store.addChunk(id, 'second', [1, 0])).rejects.toMatchObject({
        code: 'INVALID_INPUT',
      });
    });

    it('hands out copies of stored embeddings', async () => {
      const id = await store.createDocument('doc');
      const input = [1, 0];
      await store.addChunk(id, 'text', input);
      input[0] = 9;

      const [first] = await store.allChunks();
      first.embedding[1] = 9;

      expect(await store.allChunks()).toEqual([{ content: 'text', embedding: [1, 0] }]);
    });

    it('deletes a document together with its chunks', async () => {
      const keep = await store.createDocument('keep');
      const drop = await store.createDocument('drop');
      await store.addChunk(keep, 'kept', [1]);
      await store.addChunk(drop, 'dropped', [1]);

      await expect(store.deleteDocument(drop)).resolves.toBe(true);
      await expect(store.deleteDocument(drop)).resolves.toBe(false);
      expect(await store.getDocument(drop)).toBeNull();
      expect(await store.allChunks()).toEqual([{ content: 'kept', embedding: [1] }]);
    });

    it('lists documents newest first with chunk counts', async () => {
      const first = await store.createDocument('first');
      await store.createDocument('second');
      await store.addChunk(first, 'x', [1]);
      await store.addChunk(first, 'y', [1]);

      const page = await store.listDocuments({ limit: 10, offset: 0 });
      expect(page.total).toBe(2);
      expect(page.documents.map(({ name, chunkCount }) => ({ name, chunkCount }))).toEqual([
        { name: 'second', chunkCount: 0 },
        { name: 'first', chunkCount: 2 },
      ]);

      const second = await store.listDocuments({ limit: 1, offset: 1 });
      expect(second.documents.map((document) => document.name)).toEqual(['first']);
    });
  });

  describe('conversations', () => {
    it('returns the most recent turns oldest first', async () => {
      await store.appendTurn('c1', 'user', 'one');
      await store.appendTurn('c1', 'assistant', 'two');
      await store.appendTurn('c1', 'user', 'three');

      expect(await store.recentTurns('c1', 2)).toEqual([
        { role: 'assistant', content: 'two' },
        { role: 'user', content: 'three' },
      ]);
    });

    it('returns nothing for an unknown conversation', async () => {
      expect(await store.recentTurns('missing', 20)).toEqual([]);
    });

    it('rejects an unknown role or empty user content', async () => {
      await expect(store.appendTurn('c1', 'user', '')).rejects.toMatchObject({ code: 'INVALID_INPUT' });
      await expect(store.appendTurn('', 'user', 'hi')).rejects.toMatchObject({ code: 'INVALID_INPUT' });
    });

    it('pages turns with a total', async () => {
      for (const content of ['a', 'b', 'c']) {
        await store.appendTurn('c1', 'user', content);
      }
      await store.appendTurn('c2', 'user', 'other');

      const { turns, total } = await store.listTurns('c1', { limit: 2, offset: 1 });
      expect(total).toBe(3);
      expect(turns.map((turn) => turn.content)).toEqual(['b', 'c']);
    });

    it('counts documents, chunks and turns', async () => {
      const id = await store.createDocument('doc');
      await store.addChunk(id, 'x', [1]);
      await store.appendTurn('c1', 'user', 'hi');
      await store.appendTurn('c1', 'assistant', 'hello');

      expect(await store.counts()).toEqual({ documents: 1, chunks: 1, turns: 2 });
    });
  });
});
