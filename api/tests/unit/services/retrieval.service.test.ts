import { describe, it, expect, vi } from 'vitest';
import { DEFAULT_TOP_K, Retriever } from '@/services/retrieval.service';
import type { StoredChunk } from '@/services/storage/types';

function storeWith(chunks: StoredChunk[]) {
  return { allChunks: vi.fn(async () => chunks) };
}

const COMPASS: StoredChunk[] = [
  { content: 'north', embedding: [0, 1] },
  { content: 'west', embedding: [-1, 0] },
  { content: 'east', embedding: [1, 0] },
  { content: 'northeast', embedding: [1, 1] },
];

describe('Retriever', () => {
  it('returns nothing for an empty store', async () => {
    const retriever = new Retriever(storeWith([]));
    await expect(retriever.topK([1, 0], 4)).resolves.toEqual([]);
  });

  it('returns the k most similar fragments, best first', async () => {
    const retriever = new Retriever(storeWith(COMPASS));
    await expect(retriever.topK([1, 0], 2)).resolves.toEqual(['east', 'northeast']);
  });

  it('returns every fragment when k exceeds the store size', async () => {
    const retriever = new Retriever(storeWith(COMPASS));
    await expect(retriever.topK([1, 0], 10)).resolves.toEqual(['east', 'northeast', 'north', 'west']);
  });

  it('produces non-increasing scores', async () => {
    const retriever = new Retriever(storeWith(COMPASS));
    const ranked = await retriever.rank([0.2, 0.9], 4);
    for (let i = 1; i < ranked.length; i++) {
      expect(ranked[i - 1].score).toBeGreaterThanOrEqual(ranked[i].score);
    }
  });

  it('keeps scan order for equal scores', async () => {
    const retriever = new Retriever(
      storeWith([
        { content: 'first', embedding: [2, 0] },
        { content: 'orthogonal', embedding: [0, 3] },
        { content: 'second', embedding: [1, 0] },
        { content: 'third', embedding: [5, 0] },
      ])
    );
    await expect(retriever.topK([1, 0], 3)).resolves.toEqual(['first', 'second', 'third']);
  });

  it(`defaults to k = ${DEFAULT_TOP_K}`, async () => {
    const chunks = Array.from({ length: 6 }, (_, i) => ({ content: `chunk-${i}`, embedding: [1, i] }));
    const retriever = new Retriever(storeWith(chunks));
    const result = await retriever.topK([1, 0]);
    expect(DEFAULT_TOP_K).toBe(4);
    expect(result).toHaveLength(4);
  });

  it('rejects k below 1 without reading the store', async () => {
    const store = storeWith(COMPASS);
    const retriever = new Retriever(store);
    await expect(retriever.topK([1, 0], 0)).rejects.toMatchObject({ code: 'INVALID_INPUT' });
    expect(store.allChunks).not.toHaveBeenCalled();
  });

  it('reports a query dimension that differs from the stored chunks as an embedding fault', async () => {
    const retriever = new Retriever(storeWith(COMPASS));
    await expect(retriever.topK([1, 0, 0], 2)).rejects.toMatchObject({
      code: 'EMBEDDING_UNAVAILABLE',
      message: 'Query embedding has dimension 3, stored chunks have 2',
    });
  });
});
