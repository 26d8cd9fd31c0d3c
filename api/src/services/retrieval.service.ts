/**
 * Retrieval Service
 *
 * Brute-force top-K ranking over every stored chunk: one cosine similarity
 * per chunk, O(chunks x dimension) per query, no index. Deployments that need
 * sub-linear lookups replace this module behind the same `topK` contract.
 */

import { ServiceError } from '@/errors/serviceError';
import { cosineSimilarity } from '@/utils/vectorMath';
import type { DocumentStore } from '@/services/storage/types';

export const DEFAULT_TOP_K = 4;

export interface RankedChunk {
  content: string;
  score: number;
}

export class Retriever {
  constructor(private readonly documents: Pick<DocumentStore, 'allChunks'>) {}

  /**
   * Score every chunk against the query and keep the best `k`.
   * Equal scores keep the store's scan order.
   */
  async rank(queryVector: readonly number[], k: number = DEFAULT_TOP_K): Promise<RankedChunk[]> {
    if (!Number.isInteger(k) || k <= 0) {
      throw new ServiceError('INVALID_INPUT', `k must be a positive integer, got ${k}`);
    }

    const stored = await this.documents.allChunks();
    if (stored.length === 0) return [];

    // Stored chunks share one dimension; a different query length means the
    // embedding model changed since ingestion
    const storedDimension = stored[0].embedding.length;
    if (queryVector.length !== storedDimension) {
      throw new ServiceError(
        'EMBEDDING_UNAVAILABLE',
        `Query embedding has dimension ${queryVector.length}, stored chunks have ${storedDimension}`
      );
    }

    const scored = stored.map((chunk) => ({
      content: chunk.content,
      score: cosineSimilarity(queryVector, chunk.embedding),
    }));

    // Array.prototype.sort is stable, which gives the scan-order tie-break
    scored.sort((a, b) => b.score - a.score);
    return scored.slice(0, k);
  }

  async topK(queryVector: readonly number[], k: number = DEFAULT_TOP_K): Promise<string[]> {
    const ranked = await this.rank(queryVector, k);
    return ranked.map((chunk) => chunk.content);
  }
}
