/**
 * Vector Math
 */

import { ServiceError } from '@/errors/serviceError';

/**
 * Cosine similarity of two equal-length vectors.
 *
 * Returns 0 when either vector has zero magnitude so that ranking stays total.
 * Throws INVALID_INPUT when the lengths differ.
 */
export function cosineSimilarity(a: readonly number[], b: readonly number[]): number {
  if (a.length !== b.length) {
    throw new ServiceError(
      'INVALID_INPUT',
      `Vector length mismatch: ${a.length} vs ${b.length}`,
    );
  }

  let dot = 0;
  let normA = 0;
  let normB = 0;
  for (let i = 0; i < a.length; i += 1) {
    dot += a[i] * b[i];
    normA += a[i] * a[i];
    normB += b[i] * b[i];
  }

  if (normA === 0 || normB === 0) return 0;

  const similarity = dot / (Math.sqrt(normA) * Math.sqrt(normB));
  // Float drift can push identical vectors a hair past 1
  return Math.min(1, Math.max(-1, similarity));
}
