import { describe, it, expect } from 'vitest';
import { cosineSimilarity } from '@/utils/vectorMath';
import { ServiceError } from '@/errors/serviceError';

describe('cosineSimilarity', () => {
  it('returns 1 for a vector compared with itself', () => {
    expect(cosineSimilarity([0.3, -1.2, 4], [0.3, -1.2, 4])).toBeCloseTo(1, 12);
  });

  it('ignores magnitude', () => {
    expect(cosineSimilarity([1, 2, 3], [2, 4, 6])).toBeCloseTo(1, 12);
  });

  it('returns 0 for orthogonal vectors', () => {
    expect(cosineSimilarity([1, 0], [0, 1])).toBe(0);
  });

  it('returns -1 for opposite vectors', () => {
    expect(cosineSimilarity([1, 0], [-1, 0])).toBe(-1);
  });

  it('returns 0 when either vector has zero magnitude', () => {
    expect(cosineSimilarity([0, 0, 0], [1, 2, 3])).toBe(0);
    expect(cosineSimilarity([1, 2, 3], [0, 0, 0])).toBe(0);
  });

  it('stays within [-1, 1]', () => {
    const pairs: Array<[number[], number[]]> = [
      [[0.1, 0.2, 0.3], [0.1, 0.2, 0.3]],
      [[1e-8, 3, -7], [5, -2, 0.5]],
      [[-3, -3], [3, 3]],
    ];
    for (const [a, b] of pairs) {
      const score = cosineSimilarity(a, b);
      expect(score).toBeGreaterThanOrEqual(-1);
      expect(score).toBeLessThanOrEqual(1);
    }
  });

  it('rejects vectors of different lengths', () => {
    expect.assertions(2);
    expect(() => cosineSimilarity([1, 2], [1, 2, 3])).toThrow(ServiceError);
    try {
      cosineSimilarity([1, 2], [1, 2, 3]);
    } catch (error) {
      expect(error).toMatchObject({ code: 'INVALID_INPUT', status: 400 });
    }
  });
});
