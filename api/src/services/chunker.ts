/**
 * Chunker
 *
 * Splits ingested text into contiguous fragments for embedding. Lengths are
 * counted in Unicode code points so surrogate pairs stay intact.
 */

import { ServiceError } from '@/errors/serviceError';

export const DEFAULT_CHUNK_MAX_LENGTH = 800;

/**
 * Partition the trimmed text into fragments of at most `maxLength` code points.
 *
 * Joining the result reproduces `text.trim()` exactly. Empty input yields [].
 */
export function splitText(text: string, maxLength: number = DEFAULT_CHUNK_MAX_LENGTH): string[] {
  if (!Number.isInteger(maxLength) || maxLength <= 0) {
    throw new ServiceError('INVALID_INPUT', `maxLength must be a positive integer, got ${maxLength}`);
  }

  const codePoints = Array.from(text.trim());
  const fragments: string[] = [];
  for (let start = 0; start < codePoints.length; start += maxLength) {
    fragments.push(codePoints.slice(start, start + maxLength).join(''));
  }
  return fragments;
}
