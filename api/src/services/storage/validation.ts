/**
 * Write-side checks shared by the storage drivers
 */

import { ServiceError } from '@/errors/serviceError';
import type { TurnRole } from './types';

const TURN_ROLES: readonly TurnRole[] = ['user', 'assistant', 'system'];

export function assertChunkInput(content: string, embedding: readonly number[]): void {
  if (content.length === 0) {
    throw new ServiceError('INVALID_INPUT', 'Chunk content must not be empty');
  }
  if (embedding.length === 0) {
    throw new ServiceError('INVALID_INPUT', 'Chunk embedding must not be empty');
  }
  if (!embedding.every((value) => Number.isFinite(value))) {
    throw new ServiceError('INVALID_INPUT', 'Chunk embedding must contain only finite numbers');
  }
}

/**
 * Every stored embedding shares one dimension. `storedDimension` is null
 * while the store holds no chunks.
 */
export function assertEmbeddingDimension(storedDimension: number | null, embedding: readonly number[]): void {
  if (storedDimension !== null && storedDimension !== embedding.length) {
    throw new ServiceError(
      'INVALID_INPUT',
      `Embedding dimension ${embedding.length} does not match stored dimension ${storedDimension}`,
    );
  }
}

export function assertTurnInput(conversationId: string, role: TurnRole, content: string): void {
  if (conversationId.length === 0) {
    throw new ServiceError('INVALID_INPUT', 'Conversation id must not be empty');
  }
  if (!TURN_ROLES.includes(role)) {
    throw new ServiceError('INVALID_INPUT', `Unknown turn role: ${String(role)}`);
  }
  // An empty completion is still recorded so the user turn keeps its reply
  if (content.length === 0 && role !== 'assistant') {
    throw new ServiceError('INVALID_INPUT', 'Turn content must not be empty');
  }
}
