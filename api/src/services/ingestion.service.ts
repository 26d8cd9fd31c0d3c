/**
 * Ingestion Service
 *
 * Split, embed, then write. Every fragment is embedded before the document
 * row exists, so an embedding failure leaves storage untouched. A failed
 * chunk write removes the document again (its chunks go with it).
 */

import { ServiceError } from '@/errors/serviceError';
import { describeError, logger } from '@/utils/logger';
import { DEFAULT_CHUNK_MAX_LENGTH, splitText } from './chunker';
import type { EmbeddingClient } from './llm/types';
import type { DocumentStore } from './storage/types';

export const MAX_DOCUMENT_NAME_LENGTH = 200;

export interface IngestionResult {
  documentId: string;
  chunksAdded: number;
}

export interface StatsResult {
  messages: number;
  documents: number;
  chunks: number;
}

export class IngestionService {
  constructor(
    private readonly documents: DocumentStore,
    private readonly embeddings: Pick<EmbeddingClient, 'embedMany'>,
    private readonly chunkMaxLength: number = DEFAULT_CHUNK_MAX_LENGTH
  ) {}

  async ingest(name: string, text: string): Promise<IngestionResult> {
    const trimmedName = name.trim();
    if (trimmedName.length === 0 || trimmedName.length > MAX_DOCUMENT_NAME_LENGTH) {
      throw new ServiceError(
        'INVALID_INPUT',
        `Document name must be 1-${MAX_DOCUMENT_NAME_LENGTH} characters`
      );
    }

    const fragments = splitText(text, this.chunkMaxLength);
    const vectors = fragments.length > 0 ? await this.embeddings.embedMany(fragments) : [];
    if (vectors.length !== fragments.length) {
      throw new ServiceError(
        'EMBEDDING_UNAVAILABLE',
        `Expected ${fragments.length} embeddings, received ${vectors.length}`
      );
    }

    const documentId = await this.documents.createDocument(trimmedName);

    try {
      for (let i = 0; i < fragments.length; i++) {
        await this.documents.addChunk(documentId, fragments[i], vectors[i]);
      }
    } catch (error) {
      await this.discardDocument(documentId);
      throw error;
    }

    logger.info('document ingested', {
      documentId,
      chunksAdded: fragments.length,
      textLength: text.length,
    });

    return { documentId, chunksAdded: fragments.length };
  }

  async stats(): Promise<StatsResult> {
    const counts = await this.documents.counts();
    return {
      messages: counts.turns,
      documents: counts.documents,
      chunks: counts.chunks,
    };
  }

  private async discardDocument(documentId: string): Promise<void> {
    try {
      await this.documents.deleteDocument(documentId);
    } catch (cleanupError) {
      // The original failure is the one rethrown; this one is only logged
      logger.error('Failed to remove partially ingested document', {
        documentId,
        ...describeError(cleanupError),
      });
    }
  }
}
