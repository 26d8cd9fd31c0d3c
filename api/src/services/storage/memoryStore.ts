/**
 * In-memory storage driver
 *
 * Same contract as the Postgres driver, held in process memory. Selected with
 * STORAGE_DRIVER=memory for local development, and used by the test suite.
 * Nothing survives a restart.
 */

import { randomUUID } from 'node:crypto';
import { ServiceError } from '@/errors/serviceError';
import { assertChunkInput, assertEmbeddingDimension, assertTurnInput } from './validation';
import type {
  ConversationStore,
  DocumentDetail,
  DocumentStore,
  DocumentSummary,
  PageOptions,
  RecentTurn,
  StoreCounts,
  StoredChunk,
  Turn,
  TurnRole,
} from './types';

interface MemoryDocument {
  id: string;
  name: string;
  createdAt: Date;
}

interface MemoryChunk {
  id: number;
  documentId: string;
  position: number;
  content: string;
  embedding: number[];
  createdAt: Date;
}

export class InMemoryStore implements DocumentStore, ConversationStore {
  private readonly documents = new Map<string, MemoryDocument>();
  private chunks: MemoryChunk[] = [];
  private readonly turns: Turn[] = [];
  private nextChunkId = 1;
  private nextTurnId = 1;

  async createDocument(name: string): Promise<string> {
    const id = randomUUID();
    this.documents.set(id, { id, name, createdAt: new Date() });
    return id;
  }

  async addChunk(documentId: string, content: string, embedding: number[]): Promise<void> {
    assertChunkInput(content, embedding);
    if (!this.documents.has(documentId)) {
      throw new ServiceError('NOT_FOUND', `Document ${documentId} not found`);
    }
    assertEmbeddingDimension(this.chunks[0]?.embedding.length ?? null, embedding);

    const position = this.chunks.filter((chunk) => chunk.documentId === documentId).length;
    this.chunks.push({
      id: this.nextChunkId++,
      documentId,
      position,
      content,
      embedding: [...embedding],
      createdAt: new Date(),
    });
  }

  async allChunks(): Promise<StoredChunk[]> {
    return this.chunks.map((chunk) => ({ content: chunk.content, embedding: [...chunk.embedding] }));
  }

  async counts(): Promise<StoreCounts> {
    return {
      documents: this.documents.size,
      chunks: this.chunks.length,
      turns: this.turns.length,
    };
  }

  async listDocuments(page: PageOptions): Promise<{ documents: DocumentSummary[]; total: number }> {
    // Newest first; later inserts win ties on identical timestamps
    const ordered = [...this.documents.values()].reverse().sort(
      (a, b) => b.createdAt.getTime() - a.createdAt.getTime()
    );

    const documents = ordered.slice(page.offset, page.offset + page.limit).map((document) => ({
      ...document,
      chunkCount: this.chunks.filter((chunk) => chunk.documentId === document.id).length,
    }));

    return { documents, total: this.documents.size };
  }

  async getDocument(documentId: string): Promise<DocumentDetail | null> {
    const document = this.documents.get(documentId);
    if (!document) return null;

    const chunks = this.chunks
      .filter((chunk) => chunk.documentId === documentId)
      .sort((a, b) => a.position - b.position)
      .map(({ id, position, content, createdAt }) => ({ id, position, content, createdAt }));

    return { ...document, chunks };
  }

  async deleteDocument(documentId: string): Promise<boolean> {
    if (!this.documents.delete(documentId)) return false;
    this.chunks = this.chunks.filter((chunk) => chunk.documentId !== documentId);
    return true;
  }

  async appendTurn(conversationId: string, role: TurnRole, content: string): Promise<void> {
    assertTurnInput(conversationId, role, content);
    this.turns.push({
      id: this.nextTurnId++,
      conversationId,
      role,
      content,
      createdAt: new Date(),
    });
  }

  async recentTurns(conversationId: string, limit: number): Promise<RecentTurn[]> {
    const conversation = this.turns.filter((turn) => turn.conversationId === conversationId);
    return conversation
      .slice(Math.max(0, conversation.length - limit))
      .map(({ role, content }) => ({ role, content }));
  }

  async listTurns(conversationId: string, page: PageOptions): Promise<{ turns: Turn[]; total: number }> {
    const conversation = this.turns.filter((turn) => turn.conversationId === conversationId);
    return {
      turns: conversation.slice(page.offset, page.offset + page.limit).map((turn) => ({ ...turn })),
      total: conversation.length,
    };
  }
}
