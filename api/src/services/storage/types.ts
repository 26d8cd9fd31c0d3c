/**
 * Storage contracts for documents, chunks and conversation turns.
 *
 * Two drivers implement them: Postgres (durable) and in-memory (local
 * development and tests). Every method either resolves or rejects with a
 * ServiceError.
 */

export type TurnRole = 'user' | 'assistant' | 'system';

export interface StoredChunk {
  content: string;
  embedding: number[];
}

export interface StoreCounts {
  documents: number;
  chunks: number;
  turns: number;
}

export interface DocumentSummary {
  id: string;
  name: string;
  chunkCount: number;
  createdAt: Date;
}

export interface DocumentChunkRecord {
  id: number;
  position: number;
  content: string;
  createdAt: Date;
}

export interface DocumentDetail {
  id: string;
  name: string;
  createdAt: Date;
  chunks: DocumentChunkRecord[];
}

export interface Turn {
  id: number;
  conversationId: string;
  role: TurnRole;
  content: string;
  createdAt: Date;
}

export interface RecentTurn {
  role: TurnRole;
  content: string;
}

export interface PageOptions {
  limit: number;
  offset: number;
}

export interface DocumentStore {
  createDocument(name: string): Promise<string>;
  /**
   * Rejects with NOT_FOUND when the document is missing and with
   * INVALID_INPUT when the embedding dimension differs from stored chunks.
   */
  addChunk(documentId: string, content: string, embedding: number[]): Promise<void>;
  /** Full scan, unordered. Used only by retrieval. */
  allChunks(): Promise<StoredChunk[]>;
  counts(): Promise<StoreCounts>;
  listDocuments(page: PageOptions): Promise<{ documents: DocumentSummary[]; total: number }>;
  getDocument(documentId: string): Promise<DocumentDetail | null>;
  /** Deletes the document and its chunks in one step. Resolves false when absent. */
  deleteDocument(documentId: string): Promise<boolean>;
}

export interface ConversationStore {
  appendTurn(conversationId: string, role: TurnRole, content: string): Promise<void>;
  /** Up to `limit` most recent turns, oldest first. */
  recentTurns(conversationId: string, limit: number): Promise<RecentTurn[]>;
  listTurns(conversationId: string, page: PageOptions): Promise<{ turns: Turn[]; total: number }>;
}
