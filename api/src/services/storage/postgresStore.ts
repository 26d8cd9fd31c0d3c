/**
 * Postgres storage driver
 *
 * Documents, chunks and turns live in three tables (see db/schema.ts).
 * Every write is a single statement, so a chunk or turn is either fully
 * visible or not at all, and deleting a document removes its chunks through
 * ON DELETE CASCADE.
 */

import { asc, count, desc, eq, sql } from 'drizzle-orm';
import type { Database } from '@/db/client';
import { chunks, documents, messages } from '@/db/schema';
import { withStorageErrors } from './storageErrors';
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

export class PostgresStore implements DocumentStore, ConversationStore {
  constructor(private readonly db: Database) {}

  async createDocument(name: string): Promise<string> {
    return withStorageErrors('createDocument', async () => {
      const [row] = await this.db
        .insert(documents)
        .values({ name })
        .returning({ id: documents.id });
      return row.id;
    });
  }

  async addChunk(documentId: string, content: string, embedding: number[]): Promise<void> {
    assertChunkInput(content, embedding);

    await withStorageErrors('addChunk', async () => {
      const [sample] = await this.db
        .select({ dimension: sql<number | null>`array_length(${chunks.embedding}, 1)` })
        .from(chunks)
        .limit(1);
      assertEmbeddingDimension(sample?.dimension ?? null, embedding);

      // Position is assigned in the same statement as the insert
      await this.db.insert(chunks).values({
        documentId,
        content,
        embedding,
        position: sql`(SELECT COALESCE(MAX(${chunks.position}), -1) + 1 FROM ${chunks} WHERE ${chunks.documentId} = ${documentId})`,
      });
    });
  }

  async allChunks(): Promise<StoredChunk[]> {
    return withStorageErrors('allChunks', async () => {
      const rows = await this.db
        .select({ content: chunks.content, embedding: chunks.embedding })
        .from(chunks);
      return rows;
    });
  }

  async counts(): Promise<StoreCounts> {
    return withStorageErrors('counts', async () => {
      const [[documentRow], [chunkRow], [turnRow]] = await Promise.all([
        this.db.select({ value: count() }).from(documents),
        this.db.select({ value: count() }).from(chunks),
        this.db.select({ value: count() }).from(messages),
      ]);
      return {
        documents: documentRow?.value ?? 0,
        chunks: chunkRow?.value ?? 0,
        turns: turnRow?.value ?? 0,
      };
    });
  }

  async listDocuments(page: PageOptions): Promise<{ documents: DocumentSummary[]; total: number }> {
    return withStorageErrors('listDocuments', async () => {
      const [rows, [totalRow]] = await Promise.all([
        this.db
          .select({
            id: documents.id,
            name: documents.name,
            createdAt: documents.createdAt,
            chunkCount: count(chunks.id),
          })
          .from(documents)
          .leftJoin(chunks, eq(chunks.documentId, documents.id))
          .groupBy(documents.id)
          .orderBy(desc(documents.createdAt), desc(documents.id))
          .limit(page.limit)
          .offset(page.offset),
        this.db.select({ value: count() }).from(documents),
      ]);

      return { documents: rows, total: totalRow?.value ?? 0 };
    });
  }

  async getDocument(documentId: string): Promise<DocumentDetail | null> {
    return withStorageErrors('getDocument', async () => {
      const [document] = await this.db
        .select()
        .from(documents)
        .where(eq(documents.id, documentId))
        .limit(1);
      if (!document) return null;

      const chunkRows = await this.db
        .select({
          id: chunks.id,
          position: chunks.position,
          content: chunks.content,
          createdAt: chunks.createdAt,
        })
        .from(chunks)
        .where(eq(chunks.documentId, documentId))
        .orderBy(asc(chunks.position), asc(chunks.id));

      return { ...document, chunks: chunkRows };
    });
  }

  async deleteDocument(documentId: string): Promise<boolean> {
    return withStorageErrors('deleteDocument', async () => {
      const deleted = await this.db
        .delete(documents)
        .where(eq(documents.id, documentId))
        .returning({ id: documents.id });
      return deleted.length > 0;
    });
  }

  async appendTurn(conversationId: string, role: TurnRole, content: string): Promise<void> {
    assertTurnInput(conversationId, role, content);
    await withStorageErrors('appendTurn', async () => {
      await this.db.insert(messages).values({ conversationId, role, content });
    });
  }

  async recentTurns(conversationId: string, limit: number): Promise<RecentTurn[]> {
    return withStorageErrors('recentTurns', async () => {
      const rows = await this.db
        .select({ role: messages.role, content: messages.content })
        .from(messages)
        .where(eq(messages.conversationId, conversationId))
        .orderBy(desc(messages.id))
        .limit(limit);
      return rows.reverse();
    });
  }

  async listTurns(conversationId: string, page: PageOptions): Promise<{ turns: Turn[]; total: number }> {
    return withStorageErrors('listTurns', async () => {
      const [rows, [totalRow]] = await Promise.all([
        this.db
          .select()
          .from(messages)
          .where(eq(messages.conversationId, conversationId))
          .orderBy(asc(messages.id))
          .limit(page.limit)
          .offset(page.offset),
        this.db
          .select({ value: count() })
          .from(messages)
          .where(eq(messages.conversationId, conversationId)),
      ]);

      return { turns: rows, total: totalRow?.value ?? 0 };
    });
  }
}
