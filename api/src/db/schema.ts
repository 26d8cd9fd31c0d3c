/**
 * Database Schema Definitions
 * Drizzle ORM schema for PostgreSQL
 *
 * Embeddings are stored as plain double precision arrays: retrieval is a
 * full scan ranked in process, so no vector index is needed.
 */

import {
  pgTable,
  uuid,
  varchar,
  text,
  timestamp,
  integer,
  bigserial,
  doublePrecision,
  check,
  index,
} from 'drizzle-orm/pg-core';
import { sql } from 'drizzle-orm';

/**
 * Ingested documents
 */
export const documents = pgTable(
  'documents',
  {
    id: uuid('id').primaryKey().defaultRandom(),
    name: varchar('name', { length: 200 }).notNull(),
    createdAt: timestamp('created_at', { withTimezone: true }).notNull().defaultNow(),
  },
  (table) => ({
    createdAtIdx: index('idx_documents_created_at').on(table.createdAt),
  })
);

/**
 * Embedded document fragments
 */
export const chunks = pgTable(
  'chunks',
  {
    id: bigserial('id', { mode: 'number' }).primaryKey(),
    documentId: uuid('document_id')
      .notNull()
      .references(() => documents.id, { onDelete: 'cascade' }),
    position: integer('position').notNull(),
    content: text('content').notNull(),
    embedding: doublePrecision('embedding').array().notNull(),
    createdAt: timestamp('created_at', { withTimezone: true }).notNull().defaultNow(),
  },
  (table) => ({
    documentPositionIdx: index('idx_chunks_document_position').on(table.documentId, table.position),
    contentCheck: check('chunks_content_check', sql`length(${table.content}) > 0`),
  })
);

/**
 * Conversation turns (append-only)
 */
export const messages = pgTable(
  'messages',
  {
    id: bigserial('id', { mode: 'number' }).primaryKey(),
    conversationId: varchar('conversation_id', { length: 200 }).notNull(),
    role: varchar('role', { length: 20 })
      .notNull()
      .$type<'user' | 'assistant' | 'system'>(),
    content: text('content').notNull(),
    createdAt: timestamp('created_at', { withTimezone: true }).notNull().defaultNow(),
  },
  (table) => ({
    conversationIdx: index('idx_messages_conversation').on(table.conversationId, table.id),
    roleCheck: check('messages_role_check', sql`${table.role} IN ('user', 'assistant', 'system')`),
  })
);

/**
 * DDL applied at startup. Mirrors the table definitions above.
 */
export const SCHEMA_DDL = `
CREATE TABLE IF NOT EXISTS documents (
  id UUID PRIMARY KEY DEFAULT gen_random_uuid(),
  name VARCHAR(200) NOT NULL,
  created_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
);
CREATE INDEX IF NOT EXISTS idx_documents_created_at ON documents (created_at);

CREATE TABLE IF NOT EXISTS chunks (
  id BIGSERIAL PRIMARY KEY,
  document_id UUID NOT NULL REFERENCES documents(id) ON DELETE CASCADE,
  position INTEGER NOT NULL,
  content TEXT NOT NULL CONSTRAINT chunks_content_check CHECK (length(content) > 0),
  embedding DOUBLE PRECISION[] NOT NULL,
  created_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
);
CREATE INDEX IF NOT EXISTS idx_chunks_document_position ON chunks (document_id, position);

CREATE TABLE IF NOT EXISTS messages (
  id BIGSERIAL PRIMARY KEY,
  conversation_id VARCHAR(200) NOT NULL,
  role VARCHAR(20) NOT NULL CONSTRAINT messages_role_check CHECK (role IN ('user', 'assistant', 'system')),
  content TEXT NOT NULL,
  created_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
);
CREATE INDEX IF NOT EXISTS idx_messages_conversation ON messages (conversation_id, id);
`;
