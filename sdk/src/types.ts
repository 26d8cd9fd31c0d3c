export type FetchLike = (url: string, init?: RequestInit) => Promise<Response>;

export interface ContextChatClientConfig {
  /** Server origin. Defaults to http://localhost:3000 */
  baseUrl?: string;
  /** Sent as X-API-Key when the server requires one */
  apiKey?: string;
  fetch?: FetchLike;
  defaultHeaders?: Record<string, string>;
  timeoutMs?: number;
}

export interface PageInput {
  limit?: number;
  offset?: number;
}

export interface PageMeta {
  total: number;
  limit: number;
  offset: number;
}

export interface IngestInput {
  name: string;
  text: string;
}

export interface IngestResult {
  documentId: string;
  chunksAdded: number;
}

export interface DocumentSummary {
  id: string;
  name: string;
  chunkCount: number;
  createdAt: string;
}

export interface ListDocumentsResult {
  documents: DocumentSummary[];
  meta: PageMeta;
}

export interface DocumentChunk {
  id: number;
  position: number;
  content: string;
  createdAt: string;
}

export interface DocumentDetail {
  id: string;
  name: string;
  createdAt: string;
  chunks: DocumentChunk[];
}

export interface ChatInput {
  conversationId: string;
  message: string;
}

export interface ChatResult {
  conversationId: string;
  response: string;
}

export type MessageRole = 'user' | 'assistant' | 'system';

export interface ConversationMessage {
  id: number;
  conversationId: string;
  role: MessageRole;
  content: string;
  createdAt: string;
}

export interface ListMessagesResult {
  messages: ConversationMessage[];
  meta: PageMeta;
}

export interface StatsResult {
  messages: number;
  documents: number;
  chunks: number;
}

export interface HealthResult {
  status: string;
  timestamp: string;
  version: string;
}
