import type { TurnRole } from '@/services/storage/types';

export interface ChatMessage {
  role: TurnRole;
  content: string;
}

/**
 * Text embedding backend. Rejects with a classified ServiceError.
 */
export interface EmbeddingClient {
  embed(text: string): Promise<number[]>;
  embedMany(texts: string[]): Promise<number[][]>;
}

/**
 * Chat generation backend. Resolves to '' when the model returns no content.
 */
export interface GenerationClient {
  generate(messages: ChatMessage[]): Promise<string>;
}

export type FetchLike = (url: string, init?: RequestInit) => Promise<Response>;

export interface OpenAiClientOptions {
  apiKey?: string;
  baseUrl: string;
  model: string;
  timeoutMs: number;
  fetch?: FetchLike;
}
