/**
 * Service wiring
 *
 * Builds the storage driver, the model backends and the services on top of
 * them from one AppConfig. Tests pass their own store and backends through
 * `overrides`.
 */

import type { AppConfig } from '@/config';
import { getDatabase, initDatabase } from '@/db/client';
import { ChatService } from './chat.service';
import { ConversationMemory } from './conversationMemory.service';
import { IngestionService } from './ingestion.service';
import { OpenAiEmbeddingClient, OpenAiGenerationClient } from './llm/openai';
import type { EmbeddingClient, GenerationClient } from './llm/types';
import { Retriever } from './retrieval.service';
import { InMemoryStore } from './storage/memoryStore';
import { PostgresStore } from './storage/postgresStore';
import type { ConversationStore, DocumentStore } from './storage/types';

export type Store = DocumentStore & ConversationStore;

export interface AppServices {
  store: Store;
  chat: ChatService;
  ingestion: IngestionService;
}

export interface ServiceOverrides {
  store?: Store;
  embeddings?: EmbeddingClient;
  generation?: GenerationClient;
}

function createStore(config: AppConfig): Store {
  if (config.storage.driver === 'memory') {
    return new InMemoryStore();
  }

  if (!config.storage.databaseUrl) {
    throw new Error('DATABASE_URL is required when STORAGE_DRIVER is postgres');
  }
  initDatabase({ url: config.storage.databaseUrl, poolSize: config.storage.poolSize });
  return new PostgresStore(getDatabase());
}

export function createServices(config: AppConfig, overrides: ServiceOverrides = {}): AppServices {
  const store = overrides.store ?? createStore(config);

  const embeddings =
    overrides.embeddings ??
    new OpenAiEmbeddingClient(
      {
        apiKey: config.llm.apiKey,
        baseUrl: config.llm.baseUrl,
        model: config.llm.embeddingModel,
        timeoutMs: config.llm.timeoutMs,
      },
      config.llm.embeddingBatchSize
    );

  const generation =
    overrides.generation ??
    new OpenAiGenerationClient({
      apiKey: config.llm.apiKey,
      baseUrl: config.llm.baseUrl,
      model: config.llm.chatModel,
      timeoutMs: config.llm.timeoutMs,
    });

  const chat = new ChatService({
    memory: new ConversationMemory(store),
    retriever: new Retriever(store),
    conversations: store,
    embeddings,
    generation,
    topK: config.rag.topK,
    historyLimit: config.rag.historyLimit,
  });

  const ingestion = new IngestionService(store, embeddings, config.rag.chunkMaxLength);

  return { store, chat, ingestion };
}
