import { ContextChatHttpClient } from './http.js';
import { chatMethod, listMessagesMethod } from './methods/chat.js';
import {
  deleteDocumentMethod,
  getDocumentMethod,
  ingestMethod,
  listDocumentsMethod,
} from './methods/documents.js';
import { healthMethod, statsMethod } from './methods/stats.js';
import type {
  ChatInput,
  ChatResult,
  ContextChatClientConfig,
  DocumentDetail,
  HealthResult,
  IngestInput,
  IngestResult,
  ListDocumentsResult,
  ListMessagesResult,
  PageInput,
  StatsResult,
} from './types.js';

export class ContextChatClient {
  private readonly http: ContextChatHttpClient;

  constructor(config: ContextChatClientConfig = {}) {
    this.http = new ContextChatHttpClient(config);
  }

  async ingest(input: IngestInput): Promise<IngestResult> {
    return ingestMethod(this.http, input);
  }

  async listDocuments(input: PageInput = {}): Promise<ListDocumentsResult> {
    return listDocumentsMethod(this.http, input);
  }

  async getDocument(documentId: string): Promise<DocumentDetail> {
    return getDocumentMethod(this.http, documentId);
  }

  async deleteDocument(documentId: string): Promise<void> {
    return deleteDocumentMethod(this.http, documentId);
  }

  async chat(input: ChatInput): Promise<ChatResult> {
    return chatMethod(this.http, input);
  }

  async listMessages(conversationId: string, input: PageInput = {}): Promise<ListMessagesResult> {
    return listMessagesMethod(this.http, conversationId, input);
  }

  async stats(): Promise<StatsResult> {
    return statsMethod(this.http);
  }

  async health(): Promise<HealthResult> {
    return healthMethod(this.http);
  }
}
