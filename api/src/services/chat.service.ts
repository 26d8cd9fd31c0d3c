/**
 * Chat Service
 *
 * One request, strictly in this order:
 *   1. load recent turns
 *   2. embed the user message
 *   3. retrieve the closest fragments
 *   4. assemble [context system message] + history + user message
 *   5. generate
 *   6. persist the user turn, then the assistant turn
 *
 * A failure in steps 2-5 aborts the request before anything is written.
 * There are no retries.
 */

import { ServiceError } from '@/errors/serviceError';
import { logger } from '@/utils/logger';
import { DEFAULT_HISTORY_LIMIT, type ConversationMemory } from './conversationMemory.service';
import { DEFAULT_TOP_K, type Retriever } from './retrieval.service';
import type { ChatMessage, EmbeddingClient, GenerationClient } from './llm/types';
import type { ConversationStore } from './storage/types';

export const CONTEXT_PREFIX = 'Use the following context from ingested documents when it is relevant:\n\n';
export const CONTEXT_SEPARATOR = '\n\n---\n\n';

export interface ChatServiceDeps {
  memory: ConversationMemory;
  retriever: Retriever;
  conversations: Pick<ConversationStore, 'appendTurn'>;
  embeddings: Pick<EmbeddingClient, 'embed'>;
  generation: GenerationClient;
  topK?: number;
  historyLimit?: number;
}

export interface ChatResult {
  responseText: string;
}

/**
 * Build the prompt sent to the generation backend. The context message,
 * when there is one, always comes first.
 */
export function assembleMessages(
  fragments: string[],
  history: ChatMessage[],
  userMessage: string
): ChatMessage[] {
  const messages: ChatMessage[] = [];
  if (fragments.length > 0) {
    messages.push({
      role: 'system',
      content: CONTEXT_PREFIX + fragments.join(CONTEXT_SEPARATOR),
    });
  }
  messages.push(...history);
  messages.push({ role: 'user', content: userMessage });
  return messages;
}

export class ChatService {
  private readonly topK: number;
  private readonly historyLimit: number;

  constructor(private readonly deps: ChatServiceDeps) {
    this.topK = deps.topK ?? DEFAULT_TOP_K;
    this.historyLimit = deps.historyLimit ?? DEFAULT_HISTORY_LIMIT;
  }

  async chat(conversationId: string, message: string): Promise<ChatResult> {
    if (conversationId.trim().length === 0) {
      throw new ServiceError('INVALID_INPUT', 'conversationId must not be empty');
    }
    if (message.trim().length === 0) {
      throw new ServiceError('INVALID_INPUT', 'message must not be empty');
    }

    const startedAt = Date.now();

    const history = await this.deps.memory.loadHistory(conversationId, this.historyLimit);
    const queryVector = await this.deps.embeddings.embed(message);
    const fragments = await this.deps.retriever.topK(queryVector, this.topK);

    const responseText = await this.deps.generation.generate(
      assembleMessages(fragments, history, message)
    );

    await this.deps.conversations.appendTurn(conversationId, 'user', message);
    await this.deps.conversations.appendTurn(conversationId, 'assistant', responseText);

    logger.info('chat completed', {
      conversationId,
      historySize: history.length,
      retrievedCount: fragments.length,
      responseLength: responseText.length,
      latencyMs: Date.now() - startedAt,
    });

    return { responseText };
  }
}
