/**
 * Conversation Memory
 *
 * Recent turns of a conversation, shaped as chat messages.
 */

import type { ConversationStore } from '@/services/storage/types';
import type { ChatMessage } from '@/services/llm/types';

export const DEFAULT_HISTORY_LIMIT = 20;

export class ConversationMemory {
  constructor(private readonly conversations: Pick<ConversationStore, 'recentTurns'>) {}

  async loadHistory(conversationId: string, limit: number = DEFAULT_HISTORY_LIMIT): Promise<ChatMessage[]> {
    const turns = await this.conversations.recentTurns(conversationId, limit);
    return turns.map((turn) => ({ role: turn.role, content: turn.content }));
  }
}
