import { ContextChatValidationError } from '../errors.js';
import { ContextChatHttpClient } from '../http.js';
import { requireId } from './documents.js';
import type {
  ChatInput,
  ChatResult,
  ConversationMessage,
  ListMessagesResult,
  PageInput,
  PageMeta,
} from '../types.js';

interface ChatResponseEnvelope {
  data: ChatResult;
}

interface ListMessagesResponseEnvelope {
  data: ConversationMessage[];
  meta: PageMeta;
}

export async function chatMethod(
  http: ContextChatHttpClient,
  input: ChatInput,
): Promise<ChatResult> {
  if (!input.message || input.message.trim().length === 0) {
    throw new ContextChatValidationError('chat.message is required', {
      status: 400,
      code: 'INVALID_ARGS',
    });
  }

  const response = await http.request<ChatResponseEnvelope>({
    method: 'POST',
    path: '/v1/chat',
    body: {
      conversationId: requireId(input.conversationId, 'conversationId'),
      message: input.message,
    },
  });

  return {
    conversationId: response.data.conversationId,
    response: response.data.response,
  };
}

export async function listMessagesMethod(
  http: ContextChatHttpClient,
  conversationId: string,
  input: PageInput = {},
): Promise<ListMessagesResult> {
  const id = requireId(conversationId, 'conversationId');
  const response = await http.request<ListMessagesResponseEnvelope>({
    method: 'GET',
    path: `/v1/conversations/${encodeURIComponent(id)}/messages`,
    query: { limit: input.limit, offset: input.offset },
  });

  return { messages: response.data, meta: response.meta };
}
