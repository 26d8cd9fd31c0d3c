export { ContextChatClient } from './client.js';
export { ContextChatHttpClient, type HttpRequestOptions } from './http.js';
export {
  ContextChatAuthError,
  ContextChatError,
  ContextChatNotFoundError,
  ContextChatRateLimitError,
  ContextChatServerError,
  ContextChatValidationError,
  createContextChatError,
  type ContextChatErrorContext,
  type RateLimitInfo,
  type RateLimitTier,
} from './errors.js';
export type * from './types.js';
