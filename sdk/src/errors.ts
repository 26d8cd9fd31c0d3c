export type RateLimitTier = 'general' | 'expensive';

export interface RateLimitInfo {
  /** Which server limit refused the request */
  tier?: RateLimitTier;
  limit?: number;
  remaining?: number;
  reset?: number;
  retryAfter?: number;
}

export interface ContextChatErrorContext {
  status: number;
  code: string;
  details?: unknown;
  rateLimit?: RateLimitInfo;
}

export class ContextChatError extends Error {
  readonly status: number;
  readonly code: string;
  readonly details?: unknown;
  readonly rateLimit?: RateLimitInfo;

  constructor(message: string, context: ContextChatErrorContext) {
    super(message);
    this.name = 'ContextChatError';
    this.status = context.status;
    this.code = context.code;
    this.details = context.details;
    this.rateLimit = context.rateLimit;
  }
}

/**
 * 401: a missing or wrong API key, or the model provider rejected the
 * server's credentials (code UNAUTHORIZED)
 */
export class ContextChatAuthError extends ContextChatError {
  constructor(message: string, context: ContextChatErrorContext) {
    super(message, context);
    this.name = 'ContextChatAuthError';
  }
}

export class ContextChatNotFoundError extends ContextChatError {
  constructor(message: string, context: ContextChatErrorContext) {
    super(message, context);
    this.name = 'ContextChatNotFoundError';
  }
}

export class ContextChatRateLimitError extends ContextChatError {
  constructor(message: string, context: ContextChatErrorContext) {
    super(message, context);
    this.name = 'ContextChatRateLimitError';
  }
}

export class ContextChatValidationError extends ContextChatError {
  constructor(message: string, context: ContextChatErrorContext) {
    super(message, context);
    this.name = 'ContextChatValidationError';
  }
}

export class ContextChatServerError extends ContextChatError {
  constructor(message: string, context: ContextChatErrorContext) {
    super(message, context);
    this.name = 'ContextChatServerError';
  }
}

export function createContextChatError(
  message: string,
  context: ContextChatErrorContext,
): ContextChatError {
  if (context.status === 401) {
    return new ContextChatAuthError(message, context);
  }

  if (context.status === 404) {
    return new ContextChatNotFoundError(message, context);
  }

  if (context.status === 429) {
    return new ContextChatRateLimitError(message, context);
  }

  if (context.status === 400 || context.status === 422) {
    return new ContextChatValidationError(message, context);
  }

  // 424: the server's embedding backend is down
  if (context.status >= 500 || context.status === 424) {
    return new ContextChatServerError(message, context);
  }

  return new ContextChatError(message, context);
}
