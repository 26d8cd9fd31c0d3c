/**
 * Service Error
 *
 * Stable failure taxonomy shared by the stores, the backends and the
 * orchestrator. The error handler maps each code to its own HTTP status.
 */

export type ServiceErrorCode =
  | 'INVALID_INPUT'
  | 'NOT_FOUND'
  | 'STORAGE_UNAVAILABLE'
  | 'EMBEDDING_UNAVAILABLE'
  | 'UNAUTHORIZED'
  | 'RATE_LIMITED'
  | 'BAD_UPSTREAM_REQUEST'
  | 'UPSTREAM_UNAVAILABLE';

export type ServiceErrorStatus = 400 | 401 | 404 | 422 | 424 | 429 | 502 | 503;

export const SERVICE_ERROR_STATUS: Record<ServiceErrorCode, ServiceErrorStatus> = {
  INVALID_INPUT: 400,
  UNAUTHORIZED: 401,
  NOT_FOUND: 404,
  BAD_UPSTREAM_REQUEST: 422,
  EMBEDDING_UNAVAILABLE: 424,
  RATE_LIMITED: 429,
  UPSTREAM_UNAVAILABLE: 502,
  STORAGE_UNAVAILABLE: 503,
};

/**
 * Messages returned to clients when verbose errors are off
 */
export const SERVICE_ERROR_PUBLIC_MESSAGE: Record<ServiceErrorCode, string> = {
  INVALID_INPUT: 'Invalid input',
  UNAUTHORIZED: 'Upstream model provider rejected the credentials',
  NOT_FOUND: 'Resource not found',
  BAD_UPSTREAM_REQUEST: 'Upstream model provider rejected the request',
  EMBEDDING_UNAVAILABLE: 'Embedding service is unavailable',
  RATE_LIMITED: 'Upstream model provider is rate limiting requests',
  UPSTREAM_UNAVAILABLE: 'Generation service is unavailable',
  STORAGE_UNAVAILABLE: 'Storage is unavailable',
};

export class ServiceError extends Error {
  readonly code: ServiceErrorCode;
  readonly status: ServiceErrorStatus;

  constructor(code: ServiceErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ServiceError';
    this.code = code;
    this.status = SERVICE_ERROR_STATUS[code];
  }
}

export function isServiceError(error: unknown): error is ServiceError {
  return error instanceof ServiceError;
}
