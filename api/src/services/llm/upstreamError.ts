/**
 * Upstream failure classification
 *
 * Turns provider HTTP outcomes into stable service codes so operators can
 * tell a credential problem from throttling from an outage.
 */

import { ServiceError, type ServiceErrorCode } from '@/errors/serviceError';

export type UpstreamKind = 'embedding' | 'generation';

const BAD_REQUEST_STATUSES = new Set([400, 404, 409, 413, 422]);

function unavailableCode(kind: UpstreamKind): ServiceErrorCode {
  return kind === 'embedding' ? 'EMBEDDING_UNAVAILABLE' : 'UPSTREAM_UNAVAILABLE';
}

export function classifyUpstreamStatus(kind: UpstreamKind, status: number): ServiceErrorCode {
  if (status === 401 || status === 403) return 'UNAUTHORIZED';
  if (status === 429) return 'RATE_LIMITED';
  if (BAD_REQUEST_STATUSES.has(status)) return 'BAD_UPSTREAM_REQUEST';
  return unavailableCode(kind);
}

/**
 * Build the error for a non-2xx upstream response. The provider's own message
 * is kept in the error text for logs; clients only see the stable message.
 */
export function upstreamStatusError(kind: UpstreamKind, status: number, detail: string): ServiceError {
  const code = classifyUpstreamStatus(kind, status);
  const suffix = detail ? `: ${detail.slice(0, 500)}` : '';
  return new ServiceError(code, `${kind} provider returned ${status}${suffix}`);
}

export function upstreamUnavailableError(kind: UpstreamKind, reason: string, cause?: unknown): ServiceError {
  return new ServiceError(unavailableCode(kind), `${kind} provider unavailable: ${reason}`, { cause });
}

/**
 * Pull `error.message` out of an OpenAI-style error body when present
 */
export function extractProviderMessage(body: string): string {
  let parsed: unknown;
  try {
    parsed = JSON.parse(body);
  } catch {
    return body.trim();
  }

  if (parsed && typeof parsed === 'object') {
    const error = (parsed as Record<string, unknown>).error;
    if (error && typeof error === 'object') {
      const message = (error as Record<string, unknown>).message;
      if (typeof message === 'string') return message;
    }
  }
  return body.trim();
}
