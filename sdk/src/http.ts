import {
  ContextChatServerError,
  createContextChatError,
  type RateLimitInfo,
  type RateLimitTier,
} from './errors.js';
import type { ContextChatClientConfig, FetchLike } from './types.js';

const DEFAULT_BASE_URL = 'http://localhost:3000';
const DEFAULT_TIMEOUT_MS = 30_000;

export interface HttpRequestOptions {
  method: 'GET' | 'POST' | 'DELETE';
  /** Absolute path on the server, e.g. /v1/chat or /health */
  path: string;
  query?: Record<string, number | undefined>;
  body?: unknown;
}

/**
 * Error body written by the server's error handler and rate limiter:
 * `{ error: { code, message, details?, tier? } }`
 */
interface ErrorBody {
  code: string;
  message: string;
  details?: unknown;
  tier?: string;
}

export class ContextChatHttpClient {
  private readonly baseUrl: string;
  private readonly headers: Record<string, string>;
  private readonly fetchFn: FetchLike;
  private readonly timeoutMs: number;

  constructor(config: ContextChatClientConfig = {}) {
    this.baseUrl = normalizeBaseUrl(config.baseUrl ?? DEFAULT_BASE_URL);
    this.headers = authHeaders(config.apiKey, config.defaultHeaders ?? {});
    this.fetchFn = config.fetch ?? globalThis.fetch.bind(globalThis);
    this.timeoutMs = config.timeoutMs ?? DEFAULT_TIMEOUT_MS;
  }

  async request<T>(options: HttpRequestOptions): Promise<T> {
    const headers = new Headers(this.headers);
    if (options.body !== undefined) {
      headers.set('Content-Type', 'application/json');
    }

    const controller = new AbortController();
    let timedOut = false;
    const timeoutId = setTimeout(() => {
      timedOut = true;
      controller.abort();
    }, this.timeoutMs);

    let response: Response;
    let text: string;
    try {
      response = await this.fetchFn(buildUrl(this.baseUrl, options.path, options.query), {
        method: options.method,
        headers,
        body: options.body !== undefined ? JSON.stringify(options.body) : undefined,
        signal: controller.signal,
      });
      text = await response.text();
    } catch (error) {
      if (error instanceof Error && error.name === 'AbortError') {
        throw new ContextChatServerError(
          timedOut ? `Request timed out after ${this.timeoutMs}ms` : 'Request was aborted',
          { status: 408, code: timedOut ? 'TIMEOUT' : 'ABORTED' },
        );
      }
      throw error;
    } finally {
      clearTimeout(timeoutId);
    }

    const parsed = parseJson(text);

    if (!response.ok) {
      const body = readErrorBody(parsed);
      const tier = body?.tier === 'general' || body?.tier === 'expensive' ? body.tier : undefined;
      throw createContextChatError(
        body?.message ?? `Context Chat API request failed with status ${response.status}`,
        {
          status: response.status,
          code: body?.code ?? `HTTP_${response.status}`,
          details: body?.details,
          rateLimit: response.status === 429 ? readRateLimit(response.headers, tier) : undefined,
        },
      );
    }

    if (parsed === undefined) {
      throw new ContextChatServerError('Expected JSON response from Context Chat API', {
        status: response.status,
        code: 'INVALID_RESPONSE',
      });
    }

    return parsed as T;
  }
}

// Paths carry their own /v1 prefix, so a base URL ending in /v1 is trimmed
function normalizeBaseUrl(baseUrl: string): string {
  const raw = baseUrl.replace(/\/+$/, '');
  return raw.endsWith('/v1') ? raw.slice(0, -3) : raw;
}

function authHeaders(
  apiKey: string | undefined,
  defaultHeaders: Record<string, string>,
): Record<string, string> {
  const headers = new Headers(defaultHeaders);
  // An explicit credential header wins over the configured key
  if (apiKey && !headers.has('x-api-key') && !headers.has('authorization')) {
    headers.set('X-API-Key', apiKey);
  }
  return Object.fromEntries(headers.entries());
}

function buildUrl(baseUrl: string, path: string, query?: HttpRequestOptions['query']): string {
  const url = new URL(`${baseUrl}${path}`);
  for (const [key, value] of Object.entries(query ?? {})) {
    if (value !== undefined) url.searchParams.set(key, String(value));
  }
  return url.toString();
}

/**
 * The expensive tier (chat, ingest) reports its counters under
 * X-RateLimit-*-Expensive; the general tier under plain X-RateLimit-*.
 */
function readRateLimit(headers: Headers, tier: RateLimitTier | undefined): RateLimitInfo {
  const suffix = tier === 'expensive' ? '-expensive' : '';
  return {
    tier,
    limit: toNumber(headers.get(`x-ratelimit-limit${suffix}`)),
    remaining: toNumber(headers.get(`x-ratelimit-remaining${suffix}`)),
    reset: toNumber(headers.get(`x-ratelimit-reset${suffix}`)),
    retryAfter: toNumber(headers.get('retry-after')),
  };
}

function toNumber(value: string | null): number | undefined {
  if (value === null || value.trim() === '') return undefined;
  const parsed = Number(value);
  return Number.isFinite(parsed) ? parsed : undefined;
}

function parseJson(text: string): unknown {
  if (!text) return undefined;
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
}

function readErrorBody(parsed: unknown): ErrorBody | undefined {
  if (!isRecord(parsed) || !isRecord(parsed.error)) return undefined;
  const { code, message, details, tier } = parsed.error;
  if (typeof code !== 'string' || typeof message !== 'string') return undefined;
  return { code, message, details, tier: typeof tier === 'string' ? tier : undefined };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
