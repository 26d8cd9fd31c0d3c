/**
 * OpenAI-compatible backends
 *
 * Embeddings:  POST {baseUrl}/v1/embeddings
 * Generation:  POST {baseUrl}/v1/chat/completions
 *
 * Each request has its own timeout. No retries: every failure is classified
 * (see upstreamError.ts) and thrown to the caller.
 */

import { z } from 'zod';
import { ServiceError } from '@/errors/serviceError';
import { logger } from '@/utils/logger';
import {
  extractProviderMessage,
  upstreamStatusError,
  upstreamUnavailableError,
  type UpstreamKind,
} from './upstreamError';
import type {
  ChatMessage,
  EmbeddingClient,
  GenerationClient,
  OpenAiClientOptions,
} from './types';

const embeddingResponseSchema = z.object({
  data: z
    .array(
      z.object({
        index: z.number().int().nonnegative(),
        embedding: z.array(z.number()),
      })
    )
    .min(1),
});

const chatResponseSchema = z.object({
  choices: z
    .array(
      z.object({
        message: z
          .object({
            content: z.string().nullable().optional(),
          })
          .nullable()
          .optional(),
      })
    )
    .min(1),
});

async function postJson(
  kind: UpstreamKind,
  options: OpenAiClientOptions,
  path: string,
  body: Record<string, unknown>,
): Promise<unknown> {
  if (!options.apiKey) {
    throw new ServiceError('UNAUTHORIZED', `${kind} provider API key is not configured`);
  }

  const fetchFn = options.fetch ?? globalThis.fetch.bind(globalThis);
  const controller = new AbortController();
  const timeoutId = setTimeout(() => controller.abort(), options.timeoutMs);
  const startedAt = Date.now();

  try {
    let response: Response;
    try {
      response = await fetchFn(`${options.baseUrl}${path}`, {
        method: 'POST',
        headers: {
          'Content-Type': 'application/json',
          Authorization: `Bearer ${options.apiKey}`,
        },
        body: JSON.stringify(body),
        signal: controller.signal,
      });
    } catch (error) {
      const reason = controller.signal.aborted
        ? `request timed out after ${options.timeoutMs}ms`
        : 'network error';
      throw upstreamUnavailableError(kind, reason, error);
    }

    const responseText = await response.text();
    logger.debug('LLM provider responded', {
      kind,
      model: options.model,
      status: response.status,
      latencyMs: Date.now() - startedAt,
    });

    if (!response.ok) {
      throw upstreamStatusError(kind, response.status, extractProviderMessage(responseText));
    }

    try {
      return JSON.parse(responseText);
    } catch (error) {
      throw upstreamUnavailableError(kind, 'response was not valid JSON', error);
    }
  } finally {
    clearTimeout(timeoutId);
  }
}

export class OpenAiEmbeddingClient implements EmbeddingClient {
  private readonly batchSize: number;

  constructor(
    private readonly options: OpenAiClientOptions,
    batchSize = 64,
  ) {
    this.batchSize = Math.max(1, batchSize);
  }

  async embed(text: string): Promise<number[]> {
    const [embedding] = await this.embedBatch([text]);
    return embedding;
  }

  async embedMany(texts: string[]): Promise<number[][]> {
    const embeddings: number[][] = [];
    for (let start = 0; start < texts.length; start += this.batchSize) {
      const batch = texts.slice(start, start + this.batchSize);
      embeddings.push(...(await this.embedBatch(batch)));
    }
    return embeddings;
  }

  private async embedBatch(input: string[]): Promise<number[][]> {
    const raw = await postJson('embedding', this.options, '/v1/embeddings', {
      model: this.options.model,
      input,
    });

    const parsed = embeddingResponseSchema.safeParse(raw);
    if (!parsed.success || parsed.data.data.length !== input.length) {
      throw upstreamUnavailableError('embedding', 'unexpected embeddings response shape');
    }

    return [...parsed.data.data]
      .sort((a, b) => a.index - b.index)
      .map((entry) => entry.embedding);
  }
}

export class OpenAiGenerationClient implements GenerationClient {
  constructor(
    private readonly options: OpenAiClientOptions,
    private readonly temperature?: number,
  ) {}

  async generate(messages: ChatMessage[]): Promise<string> {
    const raw = await postJson('generation', this.options, '/v1/chat/completions', {
      model: this.options.model,
      messages,
      ...(this.temperature !== undefined ? { temperature: this.temperature } : {}),
    });

    const parsed = chatResponseSchema.safeParse(raw);
    if (!parsed.success) {
      throw upstreamUnavailableError('generation', 'unexpected chat completion response shape');
    }

    return parsed.data.choices[0].message?.content ?? '';
  }
}
