/**
 * In-process stand-ins for the model backends
 */

import { vi } from 'vitest';
import type { ChatMessage } from '@/services/llm/types';

/**
 * Embeddings keyed by exact input text; anything unknown gets `fallback`
 */
export function createFakeEmbeddings(vectors: Record<string, number[]> = {}, fallback: number[] = [1, 0, 0]) {
  const lookup = (text: string): number[] => vectors[text] ?? fallback;
  return {
    embed: vi.fn(async (text: string) => lookup(text)),
    embedMany: vi.fn(async (texts: string[]) => texts.map(lookup)),
  };
}

export function createFakeGeneration(reply = 'stub reply') {
  return {
    generate: vi.fn(async (_messages: ChatMessage[]) => reply),
  };
}

/**
 * Queue of canned fetch responses, consumed in order
 */
export function createFetchMock(responses: Array<{ status: number; body: unknown }>) {
  const queue = [...responses];
  return vi.fn(async (_url: string, _init?: RequestInit) => {
    const next = queue.shift();
    if (!next) {
      throw new Error('Unexpected fetch call');
    }
    const body = typeof next.body === 'string' ? next.body : JSON.stringify(next.body);
    return new Response(body, {
      status: next.status,
      headers: { 'Content-Type': 'application/json' },
    });
  });
}

export function readJsonBody(init: RequestInit | undefined): unknown {
  return typeof init?.body === 'string' ? JSON.parse(init.body) : undefined;
}
