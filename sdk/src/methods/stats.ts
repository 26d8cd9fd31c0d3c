import { ContextChatHttpClient } from '../http.js';
import type { HealthResult, StatsResult } from '../types.js';

interface StatsResponseEnvelope extends StatsResult {
  status: string;
}

export async function statsMethod(http: ContextChatHttpClient): Promise<StatsResult> {
  const response = await http.request<StatsResponseEnvelope>({
    method: 'GET',
    path: '/v1/stats',
  });

  return {
    messages: response.messages,
    documents: response.documents,
    chunks: response.chunks,
  };
}

export async function healthMethod(http: ContextChatHttpClient): Promise<HealthResult> {
  return http.request<HealthResult>({ method: 'GET', path: '/health' });
}
