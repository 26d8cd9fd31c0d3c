import { describe, it, expect, beforeEach } from 'vitest';
import { resetAllRateLimits } from '@/services/rateLimit.service';
import { createTestApp, jsonRequest } from '../../helpers/app';

describe('App', () => {
  beforeEach(() => {
    resetAllRateLimits();
  });

  it('GET /health reports ok', async () => {
    const { app } = createTestApp();

    const res = await app.request('/health');

    expect(res.status).toBe(200);
    expect(await res.json()).toMatchObject({ status: 'ok', version: '1.0.0' });
    expect(res.headers.get('X-Content-Type-Options')).toBe('nosniff');
  });

  it('GET /v1/stats counts messages, documents and chunks', async () => {
    const { app } = createTestApp();
    await app.request('/v1/documents', jsonRequest('POST', { name: 'doc1', text: 'A'.repeat(1600) }));
    await app.request('/v1/chat', jsonRequest('POST', { conversationId: 'c1', message: 'Hello' }));

    const res = await app.request('/v1/stats');

    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({ status: 'ok', messages: 2, documents: 1, chunks: 2 });
  });

  it('returns a JSON 404 for unknown routes', async () => {
    const { app } = createTestApp();

    const res = await app.request('/v1/nothing-here');

    expect(res.status).toBe(404);
    expect(await res.json()).toEqual({
      error: { code: 'NOT_FOUND', message: 'Endpoint not found' },
    });
  });

  it('answers CORS preflight requests', async () => {
    const { app } = createTestApp();

    const res = await app.request('/v1/chat', {
      method: 'OPTIONS',
      headers: { Origin: 'http://localhost:5173' },
    });

    expect(res.status).toBe(204);
    expect(res.headers.get('Access-Control-Allow-Origin')).toBe('http://localhost:5173');
  });

  describe('API key', () => {
    it('rejects /v1 requests without the key', async () => {
      const { app } = createTestApp({ apiKey: 'test-secret' });

      const res = await app.request('/v1/stats');

      expect(res.status).toBe(401);
      expect(await res.json()).toEqual({
        error: { code: 'UNAUTHENTICATED', message: 'A valid API key is required' },
      });
    });

    it('rejects a wrong key', async () => {
      const { app } = createTestApp({ apiKey: 'test-secret' });

      const res = await app.request('/v1/stats', { headers: { 'X-API-Key': 'wrong-secret' } });

      expect(res.status).toBe(401);
    });

    it('accepts the key as X-API-Key or a bearer token', async () => {
      const { app } = createTestApp({ apiKey: 'test-secret' });

      const viaHeader = await app.request('/v1/stats', { headers: { 'X-API-Key': 'test-secret' } });
      const viaBearer = await app.request('/v1/stats', {
        headers: { Authorization: 'Bearer test-secret' },
      });

      expect(viaHeader.status).toBe(200);
      expect(viaBearer.status).toBe(200);
    });

    it('leaves /health open', async () => {
      const { app } = createTestApp({ apiKey: 'test-secret' });

      const res = await app.request('/health');

      expect(res.status).toBe(200);
    });
  });
});
