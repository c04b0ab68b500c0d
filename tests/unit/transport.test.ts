import { describe, it, expect, vi, afterEach } from 'vitest';
import { ApiClient, ApiError } from '../../src/core/transport';

type FetchArgs = [url: string, init?: RequestInit];

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), { status, headers: { 'Content-Type': 'application/json' } });
}

function stubFetch(impl: (...args: FetchArgs) => Promise<Response>) {
  const fetchMock = vi.fn(impl);
  vi.stubGlobal('fetch', fetchMock);
  return fetchMock;
}

function requestBody(init: RequestInit | undefined): unknown {
  return typeof init?.body === 'string' ? JSON.parse(init.body) : undefined;
}

describe('ApiClient', () => {
  const client = new ApiClient({ apiKey: 'test-secret', serverUrl: 'http://beacon.test/' });

  afterEach(() => {
    vi.unstubAllGlobals();
  });

  describe('startSession', () => {
    it('should POST the session and return its id', async () => {
      const fetchMock = stubFetch(async () => jsonResponse({ session_id: 'sess-1' }));

      const result = await client.startSession({ project: 'demo', source: 'test', sessionName: 'run-1' });

      expect(result).toEqual({ sessionId: 'sess-1' });
      const [url, init] = fetchMock.mock.calls[0];
      expect(url).toBe('http://beacon.test/session/start');
      expect(init?.method).toBe('POST');
      expect(init?.headers).toEqual({
        'Content-Type': 'application/json',
        'Authorization': 'Bearer test-secret',
      });
      expect(requestBody(init)).toEqual({
        session: { project: 'demo', session_name: 'run-1', source: 'test', inputs: {}, metadata: {} },
      });
    });

    it('should accept a nested session id', async () => {
      stubFetch(async () => jsonResponse({ session: { session_id: 'sess-nested' } }));

      const result = await client.startSession({ project: 'demo', source: 'test', sessionName: 'run-1' });
      expect(result.sessionId).toBe('sess-nested');
    });

    it('should reject when the response has no id', async () => {
      stubFetch(async () => jsonResponse({}));

      await expect(
        client.startSession({ project: 'demo', source: 'test', sessionName: 'run-1' })
      ).rejects.toThrow('Session start response did not include a session_id');
    });

    it('should reject with the HTTP status on errors', async () => {
      stubFetch(async () => new Response('bad key', { status: 401 }));

      const pending = client.startSession({ project: 'demo', source: 'test', sessionName: 'run-1' });

      await expect(pending).rejects.toBeInstanceOf(ApiError);
      await expect(pending).rejects.toThrow('HTTP 401: bad key');
      await expect(pending).rejects.toHaveProperty('status', 401);
    });

    it('should time out slow requests', async () => {
      const slowClient = new ApiClient({ apiKey: 'test-secret', serverUrl: 'http://beacon.test', requestTimeoutMs: 10 });
      stubFetch(
        (_url, init) =>
          new Promise<Response>((_, reject) => {
            init?.signal?.addEventListener('abort', () => {
              const abortError = new Error('aborted');
              abortError.name = 'AbortError';
              reject(abortError);
            });
          })
      );

      await expect(
        slowClient.startSession({ project: 'demo', source: 'test', sessionName: 'run-1' })
      ).rejects.toThrow('Request timeout after 10ms');
    });
  });

  describe('enrichSession', () => {
    it('should PUT the enrichment addressed at the session event', async () => {
      const fetchMock = stubFetch(async () => jsonResponse({ success: true }));

      const result = await client.enrichSession('sess-1', {
        metadata: { tier: 'pro' },
        feedback: { rating: 5 },
        userProperties: { plan: 'team' },
      });

      expect(result).toEqual({ ok: true });
      const [url, init] = fetchMock.mock.calls[0];
      expect(url).toBe('http://beacon.test/events');
      expect(init?.method).toBe('PUT');
      expect(requestBody(init)).toEqual({
        event_id: 'sess-1',
        metadata: { tier: 'pro' },
        feedback: { rating: 5 },
        user_properties: { plan: 'team' },
      });
    });
  });
});
