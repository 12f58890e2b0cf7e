import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { createReoonOracle, getConfiguredServices, getDefaultOracle } from './services';
import { ConfigurationError } from '../../errors';
import { isErr, isOk } from '../../result';

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'Content-Type': 'application/json' },
  });
}

describe('createReoonOracle', () => {
  const fetchMock = vi.fn<(input: string | URL | Request, init?: RequestInit) => Promise<Response>>();

  beforeEach(() => {
    fetchMock.mockReset();
    vi.stubGlobal('fetch', fetchMock);
  });

  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it('should call the verify endpoint with email, key and mode', async () => {
    fetchMock.mockResolvedValue(jsonResponse({ status: 'valid', email: 'jane@acme.com' }));
    const oracle = createReoonOracle({ apiKey: 'test-key' });

    await oracle.verify('jane@acme.com');

    expect(fetchMock).toHaveBeenCalledTimes(1);
    expect(fetchMock.mock.calls[0][0]).toBe(
      'https://emailverifier.reoon.com/api/v1/verify?email=jane%40acme.com&key=test-key&mode=power'
    );
    expect(fetchMock.mock.calls[0][1]?.method).toBe('GET');
  });

  it('should use the configured mode and base URL', async () => {
    fetchMock.mockResolvedValue(jsonResponse({ status: 'valid' }));
    const oracle = createReoonOracle({ apiKey: 'test-key', mode: 'quick', baseUrl: 'http://localhost:9999/verify' });

    await oracle.verify('a@b.co');

    expect(fetchMock.mock.calls[0][0]).toBe('http://localhost:9999/verify?email=a%40b.co&key=test-key&mode=quick');
  });

  it('should return the lowercased status and raw body', async () => {
    fetchMock.mockResolvedValue(jsonResponse({ status: ' Catch_All ', score: 50 }));
    const oracle = createReoonOracle({ apiKey: 'test-key' });

    const response = await oracle.verify('jane@acme.com');

    expect(isOk(response)).toBe(true);
    if (isOk(response)) {
      expect(response.data.status).toBe('catch_all');
      expect(response.data.raw).toEqual({ status: ' Catch_All ', score: 50 });
    }
  });

  it('should report a body without status as malformed', async () => {
    fetchMock.mockResolvedValue(jsonResponse({ result: 'ok' }));
    const oracle = createReoonOracle({ apiKey: 'test-key' });

    const response = await oracle.verify('jane@acme.com');

    expect(isErr(response)).toBe(true);
    if (isErr(response)) {
      expect(response.error.kind).toBe('malformed');
      expect(response.error.provider).toBe('reoon');
    }
  });

  it('should report a non-JSON body as malformed', async () => {
    fetchMock.mockResolvedValue(new Response('<html>oops</html>', { status: 200 }));
    const oracle = createReoonOracle({ apiKey: 'test-key' });

    const response = await oracle.verify('jane@acme.com');

    expect(isErr(response) && response.error.kind).toBe('malformed');
  });

  it('should not retry a client error', async () => {
    fetchMock.mockResolvedValue(new Response('nope', { status: 401, statusText: 'Unauthorized' }));
    const oracle = createReoonOracle({ apiKey: 'test-key', retryAttempts: 3, retryDelayMs: 1 });

    const response = await oracle.verify('jane@acme.com');

    expect(fetchMock).toHaveBeenCalledTimes(1);
    expect(isErr(response)).toBe(true);
    if (isErr(response)) {
      expect(response.error.kind).toBe('http');
      expect(response.error.originalStatus).toBe(401);
    }
  });

  it('should retry a server error and succeed', async () => {
    fetchMock
      .mockResolvedValueOnce(new Response('busy', { status: 503, statusText: 'Service Unavailable' }))
      .mockResolvedValueOnce(jsonResponse({ status: 'safe' }));
    const oracle = createReoonOracle({ apiKey: 'test-key', retryAttempts: 2, retryDelayMs: 1 });

    const response = await oracle.verify('jane@acme.com');

    expect(fetchMock).toHaveBeenCalledTimes(2);
    expect(isOk(response) && response.data.status).toBe('safe');
  });

  it('should pace retried requests through the caller limiter', async () => {
    fetchMock
      .mockResolvedValueOnce(new Response('slow down', { status: 429, statusText: 'Too Many Requests' }))
      .mockResolvedValueOnce(jsonResponse({ status: 'valid' }));
    const limiter = { acquire: vi.fn(async () => {}) };
    const oracle = createReoonOracle({ apiKey: 'test-key', retryAttempts: 2, retryDelayMs: 1 });

    const response = await oracle.verify('jane@acme.com', { limiter });

    expect(isOk(response)).toBe(true);
    expect(fetchMock).toHaveBeenCalledTimes(2);
    expect(limiter.acquire).toHaveBeenCalledTimes(1);
  });

  it('should report an exhausted server error as http', async () => {
    fetchMock.mockImplementation(async () => new Response('busy', { status: 500, statusText: 'Internal Server Error' }));
    const oracle = createReoonOracle({ apiKey: 'test-key', retryAttempts: 2, retryDelayMs: 1 });

    const response = await oracle.verify('jane@acme.com');

    expect(fetchMock).toHaveBeenCalledTimes(2);
    expect(isErr(response)).toBe(true);
    if (isErr(response)) {
      expect(response.error.kind).toBe('http');
      expect(response.error.originalStatus).toBe(500);
    }
  });

  it('should report a network failure', async () => {
    fetchMock.mockRejectedValue(new TypeError('fetch failed'));
    const oracle = createReoonOracle({ apiKey: 'test-key', retryAttempts: 2, retryDelayMs: 1 });

    const response = await oracle.verify('jane@acme.com');

    expect(fetchMock).toHaveBeenCalledTimes(2);
    expect(isErr(response)).toBe(true);
    if (isErr(response)) {
      expect(response.error.kind).toBe('network');
      expect(response.error.message).toBe('reoon network error: fetch failed');
    }
  });

  it('should report a timeout', async () => {
    fetchMock.mockImplementation((_input, init) =>
      new Promise<Response>((_resolve, reject) => {
        init?.signal?.addEventListener('abort', () => {
          const abortError = new Error('This operation was aborted');
          abortError.name = 'AbortError';
          reject(abortError);
        });
      })
    );
    const oracle = createReoonOracle({ apiKey: 'test-key', timeoutMs: 10, retryAttempts: 1 });

    const response = await oracle.verify('jane@acme.com');

    expect(isErr(response)).toBe(true);
    if (isErr(response)) {
      expect(response.error.kind).toBe('timeout');
    }
  });
});

describe('getDefaultOracle', () => {
  afterEach(() => {
    vi.unstubAllEnvs();
  });

  it('should throw a configuration error without an API key', () => {
    vi.stubEnv('REOON_API_KEY', '');

    expect(() => getDefaultOracle()).toThrow(ConfigurationError);
    expect(getConfiguredServices()).toEqual([]);
  });

  it('should build the reoon oracle when configured', () => {
    vi.stubEnv('REOON_API_KEY', 'test-key');

    expect(getDefaultOracle().name).toBe('reoon');
    expect(getConfiguredServices()).toEqual(['reoon']);
  });
});
