import { describe, expect, it, vi } from 'vitest';
import { waitFor } from '../test-support/fake-http.js';
import { QQMusicError } from '../utils/http-result.js';
import { createHttpClient, type FetchLike } from './http-client.js';

function hangingFetch(): FetchLike {
  return async (_input, init) => {
    await waitFor(60_000, init?.signal ?? undefined);
    return new Response('late');
  };
}

/** Headers arrive at once; the body sends a fragment and then never finishes. */
function stalledBodyFetch(): FetchLike {
  return async () =>
    new Response(
      new ReadableStream<Uint8Array>({
        start(controller) {
          controller.enqueue(new TextEncoder().encode('{"code":0,'));
        },
      }),
      { status: 200, headers: { 'Content-Type': 'application/json' } },
    );
}

async function captureError(promise: Promise<unknown>): Promise<QQMusicError> {
  try {
    await promise;
  } catch (error) {
    if (error instanceof QQMusicError) {
      return error;
    }
    throw error;
  }
  throw new Error('expected a rejection');
}

describe('createHttpClient', () => {
  it('merges base headers with per-call headers', async () => {
    const fetch = vi.fn<FetchLike>(async () => new Response('ok'));
    const http = createHttpClient({
      baseHeaders: { 'User-Agent': 'test-agent', Referer: 'https://base.example.test/' },
      fetch,
    });

    await http('https://api.example.test/x', { headers: { Referer: 'https://override.example.test/' } });

    const headers = fetch.mock.calls[0]?.[1]?.headers;
    expect(headers).toBeInstanceOf(Headers);
    const merged = new Headers(headers);
    expect(merged.get('user-agent')).toBe('test-agent');
    expect(merged.get('referer')).toBe('https://override.example.test/');
  });

  it('fails with timeout when the request outlives its budget', async () => {
    const http = createHttpClient({ timeout: 20, fetch: hangingFetch() });
    const error = await captureError(http('https://api.example.test/slow'));
    expect(error.code).toBe('timeout');
    expect(error.message).toBe('Request timed out after 20ms');
  });

  it('fails with cancelled when the caller aborts', async () => {
    const http = createHttpClient({ timeout: 10_000, fetch: hangingFetch() });
    const controller = new AbortController();
    const pending = captureError(http('https://api.example.test/slow', { signal: controller.signal }));
    setTimeout(() => controller.abort(), 10);
    const error = await pending;
    expect(error.code).toBe('cancelled');
  });

  it('applies the timeout to a body that stalls after the headers', async () => {
    const http = createHttpClient({ timeout: 30, fetch: stalledBodyFetch() });
    const error = await captureError(http('https://api.example.test/stalled'));
    expect(error.code).toBe('timeout');
    expect(error.message).toBe('Request timed out after 30ms');
  });

  it('abandons a stalled body when the caller aborts', async () => {
    const http = createHttpClient({ timeout: 10_000, fetch: stalledBodyFetch() });
    const controller = new AbortController();
    const pending = captureError(
      http('https://api.example.test/stalled', { signal: controller.signal }),
    );
    setTimeout(() => controller.abort(), 20);
    const error = await pending;
    expect(error.code).toBe('cancelled');
  });

  it('returns a buffered copy of the response', async () => {
    const http = createHttpClient({
      fetch: async () =>
        new Response('{"code":0}', { status: 201, headers: { 'X-Trace': 'abc' } }),
    });
    const response = await http('https://api.example.test/x');
    expect(response.status).toBe(201);
    expect(response.headers.get('x-trace')).toBe('abc');
    expect(await response.text()).toBe('{"code":0}');
  });

  it('does not call fetch when the signal is already aborted', async () => {
    const fetch = vi.fn<FetchLike>(async () => new Response('ok'));
    const http = createHttpClient({ fetch });
    const error = await captureError(
      http('https://api.example.test/x', { signal: AbortSignal.abort() }),
    );
    expect(error.code).toBe('cancelled');
    expect(fetch).not.toHaveBeenCalled();
  });

  it('retries 5xx responses and returns the first success', async () => {
    const fetch = vi
      .fn<FetchLike>()
      .mockResolvedValueOnce(new Response('down', { status: 503 }))
      .mockResolvedValueOnce(new Response('up', { status: 200 }));
    const http = createHttpClient({ retries: 2, retryDelay: 1, fetch });

    const response = await http('https://api.example.test/x');
    expect(response.status).toBe(200);
    expect(fetch).toHaveBeenCalledTimes(2);
  });

  it('does not retry 4xx responses', async () => {
    const fetch = vi.fn<FetchLike>(async () => new Response('nope', { status: 404 }));
    const http = createHttpClient({ retries: 3, retryDelay: 1, fetch });

    const response = await http('https://api.example.test/x');
    expect(response.status).toBe(404);
    expect(fetch).toHaveBeenCalledTimes(1);
  });

  it('reports network failures as unavailable', async () => {
    const fetch = vi.fn<FetchLike>(async () => {
      throw new TypeError('fetch failed');
    });
    const http = createHttpClient({ retries: 1, retryDelay: 1, fetch });

    const error = await captureError(http('https://api.example.test/x'));
    expect(error.code).toBe('unavailable');
    expect(error.message).toBe('Request failed: fetch failed');
    expect(fetch).toHaveBeenCalledTimes(2);
  });

  it('queues requests beyond the concurrency limit', async () => {
    let active = 0;
    let peak = 0;
    const http = createHttpClient({
      concurrency: 2,
      fetch: async () => {
        active += 1;
        peak = Math.max(peak, active);
        await waitFor(5);
        active -= 1;
        return new Response('ok');
      },
    });

    await Promise.all(Array.from({ length: 5 }, (_, i) => http(`https://api.example.test/${i}`)));
    expect(peak).toBe(2);
  });
});
