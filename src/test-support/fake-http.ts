import type { HttpClient } from '../services/http-client.js';
import { createQQMusicApi, type QQMusicApi } from '../services/qqmusic/client.js';

export interface RecordedCall {
  url: URL;
  headers: Headers;
  signal?: AbortSignal;
}

export type FakeHandler = (call: RecordedCall) => Response | Promise<Response>;

export function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'Content-Type': 'application/json' },
  });
}

/** In-process stand-in for the outbound HTTP client; records every call. */
export function createFakeHttp(handler: FakeHandler): { http: HttpClient; calls: RecordedCall[] } {
  const calls: RecordedCall[] = [];
  const http: HttpClient = async (input, init) => {
    const call: RecordedCall = {
      url: new URL(input.toString()),
      headers: new Headers(init?.headers),
      signal: init?.signal ?? undefined,
    };
    calls.push(call);
    return handler(call);
  };
  return { http, calls };
}

export function createFakeApi(
  handler: FakeHandler,
  options: { credential?: string } = {},
): { api: QQMusicApi; calls: RecordedCall[] } {
  const { http, calls } = createFakeHttp(handler);
  const api = createQQMusicApi({ http, credential: options.credential, guid: () => '1234567890' });
  return { api, calls };
}

/** The musicu request document sent in the `data` query parameter. */
export function musicuRequest(
  call: RecordedCall | undefined,
): Record<string, { module: string; method: string; param: Record<string, unknown> }> {
  return JSON.parse(call?.url.searchParams.get('data') ?? '{}');
}

/** Resolves after `ms`, or rejects with the signal's reason when it aborts first. */
export function waitFor(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise<void>((resolve, reject) => {
    if (signal?.aborted) {
      reject(signal.reason);
      return;
    }
    const timer = setTimeout(resolve, ms);
    signal?.addEventListener(
      'abort',
      () => {
        clearTimeout(timer);
        reject(signal.reason);
      },
      { once: true },
    );
  });
}
