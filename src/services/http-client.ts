import { errorMessage, QQMusicError } from '../utils/http-result.js';
import { makeConcurrencyGate, makeTokenBucket, sleep } from '../utils/limits.js';
import { logger } from '../utils/logger.js';

export type HttpClientInput = string | URL;
/** Resolves once the body has been read; the returned response is fully buffered. */
export type HttpClient = (input: HttpClientInput, init?: RequestInit) => Promise<Response>;
export type FetchLike = (input: string, init?: RequestInit) => Promise<Response>;

export interface HttpClientOptions {
  baseHeaders?: Record<string, string>;
  timeout?: number;
  /** Extra attempts after the first, for network errors and 5xx responses. */
  retries?: number;
  retryDelay?: number;
  /** Omit, or pass rps 0, to disable. */
  rateLimit?: { rps: number; burst: number };
  concurrency?: number;
  fetch?: FetchLike;
}

export function createHttpClient(options: HttpClientOptions = {}): HttpClient {
  const {
    baseHeaders = {},
    timeout = 15000,
    retries = 0,
    retryDelay = 500,
    rateLimit,
    concurrency = 8,
    fetch: fetchImpl = (input, init) => fetch(input, init),
  } = options;

  const rateLimiter =
    rateLimit && rateLimit.rps > 0
      ? makeTokenBucket(Math.max(1, rateLimit.burst), rateLimit.rps)
      : undefined;
  const gate = makeConcurrencyGate(concurrency);

  return async (input: HttpClientInput, init?: RequestInit): Promise<Response> => {
    const url = typeof input === 'string' ? input : input.toString();
    const method = init?.method || 'GET';
    const callerSignal = init?.signal ?? undefined;

    if (callerSignal?.aborted) {
      throw new QQMusicError('cancelled', 'Operation was cancelled');
    }

    return gate(async () => {
      if (rateLimiter) {
        try {
          await rateLimiter.acquire(callerSignal);
        } catch {
          throw new QQMusicError('cancelled', 'Operation was cancelled');
        }
      }

      const attempts = retries + 1;
      for (let attempt = 1; attempt <= attempts; attempt++) {
        const controller = new AbortController();
        let timedOut = false;
        const timeoutId = setTimeout(() => {
          timedOut = true;
          controller.abort();
        }, timeout);
        const onCallerAbort = () => controller.abort();
        callerSignal?.addEventListener('abort', onCallerAbort, { once: true });

        await logger.debug('http_client', {
          message: 'HTTP request start',
          url,
          method,
          attempt,
        });

        try {
          const fetched = await fetchImpl(url, {
            ...init,
            headers: mergeHeaders(baseHeaders, init?.headers),
            signal: controller.signal,
          });
          // The deadline and the caller signal cover the body as well as the headers
          const response = await bufferResponse(fetched, controller.signal);

          if (response.status < 500 || attempt === attempts) {
            await logger.debug('http_client', {
              message: 'HTTP request completed',
              url,
              method,
              status: response.status,
              attempt,
            });
            return response;
          }

          await logger.warning('http_client', {
            message: 'HTTP request failed, retrying',
            url,
            method,
            status: response.status,
            attempt,
          });
        } catch (error) {
          if (timedOut) {
            await logger.warning('http_client', {
              message: 'HTTP request timed out',
              url,
              method,
              timeout,
            });
            throw new QQMusicError('timeout', `Request timed out after ${timeout}ms`, {
              cause: error,
            });
          }
          if (callerSignal?.aborted) {
            throw new QQMusicError('cancelled', 'Operation was cancelled', { cause: error });
          }
          if (attempt === attempts) {
            await logger.error('http_client', {
              message: 'HTTP request failed',
              url,
              method,
              error: errorMessage(error),
              attempts,
            });
            throw new QQMusicError('unavailable', `Request failed: ${errorMessage(error)}`, {
              cause: error,
            });
          }
          await logger.warning('http_client', {
            message: 'HTTP error, retrying',
            url,
            method,
            error: errorMessage(error),
            attempt,
          });
        } finally {
          clearTimeout(timeoutId);
          callerSignal?.removeEventListener('abort', onCallerAbort);
        }

        const delay = retryDelay * 2 ** (attempt - 1);
        try {
          await sleep(delay, callerSignal);
        } catch {
          throw new QQMusicError('cancelled', 'Operation was cancelled');
        }
      }

      throw new Error('Unexpected end of retry loop');
    });
  };
}

const NULL_BODY_STATUSES = new Set([101, 204, 205, 304]);

/** Read the whole body while `signal` is armed and return a detached copy of the response. */
async function bufferResponse(response: Response, signal: AbortSignal): Promise<Response> {
  const body = NULL_BODY_STATUSES.has(response.status) ? null : await readBody(response, signal);
  return new Response(body, {
    status: response.status,
    statusText: response.statusText,
    headers: response.headers,
  });
}

// Not every body is tied to the request signal, so the read races it explicitly
async function readBody(response: Response, signal: AbortSignal): Promise<string> {
  if (signal.aborted) {
    throw signal.reason;
  }
  let onAbort = () => {};
  const aborted = new Promise<never>((_, reject) => {
    onAbort = () => reject(signal.reason);
    signal.addEventListener('abort', onAbort, { once: true });
  });
  try {
    return await Promise.race([response.text(), aborted]);
  } finally {
    signal.removeEventListener('abort', onAbort);
  }
}

function mergeHeaders(base: Record<string, string>, extra: HeadersInit | undefined): Headers {
  const merged = new Headers(base);
  new Headers(extra).forEach((value, key) => {
    merged.set(key, value);
  });
  return merged;
}
