/**
 * Remote call layer for the QQ Music web API.
 *
 * Every operation goes through {@link QQMusicApi.call}, which owns URL
 * building, credential attachment, JSONP unwrapping and HTTP status
 * classification. Envelope codes inside the JSON are left to the callers,
 * since each endpoint reports "not found" differently.
 */

import type { HttpClient } from '../http-client.js';
import { expectOk, QQMusicError } from '../../utils/http-result.js';
import { logger } from '../../utils/logger.js';
import { type BaseUrls, DEFAULT_BASE_URLS, ENDPOINTS, type Endpoint } from './constants.js';

export type QueryParams = Record<string, string | number>;

export interface CallOptions {
  /** Attach the session cookie when one is configured. */
  auth?: boolean;
  headers?: Record<string, string>;
  signal?: AbortSignal;
}

export interface QQMusicApi {
  readonly hasCredential: boolean;
  readonly uin: string;
  call(endpoint: Endpoint, params: QueryParams, options?: CallOptions): Promise<unknown>;
  /**
   * Single-module request to musicu.fcg. The request document travels in the
   * `data` query parameter and the response is keyed by `key`.
   */
  callModule(
    key: string,
    request: { module: string; method: string; param: Record<string, unknown> },
    options?: CallOptions,
  ): Promise<unknown>;
  guid(): string;
}

export interface QQMusicApiOptions {
  http: HttpClient;
  credential?: string;
  baseUrls?: Partial<BaseUrls>;
  guid?: () => string;
}

export function createQQMusicApi(options: QQMusicApiOptions): QQMusicApi {
  const { http } = options;
  const credential = options.credential?.trim() || undefined;
  const baseUrls: BaseUrls = { ...DEFAULT_BASE_URLS, ...options.baseUrls };
  const uin = uinFromCookie(credential);
  const guid = options.guid ?? randomGuid;

  const call = async (
    endpoint: Endpoint,
    params: QueryParams,
    callOptions: CallOptions = {},
  ): Promise<unknown> => {
    const { host, path } = ENDPOINTS[endpoint];
    const url = new URL(path, baseUrls[host]);
    for (const [key, value] of Object.entries(params)) {
      url.searchParams.set(key, String(value));
    }

    const headers: Record<string, string> = { ...callOptions.headers };
    if (callOptions.auth && credential) {
      headers.Cookie = credential;
    }

    const response = await http(url, {
      method: 'GET',
      headers,
      signal: callOptions.signal,
    });
    await expectOk(response, `QQ Music ${endpoint} request failed`);

    const text = await response.text();
    try {
      return parseJsonOrJsonp(text);
    } catch (error) {
      await logger.warning('qqmusic', {
        message: 'Unparseable response body',
        endpoint,
        preview: text.slice(0, 120),
      });
      throw new QQMusicError('upstream_error', `QQ Music ${endpoint} returned a non-JSON body`, {
        status: response.status,
        cause: error,
      });
    }
  };

  return Object.freeze<QQMusicApi>({
    hasCredential: Boolean(credential),
    uin,
    call,
    callModule: (key, request, callOptions) =>
      call(
        'musicu',
        { format: 'json', data: JSON.stringify({ [key]: request }) },
        callOptions,
      ),
    guid,
  });
}

const JSONP_PATTERN = /^\s*[\w$.]+\(\s*([\s\S]*?)\s*\)\s*;?\s*$/;

export function parseJsonOrJsonp(text: string): unknown {
  const match = JSONP_PATTERN.exec(text);
  return JSON.parse(match?.[1] ?? text);
}

/** Numeric account id from the `uin` cookie (`uin=o0123456` or `uin=123456`). */
export function uinFromCookie(cookie: string | undefined): string {
  if (!cookie) {
    return '0';
  }
  const match = /(?:^|[;\s])uin=o?0*(\d+)/.exec(cookie);
  return match?.[1] ?? '0';
}

function randomGuid(): string {
  return String(Math.floor(1_000_000_000 + Math.random() * 9_000_000_000));
}
