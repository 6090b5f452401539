/**
 * QQ Music API client factory.
 * Builds the process-wide client from config; the session cookie is read once here.
 */

import { type Config, config } from '../../config/env.js';
import { createHttpClient } from '../http-client.js';
import { createQQMusicApi, type QQMusicApi } from './client.js';
import { DEFAULT_HEADERS } from './constants.js';

export function buildQQMusicApi(cfg: Config): QQMusicApi {
  const http = createHttpClient({
    baseHeaders: DEFAULT_HEADERS,
    timeout: cfg.REQUEST_TIMEOUT_MS,
    retries: cfg.HTTP_RETRIES,
    rateLimit: { rps: cfg.RPS_LIMIT, burst: cfg.RPS_LIMIT * 2 },
    concurrency: cfg.CONCURRENCY_LIMIT,
  });
  return createQQMusicApi({
    http,
    credential: cfg.QQ_MUSIC_COOKIE,
    baseUrls: { c: cfg.QQMUSIC_C_URL, u: cfg.QQMUSIC_U_URL },
  });
}

let appClient: QQMusicApi | null = null;

export function getQQMusicApi(): QQMusicApi {
  if (!appClient) {
    appClient = buildQQMusicApi(config);
  }
  return appClient;
}
