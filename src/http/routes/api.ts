import type { HttpBindings } from '@hono/node-server';
import { type Context, Hono } from 'hono';
import { COVER_SIZES } from '../../services/qqmusic/constants.js';
import type { QQMusicApi } from '../../services/qqmusic/client.js';
import { executeTool } from '../../tools/registry.js';
import { ERROR_CODES, type ErrorCode } from '../../utils/http-result.js';
import { isRecord } from '../../utils/guards.js';

type ApiStatus = 200 | 400 | 401 | 404 | 500 | 502 | 503 | 504;

const STATUS_BY_CODE: Record<ErrorCode, ApiStatus> = {
  invalid_argument: 400,
  not_found: 404,
  unauthorized: 401,
  unavailable: 503,
  timeout: 504,
  upstream_error: 502,
  // The caller has gone; nobody reads this one
  cancelled: 503,
};

const ENDPOINTS = {
  search: '/search?keyword=&type=&page=&page_size=',
  song: '/song/{songMid}',
  quality: '/quality/{songMid}',
  lyric: '/lyric/{songMid}?timestamps=',
  url: '/url/{songMid}?quality=',
  batchUrl: '/url?mids=a,b,c&quality=',
  album: '/album/{albumMid}',
  albumSongs: '/album/{albumMid}/songs?page=&page_size=',
  playlist: '/playlist/{playlistId}',
  cover: '/cover/{albumMid}?size=',
};

/**
 * Plain REST surface over the same tools the MCP server exposes. Responses
 * carry the tool envelope (`ok`, `_msg`, `data` or `error`); the HTTP status
 * follows the error code.
 */
export function apiRoutes(api: QQMusicApi): Hono<{ Bindings: HttpBindings }> {
  const app = new Hono<{ Bindings: HttpBindings }>();

  const run = async (c: Context<{ Bindings: HttpBindings }>, tool: string, args: object) => {
    const result = await executeTool(tool, args, { api, signal: c.req.raw.signal });
    return c.json(result.structuredContent ?? {}, statusOf(result.structuredContent, result.isError));
  };

  app.get('/', (c) => c.json({ name: 'QQ Music API', endpoints: ENDPOINTS }));

  app.get('/search', (c) =>
    run(c, 'search_music', {
      query: c.req.query('keyword') ?? c.req.query('q'),
      type: c.req.query('type'),
      page: toNumber(c.req.query('page')),
      pageSize: toNumber(c.req.query('page_size')),
    }),
  );

  app.get('/song/:mid', (c) => run(c, 'get_song_detail', { songId: c.req.param('mid') }));

  app.get('/quality/:mid', (c) => run(c, 'get_song_quality', { songId: c.req.param('mid') }));

  app.get('/lyric/:mid', (c) =>
    run(c, 'get_lyric', {
      songId: c.req.param('mid'),
      timestamps: toBoolean(c.req.query('timestamps')),
    }),
  );

  app.get('/url/:mid', (c) =>
    run(c, 'get_song_url', { songId: c.req.param('mid'), quality: c.req.query('quality') }),
  );

  app.get('/url', (c) =>
    run(c, 'get_batch_song_urls', {
      songIds: c.req.query('mids'),
      quality: c.req.query('quality'),
    }),
  );

  app.get('/album/:mid', (c) => run(c, 'get_album_detail', { albumId: c.req.param('mid') }));

  app.get('/album/:mid/songs', (c) =>
    run(c, 'get_album_songs', {
      albumId: c.req.param('mid'),
      page: toNumber(c.req.query('page')),
      pageSize: toNumber(c.req.query('page_size')),
    }),
  );

  app.get('/playlist/:id', (c) =>
    run(c, 'get_playlist_detail', { playlistId: c.req.param('id') }),
  );

  app.get('/cover/:mid', (c) =>
    run(c, 'get_album_cover', {
      albumId: c.req.param('mid'),
      size: toCoverSize(c.req.query('size')),
    }),
  );

  return app;
}

function statusOf(structured: unknown, isError: boolean | undefined): ApiStatus {
  if (!isError) {
    return 200;
  }
  const error = isRecord(structured) ? structured.error : undefined;
  const code = ERROR_CODES.find((known) => isRecord(error) && error.code === known);
  return code ? STATUS_BY_CODE[code] : 500;
}

// Unparseable values pass through so the tool reports them as invalid_argument
function toNumber(value: string | undefined): number | string | undefined {
  if (value === undefined || value === '') {
    return undefined;
  }
  const parsed = Number(value);
  return Number.isFinite(parsed) ? parsed : value;
}

function toBoolean(value: string | undefined): boolean | string | undefined {
  if (value === undefined || value === '') {
    return undefined;
  }
  if (value === 'true' || value === '1') {
    return true;
  }
  if (value === 'false' || value === '0') {
    return false;
  }
  return value;
}

/** Accepts a size name or its pixel count (150, 300, 500). */
function toCoverSize(value: string | undefined): string | undefined {
  const byPixels = Object.entries(COVER_SIZES).find(([, pixels]) => String(pixels) === value);
  return byPixels?.[0] ?? (value || undefined);
}
