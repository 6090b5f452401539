/**
 * Output schemas for QQ Music MCP tools.
 *
 * Every tool answers with the same envelope: `ok`, a human summary in `_msg`,
 * and either `data` or a classified `error`.
 */

import { z } from 'zod';
import {
  COVER_SIZE_NAMES,
  QUALITY_CODES,
  SEARCH_TYPES,
} from '../services/qqmusic/constants.js';
import { ERROR_CODES } from '../utils/http-result.js';

export const ToolErrorSchema = z.object({
  code: z.enum(ERROR_CODES),
  message: z.string(),
});

function envelope<T extends z.ZodTypeAny>(data: T) {
  return z.object({
    ok: z.boolean(),
    _msg: z.string(),
    data: data.optional(),
    error: ToolErrorSchema.optional(),
  });
}

// ---------------------------------------------------------------------------
// Slim entities used across outputs
// ---------------------------------------------------------------------------

const SlimSongSchema = z.object({
  mid: z.string(),
  id: z.number(),
  name: z.string(),
  artists: z.array(z.string()),
  singers: z.string(),
  album: z.object({ mid: z.string(), name: z.string() }).optional(),
  durationSeconds: z.number(),
  payPlay: z.boolean(),
});

const SongDetailSchema = SlimSongSchema.extend({
  availableQualities: z.array(z.enum(QUALITY_CODES)),
});

const SearchItemSchema = z.object({
  type: z.enum(['song', 'album', 'playlist', 'mv', 'user']),
  id: z.string(),
  mid: z.string().optional(),
  name: z.string(),
  artists: z.array(z.string()),
  album: z.string().optional(),
  durationSeconds: z.number().optional(),
});

// ---------------------------------------------------------------------------
// Tool outputs
// ---------------------------------------------------------------------------

export const SearchMusicOutput = envelope(
  z.object({
    query: z.string(),
    type: z.enum(SEARCH_TYPES),
    total: z.number(),
    page: z.number(),
    pageSize: z.number(),
    items: z.array(SearchItemSchema),
  }),
);
export type SearchMusicOutput = z.infer<typeof SearchMusicOutput>;

export const SongDetailOutput = envelope(SongDetailSchema);

export const SongQualityOutput = envelope(
  z.object({
    mid: z.string(),
    name: z.string(),
    availableQualities: z.array(z.enum(QUALITY_CODES)),
    sizes: z.record(z.number()).describe('File size in bytes per available quality'),
  }),
);

export const LyricOutput = envelope(
  z.object({
    songId: z.string(),
    lyric: z.string(),
    translation: z.string().optional(),
    timestamped: z.boolean(),
  }),
);

export const SongUrlOutput = envelope(
  z.object({
    mid: z.string(),
    url: z.string(),
    quality: z.enum(QUALITY_CODES),
    size: z.number().optional(),
  }),
);

const BatchEntrySchema = z.union([
  z.object({ ok: z.literal(true), url: z.string(), size: z.number().optional() }),
  z.object({ ok: z.literal(false), error: ToolErrorSchema }),
]);

export const BatchSongUrlsOutput = envelope(
  z.object({
    quality: z.enum(QUALITY_CODES),
    succeeded: z.number(),
    failed: z.number(),
    results: z.record(BatchEntrySchema).describe('Keyed by song MID'),
  }),
);

export const AlbumDetailOutput = envelope(
  z.object({
    mid: z.string(),
    id: z.number(),
    name: z.string(),
    artists: z.array(z.string()),
    singers: z.string(),
    publishDate: z.string().optional(),
    description: z.string().optional(),
    songCount: z.number(),
    coverUrl: z.string().optional(),
  }),
);

export const AlbumSongsOutput = envelope(
  z.object({
    albumId: z.string(),
    total: z.number(),
    page: z.number(),
    pageSize: z.number(),
    songs: z.array(SlimSongSchema),
  }),
);

export const PlaylistDetailOutput = envelope(
  z.object({
    id: z.string(),
    name: z.string(),
    cover: z.string().optional(),
    creator: z.string().optional(),
    listenCount: z.number(),
    songCount: z.number(),
    songs: z.array(SlimSongSchema),
  }),
);

export const AlbumCoverOutput = envelope(
  z.object({
    albumId: z.string(),
    size: z.enum(COVER_SIZE_NAMES),
    pixels: z.number(),
    url: z.string(),
  }),
);

export const HealthOutput = envelope(
  z.object({
    status: z.string(),
    timestamp: z.number(),
    runtime: z.string(),
    credentialConfigured: z.boolean(),
    uptime: z.number().optional(),
    nodeVersion: z.string().optional(),
  }),
);
