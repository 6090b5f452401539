import { z } from 'zod';
import {
  COVER_SIZE_NAMES,
  QUALITY_CODES,
  SEARCH_TYPES,
} from '../services/qqmusic/constants.js';

const SongId = z
  .string()
  .trim()
  .min(1)
  .describe("Song MID, e.g. '0039MnYb0qxYhV'. Get it from search_music items[].mid.");

const AlbumId = z
  .string()
  .trim()
  .min(1)
  .describe('Album MID. Get it from song album.mid or search_music with type=album.');

const Quality = z
  .enum(QUALITY_CODES)
  .default('128')
  .describe(
    "Encoding: m4a (AAC), 128 / 320 (MP3 kbps), flac / ape (lossless), hires (24bit master), atmos (Dolby Atmos). Anything above 128 needs a VIP cookie.",
  );

// Search
export const SearchMusicInputSchema = z.object({
  query: z.string().trim().min(1).describe('Keywords: song title, artist, album or lyric fragment.'),
  type: z
    .enum(SEARCH_TYPES)
    .default('song')
    .describe("What to search for: 'song', 'album', 'playlist', 'mv', 'lyric' or 'user'."),
  page: z.number().int().min(1).default(1).describe('1-based page number.'),
  pageSize: z.number().int().min(1).max(100).default(20).describe('Results per page (1-100).'),
});

// Songs
export const SongDetailInputSchema = z.object({ songId: SongId });

export const SongQualityInputSchema = z.object({ songId: SongId });

export const LyricInputSchema = z.object({
  songId: SongId,
  timestamps: z
    .boolean()
    .default(true)
    .describe('Keep LRC time tags ([mm:ss.xx]). Set false for plain lines.'),
});

export const SongUrlInputSchema = z.object({ songId: SongId, quality: Quality });

export const BatchSongUrlsInputSchema = z.object({
  songIds: z
    .preprocess(
      (v) => (typeof v === 'string' ? v.split(',') : v),
      z.array(z.string().trim()).transform((ids) => ids.filter(Boolean)),
    )
    .pipe(z.array(z.string()).min(1).max(50))
    .describe('1-50 song MIDs, as an array or a comma-separated string.'),
  quality: Quality,
});

// Albums
export const AlbumDetailInputSchema = z.object({ albumId: AlbumId });

export const AlbumSongsInputSchema = z.object({
  albumId: AlbumId,
  page: z.number().int().min(1).default(1).describe('1-based page number.'),
  pageSize: z.number().int().min(1).max(100).default(50).describe('Songs per page (1-100).'),
});

export const AlbumCoverInputSchema = z.object({
  albumId: AlbumId,
  size: z
    .enum(COVER_SIZE_NAMES)
    .default('medium')
    .describe('small (150px), medium (300px) or large (500px).'),
});

// Playlists
export const PlaylistDetailInputSchema = z.object({
  playlistId: z
    .union([z.string().trim(), z.number().int().positive().transform(String)])
    .pipe(z.string().regex(/^\d+$/, 'playlistId must be numeric'))
    .describe('Numeric playlist id (disstid), from search_music with type=playlist or a y.qq.com playlist link.'),
});
