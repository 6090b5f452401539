export const DEFAULT_BASE_URLS = {
  c: 'https://c.y.qq.com',
  u: 'https://u.y.qq.com',
} as const;

export type BaseUrls = { c: string; u: string };

export const DEFAULT_HEADERS: Record<string, string> = {
  'User-Agent':
    'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36',
  Referer: 'https://y.qq.com/',
  Origin: 'https://y.qq.com',
};

// Used when the vkey response omits `sip`
export const DEFAULT_STREAM_HOST = 'https://ws.stream.qqmusic.qq.com/';

export const LYRIC_REFERER = 'https://y.qq.com/portal/player.html';

export const ENDPOINTS = {
  search: { host: 'c', path: '/soso/fcgi-bin/client_search_cp' },
  musicu: { host: 'u', path: '/cgi-bin/musicu.fcg' },
  lyric: { host: 'c', path: '/lyric/fcgi-bin/fcg_query_lyric_new.fcg' },
  album: { host: 'c', path: '/v8/fcg-bin/fcg_v8_album_info_cp.fcg' },
  playlist: { host: 'c', path: '/qzone/fcg-bin/fcg_ucc_getcdinfo_byids_cp.fcg' },
} as const satisfies Record<string, { host: keyof BaseUrls; path: string }>;

export type Endpoint = keyof typeof ENDPOINTS;

export const SEARCH_TYPES = ['song', 'album', 'playlist', 'mv', 'lyric', 'user'] as const;
export type SearchType = (typeof SEARCH_TYPES)[number];

/** Value of the `t` parameter on client_search_cp. */
export const SEARCH_TYPE_CODES: Record<SearchType, number> = {
  song: 0,
  album: 2,
  playlist: 3,
  mv: 4,
  lyric: 7,
  user: 8,
};

export const QUALITY_CODES = ['m4a', '128', '320', 'flac', 'ape', 'hires', 'atmos'] as const;
export type QualityCode = (typeof QUALITY_CODES)[number];

export interface QualityInfo {
  prefix: string;
  ext: string;
  label: string;
  /** Remote only signs these for a logged-in VIP session. */
  requiresCredential: boolean;
  /** Field of track_info.file holding the size in bytes. */
  sizeField: string;
}

export const QUALITY_TABLE: Record<QualityCode, QualityInfo> = {
  m4a: {
    prefix: 'C400',
    ext: 'm4a',
    label: 'AAC 96kbps',
    requiresCredential: false,
    sizeField: 'size_96aac',
  },
  '128': {
    prefix: 'M500',
    ext: 'mp3',
    label: 'MP3 128kbps',
    requiresCredential: false,
    sizeField: 'size_128mp3',
  },
  '320': {
    prefix: 'M800',
    ext: 'mp3',
    label: 'MP3 320kbps',
    requiresCredential: true,
    sizeField: 'size_320mp3',
  },
  flac: {
    prefix: 'F000',
    ext: 'flac',
    label: 'FLAC lossless',
    requiresCredential: true,
    sizeField: 'size_flac',
  },
  ape: {
    prefix: 'A000',
    ext: 'ape',
    label: 'APE lossless',
    requiresCredential: true,
    sizeField: 'size_ape',
  },
  hires: {
    prefix: 'RS01',
    ext: 'flac',
    label: 'Hi-Res master 24bit/192kHz',
    requiresCredential: true,
    sizeField: 'size_hires',
  },
  atmos: {
    prefix: 'Q001',
    ext: 'flac',
    label: 'Dolby Atmos spatial audio',
    requiresCredential: true,
    sizeField: 'size_dolby',
  },
};

export const COVER_SIZE_NAMES = ['small', 'medium', 'large'] as const;
export type CoverSize = (typeof COVER_SIZE_NAMES)[number];

export const COVER_SIZES: Record<CoverSize, number> = { small: 150, medium: 300, large: 500 };

export function albumCoverUrl(albumMid: string, pixels: number): string {
  return `https://y.qq.com/music/photo_new/T002R${pixels}x${pixels}M000${encodeURIComponent(albumMid)}.jpg`;
}
