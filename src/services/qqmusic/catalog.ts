import {
  AlbumInfoResponseCodec,
  type AlbumInfoCodecType,
  parseSearchBlock,
  PlaylistResponseCodec,
  type PlaylistCdCodecType,
  SearchAlbumItemCodec,
  SearchMvItemCodec,
  SearchPlaylistItemCodec,
  SearchResponseCodec,
  SearchUserItemCodec,
  SongDetailResponseCodec,
  SongItemCodec,
  type SongItemCodecType,
} from '../../types/qqmusic.codecs.js';
import { QQMusicError } from '../../utils/http-result.js';
import {
  type SearchItem,
  toSearchAlbum,
  toSearchMv,
  toSearchPlaylist,
  toSearchSong,
  toSearchUser,
} from '../../utils/mappers.js';
import type { QQMusicApi } from './client.js';
import { SEARCH_TYPE_CODES, type SearchType } from './constants.js';

const CHARSET_PARAMS = { format: 'json', inCharset: 'utf8', outCharset: 'utf-8' } as const;

export type SearchParams = {
  query: string;
  type: SearchType;
  page: number;
  pageSize: number;
};

// Response key under `data` for each search type, in lookup order
const SEARCH_BLOCK_KEYS: Record<SearchType, string[]> = {
  song: ['song'],
  lyric: ['lyric', 'song'],
  album: ['album'],
  playlist: ['playlist', 'songlist', 'qdisc'],
  mv: ['mv'],
  user: ['user'],
};

export async function searchMusic(
  api: QQMusicApi,
  params: SearchParams,
  signal?: AbortSignal,
): Promise<{ total: number; items: SearchItem[] }> {
  const json = await api.call(
    'search',
    {
      w: params.query,
      p: params.page,
      n: params.pageSize,
      t: SEARCH_TYPE_CODES[params.type],
      new_json: 1,
      aggr: 1,
      cr: 1,
      lossless: 0,
      ...CHARSET_PARAMS,
    },
    { signal },
  );

  const parsed = SearchResponseCodec.safeParse(json);
  if (!parsed.success) {
    throw new QQMusicError('upstream_error', 'Search returned an unexpected payload');
  }
  if (parsed.data.code !== 0) {
    throw new QQMusicError('upstream_error', `Search failed with code ${parsed.data.code}`);
  }

  const key = SEARCH_BLOCK_KEYS[params.type].find((k) => parsed.data.data[k] !== undefined);
  const block = key ? parseSearchBlock(parsed.data.data[key]) : undefined;
  if (!block) {
    return { total: 0, items: [] };
  }

  const items: SearchItem[] = [];
  for (const raw of block.list) {
    const item = toSearchItem(params.type, raw);
    if (item?.id && item.name) {
      items.push(item);
    }
  }
  return { total: block.totalnum, items };
}

function toSearchItem(type: SearchType, raw: unknown): SearchItem | undefined {
  switch (type) {
    case 'song':
    case 'lyric': {
      const parsed = SongItemCodec.safeParse(raw);
      return parsed.success ? toSearchSong(parsed.data) : undefined;
    }
    case 'album': {
      const parsed = SearchAlbumItemCodec.safeParse(raw);
      return parsed.success ? toSearchAlbum(parsed.data) : undefined;
    }
    case 'playlist': {
      const parsed = SearchPlaylistItemCodec.safeParse(raw);
      return parsed.success ? toSearchPlaylist(parsed.data) : undefined;
    }
    case 'mv': {
      const parsed = SearchMvItemCodec.safeParse(raw);
      return parsed.success ? toSearchMv(parsed.data) : undefined;
    }
    case 'user': {
      const parsed = SearchUserItemCodec.safeParse(raw);
      return parsed.success ? toSearchUser(parsed.data) : undefined;
    }
  }
}

export async function getSongDetail(
  api: QQMusicApi,
  songId: string,
  signal?: AbortSignal,
): Promise<SongItemCodecType> {
  const json = await api.callModule(
    'songinfo',
    {
      module: 'music.pf_song_detail_svr',
      method: 'get_song_detail_yqq',
      param: { song_mid: songId },
    },
    { auth: true, signal },
  );

  const parsed = SongDetailResponseCodec.safeParse(json);
  if (!parsed.success) {
    throw new QQMusicError('upstream_error', 'Song detail returned an unexpected payload');
  }
  if (parsed.data.code !== 0) {
    throw new QQMusicError('upstream_error', `Song detail failed with code ${parsed.data.code}`);
  }
  const songinfo = parsed.data.songinfo;
  if (!songinfo) {
    throw new QQMusicError('upstream_error', 'Song detail response has no songinfo module');
  }
  if (songinfo.code !== 0) {
    throw new QQMusicError('upstream_error', `Song detail module failed with code ${songinfo.code}`);
  }
  const track = songinfo.data.track_info;
  if (!track || (!track.mid && !track.id)) {
    throw new QQMusicError('not_found', `Song ${songId} not found`);
  }
  return track;
}

export async function getAlbumInfo(
  api: QQMusicApi,
  albumId: string,
  signal?: AbortSignal,
): Promise<AlbumInfoCodecType> {
  const json = await api.call('album', { albummid: albumId, ...CHARSET_PARAMS }, { signal });

  const parsed = AlbumInfoResponseCodec.safeParse(json);
  if (!parsed.success) {
    throw new QQMusicError('upstream_error', 'Album info returned an unexpected payload');
  }
  const album = parsed.data.code === 0 ? parsed.data.data : undefined;
  if (!album || (!album.mid && !album.name && album.list.length === 0)) {
    throw new QQMusicError('not_found', `Album ${albumId} not found`);
  }
  return album;
}

export async function getPlaylist(
  api: QQMusicApi,
  playlistId: string,
  signal?: AbortSignal,
): Promise<PlaylistCdCodecType> {
  const json = await api.call(
    'playlist',
    { type: 1, json: 1, utf8: 1, onlysong: 0, disstid: playlistId, ...CHARSET_PARAMS },
    { auth: true, signal },
  );

  const parsed = PlaylistResponseCodec.safeParse(json);
  if (!parsed.success) {
    throw new QQMusicError('upstream_error', 'Playlist returned an unexpected payload');
  }
  const cd = parsed.data.code === 0 ? parsed.data.cdlist[0] : undefined;
  if (!cd) {
    throw new QQMusicError('not_found', `Playlist ${playlistId} not found`);
  }
  return cd;
}
