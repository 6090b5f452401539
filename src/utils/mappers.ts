/**
 * Mapper utilities to convert QQ Music API responses to slim representations.
 */

import type {
  AlbumInfoCodecType,
  AlbumSongItemCodecType,
  PlaylistCdCodecType,
  SearchAlbumItemCodecType,
  SearchMvItemCodecType,
  SearchPlaylistItemCodecType,
  SearchUserItemCodecType,
  SingerCodecType,
  SongItemCodecType,
} from '../types/qqmusic.codecs.js';
import {
  albumCoverUrl,
  QUALITY_CODES,
  QUALITY_TABLE,
  type QualityCode,
} from '../services/qqmusic/constants.js';

export interface SlimSong {
  mid: string;
  id: number;
  name: string;
  artists: string[];
  singers: string;
  album?: { mid: string; name: string };
  durationSeconds: number;
  payPlay: boolean;
}

export interface SongDetail extends SlimSong {
  availableQualities: QualityCode[];
}

export interface SearchItem {
  type: 'song' | 'album' | 'playlist' | 'mv' | 'user';
  id: string;
  mid?: string;
  name: string;
  artists: string[];
  album?: string;
  durationSeconds?: number;
}

function artistNames(singers: SingerCodecType[]): string[] {
  return singers.map((s) => s.name).filter(Boolean);
}

export function toSlimSong(s: SongItemCodecType): SlimSong {
  const artists = artistNames(s.singer);
  const albumRef = s.album.mid || s.album.name ? { mid: s.album.mid, name: s.album.name } : undefined;
  return {
    mid: s.mid,
    id: s.id,
    name: s.name || s.title,
    artists,
    singers: artists.join(' / '),
    album: albumRef,
    durationSeconds: s.interval,
    payPlay: s.pay.pay_play > 0,
  };
}

export function toSongDetail(s: SongItemCodecType): SongDetail {
  return { ...toSlimSong(s), availableQualities: availableQualities(s.file) };
}

export function toSlimAlbumSong(s: AlbumSongItemCodecType): SlimSong {
  const artists = artistNames(s.singer);
  return {
    mid: s.songmid,
    id: s.songid,
    name: s.songname,
    artists,
    singers: artists.join(' / '),
    album: s.albummid || s.albumname ? { mid: s.albummid, name: s.albumname } : undefined,
    durationSeconds: s.interval,
    payPlay: false,
  };
}

/** Per-quality file sizes in bytes; a quality is available when its size is positive. */
export function qualitySizes(file: Record<string, unknown>): Partial<Record<QualityCode, number>> {
  const sizes: Partial<Record<QualityCode, number>> = {};
  for (const code of QUALITY_CODES) {
    const raw = file[QUALITY_TABLE[code].sizeField];
    const size = typeof raw === 'string' ? Number(raw) : raw;
    if (typeof size === 'number' && Number.isFinite(size) && size > 0) {
      sizes[code] = size;
    }
  }
  return sizes;
}

export function availableQualities(file: Record<string, unknown>): QualityCode[] {
  const sizes = qualitySizes(file);
  return QUALITY_CODES.filter((code) => sizes[code] !== undefined);
}

export function toSearchSong(s: SongItemCodecType): SearchItem {
  const slim = toSlimSong(s);
  return {
    type: 'song',
    id: String(slim.id),
    mid: slim.mid || undefined,
    name: slim.name,
    artists: slim.artists,
    album: slim.album?.name || undefined,
    durationSeconds: slim.durationSeconds,
  };
}

export function toSearchAlbum(a: SearchAlbumItemCodecType): SearchItem {
  const fromList = artistNames(a.singer_list);
  return {
    type: 'album',
    id: String(a.albumID),
    mid: a.albumMID || undefined,
    name: a.albumName,
    artists: fromList.length > 0 ? fromList : a.singerName ? [a.singerName] : [],
  };
}

export function toSearchPlaylist(p: SearchPlaylistItemCodecType): SearchItem {
  return {
    type: 'playlist',
    id: p.dissid,
    name: p.dissname,
    artists: p.creator.name ? [p.creator.name] : [],
  };
}

export function toSearchMv(m: SearchMvItemCodecType): SearchItem {
  const vid = m.vid || m.v_id;
  const fromList = artistNames(m.singer_list);
  return {
    type: 'mv',
    id: vid,
    mid: vid || undefined,
    name: m.mv_name || m.title,
    artists: fromList.length > 0 ? fromList : m.singer_name ? [m.singer_name] : [],
  };
}

export function toSearchUser(u: SearchUserItemCodecType): SearchItem {
  return {
    type: 'user',
    id: u.encrypt_uin || u.uin,
    name: u.title || u.nick,
    artists: [],
  };
}

export function toAlbumDetails(a: AlbumInfoCodecType) {
  // The album endpoint carries artists only on its tracks
  const firstTrack = a.list[0];
  const artists = firstTrack ? artistNames(firstTrack.singer) : [];
  if (artists.length === 0 && a.singername) {
    artists.push(a.singername);
  }
  return {
    mid: a.mid,
    id: a.id,
    name: a.name,
    artists,
    singers: artists.join(' / '),
    publishDate: a.aDate || undefined,
    description: a.desc || undefined,
    songCount: a.total_song_num ?? a.list.length,
    coverUrl: a.mid ? albumCoverUrl(a.mid, 500) : undefined,
  };
}

export function toPlaylistDetails(p: PlaylistCdCodecType) {
  return {
    id: p.dissid,
    name: p.dissname,
    cover: p.logo || undefined,
    creator: p.nick || undefined,
    listenCount: p.visitnum,
    songCount: p.songnum || p.songlist.length,
  };
}
