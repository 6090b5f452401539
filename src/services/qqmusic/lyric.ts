import { LyricResponseCodec } from '../../types/qqmusic.codecs.js';
import { QQMusicError } from '../../utils/http-result.js';
import { decodeLyricField } from '../../utils/lyrics.js';
import type { QQMusicApi } from './client.js';
import { LYRIC_REFERER } from './constants.js';

export interface LyricText {
  lyric: string;
  translation?: string;
}

export async function getLyric(
  api: QQMusicApi,
  songId: string,
  signal?: AbortSignal,
): Promise<LyricText> {
  const json = await api.call(
    'lyric',
    {
      songmid: songId,
      g_tk: 5381,
      format: 'json',
      inCharset: 'utf8',
      outCharset: 'utf-8',
      nobase64: 0,
    },
    // The lyric endpoint rejects the default Referer
    { headers: { Referer: LYRIC_REFERER }, signal },
  );

  const parsed = LyricResponseCodec.safeParse(json);
  if (!parsed.success) {
    throw new QQMusicError('upstream_error', 'Lyric returned an unexpected payload');
  }
  const lyric = parsed.data.code === 0 ? decodeLyricField(parsed.data.lyric).trim() : '';
  if (!lyric) {
    throw new QQMusicError('not_found', `No lyric available for song ${songId}`);
  }
  const translation = decodeLyricField(parsed.data.trans).trim();
  return { lyric, translation: translation || undefined };
}
