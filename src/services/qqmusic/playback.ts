import { VkeyResponseCodec } from '../../types/qqmusic.codecs.js';
import { type ErrorCode, QQMusicError, toQQMusicError } from '../../utils/http-result.js';
import { makeConcurrencyGate } from '../../utils/limits.js';
import { logger } from '../../utils/logger.js';
import type { QQMusicApi } from './client.js';
import { DEFAULT_STREAM_HOST, QUALITY_TABLE, type QualityCode } from './constants.js';

export interface SongUrl {
  mid: string;
  url: string;
  quality: QualityCode;
  size?: number;
}

export type BatchSongUrlEntry =
  | { ok: true; url: string; size?: number }
  | { ok: false; error: { code: ErrorCode; message: string } };

export function assertQualityAllowed(api: QQMusicApi, quality: QualityCode): void {
  const info = QUALITY_TABLE[quality];
  if (info.requiresCredential && !api.hasCredential) {
    throw new QQMusicError(
      'unauthorized',
      `Quality '${quality}' (${info.label}) requires a logged-in QQ Music VIP session. Set QQ_MUSIC_COOKIE and retry, or use 128/m4a.`,
    );
  }
}

export async function getSongUrl(
  api: QQMusicApi,
  songId: string,
  quality: QualityCode,
  signal?: AbortSignal,
): Promise<SongUrl> {
  assertQualityAllowed(api, quality);
  const { prefix, ext } = QUALITY_TABLE[quality];

  const json = await api.callModule(
    'req_0',
    {
      module: 'vkey.GetVkeyServer',
      method: 'CgiGetVkey',
      param: {
        guid: api.guid(),
        songmid: [songId],
        songtype: [0],
        uin: api.uin,
        loginflag: api.hasCredential ? 1 : 0,
        platform: '20',
        filename: [`${prefix}${songId}${songId}.${ext}`],
      },
    },
    { auth: true, signal },
  );

  const parsed = VkeyResponseCodec.safeParse(json);
  if (!parsed.success) {
    throw new QQMusicError('upstream_error', 'Playback URL returned an unexpected payload');
  }
  const req = parsed.data.req_0;
  if (parsed.data.code !== 0 || !req || req.code !== 0) {
    throw new QQMusicError(
      'upstream_error',
      `Playback URL failed with code ${req?.code ?? parsed.data.code}`,
    );
  }

  const info = req.data.midurlinfo.find((entry) => entry.songmid === songId);
  if (!info) {
    throw new QQMusicError('not_found', `Song ${songId} not found`);
  }
  if (!info.purl) {
    const hint = api.hasCredential
      ? 'The configured cookie may be expired or lack VIP rights, or the song is region/copyright restricted.'
      : 'The song may be VIP-only or region/copyright restricted.';
    throw new QQMusicError(
      'unavailable',
      `No playback URL for song ${songId} at quality '${quality}'. ${hint}`,
    );
  }

  const host = req.data.sip.find(Boolean) ?? DEFAULT_STREAM_HOST;
  return {
    mid: songId,
    url: `${host}${info.purl}`,
    quality,
    size: info.filesize && info.filesize > 0 ? info.filesize : undefined,
  };
}

/**
 * Resolve each id with its own request. Failures stay on their entry and
 * never reject the batch; duplicate ids collapse into one entry.
 */
export async function getBatchSongUrls(
  api: QQMusicApi,
  songIds: readonly string[],
  quality: QualityCode,
  options: { concurrency: number; signal?: AbortSignal },
): Promise<Record<string, BatchSongUrlEntry>> {
  assertQualityAllowed(api, quality);

  const unique = [...new Set(songIds)];
  const gate = makeConcurrencyGate(options.concurrency);

  const settled = await Promise.all(
    unique.map((songId) =>
      gate(async (): Promise<[string, BatchSongUrlEntry]> => {
        try {
          const { url, size } = await getSongUrl(api, songId, quality, options.signal);
          return [songId, { ok: true, url, size }];
        } catch (error) {
          const err = toQQMusicError(error);
          await logger.debug('qqmusic', {
            message: 'Batch entry failed',
            songId,
            code: err.code,
          });
          return [songId, { ok: false, error: { code: err.code, message: err.message } }];
        }
      }),
    ),
  );

  return Object.fromEntries(settled);
}
