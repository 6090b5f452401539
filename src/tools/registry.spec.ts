import { describe, expect, it, vi } from 'vitest';
import { createHttpClient } from '../services/http-client.js';
import { createQQMusicApi, type QQMusicApi } from '../services/qqmusic/client.js';
import { createFakeApi, jsonResponse, musicuRequest, waitFor } from '../test-support/fake-http.js';
import {
  albumPayload,
  lyricPayload,
  playlistPayload,
  searchPayload,
  songDetailPayload,
  songItem,
  vkeyPayload,
} from '../test-support/fixtures.js';
import { logger } from '../utils/logger.js';
import { executeTool, getToolNames } from './registry.js';

const context = (api: QQMusicApi, signal?: AbortSignal) => ({
  api,
  signal,
});

describe('tool registry', () => {
  it('exposes every tool', () => {
    expect(getToolNames()).toEqual([
      'search_music',
      'get_song_detail',
      'get_song_quality',
      'get_lyric',
      'get_song_url',
      'get_batch_song_urls',
      'get_album_detail',
      'get_album_songs',
      'get_playlist_detail',
      'get_album_cover',
      'health',
    ]);
  });

  it('reports an unknown tool as invalid_argument', async () => {
    const { api } = createFakeApi(() => jsonResponse({}));
    const result = await executeTool('play_song', {}, context(api));
    expect(result.isError).toBe(true);
    expect(result.structuredContent).toEqual({
      ok: false,
      _msg: 'Unknown tool: play_song',
      error: { code: 'invalid_argument', message: 'Unknown tool: play_song' },
    });
  });

  it('rejects invalid input without touching the network', async () => {
    const { api, calls } = createFakeApi(() => jsonResponse({}));
    const result = await executeTool('search_music', { query: 'x', pageSize: 500 }, context(api));
    expect(result.isError).toBe(true);
    expect(result.structuredContent).toMatchObject({ ok: false, error: { code: 'invalid_argument' } });
    expect(calls).toHaveLength(0);
  });

  it('logs error results with the request id', async () => {
    const debug = vi.spyOn(logger, 'debug');
    const { api } = createFakeApi(() => jsonResponse({}));

    await executeTool('get_song_url', { songId: 'mid0001', quality: 'flac' }, {
      api,
      requestId: '42',
    });

    expect(debug).toHaveBeenCalledWith('tools', {
      message: 'Tool returned an error',
      tool: 'get_song_url',
      requestId: '42',
    });
    debug.mockRestore();
  });

  it('returns cancelled for an already-aborted invocation', async () => {
    const { api, calls } = createFakeApi(() => jsonResponse({}));
    const result = await executeTool(
      'search_music',
      { query: 'x' },
      context(api, AbortSignal.abort()),
    );
    expect(result.structuredContent).toMatchObject({ error: { code: 'cancelled' } });
    expect(calls).toHaveLength(0);
  });
});

describe('search_music', () => {
  it('applies defaults and returns the envelope', async () => {
    const { api, calls } = createFakeApi(() =>
      jsonResponse(searchPayload('song', [songItem('mid0001', 'First Song')], 1)),
    );

    const result = await executeTool('search_music', { query: 'first' }, context(api));

    expect(result.isError).toBeUndefined();
    expect(calls[0]?.url.searchParams.get('n')).toBe('20');
    expect(result.structuredContent).toMatchObject({
      ok: true,
      data: { query: 'first', type: 'song', total: 1, page: 1, pageSize: 20 },
    });
    expect(result.content).toEqual([
      {
        type: 'text',
        text: 'Results for "first" (page 1, 1 total):\n- [song] First Song - Singer A / Singer B (mid0001)',
      },
    ]);
  });

  it('gives identical results for repeated calls', async () => {
    const { api } = createFakeApi(() =>
      jsonResponse(searchPayload('song', [songItem('mid0001', 'First Song')], 1)),
    );
    const first = await executeTool('search_music', { query: 'x' }, context(api));
    const second = await executeTool('search_music', { query: 'x' }, context(api));
    expect(second).toEqual(first);
  });

  it('keeps concurrent invocations apart', async () => {
    const { api } = createFakeApi(async (call) => {
      const query = call.url.searchParams.get('w') ?? '';
      await waitFor(query === 'slow' ? 20 : 1);
      return jsonResponse(searchPayload('song', [songItem(`mid-${query}`, `Song ${query}`)]));
    });

    const [slow, fast] = await Promise.all([
      executeTool('search_music', { query: 'slow' }, context(api)),
      executeTool('search_music', { query: 'fast' }, context(api)),
    ]);

    expect(slow.structuredContent).toMatchObject({
      data: { query: 'slow', items: [{ mid: 'mid-slow', name: 'Song slow' }] },
    });
    expect(fast.structuredContent).toMatchObject({
      data: { query: 'fast', items: [{ mid: 'mid-fast', name: 'Song fast' }] },
    });
  });

  it('reports a body without an envelope code as an error, not an empty result', async () => {
    const { api } = createFakeApi(() => jsonResponse({ message: 'server busy' }));
    const result = await executeTool('search_music', { query: 'x' }, context(api));
    expect(result.isError).toBe(true);
    expect(result.structuredContent).toEqual({
      ok: false,
      _msg: 'Search returned an unexpected payload',
      error: { code: 'upstream_error', message: 'Search returned an unexpected payload' },
    });
  });

  it('reports a timed-out request as timeout', async () => {
    const http = createHttpClient({
      timeout: 20,
      fetch: async (_input, init) => {
        await waitFor(60_000, init?.signal ?? undefined);
        return jsonResponse({});
      },
    });
    const api = createQQMusicApi({ http });

    const result = await executeTool('search_music', { query: 'x' }, context(api));

    expect(result.structuredContent).toEqual({
      ok: false,
      _msg: 'Request timed out after 20ms',
      error: { code: 'timeout', message: 'Request timed out after 20ms' },
    });
  });

  describe('with a body that stalls after the headers', () => {
    const stalledApi = (timeout: number) =>
      createQQMusicApi({
        http: createHttpClient({
          timeout,
          fetch: async () =>
            new Response(
              new ReadableStream<Uint8Array>({
                start(controller) {
                  controller.enqueue(new TextEncoder().encode('{"code":0,'));
                },
              }),
            ),
        }),
      });

    it('times out', async () => {
      const result = await executeTool('search_music', { query: 'x' }, context(stalledApi(30)));
      expect(result.structuredContent).toMatchObject({
        ok: false,
        error: { code: 'timeout', message: 'Request timed out after 30ms' },
      });
    });

    it('is cancelled when the invocation is withdrawn', async () => {
      const controller = new AbortController();
      const pending = executeTool(
        'search_music',
        { query: 'x' },
        context(stalledApi(10_000), controller.signal),
      );
      setTimeout(() => controller.abort(), 20);
      const result = await pending;
      expect(result.structuredContent).toMatchObject({ ok: false, error: { code: 'cancelled' } });
    });
  });
});

describe('get_song_detail', () => {
  it('maps title, artists, album and duration', async () => {
    const { api } = createFakeApi(() =>
      jsonResponse(songDetailPayload(songItem('mid0001', 'First Song'))),
    );

    const result = await executeTool('get_song_detail', { songId: 'mid0001' }, context(api));

    expect(result.structuredContent).toEqual({
      ok: true,
      _msg: "'First Song' by Singer A / Singer B from 'Test Album', 3:35. Qualities: m4a, 128, 320.",
      data: {
        mid: 'mid0001',
        id: 1007,
        name: 'First Song',
        artists: ['Singer A', 'Singer B'],
        singers: 'Singer A / Singer B',
        album: { mid: 'albumMid01', name: 'Test Album' },
        durationSeconds: 215,
        payPlay: false,
        availableQualities: ['m4a', '128', '320'],
      },
    });
  });

  it('rejects a missing songId without a request', async () => {
    const { api, calls } = createFakeApi(() => jsonResponse({}));
    const result = await executeTool('get_song_detail', {}, context(api));
    expect(result.structuredContent).toMatchObject({ error: { code: 'invalid_argument' } });
    expect(calls).toHaveLength(0);
  });

  it('keeps concurrent lookups of distinct ids apart', async () => {
    const { api } = createFakeApi(async (call) => {
      const mid = String(musicuRequest(call).songinfo?.param.song_mid);
      await waitFor(mid.length % 3);
      return jsonResponse(songDetailPayload(songItem(mid, `Song ${mid}`)));
    });
    const ids = ['a1', 'bb22', 'ccc333', 'dddd4444', 'e5'];

    const results = await Promise.all(
      ids.map((songId) => executeTool('get_song_detail', { songId }, context(api))),
    );

    results.forEach((result, i) => {
      expect(result.structuredContent).toMatchObject({
        data: { mid: ids[i], name: `Song ${ids[i]}` },
      });
    });
  });

  it('reports an empty track as not_found', async () => {
    const { api } = createFakeApi(() => jsonResponse(songDetailPayload({})));
    const result = await executeTool('get_song_detail', { songId: 'gone' }, context(api));
    expect(result.structuredContent).toMatchObject({
      ok: false,
      error: { code: 'not_found', message: 'Song gone not found' },
    });
  });
});

describe('get_song_quality', () => {
  it('lists qualities with positive sizes', async () => {
    const { api } = createFakeApi(() =>
      jsonResponse(songDetailPayload(songItem('mid0001', 'First Song'))),
    );

    const result = await executeTool('get_song_quality', { songId: 'mid0001' }, context(api));

    expect(result.structuredContent).toMatchObject({
      ok: true,
      data: {
        mid: 'mid0001',
        name: 'First Song',
        availableQualities: ['m4a', '128', '320'],
        sizes: { m4a: 1_500_000, '128': 3_440_000, '320': 8_600_000 },
      },
    });
  });
});

describe('get_lyric', () => {
  it('strips time tags when asked', async () => {
    const { api } = createFakeApi(() =>
      jsonResponse(
        lyricPayload('[ti:Song]\n[00:01.00]Line one\n[00:02.00]Line two', '[00:01.00]Translated'),
      ),
    );

    const result = await executeTool(
      'get_lyric',
      { songId: 'mid0001', timestamps: false },
      context(api),
    );

    expect(result.structuredContent).toMatchObject({
      ok: true,
      data: {
        songId: 'mid0001',
        lyric: 'Line one\nLine two',
        translation: 'Translated',
        timestamped: false,
      },
    });
  });

  it('returns a lyric with an out-of-range entity intact', async () => {
    const { api } = createFakeApi(() =>
      jsonResponse(lyricPayload('[00:01.00]Hi &#99999999; there')),
    );
    const result = await executeTool('get_lyric', { songId: 'mid0001' }, context(api));
    expect(result.structuredContent).toMatchObject({
      ok: true,
      data: { lyric: '[00:01.00]Hi &#99999999; there' },
    });
  });

  it('keeps time tags by default', async () => {
    const { api, calls } = createFakeApi(() => jsonResponse(lyricPayload('[00:01.00]Line one')));

    const result = await executeTool('get_lyric', { songId: 'mid0001' }, context(api));

    expect(calls[0]?.headers.get('referer')).toBe('https://y.qq.com/portal/player.html');
    expect(result.structuredContent).toMatchObject({
      data: { lyric: '[00:01.00]Line one', timestamped: true },
    });
  });
});

describe('get_song_url', () => {
  it('explains the missing cookie for VIP qualities', async () => {
    const { api, calls } = createFakeApi(() => jsonResponse(vkeyPayload([])));

    const result = await executeTool('get_song_url', { songId: 'mid0001', quality: '320' }, context(api));

    expect(result.isError).toBe(true);
    expect(result.structuredContent).toMatchObject({ error: { code: 'unauthorized' } });
    expect(result.content).toEqual([
      {
        type: 'text',
        text: "[unauthorized] Quality '320' (MP3 320kbps) requires a logged-in QQ Music VIP session. Set QQ_MUSIC_COOKIE and retry, or use 128/m4a.",
      },
    ]);
    expect(calls).toHaveLength(0);
  });
});

describe('get_batch_song_urls', () => {
  it('accepts a comma-separated string and counts outcomes', async () => {
    const { api } = createFakeApi((call) => {
      const songmid = musicuRequest(call).req_0?.param.songmid;
      const mid = Array.isArray(songmid) ? String(songmid[0]) : '';
      return jsonResponse(vkeyPayload(mid === 'songA' ? [{ songmid: 'songA', purl: 'a.mp3' }] : []));
    });

    const result = await executeTool(
      'get_batch_song_urls',
      { songIds: 'songA, songB,' },
      context(api),
    );

    expect(result.isError).toBeUndefined();
    expect(result.structuredContent).toMatchObject({
      ok: true,
      data: {
        quality: '128',
        succeeded: 1,
        failed: 1,
        results: {
          songA: { ok: true, url: 'https://stream.example.test/a.mp3' },
          songB: { ok: false, error: { code: 'not_found' } },
        },
      },
    });
  });

  it('rejects more than 50 ids', async () => {
    const { api, calls } = createFakeApi(() => jsonResponse({}));
    const songIds = Array.from({ length: 51 }, (_, i) => `song${i}`);
    const result = await executeTool('get_batch_song_urls', { songIds }, context(api));
    expect(result.structuredContent).toMatchObject({ error: { code: 'invalid_argument' } });
    expect(calls).toHaveLength(0);
  });
});

describe('album tools', () => {
  it('pages album songs locally', async () => {
    const { api, calls } = createFakeApi(() => jsonResponse(albumPayload(5)));

    const result = await executeTool(
      'get_album_songs',
      { albumId: 'albumMid01', page: 2, pageSize: 2 },
      context(api),
    );

    expect(calls).toHaveLength(1);
    expect(result.structuredContent).toMatchObject({
      data: {
        albumId: 'albumMid01',
        total: 5,
        page: 2,
        pageSize: 2,
        songs: [
          { mid: 'track3', name: 'Track 3' },
          { mid: 'track4', name: 'Track 4' },
        ],
      },
    });
  });

  it('maps album details', async () => {
    const { api } = createFakeApi(() => jsonResponse(albumPayload(2)));

    const result = await executeTool('get_album_detail', { albumId: 'albumMid01' }, context(api));

    expect(result.structuredContent).toMatchObject({
      data: {
        mid: 'albumMid01',
        name: 'Test Album',
        artists: ['Singer A'],
        publishDate: '2020-05-01',
        songCount: 2,
        coverUrl: 'https://y.qq.com/music/photo_new/T002R500x500M000albumMid01.jpg',
      },
    });
  });

  it('builds cover URLs without a request', async () => {
    const { api, calls } = createFakeApi(() => jsonResponse({}));

    const result = await executeTool(
      'get_album_cover',
      { albumId: 'albumMid01', size: 'small' },
      context(api),
    );

    expect(calls).toHaveLength(0);
    expect(result.structuredContent).toMatchObject({
      data: {
        size: 'small',
        pixels: 150,
        url: 'https://y.qq.com/music/photo_new/T002R150x150M000albumMid01.jpg',
      },
    });
  });
});

describe('get_playlist_detail', () => {
  it('accepts a numeric id', async () => {
    const { api, calls } = createFakeApi(() =>
      jsonResponse(playlistPayload([songItem('mid0001', 'First Song')])),
    );

    const result = await executeTool('get_playlist_detail', { playlistId: 7000001 }, context(api));

    expect(calls[0]?.url.searchParams.get('disstid')).toBe('7000001');
    expect(result.structuredContent).toMatchObject({
      data: {
        id: '7000001',
        name: 'Test Playlist',
        creator: 'curator',
        listenCount: 4200,
        songCount: 1,
        songs: [{ mid: 'mid0001', singers: 'Singer A / Singer B' }],
      },
    });
  });

  it('rejects a non-numeric id', async () => {
    const { api } = createFakeApi(() => jsonResponse({}));
    const result = await executeTool('get_playlist_detail', { playlistId: 'abc' }, context(api));
    expect(result.structuredContent).toMatchObject({ error: { code: 'invalid_argument' } });
  });
});

describe('health', () => {
  it('reports whether a credential is configured', async () => {
    const { api } = createFakeApi(() => jsonResponse({}), { credential: 'uin=1; qm_keyst=test-secret' });
    const result = await executeTool('health', {}, context(api));
    expect(result.structuredContent).toMatchObject({
      ok: true,
      _msg: 'Server ok. QQ Music cookie configured.',
      data: { status: 'ok', runtime: 'node', credentialConfigured: true },
    });
  });
});
