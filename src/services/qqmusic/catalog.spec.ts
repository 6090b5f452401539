import { describe, expect, it } from 'vitest';
import { createFakeApi, jsonResponse, musicuRequest } from '../../test-support/fake-http.js';
import {
  albumPayload,
  playlistPayload,
  searchPayload,
  songDetailPayload,
  songItem,
} from '../../test-support/fixtures.js';
import { getAlbumInfo, getPlaylist, getSongDetail, searchMusic } from './catalog.js';

describe('searchMusic', () => {
  it('sends the search parameters and maps song rows', async () => {
    const { api, calls } = createFakeApi(() =>
      jsonResponse(searchPayload('song', [songItem('mid0001', 'First Song')], 42)),
    );

    const result = await searchMusic(api, { query: 'hello', type: 'song', page: 2, pageSize: 5 });

    const params = calls[0]?.url.searchParams;
    expect(params?.get('w')).toBe('hello');
    expect(params?.get('p')).toBe('2');
    expect(params?.get('n')).toBe('5');
    expect(params?.get('t')).toBe('0');
    expect(result.total).toBe(42);
    expect(result.items).toEqual([
      {
        type: 'song',
        id: '1007',
        mid: 'mid0001',
        name: 'First Song',
        artists: ['Singer A', 'Singer B'],
        album: 'Test Album',
        durationSeconds: 215,
      },
    ]);
  });

  it('maps album rows with the album type code', async () => {
    const { api, calls } = createFakeApi(() =>
      jsonResponse(
        searchPayload('album', [
          { albumID: 9, albumMID: 'alb9', albumName: 'Nine', singerName: 'Solo', singer_list: [] },
        ]),
      ),
    );

    const result = await searchMusic(api, { query: 'nine', type: 'album', page: 1, pageSize: 20 });

    expect(calls[0]?.url.searchParams.get('t')).toBe('2');
    expect(result.items).toEqual([
      { type: 'album', id: '9', mid: 'alb9', name: 'Nine', artists: ['Solo'] },
    ]);
  });

  it('reads playlists from the songlist block', async () => {
    const { api } = createFakeApi(() =>
      jsonResponse(
        searchPayload('songlist', [
          { dissid: '555', dissname: 'Road Trip', creator: { name: 'dj' } },
        ]),
      ),
    );

    const result = await searchMusic(api, { query: 'trip', type: 'playlist', page: 1, pageSize: 20 });
    expect(result.items).toEqual([{ type: 'playlist', id: '555', name: 'Road Trip', artists: ['dj'] }]);
  });

  it('returns no items when the block is missing', async () => {
    const { api } = createFakeApi(() => jsonResponse({ code: 0, data: {} }));
    await expect(
      searchMusic(api, { query: 'zzz', type: 'song', page: 1, pageSize: 20 }),
    ).resolves.toEqual({ total: 0, items: [] });
  });

  it('drops rows without an id or name', async () => {
    const { api } = createFakeApi(() =>
      jsonResponse(searchPayload('song', [songItem('mid0001', ''), { garbage: true }])),
    );
    const result = await searchMusic(api, { query: 'x', type: 'song', page: 1, pageSize: 20 });
    expect(result.items).toEqual([]);
  });

  it('reports a body without an envelope code as upstream_error', async () => {
    const { api } = createFakeApi(() => jsonResponse({ message: 'server busy' }));
    await expect(
      searchMusic(api, { query: 'x', type: 'song', page: 1, pageSize: 20 }),
    ).rejects.toMatchObject({
      code: 'upstream_error',
      message: 'Search returned an unexpected payload',
    });
  });

  it('reports a garbled envelope code as upstream_error', async () => {
    const { api } = createFakeApi(() => jsonResponse({ code: 'busy', data: {} }));
    await expect(
      searchMusic(api, { query: 'x', type: 'song', page: 1, pageSize: 20 }),
    ).rejects.toMatchObject({ code: 'upstream_error' });
  });

  it('reports a non-zero envelope code as upstream_error', async () => {
    const { api } = createFakeApi(() => jsonResponse({ code: 500, data: {} }));
    await expect(
      searchMusic(api, { query: 'x', type: 'song', page: 1, pageSize: 20 }),
    ).rejects.toMatchObject({ code: 'upstream_error' });
  });
});

describe('getSongDetail', () => {
  it('requests the song detail module with the credential', async () => {
    const { api, calls } = createFakeApi(
      () => jsonResponse(songDetailPayload(songItem('mid0001', 'First Song'))),
      { credential: 'uin=1; qm_keyst=test-secret' },
    );

    const track = await getSongDetail(api, 'mid0001');

    expect(track.name).toBe('First Song');
    expect(calls[0]?.headers.get('cookie')).toBe('uin=1; qm_keyst=test-secret');
    const request = musicuRequest(calls[0]);
    expect(request.songinfo?.module).toBe('music.pf_song_detail_svr');
    expect(request.songinfo?.param).toEqual({ song_mid: 'mid0001' });
  });

  it('reports an empty track as not_found', async () => {
    const { api } = createFakeApi(() => jsonResponse(songDetailPayload({})));
    await expect(getSongDetail(api, 'missing')).rejects.toMatchObject({
      code: 'not_found',
      message: 'Song missing not found',
    });
  });

  it('reports a response without the module as upstream_error', async () => {
    const { api } = createFakeApi(() => jsonResponse({ code: 0 }));
    await expect(getSongDetail(api, 'mid0001')).rejects.toMatchObject({
      code: 'upstream_error',
      message: 'Song detail response has no songinfo module',
    });
  });

  it('reports a failed module as upstream_error', async () => {
    const { api } = createFakeApi(() => jsonResponse({ code: 0, songinfo: { code: 2001, data: {} } }));
    await expect(getSongDetail(api, 'mid0001')).rejects.toMatchObject({
      code: 'upstream_error',
      message: 'Song detail module failed with code 2001',
    });
  });
});

describe('getAlbumInfo', () => {
  it('parses album data', async () => {
    const { api, calls } = createFakeApi(() => jsonResponse(albumPayload(3)));
    const album = await getAlbumInfo(api, 'albumMid01');
    expect(calls[0]?.url.searchParams.get('albummid')).toBe('albumMid01');
    expect(album.name).toBe('Test Album');
    expect(album.list).toHaveLength(3);
  });

  it('reports a body without an envelope code as upstream_error', async () => {
    const { api } = createFakeApi(() => jsonResponse({ data: albumPayload(1).data }));
    await expect(getAlbumInfo(api, 'albumMid01')).rejects.toMatchObject({
      code: 'upstream_error',
      message: 'Album info returned an unexpected payload',
    });
  });

  it('reports a non-zero code as not_found', async () => {
    const { api } = createFakeApi(() => jsonResponse({ code: -1 }));
    await expect(getAlbumInfo(api, 'nope')).rejects.toMatchObject({ code: 'not_found' });
  });
});

describe('getPlaylist', () => {
  it('returns the first cd entry', async () => {
    const { api, calls } = createFakeApi(() =>
      jsonResponse(playlistPayload([songItem('mid0001', 'First Song')])),
    );
    const cd = await getPlaylist(api, '7000001');
    expect(calls[0]?.url.searchParams.get('disstid')).toBe('7000001');
    expect(cd.dissname).toBe('Test Playlist');
    expect(cd.songlist).toHaveLength(1);
  });

  it('reports an empty cdlist as not_found', async () => {
    const { api } = createFakeApi(() => jsonResponse({ code: 0, cdlist: [] }));
    await expect(getPlaylist(api, '1')).rejects.toMatchObject({ code: 'not_found' });
  });
});
