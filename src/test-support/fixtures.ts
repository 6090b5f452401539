export function songItem(mid: string, name: string, overrides: Record<string, unknown> = {}) {
  return {
    id: 1000 + mid.length,
    mid,
    name,
    title: name,
    album: { id: 77, mid: 'albumMid01', name: 'Test Album' },
    singer: [
      { id: 1, mid: 'singerA', name: 'Singer A' },
      { id: 2, mid: 'singerB', name: 'Singer B' },
    ],
    interval: 215,
    pay: { pay_play: 0 },
    file: { size_96aac: 1_500_000, size_128mp3: 3_440_000, size_320mp3: 8_600_000, size_flac: 0 },
    ...overrides,
  };
}

export function searchPayload(key: string, list: unknown[], totalnum = list.length) {
  return { code: 0, data: { [key]: { totalnum, curnum: list.length, curpage: 1, list } } };
}

export function songDetailPayload(track: unknown) {
  return { code: 0, songinfo: { code: 0, data: { track_info: track } } };
}

export function vkeyPayload(entries: Array<{ songmid: string; purl: string; filesize?: number }>) {
  return {
    code: 0,
    req_0: {
      code: 0,
      data: {
        sip: ['https://stream.example.test/'],
        midurlinfo: entries.map((e) => ({ filename: `M500${e.songmid}${e.songmid}.mp3`, ...e })),
      },
    },
  };
}

export function albumPayload(songCount: number) {
  const list = Array.from({ length: songCount }, (_, i) => ({
    songid: i + 1,
    songmid: `track${i + 1}`,
    songname: `Track ${i + 1}`,
    albumid: 77,
    albummid: 'albumMid01',
    albumname: 'Test Album',
    singer: [{ id: 1, mid: 'singerA', name: 'Singer A' }],
    interval: 180,
  }));
  return {
    code: 0,
    data: {
      id: 77,
      mid: 'albumMid01',
      name: 'Test Album',
      aDate: '2020-05-01',
      desc: 'An album for tests',
      singername: 'Singer A',
      total_song_num: songCount,
      list,
    },
  };
}

export function playlistPayload(songs: unknown[]) {
  return {
    code: 0,
    cdlist: [
      {
        dissid: '7000001',
        dissname: 'Test Playlist',
        logo: 'https://img.example.test/cover.jpg',
        nick: 'curator',
        visitnum: 4200,
        songnum: songs.length,
        songlist: songs,
      },
    ],
  };
}

export function lyricPayload(lyric: string, trans = '') {
  return {
    code: 0,
    lyric: Buffer.from(lyric, 'utf-8').toString('base64'),
    trans: trans ? Buffer.from(trans, 'utf-8').toString('base64') : '',
  };
}
