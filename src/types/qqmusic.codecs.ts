import { z } from 'zod';

// Leaf fields never fail a parse: drifted or missing values fall back to empty.
const Str = z
  .preprocess((v) => (typeof v === 'number' ? String(v) : v), z.string())
  .catch('');
const Num = z
  .preprocess(
    (v) => (typeof v === 'string' && v.trim() !== '' ? Number(v) : v),
    z.number().finite(),
  )
  .catch(0);
const OptNum = z
  .preprocess(
    (v) => (typeof v === 'string' && v.trim() !== '' ? Number(v) : v),
    z.number().finite().optional(),
  )
  .catch(undefined);

// Envelope codes are required: a body without one is not a success.
const Code = z.preprocess(
  (v) => (typeof v === 'string' && v.trim() !== '' ? Number(v) : v),
  z.number().int(),
);

// Entities
export const SingerCodec = z.object({ id: Num, mid: Str, name: Str });
export type SingerCodecType = z.infer<typeof SingerCodec>;

const Singers = z.array(SingerCodec).catch([]);

const AlbumRefCodec = z
  .object({ id: Num, mid: Str, name: Str })
  .catch({ id: 0, mid: '', name: '' });

// Song as returned by search, song detail and playlist listings
export const SongItemCodec = z.object({
  id: Num,
  mid: Str,
  name: Str,
  title: Str,
  album: AlbumRefCodec,
  singer: Singers,
  interval: Num,
  pay: z.object({ pay_play: Num }).catch({ pay_play: 0 }),
  file: z.record(z.unknown()).catch({}),
});
export type SongItemCodecType = z.infer<typeof SongItemCodec>;

// Song row on the album info endpoint (flat album fields)
export const AlbumSongItemCodec = z.object({
  songid: Num,
  songmid: Str,
  songname: Str,
  albumid: Num,
  albummid: Str,
  albumname: Str,
  singer: Singers,
  interval: Num,
});
export type AlbumSongItemCodecType = z.infer<typeof AlbumSongItemCodec>;

// Search result rows other than songs
export const SearchAlbumItemCodec = z.object({
  albumID: Num,
  albumMID: Str,
  albumName: Str,
  singerName: Str,
  singer_list: Singers,
  publicTime: Str,
});
export type SearchAlbumItemCodecType = z.infer<typeof SearchAlbumItemCodec>;

export const SearchPlaylistItemCodec = z.object({
  dissid: Str,
  dissname: Str,
  creator: z.object({ name: Str }).catch({ name: '' }),
  song_count: Num,
  listennum: Num,
});
export type SearchPlaylistItemCodecType = z.infer<typeof SearchPlaylistItemCodec>;

export const SearchMvItemCodec = z.object({
  v_id: Str,
  vid: Str,
  mv_name: Str,
  title: Str,
  singer_name: Str,
  singer_list: Singers,
});
export type SearchMvItemCodecType = z.infer<typeof SearchMvItemCodec>;

export const SearchUserItemCodec = z.object({
  encrypt_uin: Str,
  uin: Str,
  title: Str,
  nick: Str,
  fans_num: Num,
});
export type SearchUserItemCodecType = z.infer<typeof SearchUserItemCodec>;

// Search (client_search_cp)
const SearchBlockCodec = z.object({
  totalnum: Num,
  curnum: Num,
  curpage: Num,
  list: z.array(z.unknown()).catch([]),
});
type SearchBlockCodecType = z.infer<typeof SearchBlockCodec>;

export const SearchResponseCodec = z.object({
  code: Code,
  data: z.record(z.unknown()).catch({}),
});

export function parseSearchBlock(raw: unknown): SearchBlockCodecType | undefined {
  const parsed = SearchBlockCodec.safeParse(raw);
  return parsed.success ? parsed.data : undefined;
}

// Song detail (musicu.fcg, music.pf_song_detail_svr)
export const SongDetailResponseCodec = z.object({
  code: Code,
  songinfo: z
    .object({
      code: Code,
      data: z
        .object({ track_info: SongItemCodec.optional().catch(undefined) })
        .catch({ track_info: undefined }),
    })
    .optional()
    .catch(undefined),
});

// Lyric (fcg_query_lyric_new)
export const LyricResponseCodec = z.object({
  code: Code,
  lyric: Str,
  trans: Str,
});

// Playback URL (musicu.fcg, vkey.GetVkeyServer)
const MidUrlInfoCodec = z.object({
  songmid: Str,
  purl: Str,
  filename: Str,
  filesize: OptNum,
  result: OptNum,
});

export const VkeyResponseCodec = z.object({
  code: Code,
  req_0: z
    .object({
      code: Code,
      data: z
        .object({
          sip: z.array(Str).catch([]),
          midurlinfo: z.array(MidUrlInfoCodec).catch([]),
        })
        .catch({ sip: [], midurlinfo: [] }),
    })
    .optional()
    .catch(undefined),
});

// Album (fcg_v8_album_info_cp)
export const AlbumInfoResponseCodec = z.object({
  code: Code,
  data: z
    .object({
      id: Num,
      mid: Str,
      name: Str,
      aDate: Str,
      desc: Str,
      singername: Str,
      total_song_num: OptNum,
      list: z.array(AlbumSongItemCodec).catch([]),
    })
    .optional()
    .catch(undefined),
});
export type AlbumInfoCodecType = NonNullable<z.infer<typeof AlbumInfoResponseCodec>['data']>;

// Playlist (fcg_ucc_getcdinfo_byids_cp)
export const PlaylistCdCodec = z.object({
  dissid: Str,
  dissname: Str,
  logo: Str,
  nick: Str,
  visitnum: Num,
  songnum: Num,
  songlist: z.array(SongItemCodec).catch([]),
});
export type PlaylistCdCodecType = z.infer<typeof PlaylistCdCodec>;

export const PlaylistResponseCodec = z.object({
  code: Code,
  cdlist: z.array(PlaylistCdCodec).catch([]),
});
