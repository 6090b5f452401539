export const serverMetadata = {
  title: 'QQ Music',
  instructions: `Use these tools to search QQ Music and read song, album, playlist and lyric data, and to resolve playback URLs.

Tools
- search_music: Find songs, albums, playlists, MVs, lyrics or users. Inputs: query, type, page, pageSize (1-100). Items carry a mid to pass to the other tools.
- get_song_detail / get_song_quality: Metadata for one song MID, and the encodings it is offered in with file sizes.
- get_lyric: LRC lyric and translation when available. timestamps=false strips time tags.
- get_song_url / get_batch_song_urls: Signed playback URLs for one song or up to 50. Batch entries fail independently.
- get_album_detail / get_album_songs / get_album_cover: Album metadata, its track list (paged), and a cover image URL.
- get_playlist_detail: A playlist by numeric id, with its songs.

Notes
- Qualities above 128 (320, flac, ape, hires, atmos) need QQ_MUSIC_COOKIE from a VIP session; without it those calls fail with unauthorized.
- Playback URLs expire; resolve them right before use.
- Every result has ok and _msg; failures carry error.code (invalid_argument, not_found, unauthorized, unavailable, timeout, upstream_error, cancelled).`,
} as const;

export const toolsMetadata = {
  search_music: {
    name: 'search_music',
    title: 'Search QQ Music',
    description:
      "Search the QQ Music catalog. Inputs: query, type ('song' default, 'album', 'playlist', 'mv', 'lyric', 'user'), page (1-based), pageSize (1-100, default 20). Returns total and items with id, mid, name and artists.",
  },
  get_song_detail: {
    name: 'get_song_detail',
    title: 'Song Details',
    description:
      'Read one song by MID: name, artists, album, duration, whether it is pay-to-play, and the qualities it is available in.',
  },
  get_song_quality: {
    name: 'get_song_quality',
    title: 'Song Qualities',
    description:
      'List the encodings a song is available in (m4a, 128, 320, flac, ape, hires, atmos) with file sizes in bytes.',
  },
  get_lyric: {
    name: 'get_lyric',
    title: 'Song Lyric',
    description:
      'Fetch the lyric of a song by MID, plus its translation when one exists. Set timestamps=false to drop LRC time tags and metadata lines.',
  },
  get_song_url: {
    name: 'get_song_url',
    title: 'Song Playback URL',
    description:
      "Resolve a signed playback URL for a song MID at a quality (default '128'). Qualities above 128 need a VIP cookie. URLs expire.",
  },
  get_batch_song_urls: {
    name: 'get_batch_song_urls',
    title: 'Batch Song Playback URLs',
    description:
      'Resolve playback URLs for 1-50 song MIDs (array or comma-separated string) at one quality. Each entry reports ok with url, or an error code; one failure does not fail the batch.',
  },
  get_album_detail: {
    name: 'get_album_detail',
    title: 'Album Details',
    description:
      'Read one album by MID: name, artists, release date, description, song count and a 500px cover URL.',
  },
  get_album_songs: {
    name: 'get_album_songs',
    title: 'Album Songs',
    description:
      'List the songs of an album by MID. page (1-based) and pageSize (1-100, default 50) page through the track list.',
  },
  get_playlist_detail: {
    name: 'get_playlist_detail',
    title: 'Playlist Details',
    description:
      'Read a playlist by numeric id: name, creator, cover, listen count and its songs.',
  },
  get_album_cover: {
    name: 'get_album_cover',
    title: 'Album Cover URL',
    description:
      "Build the cover image URL for an album MID. size: 'small' (150px), 'medium' (300px, default) or 'large' (500px). Makes no request.",
  },
  health: {
    name: 'health',
    title: 'Health Check',
    description: 'Check server status and whether a QQ Music cookie is configured.',
  },
} as const;
