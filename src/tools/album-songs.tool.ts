import { toolsMetadata } from '../config/metadata.js';
import { AlbumSongsInputSchema } from '../schemas/inputs.js';
import { AlbumSongsOutput } from '../schemas/outputs.js';
import { getAlbumInfo } from '../services/qqmusic/catalog.js';
import { toSlimAlbumSong } from '../utils/mappers.js';
import { fail, ok } from './results.js';
import { defineTool } from './types.js';

export const albumSongsTool = defineTool({
  name: toolsMetadata.get_album_songs.name,
  title: toolsMetadata.get_album_songs.title,
  description: toolsMetadata.get_album_songs.description,
  inputSchema: AlbumSongsInputSchema,
  outputSchema: AlbumSongsOutput,
  annotations: {
    title: toolsMetadata.get_album_songs.title,
    readOnlyHint: true,
    idempotentHint: true,
    openWorldHint: true,
  },

  handler: async (args, context) => {
    try {
      const album = await getAlbumInfo(context.api, args.albumId, context.signal);
      // The album endpoint returns every track at once; paging is local
      const start = (args.page - 1) * args.pageSize;
      const songs = album.list.slice(start, start + args.pageSize).map(toSlimAlbumSong);
      const total = album.list.length;

      const msg =
        songs.length === 0
          ? `No songs on page ${args.page} of album ${args.albumId} (${total} total).`
          : `Songs ${start + 1}-${start + songs.length} of ${total}:\n${songs
              .map((s, i) => `${start + i + 1}. ${s.name} - ${s.singers} (${s.mid})`)
              .join('\n')}`;

      return ok(
        { albumId: args.albumId, total, page: args.page, pageSize: args.pageSize, songs },
        msg,
      );
    } catch (error) {
      return fail(error);
    }
  },
});
