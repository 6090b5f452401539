import { toolsMetadata } from '../config/metadata.js';
import { AlbumDetailInputSchema } from '../schemas/inputs.js';
import { AlbumDetailOutput } from '../schemas/outputs.js';
import { getAlbumInfo } from '../services/qqmusic/catalog.js';
import { toAlbumDetails } from '../utils/mappers.js';
import { fail, ok } from './results.js';
import { defineTool } from './types.js';

export const albumDetailTool = defineTool({
  name: toolsMetadata.get_album_detail.name,
  title: toolsMetadata.get_album_detail.title,
  description: toolsMetadata.get_album_detail.description,
  inputSchema: AlbumDetailInputSchema,
  outputSchema: AlbumDetailOutput,
  annotations: {
    title: toolsMetadata.get_album_detail.title,
    readOnlyHint: true,
    idempotentHint: true,
    openWorldHint: true,
  },

  handler: async (args, context) => {
    try {
      const album = toAlbumDetails(await getAlbumInfo(context.api, args.albumId, context.signal));
      const date = album.publishDate ? `, released ${album.publishDate}` : '';
      const msg = `Album '${album.name}' by ${album.singers || 'unknown artist'}${date}, ${album.songCount} songs.`;
      return ok(album, msg);
    } catch (error) {
      return fail(error);
    }
  },
});
