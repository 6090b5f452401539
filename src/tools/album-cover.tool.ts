import { toolsMetadata } from '../config/metadata.js';
import { AlbumCoverInputSchema } from '../schemas/inputs.js';
import { AlbumCoverOutput } from '../schemas/outputs.js';
import { albumCoverUrl, COVER_SIZES } from '../services/qqmusic/constants.js';
import { ok } from './results.js';
import { defineTool } from './types.js';

// Pure URL construction, no request is made
export const albumCoverTool = defineTool({
  name: toolsMetadata.get_album_cover.name,
  title: toolsMetadata.get_album_cover.title,
  description: toolsMetadata.get_album_cover.description,
  inputSchema: AlbumCoverInputSchema,
  outputSchema: AlbumCoverOutput,
  annotations: {
    title: toolsMetadata.get_album_cover.title,
    readOnlyHint: true,
    idempotentHint: true,
    openWorldHint: false,
  },

  handler: async (args) => {
    const pixels = COVER_SIZES[args.size];
    const url = albumCoverUrl(args.albumId, pixels);
    return ok(
      { albumId: args.albumId, size: args.size, pixels, url },
      `Cover (${pixels}x${pixels}): ${url}`,
    );
  },
});
