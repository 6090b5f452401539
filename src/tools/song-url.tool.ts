import { toolsMetadata } from '../config/metadata.js';
import { SongUrlInputSchema } from '../schemas/inputs.js';
import { SongUrlOutput } from '../schemas/outputs.js';
import { getSongUrl } from '../services/qqmusic/playback.js';
import { formatBytes } from '../utils/format.js';
import { fail, ok } from './results.js';
import { defineTool } from './types.js';

export const songUrlTool = defineTool({
  name: toolsMetadata.get_song_url.name,
  title: toolsMetadata.get_song_url.title,
  description: toolsMetadata.get_song_url.description,
  inputSchema: SongUrlInputSchema,
  outputSchema: SongUrlOutput,
  annotations: {
    title: toolsMetadata.get_song_url.title,
    readOnlyHint: true,
    idempotentHint: false,
    openWorldHint: true,
  },

  handler: async (args, context) => {
    try {
      const result = await getSongUrl(context.api, args.songId, args.quality, context.signal);
      const size = result.size !== undefined ? ` (${formatBytes(result.size)})` : '';
      // Signed URLs expire after a while
      return ok(result, `Playback URL for ${args.songId} at ${args.quality}${size}: ${result.url}`);
    } catch (error) {
      return fail(error);
    }
  },
});
