import { toolsMetadata } from '../config/metadata.js';
import { SongDetailInputSchema } from '../schemas/inputs.js';
import { SongDetailOutput } from '../schemas/outputs.js';
import { getSongDetail } from '../services/qqmusic/catalog.js';
import { formatDuration } from '../utils/format.js';
import { toSongDetail } from '../utils/mappers.js';
import { fail, ok } from './results.js';
import { defineTool } from './types.js';

export const songDetailTool = defineTool({
  name: toolsMetadata.get_song_detail.name,
  title: toolsMetadata.get_song_detail.title,
  description: toolsMetadata.get_song_detail.description,
  inputSchema: SongDetailInputSchema,
  outputSchema: SongDetailOutput,
  annotations: {
    title: toolsMetadata.get_song_detail.title,
    readOnlyHint: true,
    idempotentHint: true,
    openWorldHint: true,
  },

  handler: async (args, context) => {
    try {
      const song = toSongDetail(await getSongDetail(context.api, args.songId, context.signal));
      const album = song.album?.name ? ` from '${song.album.name}'` : '';
      const msg = `'${song.name}' by ${song.singers || 'unknown artist'}${album}, ${formatDuration(song.durationSeconds)}. Qualities: ${song.availableQualities.join(', ') || 'none listed'}.`;
      return ok(song, msg);
    } catch (error) {
      return fail(error);
    }
  },
});
