import { toolsMetadata } from '../config/metadata.js';
import { PlaylistDetailInputSchema } from '../schemas/inputs.js';
import { PlaylistDetailOutput } from '../schemas/outputs.js';
import { getPlaylist } from '../services/qqmusic/catalog.js';
import { toPlaylistDetails, toSlimSong } from '../utils/mappers.js';
import { fail, ok } from './results.js';
import { defineTool } from './types.js';

const previewLimit = 10;

export const playlistDetailTool = defineTool({
  name: toolsMetadata.get_playlist_detail.name,
  title: toolsMetadata.get_playlist_detail.title,
  description: toolsMetadata.get_playlist_detail.description,
  inputSchema: PlaylistDetailInputSchema,
  outputSchema: PlaylistDetailOutput,
  annotations: {
    title: toolsMetadata.get_playlist_detail.title,
    readOnlyHint: true,
    idempotentHint: true,
    openWorldHint: true,
  },

  handler: async (args, context) => {
    try {
      const cd = await getPlaylist(context.api, args.playlistId, context.signal);
      const details = toPlaylistDetails(cd);
      const songs = cd.songlist.map(toSlimSong);

      const by = details.creator ? ` by ${details.creator}` : '';
      const lines = songs
        .slice(0, previewLimit)
        .map((s, i) => `${i + 1}. ${s.name} - ${s.singers} (${s.mid})`)
        .join('\n');
      const msg = `Playlist '${details.name}'${by}, ${details.songCount} songs.${lines ? `\n${lines}` : ''}`;

      return ok({ ...details, id: details.id || args.playlistId, songs }, msg);
    } catch (error) {
      return fail(error);
    }
  },
});
