import { toolsMetadata } from '../config/metadata.js';
import { SongQualityInputSchema } from '../schemas/inputs.js';
import { SongQualityOutput } from '../schemas/outputs.js';
import { getSongDetail } from '../services/qqmusic/catalog.js';
import { QUALITY_TABLE } from '../services/qqmusic/constants.js';
import { formatBytes } from '../utils/format.js';
import { availableQualities, qualitySizes } from '../utils/mappers.js';
import { fail, ok } from './results.js';
import { defineTool } from './types.js';

export const songQualityTool = defineTool({
  name: toolsMetadata.get_song_quality.name,
  title: toolsMetadata.get_song_quality.title,
  description: toolsMetadata.get_song_quality.description,
  inputSchema: SongQualityInputSchema,
  outputSchema: SongQualityOutput,
  annotations: {
    title: toolsMetadata.get_song_quality.title,
    readOnlyHint: true,
    idempotentHint: true,
    openWorldHint: true,
  },

  handler: async (args, context) => {
    try {
      const track = await getSongDetail(context.api, args.songId, context.signal);
      const sizes = qualitySizes(track.file);
      const qualities = availableQualities(track.file);

      const lines = qualities.map((code) => {
        const size = sizes[code];
        const info = QUALITY_TABLE[code];
        const lock = info.requiresCredential ? ' (VIP)' : '';
        return `- ${code}: ${info.label}${size !== undefined ? `, ${formatBytes(size)}` : ''}${lock}`;
      });
      const name = track.name || track.title;
      const msg =
        lines.length > 0
          ? `Qualities for '${name}':\n${lines.join('\n')}`
          : `No downloadable qualities listed for '${name}'.`;

      return ok(
        { mid: track.mid || args.songId, name, availableQualities: qualities, sizes },
        msg,
      );
    } catch (error) {
      return fail(error);
    }
  },
});
