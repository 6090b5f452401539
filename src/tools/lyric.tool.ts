import { toolsMetadata } from '../config/metadata.js';
import { LyricInputSchema } from '../schemas/inputs.js';
import { LyricOutput } from '../schemas/outputs.js';
import { getLyric } from '../services/qqmusic/lyric.js';
import { isTimestamped, stripTimestamps } from '../utils/lyrics.js';
import { fail, ok } from './results.js';
import { defineTool } from './types.js';

const previewLines = 8;

export const lyricTool = defineTool({
  name: toolsMetadata.get_lyric.name,
  title: toolsMetadata.get_lyric.title,
  description: toolsMetadata.get_lyric.description,
  inputSchema: LyricInputSchema,
  outputSchema: LyricOutput,
  annotations: {
    title: toolsMetadata.get_lyric.title,
    readOnlyHint: true,
    idempotentHint: true,
    openWorldHint: true,
  },

  handler: async (args, context) => {
    try {
      const text = await getLyric(context.api, args.songId, context.signal);
      const lyric = args.timestamps ? text.lyric : stripTimestamps(text.lyric);
      const translation =
        text.translation && !args.timestamps ? stripTimestamps(text.translation) : text.translation;

      const lines = lyric.split('\n');
      const preview = lines.slice(0, previewLines).join('\n');
      const more = lines.length > previewLines ? `\n… (${lines.length} lines)` : '';
      const trans = translation ? ' Translation included.' : '';
      const msg = `Lyric for ${args.songId}:${trans}\n${preview}${more}`;

      return ok(
        {
          songId: args.songId,
          lyric,
          translation: translation || undefined,
          timestamped: isTimestamped(lyric),
        },
        msg,
      );
    } catch (error) {
      return fail(error);
    }
  },
});
