/**
 * Search Music Tool - Search QQ Music for songs, albums, playlists, MVs, lyrics and users.
 */

import { toolsMetadata } from '../config/metadata.js';
import { SearchMusicInputSchema } from '../schemas/inputs.js';
import { SearchMusicOutput } from '../schemas/outputs.js';
import { searchMusic } from '../services/qqmusic/catalog.js';
import { errorMessage } from '../utils/http-result.js';
import { logger } from '../utils/logger.js';
import { fail, ok } from './results.js';
import { defineTool } from './types.js';

const itemPreviewLimit = 10;

export const searchMusicTool = defineTool({
  name: toolsMetadata.search_music.name,
  title: toolsMetadata.search_music.title,
  description: toolsMetadata.search_music.description,
  inputSchema: SearchMusicInputSchema,
  outputSchema: SearchMusicOutput,
  annotations: {
    title: toolsMetadata.search_music.title,
    readOnlyHint: true,
    idempotentHint: true,
    openWorldHint: true,
  },

  handler: async (args, context) => {
    try {
      const { total, items } = await searchMusic(context.api, args, context.signal);

      let msg: string;
      if (items.length === 0) {
        msg = `No ${args.type} results for "${args.query}".`;
      } else {
        const lines = items
          .slice(0, itemPreviewLimit)
          .map((it) => {
            const by = it.artists.length > 0 ? ` - ${it.artists.join(' / ')}` : '';
            return `- [${it.type}] ${it.name}${by} (${it.mid ?? it.id})`;
          })
          .join('\n');
        const more =
          items.length > itemPreviewLimit ? `\n… and ${items.length - itemPreviewLimit} more` : '';
        msg = `Results for "${args.query}" (page ${args.page}, ${total} total):\n${lines}${more}`;
      }

      return ok(
        {
          query: args.query,
          type: args.type,
          total,
          page: args.page,
          pageSize: args.pageSize,
          items,
        },
        msg,
      );
    } catch (error) {
      await logger.warning('search_music', {
        message: 'Search failed',
        error: errorMessage(error),
      });
      return fail(error);
    }
  },
});
