/**
 * Batch Song URLs Tool - Resolve playback URLs for up to 50 songs in one call.
 *
 * Entries fail independently; the call itself only fails on invalid input,
 * a quality the configured credential cannot sign, or cancellation.
 */

import { config } from '../config/env.js';
import { toolsMetadata } from '../config/metadata.js';
import { BatchSongUrlsInputSchema } from '../schemas/inputs.js';
import { BatchSongUrlsOutput } from '../schemas/outputs.js';
import { getBatchSongUrls } from '../services/qqmusic/playback.js';
import { QQMusicError } from '../utils/http-result.js';
import { fail, ok } from './results.js';
import { defineTool } from './types.js';

export const batchSongUrlsTool = defineTool({
  name: toolsMetadata.get_batch_song_urls.name,
  title: toolsMetadata.get_batch_song_urls.title,
  description: toolsMetadata.get_batch_song_urls.description,
  inputSchema: BatchSongUrlsInputSchema,
  outputSchema: BatchSongUrlsOutput,
  annotations: {
    title: toolsMetadata.get_batch_song_urls.title,
    readOnlyHint: true,
    idempotentHint: false,
    openWorldHint: true,
  },

  handler: async (args, context) => {
    try {
      const results = await getBatchSongUrls(context.api, args.songIds, args.quality, {
        concurrency: config.BATCH_CONCURRENCY,
        signal: context.signal,
      });
      if (context.signal?.aborted) {
        throw new QQMusicError('cancelled', 'Request was cancelled');
      }

      const entries = Object.entries(results);
      const succeeded = entries.filter(([, entry]) => entry.ok).length;
      const failed = entries.length - succeeded;

      const failures = entries
        .flatMap(([id, entry]) => (entry.ok ? [] : [`- ${id}: [${entry.error.code}] ${entry.error.message}`]))
        .join('\n');
      const msg = `Resolved ${succeeded}/${entries.length} URLs at ${args.quality}.${failures ? `\nFailed:\n${failures}` : ''}`;

      return ok({ quality: args.quality, succeeded, failed, results }, msg);
    } catch (error) {
      return fail(error);
    }
  },
});
