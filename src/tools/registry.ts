/**
 * Tool registry for the QQ Music MCP server.
 * Transports call `executeTool`; nothing here knows about MCP sessions.
 */

import { QQMusicError } from '../utils/http-result.js';
import { logger } from '../utils/logger.js';
import { albumCoverTool } from './album-cover.tool.js';
import { albumDetailTool } from './album-detail.tool.js';
import { albumSongsTool } from './album-songs.tool.js';
import { batchSongUrlsTool } from './batch-song-urls.tool.js';
import { healthTool } from './health.tool.js';
import { lyricTool } from './lyric.tool.js';
import { playlistDetailTool } from './playlist-detail.tool.js';
import { fail } from './results.js';
import { searchMusicTool } from './search-music.tool.js';
import { songDetailTool } from './song-detail.tool.js';
import { songQualityTool } from './song-quality.tool.js';
import { songUrlTool } from './song-url.tool.js';
import type { RegisteredTool, ToolContext, ToolResult } from './types.js';

export type { RegisteredTool } from './types.js';

export const sharedTools: readonly RegisteredTool[] = [
  searchMusicTool,
  songDetailTool,
  songQualityTool,
  lyricTool,
  songUrlTool,
  batchSongUrlsTool,
  albumDetailTool,
  albumSongsTool,
  playlistDetailTool,
  albumCoverTool,
  healthTool,
];

export function getTool(name: string): RegisteredTool | undefined {
  return sharedTools.find((t) => t.name === name);
}

export function getToolNames(): string[] {
  return sharedTools.map((t) => t.name);
}

/**
 * Execute a tool by name. Never throws: every failure comes back as an
 * `isError` result carrying a classified error.
 */
export async function executeTool(
  name: string,
  args: unknown,
  context: ToolContext,
): Promise<ToolResult> {
  const tool = getTool(name);
  if (!tool) {
    return fail(new QQMusicError('invalid_argument', `Unknown tool: ${name}`));
  }

  if (context.signal?.aborted) {
    return fail(new QQMusicError('cancelled', 'Operation was cancelled'));
  }

  try {
    const result = await tool.handler(args, context);

    if (tool.outputShape && !result.isError && !result.structuredContent) {
      return fail(
        new QQMusicError('upstream_error', `Tool ${name} returned no structured content`),
      );
    }
    if (result.isError) {
      await logger.debug('tools', {
        message: 'Tool returned an error',
        tool: name,
        requestId: context.requestId,
      });
    }
    return result;
  } catch (error) {
    if (context.signal?.aborted) {
      return fail(new QQMusicError('cancelled', 'Operation was cancelled', { cause: error }));
    }
    return fail(error);
  }
}
