import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { SetLevelRequestSchema } from '@modelcontextprotocol/sdk/types.js';
import { config } from '../config/env.js';
import { serverMetadata } from '../config/metadata.js';
import { registerResources } from '../resources/index.js';
import type { QQMusicApi } from '../services/qqmusic/client.js';
import { registerTools } from '../tools/index.js';
import { logger } from '../utils/logger.js';
import { buildCapabilities } from './capabilities.js';

export interface ServerOptions {
  name: string;
  version: string;
  instructions?: string;
  /** Shared by every session; carries the configured credential. */
  api: QQMusicApi;
}

export function buildServer(options: ServerOptions): McpServer {
  const { name, version, instructions, api } = options;

  const server = new McpServer(
    { name, version },
    {
      capabilities: buildCapabilities(),
      instructions: instructions ?? config.MCP_INSTRUCTIONS ?? serverMetadata.instructions,
    },
  );

  registerTools(server, api);
  registerResources(server);

  // Required when the logging capability is advertised
  server.server.setRequestHandler(SetLevelRequestSchema, async (request) => {
    const level = request.params.level;
    logger.setLevel(level);
    await logger.info('mcp', { message: 'Log level changed', level: logger.getLevel() });
    return {};
  });

  return server;
}
