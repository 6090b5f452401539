/**
 * Tool registration for the QQ Music MCP server.
 */

import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import {
  CallToolRequestSchema,
  ListToolsRequestSchema,
  type Tool,
} from '@modelcontextprotocol/sdk/types.js';
import { type ZodRawShape, z } from 'zod';
import { zodToJsonSchema } from 'zod-to-json-schema';
import type { QQMusicApi } from '../services/qqmusic/client.js';
import { isRecord } from '../utils/guards.js';
import { logger } from '../utils/logger.js';
import { executeTool, type RegisteredTool, sharedTools } from './registry.js';

type ObjectJsonSchema = {
  type: 'object';
  properties: Record<string, unknown>;
  required?: string[];
};

/**
 * Serve tools/list and tools/call on the low-level server. Arguments reach
 * `executeTool` as sent, so bad input comes back as an `invalid_argument`
 * tool result rather than a protocol error.
 */
export function registerTools(server: McpServer, api: QQMusicApi): void {
  const listing = sharedTools.map(toToolListing);

  server.server.setRequestHandler(ListToolsRequestSchema, async () => ({ tools: listing }));

  server.server.setRequestHandler(CallToolRequestSchema, async (request, extra) =>
    executeTool(request.params.name, request.params.arguments ?? {}, {
      api,
      signal: extra.signal,
      requestId: String(extra.requestId),
    }),
  );

  void logger.debug('tools', {
    message: `Registered ${sharedTools.length} tools`,
    toolNames: sharedTools.map((t) => t.name),
  });
}

function toToolListing(tool: RegisteredTool): Tool {
  return {
    name: tool.name,
    title: tool.title,
    description: tool.description,
    inputSchema: toObjectJsonSchema(tool.inputShape),
    ...(tool.outputShape && { outputSchema: toObjectJsonSchema(tool.outputShape) }),
    ...(tool.annotations && { annotations: tool.annotations }),
  };
}

function toObjectJsonSchema(shape: ZodRawShape): ObjectJsonSchema {
  const json: unknown = zodToJsonSchema(z.object(shape), {
    $refStrategy: 'none',
    strictUnions: true,
  });
  const properties = isRecord(json) && isRecord(json.properties) ? json.properties : {};
  const required =
    isRecord(json) && Array.isArray(json.required)
      ? json.required.filter((key): key is string => typeof key === 'string')
      : [];
  return { type: 'object', properties, ...(required.length > 0 ? { required } : {}) };
}
