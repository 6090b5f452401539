import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { configResource } from './config.resource.js';
import { qualitiesResource } from './qualities.resource.js';

export function registerResources(server: McpServer): void {
  for (const resource of [configResource, qualitiesResource]) {
    server.registerResource(
      resource.name,
      resource.uri,
      { title: resource.title, description: resource.description, mimeType: resource.mimeType },
      resource.handler,
    );
  }
}
