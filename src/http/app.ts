import type { HttpBindings } from '@hono/node-server';
import { Hono } from 'hono';
import { config } from '../config/env.js';
import { serverMetadata } from '../config/metadata.js';
import { buildServer } from '../core/mcp.js';
import type { QQMusicApi } from '../services/qqmusic/client.js';
import { corsMiddleware } from './middlewares/cors.js';
import { createMcpSecurityMiddleware } from './middlewares/mcp-security.js';
import { apiRoutes } from './routes/api.js';
import { healthRoutes } from './routes/health.js';
import { buildMcpRoutes, type McpSession } from './routes/mcp.js';

export function buildHttpApp(api: QQMusicApi): {
  app: Hono<{ Bindings: HttpBindings }>;
  sessions: Map<string, McpSession>;
} {
  const app = new Hono<{ Bindings: HttpBindings }>();
  const sessions = new Map<string, McpSession>();

  const createServer = () =>
    buildServer({
      name: config.MCP_TITLE || serverMetadata.title,
      version: config.MCP_VERSION,
      instructions: config.MCP_INSTRUCTIONS,
      api,
    });

  app.use('*', corsMiddleware());

  app.route('/', healthRoutes());

  app.use('/mcp', createMcpSecurityMiddleware());
  app.route('/mcp', buildMcpRoutes({ createServer, sessions }));

  if (config.REST_API_ENABLED) {
    app.route('/', apiRoutes(api));
  }

  return { app, sessions };
}
