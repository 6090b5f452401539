#!/usr/bin/env node
import { serve } from '@hono/node-server';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { config } from './config/env.js';
import { serverMetadata } from './config/metadata.js';
import { buildServer } from './core/mcp.js';
import { buildHttpApp } from './http/app.js';
import type { McpSession } from './http/routes/mcp.js';
import { getQQMusicApi } from './services/qqmusic/sdk.js';
import { logger } from './utils/logger.js';

let shutdown: () => Promise<void> = async () => {};

async function startStdio(): Promise<void> {
  const server = buildServer({
    name: config.MCP_TITLE || serverMetadata.title,
    version: config.MCP_VERSION,
    api: getQQMusicApi(),
  });
  // One client owns the process, so logs go to it
  logger.setServer(server);
  await server.connect(new StdioServerTransport());
  shutdown = async () => {
    logger.setServer(undefined);
    await server.close();
  };
  await logger.info('server', {
    message: 'MCP server started on stdio',
    credentialConfigured: Boolean(config.QQ_MUSIC_COOKIE),
  });
}

function startHttp(): void {
  const { app, sessions } = buildHttpApp(getQQMusicApi());
  const httpServer = serve({ fetch: app.fetch, port: config.PORT, hostname: config.HOST });
  shutdown = async () => {
    await closeSessions(sessions);
    await new Promise<void>((resolve) => httpServer.close(() => resolve()));
  };
  void logger.info('server', {
    message: `MCP server started on http://${config.HOST}:${config.PORT}/mcp`,
    environment: config.NODE_ENV,
    credentialConfigured: Boolean(config.QQ_MUSIC_COOKIE),
  });
}

async function closeSessions(sessions: Map<string, McpSession>): Promise<void> {
  const open = [...sessions.values()];
  sessions.clear();
  await Promise.allSettled(open.map((s) => s.server.close()));
}

async function main(): Promise<void> {
  try {
    if (config.MCP_TRANSPORT === 'stdio') {
      await startStdio();
    } else {
      startHttp();
    }
  } catch (error) {
    await logger.error('server', {
      message: 'Server startup failed',
      error: error instanceof Error ? error.message : String(error),
    });
    process.exit(1);
  }
}

function onSignal(signal: NodeJS.Signals): void {
  void logger.info('server', { message: `Received ${signal}, shutting down` });
  shutdown().then(
    () => process.exit(0),
    (error: unknown) => {
      console.error('Shutdown failed:', error);
      process.exit(1);
    },
  );
}

process.on('SIGINT', onSignal);
process.on('SIGTERM', onSignal);

void main();
