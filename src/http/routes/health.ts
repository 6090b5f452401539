import type { HttpBindings } from '@hono/node-server';
import { Hono } from 'hono';
import { config } from '../../config/env.js';

export function healthRoutes(): Hono<{ Bindings: HttpBindings }> {
  const app = new Hono<{ Bindings: HttpBindings }>();

  app.get('/health', (c) =>
    c.json({
      status: 'ok',
      timestamp: Date.now(),
      name: config.MCP_TITLE,
      version: config.MCP_VERSION,
      credentialConfigured: Boolean(config.QQ_MUSIC_COOKIE),
    }),
  );

  return app;
}
