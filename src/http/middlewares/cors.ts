import type { HttpBindings } from '@hono/node-server';
import type { MiddlewareHandler } from 'hono';

export function corsMiddleware(): MiddlewareHandler<{
  Bindings: HttpBindings;
}> {
  return async (c, next) => {
    const requestOrigin = c.req.header('Origin');
    c.header('Access-Control-Allow-Origin', requestOrigin || 'http://localhost');
    c.header('Access-Control-Allow-Methods', 'GET, POST, DELETE, OPTIONS');
    c.header(
      'Access-Control-Allow-Headers',
      'Content-Type, Mcp-Session-Id, Mcp-Protocol-Version, Last-Event-ID',
    );
    c.header('Access-Control-Expose-Headers', 'Mcp-Session-Id');

    if (c.req.method === 'OPTIONS') {
      return c.body(null, 204);
    }

    await next();
  };
}
