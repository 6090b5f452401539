import type { HttpBindings } from '@hono/node-server';
import type { MiddlewareHandler } from 'hono';
import { logger } from '../../utils/logger.js';
import { SecurityError, validateOrigin, validateProtocolVersion } from '../../utils/security.js';

export function createMcpSecurityMiddleware(): MiddlewareHandler<{
  Bindings: HttpBindings;
}> {
  return async (c, next) => {
    try {
      validateOrigin(c.req.raw.headers);
      validateProtocolVersion(c.req.raw.headers);
    } catch (error) {
      if (error instanceof SecurityError) {
        await logger.warning('mcp', { message: 'Request rejected', reason: error.message });
        return c.json(
          { jsonrpc: '2.0', error: { code: -32000, message: error.message }, id: null },
          error.status,
        );
      }
      throw error;
    }

    await next();
  };
}
