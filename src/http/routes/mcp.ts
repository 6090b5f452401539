import { randomUUID } from 'node:crypto';
import type { HttpBindings } from '@hono/node-server';
import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { StreamableHTTPServerTransport } from '@modelcontextprotocol/sdk/server/streamableHttp.js';
import { isInitializeRequest } from '@modelcontextprotocol/sdk/types.js';
import { toFetchResponse, toReqRes } from 'fetch-to-node';
import { type Context, Hono } from 'hono';
import { errorMessage } from '../../utils/http-result.js';
import { logger } from '../../utils/logger.js';

const MCP_SESSION_HEADER = 'Mcp-Session-Id';

export interface McpSession {
  server: McpServer;
  transport: StreamableHTTPServerTransport;
}

function jsonRpcError(
  c: Context<{ Bindings: HttpBindings }>,
  status: 400 | 404 | 500,
  code: number,
  message: string,
) {
  return c.json({ jsonrpc: '2.0', error: { code, message }, id: null }, status);
}

/**
 * Streamable HTTP routes. Each `initialize` creates its own server and
 * transport; later requests find them by `Mcp-Session-Id`.
 */
export function buildMcpRoutes(params: {
  createServer: () => McpServer;
  sessions: Map<string, McpSession>;
}) {
  const { createServer, sessions } = params;
  const app = new Hono<{ Bindings: HttpBindings }>();

  app.post('/', async (c) => {
    try {
      const sessionIdHeader = c.req.header(MCP_SESSION_HEADER);
      let body: unknown;
      try {
        body = await c.req.json();
      } catch {
        return jsonRpcError(c, 400, -32700, 'Parse error');
      }

      let session = sessionIdHeader ? sessions.get(sessionIdHeader) : undefined;
      if (sessionIdHeader && !session) {
        return jsonRpcError(c, 404, -32001, 'Session not found');
      }

      if (!session) {
        if (!isInitializeRequest(body)) {
          return jsonRpcError(c, 400, -32000, 'Bad Request: No valid session ID provided');
        }

        const server = createServer();
        const transport: StreamableHTTPServerTransport = new StreamableHTTPServerTransport({
          sessionIdGenerator: () => randomUUID(),
          onsessioninitialized: (sid) => {
            sessions.set(sid, { server, transport });
            void logger.info('mcp', { message: 'Session initialized', sessionId: sid });
          },
        });
        transport.onclose = () => {
          const sid = transport.sessionId;
          if (sid && sessions.delete(sid)) {
            void logger.info('mcp', { message: 'Session closed', sessionId: sid });
          }
        };
        transport.onerror = (error) => {
          void logger.error('mcp', { message: 'Transport error', error: error.message });
        };

        await server.connect(transport);
        session = { server, transport };
      }

      const { req, res } = toReqRes(c.req.raw);
      await session.transport.handleRequest(req, res, body);
      return toFetchResponse(res);
    } catch (error) {
      await logger.error('mcp', { message: 'POST /mcp failed', error: errorMessage(error) });
      return jsonRpcError(c, 500, -32603, 'Internal server error');
    }
  });

  // GET opens the server-to-client stream; DELETE ends the session
  const handleSessionRequest = async (c: Context<{ Bindings: HttpBindings }>) => {
    const sessionIdHeader = c.req.header(MCP_SESSION_HEADER);
    if (!sessionIdHeader) {
      return jsonRpcError(c, 400, -32000, 'Bad Request: Mcp-Session-Id header is required');
    }
    const session = sessions.get(sessionIdHeader);
    if (!session) {
      return jsonRpcError(c, 404, -32001, 'Session not found');
    }

    const { req, res } = toReqRes(c.req.raw);
    try {
      await session.transport.handleRequest(req, res);
      if (c.req.method === 'DELETE') {
        sessions.delete(sessionIdHeader);
        await session.server.close();
        await logger.info('mcp', {
          message: 'Session deleted',
          sessionId: sessionIdHeader,
          remainingSessions: sessions.size,
        });
      }
      return toFetchResponse(res);
    } catch (error) {
      await logger.error('mcp', {
        message: `${c.req.method} /mcp failed`,
        sessionId: sessionIdHeader,
        error: errorMessage(error),
      });
      return jsonRpcError(c, 500, -32603, 'Internal server error');
    }
  };

  app.get('/', handleSessionRequest);
  app.delete('/', handleSessionRequest);

  return app;
}
