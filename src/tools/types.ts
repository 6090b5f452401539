import type { CallToolResult, ToolAnnotations } from '@modelcontextprotocol/sdk/types.js';
import type { AnyZodObject, ZodRawShape, z } from 'zod';
import type { QQMusicApi } from '../services/qqmusic/client.js';
import { QQMusicError } from '../utils/http-result.js';

export type ToolResult = CallToolResult;

/**
 * Per-invocation context handed to every tool handler.
 * `api` carries the immutable credential configured at startup.
 */
export interface ToolContext {
  api: QQMusicApi;
  signal?: AbortSignal;
  /** JSON-RPC id of the invocation, when it arrived over MCP. */
  requestId?: string;
}

export interface ToolDefinition<TInput extends AnyZodObject> {
  name: string;
  title?: string;
  description: string;
  inputSchema: TInput;
  outputSchema?: AnyZodObject;
  annotations?: ToolAnnotations;
  handler: (args: z.infer<TInput>, context: ToolContext) => Promise<ToolResult>;
}

/**
 * Type-erased tool as stored in the registry. The handler accepts raw
 * arguments and validates them against `inputSchema` itself.
 */
export interface RegisteredTool {
  name: string;
  title?: string;
  description: string;
  inputShape: ZodRawShape;
  outputShape?: ZodRawShape;
  annotations?: ToolAnnotations;
  handler: (args: unknown, context: ToolContext) => Promise<ToolResult>;
}

export function defineTool<TInput extends AnyZodObject>(
  definition: ToolDefinition<TInput>,
): RegisteredTool {
  const { inputSchema, outputSchema, handler, ...meta } = definition;
  return {
    ...meta,
    inputShape: inputSchema.shape,
    outputShape: outputSchema?.shape,
    handler: async (args, context) => {
      const parsed = inputSchema.safeParse(args ?? {});
      if (!parsed.success) {
        const errors = parsed.error.errors
          .map((e) => `${e.path.join('.') || 'input'}: ${e.message}`)
          .join(', ');
        throw new QQMusicError('invalid_argument', `Invalid input: ${errors}`);
      }
      return handler(parsed.data, context);
    },
  };
}
