import { z } from 'zod';
import { toolsMetadata } from '../config/metadata.js';
import { HealthOutput } from '../schemas/outputs.js';
import { logger } from '../utils/logger.js';
import { ok } from './results.js';
import { defineTool } from './types.js';

export const healthInputSchema = z.object({
  verbose: z.boolean().optional().describe('Include uptime and Node.js version'),
});

export const healthTool = defineTool({
  name: toolsMetadata.health.name,
  title: toolsMetadata.health.title,
  description: toolsMetadata.health.description,
  inputSchema: healthInputSchema,
  outputSchema: HealthOutput,
  annotations: {
    title: toolsMetadata.health.title,
    readOnlyHint: true,
    destructiveHint: false,
    idempotentHint: true,
    openWorldHint: false,
  },

  handler: async (args, context) => {
    await logger.debug('health', {
      message: 'Health check requested',
      requestId: context.requestId,
    });

    const credentialConfigured = context.api.hasCredential;
    const result = {
      status: 'ok',
      timestamp: Date.now(),
      runtime: 'node',
      credentialConfigured,
      ...(args.verbose
        ? { uptime: Math.floor(process.uptime()), nodeVersion: process.version }
        : {}),
    };

    const cred = credentialConfigured
      ? 'QQ Music cookie configured.'
      : 'No QQ Music cookie; qualities above 128 are unavailable.';
    return ok(result, `Server ok. ${cred}`);
  },
});
