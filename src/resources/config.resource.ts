import type { ReadResourceResult } from '@modelcontextprotocol/sdk/types.js';
import { config } from '../config/env.js';

const SENSITIVE = ['cookie', 'password', 'token', 'secret', 'key', 'authorization'];

export function redactSensitive(obj: Readonly<Record<string, unknown>>): Record<string, unknown> {
  const copy: Record<string, unknown> = {};
  for (const [k, v] of Object.entries(obj)) {
    if (SENSITIVE.some((s) => k.toLowerCase().includes(s))) {
      copy[k] = v === undefined ? undefined : '[REDACTED]';
    } else {
      copy[k] = v;
    }
  }
  return copy;
}

export const configResource = {
  uri: 'config://server',
  name: 'server-config',
  title: 'Server Configuration',
  description: 'Current server configuration (cookie and other secrets redacted)',
  mimeType: 'application/json',

  handler: async (): Promise<ReadResourceResult> => {
    const safe = redactSensitive(config);
    return {
      contents: [
        {
          uri: 'config://server',
          mimeType: 'application/json',
          text: JSON.stringify(safe, null, 2),
        },
      ],
    };
  },
} as const;
