import { z } from 'zod';

const emptyToUndefined = (value: unknown) =>
  typeof value === 'string' && value.trim() === '' ? undefined : value;

const OptionalString = z.preprocess(emptyToUndefined, z.string().optional());

const Flag = z
  .string()
  .default('false')
  .transform((v) => v.toLowerCase() === 'true');

const EnvSchema = z.object({
  MCP_TRANSPORT: z.preprocess(
    emptyToUndefined,
    z.enum(['http', 'stdio']).default('http'),
  ),
  HOST: z.string().default('127.0.0.1'),
  PORT: z.coerce.number().int().min(1).max(65535).default(3000),
  MCP_TITLE: z.string().default('QQ Music'),
  MCP_INSTRUCTIONS: OptionalString,
  MCP_VERSION: z.string().default('0.1.0'),
  MCP_PROTOCOL_VERSION: z.string().default('2025-06-18'),

  // Session cookie copied from a logged-in y.qq.com browser session
  QQ_MUSIC_COOKIE: OptionalString,
  QQMUSIC_C_URL: z.string().url().default('https://c.y.qq.com'),
  QQMUSIC_U_URL: z.string().url().default('https://u.y.qq.com'),
  INCLUDE_JSON_IN_CONTENT: Flag,
  // GET /search, /song/:mid and the rest beside /mcp in HTTP mode
  REST_API_ENABLED: z
    .string()
    .default('true')
    .transform((v) => v.toLowerCase() === 'true'),

  REQUEST_TIMEOUT_MS: z.coerce.number().int().positive().default(15000),
  HTTP_RETRIES: z.coerce.number().int().min(0).max(5).default(0),
  // 0 disables the token bucket
  RPS_LIMIT: z.coerce.number().min(0).default(10),
  CONCURRENCY_LIMIT: z.coerce.number().int().positive().default(8),
  BATCH_CONCURRENCY: z.coerce.number().int().positive().default(4),

  LOG_LEVEL: z.enum(['debug', 'info', 'warning', 'error']).default('info'),
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
});

export type Config = Readonly<z.infer<typeof EnvSchema>>;

export function loadConfig(env: Record<string, string | undefined>): Config {
  return Object.freeze(EnvSchema.parse(env));
}

export const config = loadConfig(process.env);
