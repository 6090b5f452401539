import { config } from '../config/env.js';

export class SecurityError extends Error {
  readonly status: 400 | 403;

  constructor(message: string, status: 400 | 403) {
    super(message);
    this.name = 'SecurityError';
    this.status = status;
  }
}

export const validateProtocolVersion = (
  headers: Headers,
  expected: string = config.MCP_PROTOCOL_VERSION,
): void => {
  const header = headers.get('Mcp-Protocol-Version');
  if (!header) return;
  const versions = header
    .split(',')
    .map((v) => v.trim())
    .filter(Boolean);
  if (!versions.includes(expected)) {
    throw new SecurityError(
      `Unsupported MCP protocol version: ${header}. Expected ${expected}`,
      400,
    );
  }
};

export const validateOrigin = (
  headers: Headers,
  nodeEnv: string = config.NODE_ENV,
): void => {
  const origin = headers.get('Origin');

  if (!origin) return; // non-browser callers

  // Browsers on other hosts are refused only in development, where the server binds locally
  if (nodeEnv === 'development' && !isLocalhostOrigin(origin)) {
    throw new SecurityError(
      `Invalid origin: ${origin}. Only localhost allowed in development`,
      403,
    );
  }
};

export const isLocalhostOrigin = (origin: string): boolean => {
  try {
    const url = new URL(origin);
    const hostname = url.hostname.toLowerCase();
    return (
      hostname === 'localhost' ||
      hostname === '127.0.0.1' ||
      hostname === '[::1]' ||
      hostname.startsWith('192.168.') ||
      hostname.startsWith('10.') ||
      hostname.endsWith('.local')
    );
  } catch {
    return false;
  }
};
