import { config } from '../config/env.js';
import { toQQMusicError } from '../utils/http-result.js';
import type { ToolResult } from './types.js';

const UNAUTHORIZED_HINT =
  'Set QQ_MUSIC_COOKIE to the cookie of a logged-in y.qq.com session (VIP for lossless and above).';

export function ok<T>(data: T, msg: string): ToolResult {
  const structured = { ok: true, _msg: msg, data };
  const content: ToolResult['content'] = [{ type: 'text', text: msg }];
  if (config.INCLUDE_JSON_IN_CONTENT) {
    content.push({ type: 'text', text: JSON.stringify(data) });
  }
  return { content, structuredContent: structured };
}

export function fail(error: unknown): ToolResult {
  const err = toQQMusicError(error);
  const message =
    err.code === 'unauthorized' && !err.message.includes('QQ_MUSIC_COOKIE')
      ? `${err.message} ${UNAUTHORIZED_HINT}`
      : err.message;
  return {
    isError: true,
    content: [{ type: 'text', text: `[${err.code}] ${message}` }],
    structuredContent: { ok: false, _msg: message, error: { code: err.code, message } },
  };
}
