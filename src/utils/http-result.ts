export const ERROR_CODES = [
  'invalid_argument',
  'not_found',
  'unauthorized',
  'unavailable',
  'timeout',
  'upstream_error',
  'cancelled',
] as const;
export type ErrorCode = (typeof ERROR_CODES)[number];

export class QQMusicError extends Error {
  readonly code: ErrorCode;
  readonly status?: number;

  constructor(code: ErrorCode, message: string, options?: { status?: number; cause?: unknown }) {
    super(message, options?.cause === undefined ? undefined : { cause: options.cause });
    this.name = 'QQMusicError';
    this.code = code;
    this.status = options?.status;
  }
}

export function mapStatusToCode(status: number): ErrorCode {
  if (status === 401 || status === 403) {
    return 'unauthorized';
  }
  if (status === 404) {
    return 'not_found';
  }
  if (status === 429 || status >= 500) {
    return 'unavailable';
  }
  return 'upstream_error';
}

export async function expectOk(response: Response, context: string): Promise<void> {
  if (response.ok) {
    return;
  }
  const text = await response.text().catch(() => '');
  throw new QQMusicError(
    mapStatusToCode(response.status),
    `${context}: ${response.status} ${response.statusText}${text ? ` - ${text.slice(0, 200)}` : ''}`,
    { status: response.status },
  );
}

/**
 * Normalize anything thrown below the tool boundary into a QQMusicError.
 */
export function toQQMusicError(error: unknown): QQMusicError {
  if (error instanceof QQMusicError) {
    return error;
  }
  if (error instanceof Error) {
    return new QQMusicError('upstream_error', error.message, { cause: error });
  }
  return new QQMusicError('upstream_error', String(error));
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
