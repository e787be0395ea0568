/** A provider answered with an error that is worth retrying. */
export class ProviderError extends Error {
  constructor(
    message: string,
    readonly provider: string,
    readonly status?: number
  ) {
    super(message);
    this.name = 'ProviderError';
  }
}

/** The provider session went away mid-call; cached handles must be dropped before retrying. */
export class ConnectionDroppedError extends Error {
  constructor(message: string, readonly originalError?: unknown) {
    super(message);
    this.name = 'ConnectionDroppedError';
  }
}

export class ParseError extends Error {
  constructor(message: string, readonly raw?: string) {
    super(message);
    this.name = 'ParseError';
  }
}

export class TimeoutError extends Error {
  constructor(readonly operation: string, readonly timeoutMs: number) {
    super(`${operation} timed out after ${timeoutMs}ms`);
    this.name = 'TimeoutError';
  }
}

const CONNECTION_CODES = new Set(['ECONNRESET', 'EPIPE', 'ECONNREFUSED', 'ERR_STREAM_PREMATURE_CLOSE']);

const CONNECTION_PHRASES = [
  'socket hang up',
  'connection closed',
  'connection reset',
  'session terminated',
  'session not found',
  'closedresourceerror',
];

export function isConnectionDropped(error: unknown): boolean {
  if (error instanceof ConnectionDroppedError) return true;
  if (!(error instanceof Error)) return false;
  if ('code' in error && typeof error.code === 'string' && CONNECTION_CODES.has(error.code)) {
    return true;
  }
  const message = error.message.toLowerCase();
  return CONNECTION_PHRASES.some(phrase => message.includes(phrase));
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
