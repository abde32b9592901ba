/**
 * Process-level error classes. Protocol conditions inside a turn (parse failures,
 * policy denials, timeouts, step budget) are values, never thrown.
 */

/** Config file exists but cannot be read or parsed. Aborts the process. */
export class ConfigError extends Error {
  constructor(
    message: string,
    public readonly hint?: string
  ) {
    super(message);
    this.name = 'ConfigError';
  }
}

/** Persisted session is unreadable or corrupt. Aborts the process. */
export class SessionStoreError extends Error {
  constructor(
    message: string,
    public readonly path: string
  ) {
    super(message);
    this.name = 'SessionStoreError';
  }
}

export function isUnrecoverable(e: unknown): e is ConfigError | SessionStoreError {
  return e instanceof ConfigError || e instanceof SessionStoreError;
}

export function asError(e: unknown, fallback = 'unknown error'): Error {
  if (e instanceof Error) return e;
  if (e === undefined) return new Error(fallback);
  return new Error(String(e));
}

export function isAbortError(e: unknown): boolean {
  return e instanceof Error && (e.name === 'AbortError' || e.name === 'TurnAborted');
}

/** Convert raw errors into user-facing one-liners (no stack traces). */
export function friendlyError(e: unknown): string {
  if (e instanceof ConfigError) return e.hint ? `${e.message} (${e.hint})` : e.message;
  if (e instanceof SessionStoreError) {
    return `${e.message}. Move or delete ${e.path} to start a fresh session.`;
  }
  const msg = asError(e).message;
  if (msg.includes('Connection timeout') || msg.includes('ECONNREFUSED')) {
    return `Connection failed: ${msg}. Check the endpoint in your config.`;
  }
  if (isAbortError(e)) return 'Aborted.';
  return msg;
}
