import { isRecord } from '../utils.js';

const RE_CONN_REFUSED = /ECONNREFUSED|fetch failed/i;

/** Failure talking to the chat endpoint. `status` is set for non-2xx responses only. */
export class ClientError extends Error {
  constructor(
    message: string,
    public readonly status?: number,
    public readonly retryable = false,
    /** Set for transport failures that never produced a response. */
    public readonly code?: 'ECONNREFUSED' | 'TIMEOUT'
  ) {
    super(message);
    this.name = 'ClientError';
  }
}

function messageOf(e: unknown): string {
  return e instanceof Error ? e.message : String(e ?? '');
}

export function isConnRefused(e: unknown): boolean {
  const cause = e instanceof Error ? e.cause : undefined;
  if (isRecord(cause) && cause.code === 'ECONNREFUSED') return true;
  return RE_CONN_REFUSED.test(messageOf(e));
}

export function isAbort(e: unknown): boolean {
  return e instanceof Error && e.name === 'AbortError';
}

export function abortError(): Error {
  const e = new Error('The operation was aborted');
  e.name = 'AbortError';
  return e;
}

/** Backoff delay, overridable via SHELLMATE_TEST_RETRY_DELAY_MS so tests do not sleep. */
export function getRetryDelayMs(defaultMs: number): number {
  const raw = process.env.SHELLMATE_TEST_RETRY_DELAY_MS;
  if (raw == null) return defaultMs;
  const parsed = Number(raw);
  if (!Number.isFinite(parsed) || parsed < 0) return defaultMs;
  return Math.floor(parsed);
}
