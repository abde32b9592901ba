import { spawn } from 'node:child_process';

import type { ExecOutcome } from '../types.js';
import { BASH_PATH } from '../utils.js';

import { cleanOutput } from './text-utils.js';

export const DEFAULT_MAX_EXEC_BYTES = 16384;

export type RunCommandOptions = {
  cwd: string;
  /** Mandatory wall-clock limit; the whole process group is killed when it passes. */
  timeoutSec: number;
  /** Per-stream cap on what is returned. */
  maxOutputBytes?: number;
  /** Per-stream cap on what is buffered while the command runs. */
  captureLimitBytes?: number;
  signal?: AbortSignal;
};

/**
 * Run `command` through bash in its own process group and capture both streams.
 * Never throws for command-level problems: spawn failures come back as rc 127,
 * timeouts as `timed_out`, and a fired `signal` as `aborted`.
 */
export async function runCommand(command: string, opts: RunCommandOptions): Promise<ExecOutcome> {
  if (opts.signal?.aborted) return { kind: 'aborted' };

  const timeoutSec = Math.max(1, opts.timeoutSec);
  const maxBytes = opts.maxOutputBytes ?? DEFAULT_MAX_EXEC_BYTES;
  const captureLimit = opts.captureLimitBytes ?? Math.max(maxBytes * 64, 256 * 1024);

  const child = spawn(command, [], {
    cwd: opts.cwd,
    stdio: ['ignore', 'pipe', 'pipe'],
    shell: BASH_PATH,
    detached: true,
  });

  const chunks: Record<'out' | 'err', Buffer[]> = { out: [], err: [] };
  const seen = { out: 0, err: 0 };
  const captured = { out: 0, err: 0 };
  let timedOut = false;
  let aborted = false;

  const killProcessGroup = () => {
    const pid = child.pid;
    if (!pid) return;
    try {
      process.kill(-pid, 'SIGKILL');
    } catch {
      // Group already gone or never formed; fall back to the direct child.
      child.kill('SIGKILL');
    }
  };

  const killTimer = setTimeout(() => {
    timedOut = true;
    killProcessGroup();
  }, timeoutSec * 1000);

  const onAbort = () => {
    aborted = true;
    killProcessGroup();
  };
  opts.signal?.addEventListener('abort', onAbort, { once: true });

  const pushCapped = (kind: 'out' | 'err', buf: Buffer) => {
    seen[kind] += buf.length;
    const remaining = captureLimit - captured[kind];
    if (remaining <= 0) return;
    const take = buf.length <= remaining ? buf : buf.subarray(0, remaining);
    chunks[kind].push(Buffer.from(take));
    captured[kind] += take.length;
  };

  child.stdout.on('data', (d: Buffer) => pushCapped('out', d));
  child.stderr.on('data', (d: Buffer) => pushCapped('err', d));

  const closed = await new Promise<{ rc: number } | { spawnError: string }>((resolve) => {
    child.on('error', (err: NodeJS.ErrnoException) => {
      resolve({ spawnError: `failed to spawn shell (cwd=${opts.cwd}): ${err.message} (${err.code ?? 'unknown'})` });
    });
    child.on('close', (code, sig) => resolve({ rc: code ?? (sig ? 128 + 9 : 0) }));
  });

  clearTimeout(killTimer);
  opts.signal?.removeEventListener('abort', onAbort);

  if (aborted) return { kind: 'aborted' };

  const finish = (kind: 'out' | 'err') =>
    cleanOutput(
      Buffer.concat(chunks[kind]).toString('utf8'),
      maxBytes,
      seen[kind] > captured[kind] ? seen[kind] : undefined
    );
  const out = finish('out');
  const err = finish('err');

  if ('spawnError' in closed) {
    return { kind: 'completed', rc: 127, out: out.text, err: closed.spawnError, truncated: false };
  }
  if (timedOut) {
    return { kind: 'timed_out', out: out.text, err: err.text, timeoutSec };
  }
  return {
    kind: 'completed',
    rc: closed.rc,
    out: out.text,
    err: err.text,
    truncated: out.truncated || err.truncated,
  };
}

/** Tool-result text for one executed command, as fed back to the model. */
export function formatExecResult(command: string, outcome: ExecOutcome): string {
  const lines = [`$ ${command}`];
  switch (outcome.kind) {
    case 'aborted':
      lines.push('[aborted]');
      break;
    case 'timed_out':
      if (outcome.out) lines.push(outcome.out);
      if (outcome.err) lines.push(`[stderr]\n${outcome.err}`);
      lines.push(`[timed out after ${outcome.timeoutSec}s]`);
      break;
    case 'completed':
      lines.push(`[exit ${outcome.rc}]`);
      if (outcome.out) lines.push(outcome.out);
      if (outcome.err) lines.push(`[stderr]\n${outcome.err}`);
      if (!outcome.out && !outcome.err) lines.push('(no output)');
      break;
  }
  return lines.join('\n');
}
