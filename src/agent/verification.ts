/**
 * Post-execution project health check.
 *
 * Detection priority: override → Cargo.toml → tsconfig (pnpm / npm) →
 * package.json test script → Python configs → go.mod.
 */

import { existsSync, readFileSync } from 'node:fs';
import { join } from 'node:path';

import { runCommand, type RunCommandOptions } from '../tools/exec-core.js';
import type { ExecOutcome, VerificationResult } from '../types.js';
import { isRecord, truncateChars } from '../utils.js';

import { TurnAborted } from './errors.js';

export type VerificationCommand = { label: string; command: string };

export type CommandRunner = (command: string, opts: RunCommandOptions) => Promise<ExecOutcome>;

export const SKIPPED_NO_CHECKER = 'no supported project checker detected';

const NPM_DEFAULT_TEST_STUB = 'echo "Error: no test specified" && exit 1';
const OUTPUT_PREVIEW_CHARS = 4000;

function hasRealTestScript(cwd: string): boolean {
  try {
    const pkg: unknown = JSON.parse(readFileSync(join(cwd, 'package.json'), 'utf8'));
    if (!isRecord(pkg) || !isRecord(pkg.scripts)) return false;
    const test = pkg.scripts.test;
    return typeof test === 'string' && test.trim() !== '' && test.trim() !== NPM_DEFAULT_TEST_STUB;
  } catch {
    return false;
  }
}

/**
 * Pick at most one checker for `cwd`. An `override` of `""` disables
 * verification; any other non-blank override is used as-is.
 */
export function detectVerificationCommand(cwd: string, override?: string): VerificationCommand | null {
  if (override !== undefined) {
    const cmd = override.trim();
    return cmd ? { label: 'custom', command: cmd } : null;
  }

  const has = (f: string) => existsSync(join(cwd, f));

  if (has('Cargo.toml')) return { label: 'cargo', command: 'cargo check' };
  if (has('tsconfig.json') && has('pnpm-lock.yaml')) {
    return { label: 'tsc', command: 'pnpm -s tsc --noEmit' };
  }
  if (has('tsconfig.json') && has('package.json')) {
    return { label: 'tsc', command: 'npx --no-install tsc --noEmit' };
  }
  if (has('package.json') && hasRealTestScript(cwd)) return { label: 'npm', command: 'npm test' };
  if (has('pyproject.toml') || has('pytest.ini')) return { label: 'pytest', command: 'pytest -q' };
  if (has('go.mod')) return { label: 'go', command: 'go vet ./...' };
  return null;
}

export type RunVerificationOptions = {
  override?: string;
  timeoutSec: number;
  maxOutputBytes?: number;
  signal?: AbortSignal;
  run?: CommandRunner;
};

/**
 * Run the detected checker once. A non-zero exit is `failed` and a timeout is
 * `timed_out`; only a zero exit is `passed`. Throws TurnAborted on abort.
 */
export async function runVerification(cwd: string, opts: RunVerificationOptions): Promise<VerificationResult> {
  const detected = detectVerificationCommand(cwd, opts.override);
  if (!detected) {
    const reason = opts.override !== undefined ? 'disabled by verify_command' : SKIPPED_NO_CHECKER;
    return { status: 'skipped', output: '', reason };
  }

  const run = opts.run ?? runCommand;
  const outcome = await run(detected.command, {
    cwd,
    timeoutSec: opts.timeoutSec,
    maxOutputBytes: opts.maxOutputBytes,
    signal: opts.signal,
  });

  const base = { label: detected.label, command: detected.command };
  switch (outcome.kind) {
    case 'aborted':
      throw new TurnAborted();
    case 'timed_out':
      return {
        ...base,
        status: 'timed_out',
        output: truncateChars([outcome.out, outcome.err].filter(Boolean).join('\n'), OUTPUT_PREVIEW_CHARS),
        reason: `timed out after ${outcome.timeoutSec}s`,
      };
    case 'completed':
      return {
        ...base,
        status: outcome.rc === 0 ? 'passed' : 'failed',
        rc: outcome.rc,
        output: truncateChars([outcome.out, outcome.err].filter(Boolean).join('\n'), OUTPUT_PREVIEW_CHARS),
      };
  }
}

/** Tool-message text for a verification result. */
export function formatVerification(v: VerificationResult): string {
  if (v.status === 'skipped') return `verification: skipped (${v.reason ?? SKIPPED_NO_CHECKER})`;
  const head = `verification[${v.label ?? 'custom'}] ${v.status}: ${v.command ?? ''}`;
  const detail =
    v.status === 'timed_out' ? v.reason ?? 'timed out' : `exit ${v.rc ?? -1}`;
  return [`${head} (${detail})`, v.output].filter(Boolean).join('\n');
}
