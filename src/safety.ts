/**
 * Auto-exec policy engine: decides whether a proposed shell command runs
 * silently, runs after confirmation, or is refused.
 *
 * Evaluation order (first match wins):
 *   1. deny-list prefix          → deny (dominates everything, trust included)
 *   2. safe mode, not whitelisted → deny
 *   3. custom mode, no allow match → deny
 *   4. auto_confirm_exec off      → allow
 *   5. trusted prefix             → allow
 *   6. otherwise                  → ask
 *
 * `decide` is pure: policy comes in as an argument and nothing is executed here.
 * Mutations to the policy go through PolicyStore.
 */

import fs from 'node:fs';
import path from 'node:path';

import type { AutoExecPolicy, MatchedRule, PolicyDecision } from './types.js';
import { normalizeWhitespace } from './utils.js';

// ──────────────────────────────────────────────────────
// Safe whitelist: read-only inspection commands
// ──────────────────────────────────────────────────────

export const SAFE_COMMANDS: ReadonlySet<string> = new Set([
  'ls',
  'dir',
  'pwd',
  'cat',
  'type',
  'rg',
  'grep',
  'findstr',
  'tree',
  'find',
  'head',
  'tail',
  'wc',
  'which',
  'get-childitem',
  'get-content',
  'get-location',
]);

/** git is only safe for these read-only subcommands. */
export const SAFE_GIT_SUBCOMMANDS: ReadonlySet<string> = new Set([
  'status',
  'diff',
  'log',
  'show',
  'branch',
]);

// ──────────────────────────────────────────────────────
// Prefix matching
// ──────────────────────────────────────────────────────

/**
 * Token-boundary, case-sensitive prefix test: `rg` matches `rg --files`
 * and `rg` but not `rgx`. Blank entries never match.
 */
export function matchesPrefix(command: string, entry: string): boolean {
  const e = normalizeWhitespace(entry);
  if (!e) return false;
  const c = normalizeWhitespace(command);
  return c === e || c.startsWith(e + ' ');
}

function firstMatch(command: string, entries: readonly string[]): string | undefined {
  return entries.find((e) => matchesPrefix(command, e));
}

/** Leading token, with a `git <sub>` pair kept together. */
export function commandPrefix(command: string): string {
  const tokens = normalizeWhitespace(command).split(' ').filter(Boolean);
  if (tokens.length === 0) return '';
  if (tokens[0] === 'git' && tokens.length > 1) return `git ${tokens[1]}`;
  return tokens[0];
}

/**
 * Whitelist entry that admits `command` in safe mode, or undefined.
 * The comparison is lowercase so PowerShell cmdlets match regardless of casing.
 */
export function safeWhitelistEntry(command: string): string | undefined {
  const tokens = normalizeWhitespace(command).split(' ').filter(Boolean);
  const head = tokens[0]?.toLowerCase();
  if (!head) return undefined;
  if (head === 'git') {
    const sub = tokens[1]?.toLowerCase();
    return sub && SAFE_GIT_SUBCOMMANDS.has(sub) ? `git ${sub}` : undefined;
  }
  return SAFE_COMMANDS.has(head) ? head : undefined;
}

// ──────────────────────────────────────────────────────
// Decision
// ──────────────────────────────────────────────────────

function verdict(v: PolicyDecision['verdict'], rule: MatchedRule, reason: string): PolicyDecision {
  return { verdict: v, rule, reason };
}

export function decide(command: string, policy: AutoExecPolicy): PolicyDecision {
  const denied = firstMatch(command, policy.deny);
  if (denied !== undefined) {
    return verdict('deny', { kind: 'deny', entry: denied }, `matches deny rule "${denied}"`);
  }

  // Rule that made the command eligible; reported when confirmation is needed.
  let admitted: MatchedRule = { kind: 'mode-default' };

  if (policy.mode === 'safe') {
    const entry = safeWhitelistEntry(command);
    if (entry === undefined) {
      return verdict(
        'deny',
        { kind: 'not-whitelisted' },
        `"${commandPrefix(command)}" is not in the safe whitelist (auto_exec_mode=safe)`
      );
    }
    admitted = { kind: 'safe-whitelist', entry };
  }

  if (policy.mode === 'custom') {
    const allowed = firstMatch(command, policy.allow);
    if (allowed === undefined) {
      return verdict(
        'deny',
        { kind: 'not-allowed' },
        `no allow rule matches "${commandPrefix(command)}" (auto_exec_mode=custom)`
      );
    }
    admitted = { kind: 'allow', entry: allowed };
  }

  if (!policy.confirm) {
    return verdict('allow', { kind: 'confirm-disabled' }, 'auto_confirm_exec is off');
  }

  const trusted = firstMatch(command, policy.trusted);
  if (trusted !== undefined) {
    return verdict('allow', { kind: 'trusted', entry: trusted }, `trusted prefix "${trusted}"`);
  }

  return verdict('ask', admitted, `auto_exec_mode=${policy.mode} requires confirmation`);
}

/** Human-readable summary of a policy, for `/policy show` and the system prompt. */
export function describePolicy(policy: AutoExecPolicy): string {
  const list = (xs: readonly string[]) => (xs.length ? xs.join(', ') : '(none)');
  return [
    `mode: ${policy.mode}`,
    `confirm: ${policy.confirm ? 'on' : 'off'}`,
    `allow: ${list(policy.allow)}`,
    `deny: ${list(policy.deny)}`,
    `trusted: ${list(policy.trusted)}`,
  ].join('\n');
}

// ──────────────────────────────────────────────────────
// Pre-execution sanity checks
// ──────────────────────────────────────────────────────

const MAX_INLINE_PYTHON_CHARS = 360;
const MAX_BASE64_PAYLOAD_CHARS = 700;

function stripQuotes(s: string): string {
  return s.replace(/^['"]|['"]$/g, '');
}

/**
 * Catch commands that are certain to fail or that smuggle large payloads
 * before they reach the shell. Returns the reason to skip, or null.
 */
export function precheckCommand(command: string, cwd: string): string | null {
  const cmd = command.trim();
  if (!cmd) return 'empty command';

  if (/base64/i.test(cmd) && cmd.length > MAX_BASE64_PAYLOAD_CHARS) {
    return `base64 payload is too long (${cmd.length} chars); write a small script file instead`;
  }

  const tokens = cmd.split(/\s+/);
  const head = tokens[0]?.toLowerCase() ?? '';
  const isPython = head === 'python' || head === 'python3' || head === 'py';

  if (isPython && tokens[1] === '-c') {
    const body = cmd.slice(cmd.indexOf('-c') + 2).trim();
    if (body.includes('\n')) return 'multi-line `python -c` is not supported; put the code in a script file';
    if (body.length > MAX_INLINE_PYTHON_CHARS) {
      return `\`python -c\` body is too long (${body.length} chars); put the code in a script file`;
    }
  }

  if (isPython && tokens[1] && tokens[1].endsWith('.py')) {
    const script = stripQuotes(tokens[1]);
    if (!fs.existsSync(path.resolve(cwd, script))) return `python script not found: ${script}`;
  }

  if (head === 'pip' || head === 'pip3' || (isPython && tokens[1] === '-m' && tokens[2] === 'pip')) {
    const rIdx = tokens.findIndex((t) => t === '-r' || t === '--requirement');
    const req = rIdx >= 0 ? tokens[rIdx + 1] : undefined;
    if (req && !fs.existsSync(path.resolve(cwd, stripQuotes(req)))) {
      return `requirements file not found: ${stripQuotes(req)}`;
    }
  }

  return null;
}

/** Output markers that mean a command failed even when it exited 0. */
const FAILURE_MARKERS = [
  'no such file or directory',
  'command not found',
  'is not recognized as an internal or external command',
  'traceback (most recent call last)',
  'modulenotfounderror',
  'module not found',
  'permission denied',
];

export function looksLikeCommandFailure(output: string): boolean {
  const lower = output.toLowerCase();
  return FAILURE_MARKERS.some((m) => lower.includes(m));
}
