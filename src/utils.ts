/**
 * Shared utility functions.
 */

import { spawnSync } from 'node:child_process';
import { readFileSync, existsSync } from 'node:fs';
import fs from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';

/** Package version read once at startup (source tree or dist/src). Falls back to '0.0.0'. */
export const PKG_VERSION: string = (() => {
  for (const rel of ['../package.json', '../../package.json']) {
    try {
      const parsed: unknown = JSON.parse(readFileSync(new URL(rel, import.meta.url), 'utf8'));
      if (isRecord(parsed) && parsed.name === 'shellmate' && typeof parsed.version === 'string') {
        return parsed.version;
      }
    } catch {
      continue;
    }
  }
  return '0.0.0';
})();

/** Resolved absolute path to bash; avoids ENOENT under restricted PATHs. */
export const BASH_PATH: string = (() => {
  const isWin = os.platform() === 'win32';
  try {
    const selector = isWin ? 'where' : 'which';
    const r = spawnSync(selector, ['bash'], { encoding: 'utf8', timeout: 1000 });
    const p = r.stdout?.split(/\r?\n/)[0]?.trim();
    if (p && (isWin || p.startsWith('/'))) return p;

    if (isWin) {
      // Common Git Bash locations if not in PATH
      const common = [
        'C:\\Program Files\\Git\\bin\\bash.exe',
        'C:\\Program Files\\Git\\usr\\bin\\bash.exe',
        path.join(os.homedir(), 'AppData\\Local\\Programs\\Git\\bin\\bash.exe'),
      ];
      for (const c of common) {
        if (existsSync(c)) return c;
      }
    }
  } catch {
    /* fallback */
  }
  return isWin ? 'bash' : '/bin/bash';
})();

export function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === 'object' && v !== null && !Array.isArray(v);
}

/**
 * XDG-compatible state directory for sessions.
 * `~/.local/state/shellmate`, overridable with SHELLMATE_STATE_DIR.
 */
export function stateDir(): string {
  if (process.env.SHELLMATE_STATE_DIR) return process.env.SHELLMATE_STATE_DIR;
  if (process.env.XDG_STATE_HOME) return path.join(process.env.XDG_STATE_HOME, 'shellmate');
  const base =
    process.platform === 'win32'
      ? process.env.LOCALAPPDATA || path.join(os.homedir(), 'AppData', 'Local')
      : path.join(os.homedir(), '.local', 'state');
  return path.join(base, 'shellmate');
}

/**
 * XDG-compatible config directory.
 * `~/.config/shellmate`, overridable with SHELLMATE_CONFIG_DIR.
 */
export function configDir(): string {
  if (process.env.SHELLMATE_CONFIG_DIR) return process.env.SHELLMATE_CONFIG_DIR;
  if (process.env.XDG_CONFIG_HOME) return path.join(process.env.XDG_CONFIG_HOME, 'shellmate');
  const base =
    process.platform === 'win32'
      ? process.env.APPDATA || path.join(os.homedir(), 'AppData', 'Roaming')
      : path.join(os.homedir(), '.config');
  return path.join(base, 'shellmate');
}

/** Cut `s` to `max` chars, appending `suffix` when something was removed. */
export function truncateChars(s: string, max: number, suffix = ' ...'): string {
  if (s.length <= max) return s;
  return s.slice(0, Math.max(0, max)) + suffix;
}

/** Collapse runs of whitespace and trim. */
export function normalizeWhitespace(s: string): string {
  return s.trim().split(/\s+/).filter(Boolean).join(' ');
}

export function nowIso(): string {
  return new Date().toISOString();
}

/** Write `obj` as pretty JSON via temp file + rename. */
export async function writeJsonAtomic(filePath: string, obj: unknown): Promise<void> {
  await fs.mkdir(path.dirname(filePath), { recursive: true });
  const tmp = `${filePath}.${process.pid}.tmp`;
  await fs.writeFile(tmp, JSON.stringify(obj, null, 2) + '\n', 'utf8');
  await fs.rename(tmp, filePath);
}
