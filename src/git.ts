import { spawn } from 'node:child_process';

import { BASH_PATH as BASH } from './utils.js';

async function sh(cmd: string, cwd: string, timeoutSec: number): Promise<{ rc: number; out: string }> {
  return await new Promise((resolve) => {
    const child = spawn(BASH, ['-c', cmd], { cwd, stdio: ['ignore', 'pipe', 'ignore'] });
    const out: Buffer[] = [];
    const t = setTimeout(() => child.kill('SIGKILL'), Math.max(1, timeoutSec) * 1000);
    child.on('error', () => {
      clearTimeout(t);
      resolve({ rc: 127, out: '' });
    });
    child.stdout.on('data', (d: Buffer) => out.push(d));
    child.on('close', (code) => {
      clearTimeout(t);
      resolve({ rc: code ?? 1, out: Buffer.concat(out).toString('utf8') });
    });
  });
}

/** Paths from `git status --porcelain` output; renames report the new path. */
export function parsePorcelain(out: string): string[] {
  const files: string[] = [];
  for (const line of out.split(/\r?\n/)) {
    if (line.length < 4) continue;
    let p = line.slice(3).trim();
    const arrow = p.indexOf(' -> ');
    if (arrow !== -1) p = p.slice(arrow + 4);
    if (p.startsWith('"') && p.endsWith('"')) p = p.slice(1, -1);
    if (p) files.push(p);
  }
  return [...new Set(files)].sort();
}

/** Files with uncommitted changes. Empty outside a repository or on any git failure. */
export async function changedFiles(cwd: string): Promise<string[]> {
  const st = await sh('git status --porcelain', cwd, 3);
  if (st.rc !== 0) return [];
  return parsePorcelain(st.out);
}

export type ChangeDiff = { added: string[]; still: string[]; removed: string[] };

/** Compare two `changedFiles` snapshots taken around a turn. */
export function diffChangedFiles(before: readonly string[], after: readonly string[]): ChangeDiff {
  const b = new Set(before);
  const a = new Set(after);
  return {
    added: after.filter((f) => !b.has(f)),
    still: after.filter((f) => b.has(f)),
    removed: before.filter((f) => !a.has(f)),
  };
}

export function formatChangeDiff(d: ChangeDiff): string[] {
  const lines: string[] = [];
  if (d.added.length) lines.push(`changed this turn: ${d.added.join(', ')}`);
  if (d.removed.length) lines.push(`reverted this turn: ${d.removed.join(', ')}`);
  return lines;
}
