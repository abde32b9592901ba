import fs from 'node:fs/promises';
import path from 'node:path';

import { collectFiles } from '../agent/workspace-context.js';

export const MAX_TOOL_OUTPUT_CHARS = 8000;
const MAX_LISTED_FILES = 5000;
const MAX_GREP_HITS = 500;

export async function readTextFile(p: string): Promise<string> {
  const st = await fs.stat(p).catch(() => null);
  if (!st) throw new Error(`file does not exist: ${p}`);
  if (st.isDirectory()) throw new Error(`${p} is a directory, not a file`);
  return fs.readFile(p, 'utf8');
}

/**
 * Files under `root` (or `root` itself when it is a file). `root` is resolved
 * against `cwd`; the returned paths keep the form `root` was given in.
 */
export async function listFiles(root: string, cwd = process.cwd()): Promise<string[]> {
  const abs = path.resolve(cwd, root);
  const st = await fs.stat(abs).catch(() => null);
  if (!st) throw new Error(`path does not exist: ${root}`);
  if (!st.isDirectory()) return [root];
  const rels = await collectFiles(abs, MAX_LISTED_FILES);
  return rels.map((rel) => path.join(root, rel));
}

/** Case-insensitive substring search; hits are `path:line:trimmed text`. */
export async function grepFiles(
  root: string,
  pattern: string,
  opts: { cwd?: string; maxHits?: number } = {},
): Promise<string[]> {
  const cwd = opts.cwd ?? process.cwd();
  const maxHits = opts.maxHits ?? MAX_GREP_HITS;
  const needle = pattern.toLowerCase();
  const hits: string[] = [];
  for (const file of await listFiles(root, cwd)) {
    const text = await fs.readFile(path.resolve(cwd, file), 'utf8').catch(() => null);
    if (text === null || text.includes('\u0000')) continue;
    const lines = text.split(/\r?\n/);
    for (let i = 0; i < lines.length; i++) {
      if (!lines[i].toLowerCase().includes(needle)) continue;
      hits.push(`${file}:${i + 1}:${lines[i].trim()}`);
      if (hits.length >= maxHits) return hits;
    }
  }
  return hits;
}

export function clipOutput(text: string, max = MAX_TOOL_OUTPUT_CHARS): string {
  if (text.length <= max) return text;
  return `${text.slice(0, max)}...\n[truncated]`;
}
