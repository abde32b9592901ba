/**
 * One-shot file tasks behind `shellmate review` and `shellmate edit`: read a file,
 * ask the model once, print or write the answer. No session, no tool calls.
 */

import fs from 'node:fs/promises';
import path from 'node:path';

import { DEFAULT_PERSONA } from '../agent/prompt.js';
import { makeMessage } from '../session-store.js';
import { readTextFile } from '../tools/fs-tools.js';
import type { ChatClient } from '../types.js';

export type FileTaskDeps = {
  client: ChatClient;
  model: string;
  persona?: string;
  signal?: AbortSignal;
};

export type EditResult = {
  edited: string;
  /** Set only when the edit was written. */
  backup?: string;
};

function fenceLang(file: string): string {
  return path.extname(file).slice(1);
}

function systemFor(deps: FileTaskDeps, role: string): string {
  const persona = deps.persona?.trim() || DEFAULT_PERSONA;
  return `${persona}\n${role}`;
}

async function ask(deps: FileTaskDeps, system: string, prompt: string): Promise<string> {
  return deps.client.chat({
    model: deps.model,
    messages: [makeMessage('system', system), makeMessage('user', prompt)],
    signal: deps.signal,
  });
}

export function reviewPrompt(file: string, code: string, extra?: string): string {
  let prompt =
    'Please review this code. Focus on correctness, bugs, risks, and missing tests.\n' +
    'Provide concise findings with severity and actionable suggestions.\n\n' +
    `File: ${file}\n\`\`\`${fenceLang(file)}\n${code}\n\`\`\``;
  if (extra?.trim()) prompt += `\n\nExtra requirement:\n${extra.trim()}`;
  return prompt;
}

export async function runReview(deps: FileTaskDeps, file: string, extra?: string): Promise<string> {
  const code = await readTextFile(file);
  return ask(deps, systemFor(deps, 'You are a senior code reviewer.'), reviewPrompt(file, code, extra));
}

export function editPrompt(file: string, original: string, instruction: string): string {
  return (
    'Edit this file according to the instruction.\n' +
    'Return ONLY the full updated file content with no markdown and no explanation.\n\n' +
    `Instruction:\n${instruction}\n\n` +
    `File: ${file}\n\`\`\`${fenceLang(file)}\n${original}\n\`\`\``
  );
}

/** Unwrap a reply that is one fenced block; anything else comes back unchanged. */
export function stripCodeFence(reply: string): string {
  const m = /^\s*```[^\n]*\n([\s\S]*?)\n?```\s*$/.exec(reply);
  return m ? m[1] : reply;
}

/** `src/app.ts` -> `src/app.bak.ts`; `Makefile` -> `Makefile.bak`. */
export function backupPath(file: string): string {
  const { dir, name, ext } = path.parse(file);
  return path.join(dir, ext ? `${name}.bak${ext}` : `${name}.bak`);
}

export async function runEdit(
  deps: FileTaskDeps,
  file: string,
  instruction: string,
  apply: boolean,
): Promise<EditResult> {
  const original = await readTextFile(file);
  const reply = await ask(deps, systemFor(deps, 'You are a careful code editor.'), editPrompt(file, original, instruction));
  const edited = stripCodeFence(reply);
  if (!apply) return { edited };

  const backup = backupPath(file);
  await fs.writeFile(backup, original, 'utf8');
  await fs.writeFile(file, edited, 'utf8');
  return { edited, backup };
}
