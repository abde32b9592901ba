import fs from 'node:fs/promises';
import path from 'node:path';

const ANALYSIS_PHRASES = [
  'analyze this project',
  'analyze the project',
  'review this project',
  'review the project',
  'look at this project',
];

const IGNORED_NAMES = new Set(['.git', 'node_modules', 'target', '.idea', '.vscode', 'dist']);

const MANIFESTS = ['package.json', 'Cargo.toml', 'pyproject.toml', 'requirements.txt', 'go.mod', 'pom.xml'];

const MAX_ROOT_ENTRIES = 80;
const MAX_SAMPLE_FILES = 120;
const MAX_MANIFEST_LINES = 80;
const MAX_WALKED_FILES = 5000;

export function isProjectAnalysisRequest(input: string): boolean {
  const t = input.toLowerCase();
  return ANALYSIS_PHRASES.some((k) => t.includes(k));
}

async function rootEntries(root: string): Promise<string[]> {
  const ents = await fs.readdir(root, { withFileTypes: true });
  return ents
    .filter((e) => !IGNORED_NAMES.has(e.name))
    .map((e) => (e.isDirectory() ? `${e.name}/` : e.name))
    .sort();
}

/** Relative file paths under `root`, sorted, skipping ignored directories. */
export async function collectFiles(root: string, limit = MAX_WALKED_FILES): Promise<string[]> {
  const out: string[] = [];
  const stack = [''];
  while (stack.length && out.length < limit) {
    const rel = stack.pop() ?? '';
    const ents = await fs.readdir(path.join(root, rel), { withFileTypes: true }).catch(() => []);
    for (const e of ents) {
      if (IGNORED_NAMES.has(e.name)) continue;
      const child = rel ? `${rel}/${e.name}` : e.name;
      if (e.isDirectory()) stack.push(child);
      else if (e.isFile()) out.push(child);
    }
  }
  return out.sort();
}

function listSection(title: string, items: string[], max: number): string[] {
  const lines = [title];
  if (items.length === 0) lines.push('- (empty)');
  for (const it of items.slice(0, max)) lines.push(`- ${it}`);
  if (items.length > max) lines.push(`- ... (${items.length - max} more)`);
  return lines;
}

export async function buildProjectSnapshot(root: string): Promise<string> {
  const lines: string[] = [];
  lines.push(...listSection('Root entries:', await rootEntries(root), MAX_ROOT_ENTRIES));

  const files = await collectFiles(root);
  lines.push(`Total indexed files: ${files.length}`);
  lines.push(...listSection('Sample files:', files, MAX_SAMPLE_FILES));

  lines.push('Manifest previews:');
  let found = false;
  for (const m of MANIFESTS) {
    let text: string;
    try {
      text = await fs.readFile(path.join(root, m), 'utf8');
    } catch {
      continue;
    }
    found = true;
    lines.push(`--- ${m} ---\n${text.split(/\r?\n/).slice(0, MAX_MANIFEST_LINES).join('\n')}`);
  }
  if (!found) lines.push('- none found in workspace root');

  return lines.join('\n');
}

/** User message content as sent to the model: workspace root, optional snapshot, request. */
export async function augmentUserInput(input: string, cwd: string): Promise<string> {
  if (!isProjectAnalysisRequest(input)) return `Workspace CWD: ${cwd}\nUser request: ${input}`;
  const snapshot = await buildProjectSnapshot(cwd);
  return `Workspace CWD: ${cwd}\nAuto project snapshot:\n${snapshot}\n\nUser request: ${input}`;
}
