import assert from 'node:assert/strict';
import fs from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { afterEach, beforeEach, describe, it } from 'node:test';

import { DEFAULT_PERSONA } from '../src/agent/prompt.js';
import { backupPath, reviewPrompt, runEdit, runReview, stripCodeFence } from '../src/cli/file-tasks.js';
import type { ChatClient, ChatRequest } from '../src/types.js';

class ScriptedClient implements ChatClient {
  readonly seen: ChatRequest[] = [];

  constructor(private readonly script: string[]) {}

  async chat(req: ChatRequest): Promise<string> {
    this.seen.push(req);
    const next = this.script.shift();
    if (next === undefined) throw new Error('script exhausted');
    return next;
  }
}

describe('file tasks', () => {
  let dir: string;
  let file: string;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'shellmate-task-'));
    file = path.join(dir, 'calc.ts');
    await fs.writeFile(file, 'export const add = (a, b) => a - b;\n');
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it('builds the review prompt with an optional extra requirement', () => {
    assert.equal(
      reviewPrompt('x.py', 'print(1)'),
      'Please review this code. Focus on correctness, bugs, risks, and missing tests.\n' +
        'Provide concise findings with severity and actionable suggestions.\n\n' +
        'File: x.py\n```py\nprint(1)\n```',
    );
    assert.ok(reviewPrompt('x.py', 'print(1)', ' be brief ').endsWith('```\n\nExtra requirement:\nbe brief'));
  });

  it('reviews a file with one model call', async () => {
    const client = new ScriptedClient(['high: add subtracts']);
    const answer = await runReview({ client, model: 'test-model' }, file, 'check math');

    assert.equal(answer, 'high: add subtracts');
    assert.equal(client.seen.length, 1);
    const [req] = client.seen;
    assert.equal(req?.model, 'test-model');
    assert.deepEqual(
      req?.messages.map((m) => [m.role, m.content]),
      [
        ['system', `${DEFAULT_PERSONA}\nYou are a senior code reviewer.`],
        ['user', reviewPrompt(file, 'export const add = (a, b) => a - b;\n', 'check math')],
      ],
    );
  });

  it('fails before calling the model when the file is missing', async () => {
    const client = new ScriptedClient([]);
    await assert.rejects(runReview({ client, model: 'm' }, path.join(dir, 'gone.ts')), /file does not exist/);
    assert.equal(client.seen.length, 0);
  });

  it('dry-run edit leaves the file alone', async () => {
    const client = new ScriptedClient(['```ts\nexport const add = (a, b) => a + b;\n```']);
    const result = await runEdit({ client, model: 'm', persona: 'Be terse.' }, file, 'fix add', false);

    assert.deepEqual(result, { edited: 'export const add = (a, b) => a + b;' });
    assert.equal(await fs.readFile(file, 'utf8'), 'export const add = (a, b) => a - b;\n');
    assert.equal(client.seen[0]?.messages[0]?.content, 'Be terse.\nYou are a careful code editor.');
    assert.ok(client.seen[0]?.messages[1]?.content.includes('Instruction:\nfix add\n\nFile: '));
  });

  it('applied edit writes the result and a backup', async () => {
    const client = new ScriptedClient(['export const add = (a, b) => a + b;\n']);
    const result = await runEdit({ client, model: 'm' }, file, 'fix add', true);

    const backup = path.join(dir, 'calc.bak.ts');
    assert.equal(result.backup, backup);
    assert.equal(await fs.readFile(file, 'utf8'), 'export const add = (a, b) => a + b;\n');
    assert.equal(await fs.readFile(backup, 'utf8'), 'export const add = (a, b) => a - b;\n');
  });

  it('unwraps a single fenced reply only', () => {
    assert.equal(stripCodeFence('```\nline1\nline2\n```\n'), 'line1\nline2');
    assert.equal(stripCodeFence('plain text'), 'plain text');
    assert.equal(stripCodeFence('intro\n```\ncode\n```'), 'intro\n```\ncode\n```');
  });

  it('names backups beside the file', () => {
    assert.equal(backupPath('src/app.ts'), path.join('src', 'app.bak.ts'));
    assert.equal(backupPath('Makefile'), 'Makefile.bak');
    assert.equal(backupPath('.env'), '.env.bak');
  });
});
