import assert from 'node:assert/strict';
import fs from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { after, before, describe, it } from 'node:test';

import { clipOutput, grepFiles, listFiles, readTextFile } from '../src/tools/fs-tools.js';

describe('fs tools', () => {
  let dir: string;

  before(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'shellmate-fs-'));
    await fs.mkdir(path.join(dir, 'src'), { recursive: true });
    await fs.mkdir(path.join(dir, 'node_modules', 'dep'), { recursive: true });
    await fs.writeFile(path.join(dir, 'src', 'main.ts'), 'const Token = 1;\nexport { Token };\n');
    await fs.writeFile(path.join(dir, 'README.md'), 'token docs\n');
    await fs.writeFile(path.join(dir, 'node_modules', 'dep', 'index.js'), 'token');
    await fs.writeFile(path.join(dir, 'blob.bin'), 'token\u0000\u0001');
  });

  after(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it('reads text files and names missing ones', async () => {
    assert.equal(await readTextFile(path.join(dir, 'README.md')), 'token docs\n');
    await assert.rejects(readTextFile(path.join(dir, 'nope.txt')), {
      message: `file does not exist: ${path.join(dir, 'nope.txt')}`,
    });
    await assert.rejects(readTextFile(path.join(dir, 'src')), /is a directory/);
  });

  it('lists files relative to the given root, skipping dependency folders', async () => {
    assert.deepEqual(await listFiles('.', dir), ['README.md', 'blob.bin', 'src/main.ts']);
    assert.deepEqual(await listFiles('src', dir), ['src/main.ts']);
    assert.deepEqual(await listFiles('README.md', dir), ['README.md']);
    await assert.rejects(listFiles('missing', dir), { message: 'path does not exist: missing' });
  });

  it('greps text files case-insensitively', async () => {
    assert.deepEqual(await grepFiles('.', 'TOKEN', { cwd: dir }), [
      'README.md:1:token docs',
      'src/main.ts:1:const Token = 1;',
      'src/main.ts:2:export { Token };',
    ]);
    assert.deepEqual(await grepFiles('.', 'token', { cwd: dir, maxHits: 2 }), [
      'README.md:1:token docs',
      'src/main.ts:1:const Token = 1;',
    ]);
    assert.deepEqual(await grepFiles('src', 'absent', { cwd: dir }), []);
  });

  it('clips long output', () => {
    assert.equal(clipOutput('short', 10), 'short');
    assert.equal(clipOutput('abcdef', 3), 'abc...\n[truncated]');
  });
});
