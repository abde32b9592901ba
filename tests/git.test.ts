import assert from 'node:assert/strict';
import fs from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { describe, it } from 'node:test';

import { changedFiles, diffChangedFiles, formatChangeDiff, parsePorcelain } from '../src/git.js';

describe('parsePorcelain', () => {
  it('reads modified, renamed and quoted paths', () => {
    const out = [' M src/a.ts', 'R  old.ts -> new.ts', '?? "with space.txt"', 'A  src/a.ts', ''].join('\n');
    assert.deepEqual(parsePorcelain(out), ['new.ts', 'src/a.ts', 'with space.txt']);
  });

  it('ignores short lines', () => {
    assert.deepEqual(parsePorcelain('xx\n\n'), []);
  });
});

describe('diffChangedFiles', () => {
  it('splits files into added, still and removed', () => {
    assert.deepEqual(diffChangedFiles(['a', 'b'], ['b', 'c']), { added: ['c'], still: ['b'], removed: ['a'] });
  });

  it('formats only what moved', () => {
    assert.deepEqual(formatChangeDiff({ added: ['c', 'd'], still: ['b'], removed: ['a'] }), [
      'changed this turn: c, d',
      'reverted this turn: a',
    ]);
    assert.deepEqual(formatChangeDiff({ added: [], still: ['b'], removed: [] }), []);
  });
});

describe('changedFiles', () => {
  it('is empty outside a repository', async () => {
    const dir = await fs.mkdtemp(path.join(os.tmpdir(), 'shellmate-git-'));
    try {
      assert.deepEqual(await changedFiles(dir), []);
    } finally {
      await fs.rm(dir, { recursive: true, force: true });
    }
  });
});
