import assert from 'node:assert/strict';
import fs from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { describe, it, before, after } from 'node:test';

import {
  augmentUserInput,
  buildProjectSnapshot,
  collectFiles,
  isProjectAnalysisRequest,
} from '../src/agent/workspace-context.js';

describe('isProjectAnalysisRequest', () => {
  it('matches the analysis phrases in any case', () => {
    assert.equal(isProjectAnalysisRequest('Please Analyze this project for me'), true);
    assert.equal(isProjectAnalysisRequest('could you review the project layout'), true);
    assert.equal(isProjectAnalysisRequest('analyze this function'), false);
  });
});

describe('workspace snapshot', () => {
  let root: string;
  let empty: string;

  before(async () => {
    root = await fs.mkdtemp(path.join(os.tmpdir(), 'shellmate-ws-'));
    empty = await fs.mkdtemp(path.join(os.tmpdir(), 'shellmate-ws-empty-'));
    await fs.writeFile(path.join(root, 'package.json'), '{"name":"demo"}');
    await fs.mkdir(path.join(root, 'src', 'lib'), { recursive: true });
    await fs.writeFile(path.join(root, 'src', 'main.ts'), '');
    await fs.writeFile(path.join(root, 'src', 'lib', 'util.ts'), '');
    await fs.mkdir(path.join(root, 'node_modules', 'dep'), { recursive: true });
    await fs.writeFile(path.join(root, 'node_modules', 'dep', 'index.js'), '');
    await fs.mkdir(path.join(root, '.git'));
    await fs.writeFile(path.join(root, '.git', 'HEAD'), 'ref: refs/heads/main');
  });

  after(async () => {
    await fs.rm(root, { recursive: true, force: true });
    await fs.rm(empty, { recursive: true, force: true });
  });

  it('collectFiles walks sorted relative paths and skips ignored dirs', async () => {
    assert.deepEqual(await collectFiles(root), ['package.json', 'src/lib/util.ts', 'src/main.ts']);
  });

  it('collectFiles stops at the limit', async () => {
    assert.equal((await collectFiles(root, 1)).length, 1);
  });

  it('buildProjectSnapshot lists entries, files and manifests', async () => {
    assert.equal(
      await buildProjectSnapshot(root),
      [
        'Root entries:',
        '- package.json',
        '- src/',
        'Total indexed files: 3',
        'Sample files:',
        '- package.json',
        '- src/lib/util.ts',
        '- src/main.ts',
        'Manifest previews:',
        '--- package.json ---\n{"name":"demo"}',
      ].join('\n')
    );
  });

  it('buildProjectSnapshot handles an empty workspace', async () => {
    assert.equal(
      await buildProjectSnapshot(empty),
      [
        'Root entries:',
        '- (empty)',
        'Total indexed files: 0',
        'Sample files:',
        '- (empty)',
        'Manifest previews:',
        '- none found in workspace root',
      ].join('\n')
    );
  });

  it('augmentUserInput adds the workspace root', async () => {
    assert.equal(await augmentUserInput('list files', empty), `Workspace CWD: ${empty}\nUser request: list files`);
  });

  it('augmentUserInput attaches a snapshot for analysis requests', async () => {
    const out = await augmentUserInput('analyze this project', empty);
    assert.equal(
      out,
      `Workspace CWD: ${empty}\nAuto project snapshot:\n${await buildProjectSnapshot(empty)}\n\nUser request: analyze this project`
    );
  });
});
