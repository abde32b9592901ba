import assert from 'node:assert/strict';
import fs from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { describe, it, beforeEach, afterEach } from 'node:test';

import { configInit, configSet, configShow, maskSecret } from '../src/cli/config-cmd.js';
import {
  DEFAULTS,
  applyConfigSet,
  coerceConfig,
  loadConfig,
  parseBool,
  parseCsv,
  parseExecutionMode,
  policyFromConfig,
  policyPersistence,
  readConfigFile,
  resolveApiKey,
} from '../src/config.js';
import { ConfigError } from '../src/errors.js';
import { PolicyStore } from '../src/policy-store.js';

process.env.SHELLMATE_QUIET_WARNINGS = '1';

const ENV_KEYS = [
  'SHELLMATE_ENDPOINT',
  'SHELLMATE_MODEL',
  'SHELLMATE_AUTO_EXEC_MODE',
  'SHELLMATE_MAX_STEPS',
  'SHELLMATE_EXECUTION_MODE',
  'SHELLMATE_VERBOSE',
];

describe('parsers', () => {
  it('parseBool', () => {
    assert.equal(parseBool('on'), true);
    assert.equal(parseBool('YES'), true);
    assert.equal(parseBool('0'), false);
    assert.equal(parseBool('off'), false);
    assert.equal(parseBool('maybe'), undefined);
    assert.equal(parseBool(undefined), undefined);
  });

  it('parseCsv trims and drops blanks', () => {
    assert.deepEqual(parseCsv(' npm , git status,, '), ['npm', 'git status']);
  });

  it('parseExecutionMode accepts aliases', () => {
    assert.equal(parseExecutionMode('chat-only'), 'chat');
    assert.equal(parseExecutionMode('auto'), 'agent-auto');
    assert.equal(parseExecutionMode(' Agent '), 'agent-force');
    assert.equal(parseExecutionMode('turbo'), undefined);
  });

  it('coerceConfig keeps valid keys and drops bad values', () => {
    const out = coerceConfig(
      {
        model: 'm',
        max_steps: '4',
        auto_exec_mode: 'yolo',
        auto_exec_trusted: ['ls', 'ls', 3, ' cat '],
        auto_confirm_exec: 'off',
        unknown_key: true,
      },
      'test'
    );
    assert.deepEqual(out, { model: 'm', max_steps: 4, auto_exec_trusted: ['ls', 'cat'], auto_confirm_exec: false });
  });
});

describe('loadConfig', () => {
  let dir: string;
  let file: string;
  const saved: Record<string, string | undefined> = {};

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'shellmate-config-'));
    file = path.join(dir, 'config.json');
    for (const k of ENV_KEYS) {
      saved[k] = process.env[k];
      delete process.env[k];
    }
  });

  afterEach(async () => {
    for (const k of ENV_KEYS) {
      if (saved[k] === undefined) delete process.env[k];
      else process.env[k] = saved[k];
    }
    await fs.rm(dir, { recursive: true, force: true });
  });

  it('uses defaults when the file is missing', async () => {
    const { config, configPath } = await loadConfig({ configPath: file });
    assert.equal(configPath, file);
    assert.deepEqual(config, DEFAULTS);
  });

  it('layers file, env and flags, then clamps', async () => {
    await fs.writeFile(
      file,
      JSON.stringify({ model: 'file-model', endpoint: 'http://localhost:8080/v1/', max_steps: 0, history_max_chars: 10 })
    );
    process.env.SHELLMATE_MODEL = 'env-model';
    process.env.SHELLMATE_AUTO_EXEC_MODE = 'custom';

    const fromEnv = (await loadConfig({ configPath: file })).config;
    assert.equal(fromEnv.model, 'env-model');
    assert.equal(fromEnv.auto_exec_mode, 'custom');
    assert.equal(fromEnv.endpoint, 'http://localhost:8080/v1');
    assert.equal(fromEnv.max_steps, 1);
    assert.equal(fromEnv.history_max_chars, 2000);

    const fromCli = (await loadConfig({ configPath: file, cli: { model: 'cli-model', endpoint: undefined } })).config;
    assert.equal(fromCli.model, 'cli-model');
    assert.equal(fromCli.endpoint, 'http://localhost:8080/v1');
  });

  it('raises ConfigError for invalid JSON', async () => {
    await fs.writeFile(file, '{ "model": ');
    await assert.rejects(loadConfig({ configPath: file }), (e: unknown) => {
      assert.ok(e instanceof ConfigError);
      assert.match(e.message, /is not valid JSON/);
      return true;
    });
  });

  it('raises ConfigError when the file is not an object', async () => {
    await fs.writeFile(file, '[1,2]');
    await assert.rejects(readConfigFile(file), /must contain a JSON object/);
  });

  it('does not write an env override back when a prefix is trusted', async () => {
    await fs.writeFile(file, JSON.stringify({ auto_exec_mode: 'safe' }));
    process.env.SHELLMATE_AUTO_EXEC_MODE = 'all';
    const { config } = await loadConfig({ configPath: file });
    assert.equal(config.auto_exec_mode, 'all');

    const store = new PolicyStore(policyFromConfig(config), policyPersistence(file));
    assert.equal(await store.trustPrefix('ls'), true);
    assert.equal(store.snapshot().mode, 'all');
    assert.deepEqual(JSON.parse(await fs.readFile(file, 'utf8')), { auto_exec_mode: 'safe', auto_exec_trusted: ['ls'] });
  });

  it('treats an empty file as no settings', async () => {
    await fs.writeFile(file, '  \n');
    assert.deepEqual(await readConfigFile(file), {});
  });
});

describe('applyConfigSet', () => {
  it('parses list values', () => {
    const next = applyConfigSet(DEFAULTS, 'auto_exec_allow', 'npm, git status');
    assert.deepEqual(next.auto_exec_allow, ['npm', 'git status']);
  });

  it('accepts an empty verify_command', () => {
    assert.equal(applyConfigSet(DEFAULTS, 'verify_command', '').verify_command, '');
  });

  it('rejects unknown keys and bad values', () => {
    assert.throws(() => applyConfigSet(DEFAULTS, 'nope', '1'), /unknown config key: nope/);
    assert.throws(() => applyConfigSet(DEFAULTS, 'max_steps', 'abc'), /invalid value for max_steps: "abc"/);
  });
});

describe('resolveApiKey', () => {
  const cfg = { ...DEFAULTS, api_key_env: 'SHELLMATE_TEST_KEY' };

  it('prefers the environment', () => {
    assert.equal(resolveApiKey({ ...cfg, api_key: 'stored' }, { SHELLMATE_TEST_KEY: ' test-secret ' }), 'test-secret');
  });

  it('falls back to the stored key', () => {
    assert.equal(resolveApiKey({ ...cfg, api_key: 'stored-secret' }, {}), 'stored-secret');
  });

  it('throws ConfigError with a hint when there is none', () => {
    assert.throws(
      () => resolveApiKey(cfg, {}),
      (e: unknown) => e instanceof ConfigError && e.hint?.startsWith('export SHELLMATE_TEST_KEY=') === true
    );
  });
});

describe('config files', () => {
  let dir: string;
  let file: string;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'shellmate-config-'));
    file = path.join(dir, 'nested', 'config.json');
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  const readJson = async (): Promise<unknown> => JSON.parse(await fs.readFile(file, 'utf8'));

  it('policyPersistence rewrites only the keys in the patch', async () => {
    await fs.mkdir(path.dirname(file), { recursive: true });
    await fs.writeFile(file, JSON.stringify({ model: 'keep-me', extra: 1, auto_exec_mode: 'custom' }));
    const persistence = policyPersistence(file);
    await persistence.save({ trusted: ['npm test'] });
    assert.deepEqual(await readJson(), {
      model: 'keep-me',
      extra: 1,
      auto_exec_mode: 'custom',
      auto_exec_trusted: ['npm test'],
    });
    assert.deepEqual(await persistence.load(), { mode: 'custom', trusted: ['npm test'] });
  });

  it('two stores on one file keep each other\'s trusted prefixes', async () => {
    const a = new PolicyStore(policyFromConfig(DEFAULTS), policyPersistence(file));
    const b = new PolicyStore(policyFromConfig(DEFAULTS), policyPersistence(file));

    await a.trustPrefix('ls');
    await b.trustPrefix('cat');
    assert.deepEqual(await readJson(), { auto_exec_trusted: ['ls', 'cat'] });
    assert.deepEqual([...b.snapshot().trusted], ['ls', 'cat']);

    await a.refresh();
    assert.deepEqual([...a.snapshot().trusted], ['ls', 'cat']);
  });

  it('configInit writes defaults once unless forced', async () => {
    assert.equal(await configInit(file), 'created');
    assert.deepEqual(await readJson(), DEFAULTS);
    assert.equal(await configInit(file), 'exists');
    assert.equal(await configInit(file, true), 'created');
  });

  it('configSet updates one key and keeps the rest of the file', async () => {
    await fs.mkdir(path.dirname(file), { recursive: true });
    await fs.writeFile(file, JSON.stringify({ model: 'm1', custom_note: 'hi' }));
    const next = await configSet(file, 'model', 'm2');
    assert.equal(next.model, 'm2');
    const onDisk = await readJson();
    assert.ok(onDisk !== null && typeof onDisk === 'object');
    assert.equal(Reflect.get(onDisk, 'model'), 'm2');
    assert.equal(Reflect.get(onDisk, 'custom_note'), 'hi');
  });

  it('configShow masks the API key', () => {
    const shown: unknown = JSON.parse(configShow({ ...DEFAULTS, api_key: 'test-secret' }));
    assert.ok(shown !== null && typeof shown === 'object');
    assert.equal(Reflect.get(shown, 'api_key'), '****cret');
    assert.equal(maskSecret('abc'), '****');
  });
});
