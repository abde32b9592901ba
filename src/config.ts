import fs from 'node:fs/promises';
import path from 'node:path';

import { ConfigError } from './errors.js';
import type { PolicyPatch, PolicyPersistence } from './policy-store.js';
import { warnTag } from './term.js';
import {
  AUTO_EXEC_MODES,
  type AutoExecMode,
  type AutoExecPolicy,
  type ChatExecutionMode,
  type ShellmateConfig,
} from './types.js';
import { configDir, isRecord, writeJsonAtomic } from './utils.js';

const MIN_HISTORY_MESSAGES = 4;
const MIN_HISTORY_CHARS = 2000;

export const DEFAULTS: ShellmateConfig = {
  endpoint: 'https://api.openai.com/v1',
  model: 'gpt-4o-mini',
  api_key_env: 'OPENAI_API_KEY',
  temperature: 0.2,
  response_timeout: 120,
  exec_timeout_sec: 60,
  max_exec_bytes: 16384,
  max_steps: 3,
  auto_exec_mode: 'safe',
  auto_exec_allow: [],
  auto_exec_deny: [],
  auto_exec_trusted: [],
  auto_confirm_exec: true,
  history_max_messages: 40,
  history_max_chars: 24000,
  execution_mode: 'agent-auto',
  verbose: false,
};

export function defaultConfigPath() {
  return path.join(configDir(), 'config.json');
}

export function parseBool(v: string | undefined): boolean | undefined {
  if (v == null) return undefined;
  if (['1', 'true', 'yes', 'on'].includes(v.toLowerCase())) return true;
  if (['0', 'false', 'no', 'off'].includes(v.toLowerCase())) return false;
  return undefined;
}

function parseBoolLike(v: unknown): boolean | undefined {
  if (typeof v === 'boolean') return v;
  if (typeof v === 'string') return parseBool(v);
  return undefined;
}

export function parseNum(v: string | undefined): number | undefined {
  if (v == null || v.trim() === '') return undefined;
  const n = Number(v);
  return Number.isFinite(n) ? n : undefined;
}

function parseNumLike(v: unknown): number | undefined {
  if (typeof v === 'number') return Number.isFinite(v) ? v : undefined;
  if (typeof v === 'string') return parseNum(v);
  return undefined;
}

export function parseCsv(v: string | undefined): string[] | undefined {
  if (v == null) return undefined;
  return v
    .split(',')
    .map((x) => x.trim())
    .filter(Boolean);
}

function parseListLike(v: unknown): string[] | undefined {
  if (typeof v === 'string') return parseCsv(v);
  if (!Array.isArray(v)) return undefined;
  const out: string[] = [];
  for (const item of v) {
    if (typeof item !== 'string') continue;
    const t = item.trim();
    if (t && !out.includes(t)) out.push(t);
  }
  return out;
}

function parseStr(v: unknown): string | undefined {
  return typeof v === 'string' ? v : undefined;
}

export function parseAutoExecMode(v: unknown): AutoExecMode | undefined {
  if (typeof v !== 'string') return undefined;
  const m = v.trim().toLowerCase();
  return AUTO_EXEC_MODES.find((x) => x === m);
}

export function parseExecutionMode(v: unknown): ChatExecutionMode | undefined {
  if (typeof v !== 'string') return undefined;
  switch (v.trim().toLowerCase()) {
    case 'chat':
    case 'chat-only':
      return 'chat';
    case 'auto':
    case 'agent-auto':
      return 'agent-auto';
    case 'agent':
    case 'agent-force':
      return 'agent-force';
    default:
      return undefined;
  }
}

/**
 * Pull recognized keys out of an untrusted object. Unknown keys are ignored;
 * a recognized key with an unusable value is reported and left unset.
 */
export function coerceConfig(
  raw: Record<string, unknown>,
  source: string,
  opts: { quiet?: boolean } = {}
): Partial<ShellmateConfig> {
  const out: Partial<ShellmateConfig> = {};
  const bad = (key: string) => {
    if (!opts.quiet && !process.env.SHELLMATE_QUIET_WARNINGS) {
      warnTag('config', `ignoring invalid ${key} in ${source}: ${JSON.stringify(raw[key])}`);
    }
  };
  const take = <K extends keyof ShellmateConfig>(
    key: K,
    parse: (v: unknown) => ShellmateConfig[K] | undefined
  ) => {
    if (raw[key] === undefined || raw[key] === null) return;
    const v = parse(raw[key]);
    if (v === undefined) bad(key);
    else out[key] = v;
  };

  take('endpoint', parseStr);
  take('model', parseStr);
  take('api_key_env', parseStr);
  take('api_key', parseStr);
  take('system_prompt', parseStr);
  take('temperature', parseNumLike);
  take('response_timeout', parseNumLike);
  take('exec_timeout_sec', parseNumLike);
  take('max_exec_bytes', parseNumLike);
  take('max_steps', parseNumLike);
  take('verify_command', parseStr);
  take('auto_exec_mode', parseAutoExecMode);
  take('auto_exec_allow', parseListLike);
  take('auto_exec_deny', parseListLike);
  take('auto_exec_trusted', parseListLike);
  take('auto_confirm_exec', parseBoolLike);
  take('history_max_messages', parseNumLike);
  take('history_max_chars', parseNumLike);
  take('execution_mode', parseExecutionMode);
  take('verbose', parseBoolLike);
  return out;
}

function envConfig(): Partial<ShellmateConfig> {
  const env = process.env;
  const raw: Record<string, unknown> = {
    endpoint: env.SHELLMATE_ENDPOINT,
    model: env.SHELLMATE_MODEL,
    auto_exec_mode: env.SHELLMATE_AUTO_EXEC_MODE,
    max_steps: env.SHELLMATE_MAX_STEPS,
    execution_mode: env.SHELLMATE_EXECUTION_MODE,
    verbose: env.SHELLMATE_VERBOSE,
  };
  return coerceConfig(raw, 'environment');
}

/** Clamp numeric settings into workable ranges. */
function normalize(c: ShellmateConfig): ShellmateConfig {
  const int = (n: number, min: number, fallback: number) =>
    Number.isFinite(n) ? Math.max(min, Math.floor(n)) : fallback;
  return {
    ...c,
    endpoint: c.endpoint.trim().replace(/\/+$/, ''),
    model: c.model.trim(),
    response_timeout: int(c.response_timeout, 1, DEFAULTS.response_timeout),
    exec_timeout_sec: int(c.exec_timeout_sec, 1, DEFAULTS.exec_timeout_sec),
    max_exec_bytes: int(c.max_exec_bytes, 256, DEFAULTS.max_exec_bytes),
    max_steps: int(c.max_steps, 1, DEFAULTS.max_steps),
    history_max_messages: int(c.history_max_messages, MIN_HISTORY_MESSAGES, DEFAULTS.history_max_messages),
    history_max_chars: int(c.history_max_chars, MIN_HISTORY_CHARS, DEFAULTS.history_max_chars),
  };
}

/** Read the config file as a plain object. Missing or empty file → `{}`. */
export async function readConfigFile(configPath: string): Promise<Record<string, unknown>> {
  let raw: string;
  try {
    raw = await fs.readFile(configPath, 'utf8');
  } catch (e: unknown) {
    if (isRecord(e) && e.code === 'ENOENT') return {};
    throw new ConfigError(`cannot read config ${configPath}: ${String(e)}`);
  }
  if (!raw.trim().length) return {};
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (e: unknown) {
    throw new ConfigError(
      `config ${configPath} is not valid JSON: ${e instanceof Error ? e.message : String(e)}`,
      'fix the file or run `shellmate config init --force`'
    );
  }
  if (!isRecord(parsed)) {
    throw new ConfigError(`config ${configPath} must contain a JSON object`);
  }
  return parsed;
}

export async function loadConfig(opts: {
  configPath?: string;
  cli?: Partial<ShellmateConfig>;
}): Promise<{ config: ShellmateConfig; configPath: string }> {
  const configPath = opts.configPath ?? defaultConfigPath();
  const fileCfg = coerceConfig(await readConfigFile(configPath), configPath);
  const envCfg = envConfig();
  const cliCfg = opts.cli ?? {};

  const merged: ShellmateConfig = normalize({
    ...DEFAULTS,
    ...fileCfg,
    ...envCfg,
    ...definedOnly(cliCfg),
  });
  return { config: merged, configPath };
}

function definedOnly(c: Partial<ShellmateConfig>): Partial<ShellmateConfig> {
  const out: Record<string, unknown> = {};
  for (const [k, v] of Object.entries(c)) {
    if (v !== undefined) out[k] = v;
  }
  return coerceConfig(out, 'command line');
}

/** Persist a full config, keeping keys this version does not know about. */
export async function saveConfig(config: ShellmateConfig, configPath: string): Promise<void> {
  const existing = await readConfigFile(configPath);
  await writeJsonAtomic(configPath, { ...existing, ...config });
}

export function policyFromConfig(c: ShellmateConfig): AutoExecPolicy {
  return {
    mode: c.auto_exec_mode,
    allow: [...c.auto_exec_allow],
    deny: [...c.auto_exec_deny],
    trusted: [...c.auto_exec_trusted],
    confirm: c.auto_confirm_exec,
  };
}

/**
 * The Policy Store's view of the config file. `save` rewrites only the policy
 * keys in the patch, re-reading the file first so every other key stays.
 */
export function policyPersistence(configPath: string): PolicyPersistence {
  return {
    async load(): Promise<PolicyPatch> {
      const c = coerceConfig(await readConfigFile(configPath), configPath, { quiet: true });
      const stored: PolicyPatch = {};
      if (c.auto_exec_mode !== undefined) stored.mode = c.auto_exec_mode;
      if (c.auto_exec_allow !== undefined) stored.allow = c.auto_exec_allow;
      if (c.auto_exec_deny !== undefined) stored.deny = c.auto_exec_deny;
      if (c.auto_exec_trusted !== undefined) stored.trusted = c.auto_exec_trusted;
      if (c.auto_confirm_exec !== undefined) stored.confirm = c.auto_confirm_exec;
      return stored;
    },

    async save(patch: PolicyPatch): Promise<void> {
      const next = await readConfigFile(configPath);
      if (patch.mode !== undefined) next.auto_exec_mode = patch.mode;
      if (patch.allow !== undefined) next.auto_exec_allow = patch.allow;
      if (patch.deny !== undefined) next.auto_exec_deny = patch.deny;
      if (patch.trusted !== undefined) next.auto_exec_trusted = patch.trusted;
      if (patch.confirm !== undefined) next.auto_confirm_exec = patch.confirm;
      await writeJsonAtomic(configPath, next);
    },
  };
}

/** Keys accepted by `config set`. */
export const SETTABLE_KEYS = [
  'endpoint',
  'model',
  'api_key_env',
  'api_key',
  'system_prompt',
  'temperature',
  'response_timeout',
  'exec_timeout_sec',
  'max_exec_bytes',
  'max_steps',
  'verify_command',
  'auto_exec_mode',
  'auto_exec_allow',
  'auto_exec_deny',
  'auto_exec_trusted',
  'auto_confirm_exec',
  'history_max_messages',
  'history_max_chars',
  'execution_mode',
  'verbose',
] as const satisfies ReadonlyArray<keyof ShellmateConfig>;

export type SettableKey = (typeof SETTABLE_KEYS)[number];

export function isSettableKey(k: string): k is SettableKey {
  return SETTABLE_KEYS.some((x) => x === k);
}

/**
 * Apply `config set <key> <value>`. List keys take comma-separated values.
 * Throws ConfigError for unknown keys or values that do not parse.
 */
export function applyConfigSet(config: ShellmateConfig, key: string, value: string): ShellmateConfig {
  if (!isSettableKey(key)) {
    throw new ConfigError(`unknown config key: ${key}`, `known keys: ${SETTABLE_KEYS.join(', ')}`);
  }
  const patch = coerceConfig({ [key]: value }, 'command line', { quiet: true });
  if (patch[key] === undefined) {
    throw new ConfigError(`invalid value for ${key}: ${JSON.stringify(value)}`);
  }
  return normalize({ ...config, ...patch });
}

/** Env var first, then the stored key. */
export function resolveApiKey(config: ShellmateConfig, env: NodeJS.ProcessEnv = process.env): string {
  const fromEnv = config.api_key_env ? env[config.api_key_env]?.trim() : undefined;
  if (fromEnv) return fromEnv;
  const stored = config.api_key?.trim();
  if (stored) return stored;
  throw new ConfigError(
    `no API key found (checked $${config.api_key_env || '<unset>'} and api_key)`,
    `export ${config.api_key_env || 'OPENAI_API_KEY'}=... or run \`shellmate config set api_key <key>\``
  );
}
