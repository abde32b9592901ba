/**
 * `shellmate config` actions. They work on the file's own values so that env
 * and flag overrides never get written back.
 */

import fs from 'node:fs/promises';

import { DEFAULTS, applyConfigSet, coerceConfig, readConfigFile, saveConfig } from '../config.js';
import type { ShellmateConfig } from '../types.js';
import { writeJsonAtomic } from '../utils.js';

export function maskSecret(s: string): string {
  return s.length <= 4 ? '****' : `****${s.slice(-4)}`;
}

/** Pretty JSON with `api_key` masked. */
export function configShow(config: ShellmateConfig): string {
  const shown: Record<string, unknown> = { ...config };
  if (config.api_key) shown.api_key = maskSecret(config.api_key);
  return JSON.stringify(shown, null, 2);
}

export async function configSet(configPath: string, key: string, value: string): Promise<ShellmateConfig> {
  const fromFile = coerceConfig(await readConfigFile(configPath), configPath);
  const next = applyConfigSet({ ...DEFAULTS, ...fromFile }, key, value);
  await saveConfig(next, configPath);
  return next;
}

/** Write the defaults. Leaves an existing file alone unless `force`. */
export async function configInit(configPath: string, force = false): Promise<'created' | 'exists'> {
  if (!force) {
    try {
      await fs.access(configPath);
      return 'exists';
    } catch {
      // missing: fall through and create it
    }
  }
  await writeJsonAtomic(configPath, DEFAULTS);
  return 'created';
}
