import type { Command } from 'commander';

import type { ShellmateConfig } from '../../types.js';
import { createRuntime, type AppRuntime } from '../runtime.js';

/** Options accepted before any subcommand. */
export type GlobalFlags = {
  config?: string;
  endpoint?: string;
  model?: string;
  verbose?: boolean;
  color: boolean;
};

const optStr = (v: unknown) => (typeof v === 'string' && v.trim() ? v : undefined);
const optBool = (v: unknown) => (typeof v === 'boolean' ? v : undefined);

export function readGlobalFlags(cmd: Command): GlobalFlags {
  const o = cmd.optsWithGlobals();
  return {
    config: optStr(o.config),
    endpoint: optStr(o.endpoint),
    model: optStr(o.model),
    verbose: optBool(o.verbose),
    color: o.color !== false,
  };
}

export function cliOverrides(flags: GlobalFlags): Partial<ShellmateConfig> {
  return { endpoint: flags.endpoint, model: flags.model, verbose: flags.verbose };
}

export function runtimeFor(cmd: Command): Promise<AppRuntime> {
  const flags = readGlobalFlags(cmd);
  return createRuntime({
    configPath: flags.config,
    cli: cliOverrides(flags),
    color: flags.color ? 'auto' : 'never',
  });
}
