/**
 * Wiring shared by every subcommand: config, stores, styler, client.
 */

import type { Interface as ReadlineInterface } from 'node:readline/promises';

import { OpenAIClient } from '../client.js';
import { AutoApproveProvider } from '../confirm/auto.js';
import { HeadlessConfirmProvider } from '../confirm/headless.js';
import { TerminalConfirmProvider } from '../confirm/terminal.js';
import { loadConfig, policyFromConfig, policyPersistence, resolveApiKey } from '../config.js';
import { PolicyStore } from '../policy-store.js';
import { SessionStore } from '../session-store.js';
import { makeStyler, resolveColorMode, type Styler } from '../term.js';
import type { ConfirmationProvider, ShellmateConfig } from '../types.js';

export type AppRuntime = {
  config: ShellmateConfig;
  configPath: string;
  cwd: string;
  sessions: SessionStore;
  policy: PolicyStore;
  S: Styler;
};

export type RuntimeOptions = {
  configPath?: string;
  cli?: Partial<ShellmateConfig>;
  cwd?: string;
  sessionsDir?: string;
  color?: 'auto' | 'always' | 'never';
};

export async function createRuntime(opts: RuntimeOptions = {}): Promise<AppRuntime> {
  const { config, configPath } = await loadConfig({ configPath: opts.configPath, cli: opts.cli });
  const S = makeStyler(resolveColorMode(opts.color ?? 'auto').enabled);
  return {
    config,
    configPath,
    cwd: opts.cwd ?? process.cwd(),
    sessions: new SessionStore({
      dir: opts.sessionsDir,
      budget: { maxMessages: config.history_max_messages, maxChars: config.history_max_chars },
      summarize: true,
      verbose: config.verbose,
    }),
    policy: new PolicyStore(policyFromConfig(config), policyPersistence(configPath), config.verbose),
    S,
  };
}

/** Throws ConfigError when no API key is available. */
export function createClient(config: ShellmateConfig): OpenAIClient {
  return new OpenAIClient(config.endpoint, resolveApiKey(config), {
    temperature: config.temperature,
    responseTimeout: config.response_timeout,
    verbose: config.verbose,
  });
}

/**
 * `--yes` approves everything the policy asks about; otherwise a TTY gets
 * prompts and anything else declines.
 */
export function pickConfirmProvider(opts: {
  rl?: ReadlineInterface;
  S: Styler;
  autoApprove?: boolean;
}): ConfirmationProvider {
  if (opts.autoApprove) return new AutoApproveProvider();
  if (opts.rl && process.stdin.isTTY) return new TerminalConfirmProvider(opts.rl, opts.S);
  return new HeadlessConfirmProvider();
}
