import type { Command } from 'commander';

import { parseExecutionMode } from '../../config.js';
import { ConfigError } from '../../errors.js';
import { runRepl } from '../repl.js';
import { createClient } from '../runtime.js';

import { runtimeFor } from './shared.js';

type ChatOpts = { session?: string; mode?: string; yes?: boolean };

export function registerChatCommand(program: Command) {
  program
    .command('chat', { isDefault: true })
    .description('Interactive session (default)')
    .option('-s, --session <name>', 'Session name (default: one per workspace)')
    .option('--mode <mode>', 'Execution mode: chat | agent-auto | agent-force')
    .option('-y, --yes', 'Approve every command the policy asks about', false)
    .action(async (opts: ChatOpts, cmd: Command) => {
      const mode = opts.mode === undefined ? undefined : parseExecutionMode(opts.mode);
      if (opts.mode !== undefined && !mode) {
        throw new ConfigError(`unknown mode: ${opts.mode}`, 'use chat, agent-auto or agent-force');
      }
      const rt = await runtimeFor(cmd);
      const client = createClient(rt.config);
      process.exitCode = await runRepl(rt, client, {
        sessionName: opts.session,
        mode,
        autoApprove: Boolean(opts.yes),
      });
    });
}
