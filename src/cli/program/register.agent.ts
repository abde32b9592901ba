import { stdin as input, stdout as output } from 'node:process';
import readline from 'node:readline/promises';

import type { Command } from 'commander';

import { resolveSessionName } from '../../session-store.js';
import type { TurnStatus } from '../../types.js';
import { runUserTurn } from '../agent-turn.js';
import { createClient, pickConfirmProvider } from '../runtime.js';

import { runtimeFor } from './shared.js';

type AgentOpts = { session?: string; yes?: boolean };

const EXIT_CODES: Record<TurnStatus, number> = {
  final: 0,
  step_limit: 2,
  error: 1,
  aborted: 130,
};

export function registerAgentCommand(program: Command) {
  program
    .command('agent')
    .description('Run one agent task in the current directory and exit')
    .argument('<task...>', 'What to do')
    .option('-s, --session <name>', 'Session name (default: one per workspace)')
    .option('-y, --yes', 'Approve every command the policy asks about', false)
    .action(async (task: string[], opts: AgentOpts, cmd: Command) => {
      const rt = await runtimeFor(cmd);
      const client = createClient(rt.config);
      const session = await rt.sessions.load(resolveSessionName(opts.session, rt.cwd));

      const rl = !opts.yes && input.isTTY ? readline.createInterface({ input, output }) : undefined;
      const confirm = pickConfirmProvider({ rl, S: rt.S, autoApprove: Boolean(opts.yes) });
      const ac = new AbortController();
      const onSigint = () => ac.abort();
      process.on('SIGINT', onSigint);
      rl?.on('SIGINT', onSigint);

      try {
        const result = await runUserTurn(rt, session, task.join(' '), {
          client,
          confirm,
          mode: 'agent-force',
          signal: ac.signal,
          stream: true,
        });
        process.exitCode = EXIT_CODES[result.status];
      } finally {
        process.off('SIGINT', onSigint);
        rl?.close();
      }
    });
}
