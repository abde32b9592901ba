/**
 * Interactive chat loop: slash commands are handled locally, everything else
 * becomes a turn. Ctrl-C during a turn aborts it; at the prompt it exits.
 */

import { stdin as input, stdout as output } from 'node:process';
import readline from 'node:readline/promises';

import { isUnrecoverable } from '../errors.js';
import { newSession, resolveSessionName } from '../session-store.js';
import { banner, err as errFmt } from '../term.js';
import type { ChatClient, ChatExecutionMode } from '../types.js';
import { PKG_VERSION } from '../utils.js';

import { runUserTurn } from './agent-turn.js';
import { findCommand, registerAll } from './command-registry.js';
import { restTokens } from './command-utils.js';
import { fileCommands } from './commands/files.js';
import { policyCommands } from './commands/policy.js';
import { sessionCommands } from './commands/session.js';
import type { ReplContext } from './repl-context.js';
import { pickConfirmProvider, type AppRuntime } from './runtime.js';

registerAll([...sessionCommands, ...policyCommands, ...fileCommands]);

/**
 * Run a slash command if `line` names one. Returns false when the line should
 * go to the model instead. Command errors are printed, except unrecoverable
 * ones, which propagate.
 */
export async function dispatchSlash(ctx: ReplContext, line: string): Promise<boolean> {
  if (!line.startsWith('/')) return false;
  const cmd = findCommand(line);
  if (!cmd) {
    ctx.print(`unknown command ${line.split(/\s+/)[0]}; try /help`);
    return true;
  }
  try {
    await cmd.execute(ctx, restTokens(line));
  } catch (e: unknown) {
    if (isUnrecoverable(e)) throw e;
    ctx.print(errFmt(`${cmd.name}: ${e instanceof Error ? e.message : String(e)}`, ctx.S));
  }
  return true;
}

export async function runRepl(
  rt: AppRuntime,
  client: ChatClient,
  opts: { sessionName?: string; mode?: ChatExecutionMode; autoApprove?: boolean }
): Promise<number> {
  const rl = readline.createInterface({ input, output, terminal: Boolean(input.isTTY) });
  const confirm = pickConfirmProvider({ rl, S: rt.S, autoApprove: opts.autoApprove });

  let exitCode: number | null = null;
  let turnAbort: AbortController | null = null;

  const ctx: ReplContext = {
    rt,
    S: rt.S,
    session: await rt.sessions.load(resolveSessionName(opts.sessionName, rt.cwd)),
    mode: opts.mode ?? rt.config.execution_mode,
    confirm,
    print: (line) => console.log(line),
    async useSession(name) {
      await rt.sessions.save(ctx.session);
      ctx.session = await rt.sessions.load(name);
    },
    async startSession(name) {
      await rt.sessions.save(ctx.session);
      ctx.session = newSession(name);
      await rt.sessions.save(ctx.session);
    },
    async shutdown(code) {
      await rt.sessions.save(ctx.session);
      exitCode = code;
    },
  };

  rl.on('SIGINT', () => {
    if (turnAbort) {
      turnAbort.abort();
      return;
    }
    exitCode = 130;
    rl.close();
  });

  console.log(banner(`shellmate v${PKG_VERSION}`, rt.S));
  console.log(
    rt.S.dim(
      `model ${rt.config.model} · session ${ctx.session.id} (${ctx.session.messages.length} messages) · mode ${ctx.mode} · /help`
    )
  );

  try {
    while (exitCode === null) {
      let line: string;
      try {
        line = (await rl.question(rt.S.cyan('you> '))).trim();
      } catch (e: unknown) {
        // readline rejects once closed (Ctrl-D or Ctrl-C at the prompt).
        if (e instanceof Error && (e.name === 'AbortError' || /closed/i.test(e.message))) break;
        throw e;
      }
      if (!line) continue;
      if (await dispatchSlash(ctx, line)) continue;

      turnAbort = new AbortController();
      try {
        await runUserTurn(rt, ctx.session, line, {
          client,
          confirm,
          mode: ctx.mode,
          signal: turnAbort.signal,
          stream: true,
        });
      } finally {
        turnAbort = null;
      }
    }
  } finally {
    rl.close();
    await rt.sessions.save(ctx.session);
  }
  return exitCode ?? 0;
}
