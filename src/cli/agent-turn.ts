/**
 * Shared helper: run one user request with rendering, change summary and save.
 * Used by the REPL and by `shellmate agent`.
 */

import { buildSystemPrompt } from '../agent/prompt.js';
import { runAgentTurn, runChatTurn, type AgentHooks } from '../agent/loop.js';
import { shouldUseAgent } from '../agent/mode.js';
import { augmentUserInput } from '../agent/workspace-context.js';
import { changedFiles, diffChangedFiles, formatChangeDiff } from '../git.js';
import { setSystemMessage } from '../session-store.js';
import { warnTag } from '../term.js';
import type { ChatClient, ChatExecutionMode, ConfirmationProvider, Session, TurnResult } from '../types.js';
import { truncateChars } from '../utils.js';

import type { AppRuntime } from './runtime.js';

export type TurnOptions = {
  client: ChatClient;
  confirm: ConfirmationProvider;
  mode: ChatExecutionMode;
  signal?: AbortSignal;
  /** Write tokens as they arrive. */
  stream?: boolean;
  out?: (s: string) => void;
};

export async function runUserTurn(
  rt: AppRuntime,
  session: Session,
  input: string,
  opts: TurnOptions
): Promise<TurnResult> {
  const { S } = rt;
  const write = opts.out ?? ((s: string) => process.stdout.write(s));
  const useAgent = shouldUseAgent(input, opts.mode);

  if (useAgent) await rt.policy.refresh();
  setSystemMessage(session, buildSystemPrompt(rt.config, rt.policy.snapshot(), useAgent ? 'agent-force' : 'chat'));
  const content = await augmentUserInput(input, rt.cwd);

  // `streamed`: the current reasoning call has printed tokens.
  let streamed = false;
  let needNewline = false;
  const onToken = opts.stream
    ? (t: string) => {
        streamed = true;
        needNewline = true;
        write(t);
      }
    : undefined;

  let result: TurnResult;
  if (!useAgent) {
    result = await runChatTurn(
      session,
      content,
      { client: opts.client, model: rt.config.model, sessions: rt.sessions },
      { signal: opts.signal, onToken }
    );
  } else {
    const before = await changedFiles(rt.cwd);
    const hooks: AgentHooks = {
      signal: opts.signal,
      onToken,
      onPhase: (phase, step) => {
        if (needNewline) write('\n');
        needNewline = false;
        if (phase === 'reasoning') streamed = false;
        if (rt.config.verbose) write(S.dim(`(phase: ${phase.replace('_', ' ')}, step ${step})\n`));
      },
      onToolCall: ({ call, decision }) => {
        const verdict = decision ? ` [${decision.verdict}]` : '';
        write(S.dim(`$ ${call.command}${verdict}\n`));
      },
      onToolResult: (r) => {
        if (r.status === 'ok') return;
        write(S.yellow(`  ${r.status}: ${truncateChars(r.content.split('\n').slice(-1)[0] ?? '', 160)}\n`));
      },
      onWarning: (msg) => warnTag('tool-calls', msg),
    };
    result = await runAgentTurn(
      session,
      content,
      {
        client: opts.client,
        model: rt.config.model,
        sessions: rt.sessions,
        policy: rt.policy,
        confirm: opts.confirm,
        cwd: rt.cwd,
        maxSteps: rt.config.max_steps,
        execTimeoutSec: rt.config.exec_timeout_sec,
        maxExecBytes: rt.config.max_exec_bytes,
        verifyCommand: rt.config.verify_command,
      },
      hooks
    );
    const after = await changedFiles(rt.cwd);
    for (const line of formatChangeDiff(diffChangedFiles(before, after))) write(S.dim(`[changes] ${line}\n`));
  }

  if (needNewline) write('\n');
  switch (result.status) {
    case 'final':
      if (!streamed) write(`${result.reply}\n`);
      break;
    case 'error':
      write(`${S.red(result.reply)}\n`);
      break;
    case 'step_limit':
      write(`${S.yellow(result.reply)}\n`);
      break;
    case 'aborted':
      write(`${S.dim('[aborted]')}\n`);
      break;
  }

  await rt.sessions.save(session);
  return result;
}
