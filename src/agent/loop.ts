/**
 * Bounded agent turn: reasoning → tool execution → verification → … → final.
 *
 * One call handles one user request. Every message the turn produces goes
 * through the SessionStore so the history budget holds after each append.
 * The caller saves the session afterwards; nothing here touches disk.
 */

import { friendlyError, isAbortError } from '../errors.js';
import type { PolicyStore } from '../policy-store.js';
import { commandPrefix, decide, looksLikeCommandFailure, precheckCommand } from '../safety.js';
import { makeMessage, type SessionStore } from '../session-store.js';
import { formatExecResult, runCommand } from '../tools/exec-core.js';
import type {
  AgentPhase,
  AgentTurnState,
  ChatClient,
  ConfirmationProvider,
  PolicyDecision,
  Role,
  Session,
  ToolCall,
  ToolResult,
  TurnResult,
  TurnStatus,
} from '../types.js';

import { TurnAborted, throwIfAborted } from './errors.js';
import { parseToolCalls, toolCallExample } from './tool-calls.js';
import { formatVerification, runVerification, type CommandRunner } from './verification.js';

/** After this many failed commands in one response the rest are skipped. */
export const MAX_FAILED_COMMANDS = 2;

export const DEFAULT_MAX_STEPS = 3;

export const CONTINUE_INSTRUCTION =
  'Continue based on tool outputs above. If more execution is needed, emit JSON tool_calls. ' +
  'If complete, give final answer directly with short summary, changed files, and verification result.';

export const RECOVERY_HINT =
  'Some commands failed. Prefer narrower retries: check file/path existence first, then rerun minimal commands.';

export type AgentDeps = {
  client: ChatClient;
  model: string;
  sessions: SessionStore;
  policy: PolicyStore;
  confirm: ConfirmationProvider;
  cwd: string;
  maxSteps?: number;
  execTimeoutSec: number;
  maxExecBytes?: number;
  /** `""` disables verification; undefined auto-detects. */
  verifyCommand?: string;
  /** Replaces the real executor, mainly for tests. */
  run?: CommandRunner;
};

export type ToolCallEvent = { call: ToolCall; decision: PolicyDecision | null; index: number };

export type AgentHooks = {
  signal?: AbortSignal;
  onPhase?: (phase: AgentPhase, step: number) => void;
  onToken?: (t: string) => void;
  onToolCall?: (ev: ToolCallEvent) => void;
  onToolResult?: (result: ToolResult) => void;
  onWarning?: (msg: string) => void;
};

type ExecBatch = { ranAny: boolean; failures: number };

class Turn {
  readonly state: AgentTurnState = { phase: 'reasoning', step: 0, toolOutputs: [] };
  private toolCalls = 0;

  constructor(
    private readonly session: Session,
    private readonly deps: AgentDeps,
    private readonly hooks: AgentHooks
  ) {}

  private get signal(): AbortSignal | undefined {
    return this.hooks.signal;
  }

  private enter(phase: AgentPhase): void {
    this.state.phase = phase;
    this.hooks.onPhase?.(phase, this.state.step);
  }

  private append(role: Role, content: string): void {
    this.deps.sessions.append(this.session, makeMessage(role, content));
  }

  private result(status: TurnStatus, reply: string): TurnResult {
    if (status !== 'aborted') this.enter('final');
    return { status, reply, steps: this.state.step, toolCalls: this.toolCalls, state: this.state };
  }

  private record(call: ToolCall, status: ToolResult['status'], content: string): void {
    const res: ToolResult = { call, status, content };
    this.state.toolOutputs.push(res);
    this.append('tool', `tool[${call.tool}] ${content}`);
    this.hooks.onToolResult?.(res);
  }

  async run(input: string): Promise<TurnResult> {
    this.append('user', input);
    const maxSteps = Math.max(1, this.deps.maxSteps ?? DEFAULT_MAX_STEPS);

    try {
      for (;;) {
        this.enter('reasoning');
        throwIfAborted(this.signal);
        this.deps.sessions.compact(this.session);

        let reply: string;
        try {
          reply = await this.deps.client.chat({
            model: this.deps.model,
            messages: this.session.messages,
            signal: this.signal,
            onToken: this.hooks.onToken,
          });
        } catch (e: unknown) {
          if (this.signal?.aborted || isAbortError(e)) throw new TurnAborted();
          return this.result('error', `request failed: ${friendlyError(e)}`);
        }
        throwIfAborted(this.signal);

        const parsed = parseToolCalls(reply);
        for (const d of parsed.dropped) {
          this.hooks.onWarning?.(`dropped tool call #${d.index + 1}: ${d.reason}`);
        }

        if (parsed.calls.length === 0) {
          if (parsed.hint === 'malformed') {
            this.hooks.onWarning?.(
              `response mentions tool_calls but none were valid; expected ${toolCallExample()}`
            );
          } else if (parsed.hint === 'legacy_shell_block') {
            this.hooks.onWarning?.(`shell code blocks are not executed; use ${toolCallExample()}`);
          }
          this.append('assistant', reply);
          return this.result('final', reply);
        }

        this.append('assistant', reply);

        this.enter('tool_execution');
        const batch = await this.executeCalls(parsed.calls);

        this.enter('verification');
        const verification = batch.ranAny
          ? formatVerification(
              await runVerification(this.deps.cwd, {
                override: this.deps.verifyCommand,
                timeoutSec: this.deps.execTimeoutSec,
                maxOutputBytes: this.deps.maxExecBytes,
                signal: this.signal,
                run: this.deps.run,
              })
            )
          : formatVerification({ status: 'skipped', output: '', reason: 'no command ran' });
        throwIfAborted(this.signal);

        this.append(
          'tool',
          [verification, batch.failures > 0 ? RECOVERY_HINT : '', CONTINUE_INSTRUCTION].filter(Boolean).join('\n')
        );
        this.state.step++;

        if (this.state.step >= maxSteps) {
          const notice = `stopped after ${this.state.step} steps (step limit reached). Continue by describing the next action.`;
          this.append('assistant', notice);
          return this.result('step_limit', notice);
        }
      }
    } catch (e: unknown) {
      if (e instanceof TurnAborted || isAbortError(e)) return this.result('aborted', 'aborted');
      throw e;
    }
  }

  private async executeCalls(calls: ToolCall[]): Promise<ExecBatch> {
    const batch: ExecBatch = { ranAny: false, failures: 0 };
    let stopped = false;

    for (const [index, call] of calls.entries()) {
      throwIfAborted(this.signal);
      this.toolCalls++;

      if (stopped) {
        this.hooks.onToolCall?.({ call, decision: null, index });
        this.record(call, 'skipped', `$ ${call.command}\nskipped: user stopped this batch`);
        continue;
      }
      if (batch.failures >= MAX_FAILED_COMMANDS) {
        this.hooks.onToolCall?.({ call, decision: null, index });
        this.record(
          call,
          'skipped',
          `$ ${call.command}\nskipped: ${MAX_FAILED_COMMANDS} commands already failed in this response`
        );
        continue;
      }

      const pre = precheckCommand(call.command, this.deps.cwd);
      if (pre) {
        this.hooks.onToolCall?.({ call, decision: null, index });
        this.record(call, 'prechecked', `$ ${call.command}\nskipped before execution: ${pre}`);
        continue;
      }

      const decision = decide(call.command, this.deps.policy.snapshot());
      this.hooks.onToolCall?.({ call, decision, index });

      if (decision.verdict === 'deny') {
        await this.deps.confirm.showBlocked?.(call.command, decision.reason);
        this.record(call, 'denied', `$ ${call.command}\ncommand denied by policy: ${decision.reason}`);
        continue;
      }

      if (decision.verdict === 'ask') {
        const answer = await this.deps.confirm.confirm({
          command: call.command,
          prefix: commandPrefix(call.command),
          reason: decision.reason,
          signal: this.signal,
        });
        throwIfAborted(this.signal);
        if (answer === 'no') {
          this.record(call, 'declined', `user declined: ${call.command}`);
          continue;
        }
        if (answer === 'stop') {
          stopped = true;
          this.record(call, 'declined', `user declined: ${call.command}`);
          continue;
        }
        if (answer === 'always') {
          const prefix = commandPrefix(call.command);
          try {
            await this.deps.policy.trustPrefix(prefix);
          } catch (e: unknown) {
            this.hooks.onWarning?.(`could not save trusted prefix "${prefix}": ${friendlyError(e)}`);
          }
        }
      }

      const outcome = await (this.deps.run ?? runCommand)(call.command, {
        cwd: this.deps.cwd,
        timeoutSec: this.deps.execTimeoutSec,
        maxOutputBytes: this.deps.maxExecBytes,
        signal: this.signal,
      });
      if (outcome.kind === 'aborted') throw new TurnAborted();

      batch.ranAny = true;
      const text = formatExecResult(call.command, outcome);
      if (outcome.kind === 'timed_out') {
        batch.failures++;
        this.record(call, 'timed_out', text);
      } else if (outcome.rc !== 0 || looksLikeCommandFailure(`${outcome.out}\n${outcome.err}`)) {
        batch.failures++;
        this.record(call, 'failed', text);
      } else {
        this.record(call, 'ok', text);
      }
    }
    return batch;
  }
}

/** Run one user request through the agent state machine. */
export async function runAgentTurn(
  session: Session,
  input: string,
  deps: AgentDeps,
  hooks: AgentHooks = {}
): Promise<TurnResult> {
  return new Turn(session, deps, hooks).run(input);
}

/** Chat-only turn: one completion, no tool parsing. */
export async function runChatTurn(
  session: Session,
  input: string,
  deps: Pick<AgentDeps, 'client' | 'model' | 'sessions'>,
  hooks: Pick<AgentHooks, 'signal' | 'onToken'> = {}
): Promise<TurnResult> {
  const state: AgentTurnState = { phase: 'reasoning', step: 0, toolOutputs: [] };
  deps.sessions.append(session, makeMessage('user', input));
  try {
    const reply = await deps.client.chat({
      model: deps.model,
      messages: session.messages,
      signal: hooks.signal,
      onToken: hooks.onToken,
    });
    if (hooks.signal?.aborted) return { status: 'aborted', reply: 'aborted', steps: 0, toolCalls: 0, state };
    deps.sessions.append(session, makeMessage('assistant', reply));
    state.phase = 'final';
    return { status: 'final', reply, steps: 0, toolCalls: 0, state };
  } catch (e: unknown) {
    if (hooks.signal?.aborted || isAbortError(e)) {
      return { status: 'aborted', reply: 'aborted', steps: 0, toolCalls: 0, state };
    }
    state.phase = 'final';
    return { status: 'error', reply: `request failed: ${friendlyError(e)}`, steps: 0, toolCalls: 0, state };
  }
}
