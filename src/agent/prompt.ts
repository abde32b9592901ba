/**
 * System prompt assembly from small composable sections.
 */

import type { AutoExecPolicy, ChatExecutionMode, ShellmateConfig } from '../types.js';

import { toolCallExample } from './tool-calls.js';

export const DEFAULT_PERSONA =
  'You are shellmate, a terminal coding assistant working inside the user\'s project directory. ' +
  'Answer precisely and keep replies short.';

export interface PromptSection {
  name: string;
  /** Return an empty string to skip the section. */
  build(ctx: PromptContext): string;
}

export interface PromptContext {
  persona?: string;
  mode: ChatExecutionMode;
  policy: AutoExecPolicy;
}

class PersonaSection implements PromptSection {
  name = 'persona';
  build(ctx: PromptContext): string {
    return ctx.persona?.trim() || DEFAULT_PERSONA;
  }
}

class ModeSection implements PromptSection {
  name = 'mode';
  build(ctx: PromptContext): string {
    if (ctx.mode === 'chat') return 'You are in terminal coding assistant chat mode. You cannot run commands.';
    return 'You are in agent mode: you may run shell commands to inspect and change the project.';
  }
}

class ToolProtocolSection implements PromptSection {
  name = 'tool_protocol';
  build(ctx: PromptContext): string {
    if (ctx.mode === 'chat') return '';
    return `Tool protocol:
- To run shell commands, reply with exactly one JSON object of this form (other text in the reply is ignored):
  ${toolCallExample('<command text>')}
- "tool" must be "shell". Put at most 8 calls in one reply; they run in order.
- Each command runs in a fresh bash shell in the workspace root; cd does not persist.
- Do not use \`\`\`bash blocks to run commands. They are never executed.
- After the results come back, either emit more tool_calls or give the final answer with a short summary, the changed files and the verification result.
- A reply without tool_calls ends the turn.`;
  }
}

class PolicySection implements PromptSection {
  name = 'policy';
  build(ctx: PromptContext): string {
    if (ctx.mode === 'chat') return '';
    const p = ctx.policy;
    const scope =
      p.mode === 'safe'
        ? 'only read-only inspection commands (ls, cat, rg, grep, find, head, tail, git status/diff/log/show) are eligible'
        : p.mode === 'custom'
          ? `only commands starting with one of: ${p.allow.length ? p.allow.join(', ') : '(none)'} are eligible`
          : 'any command is eligible';
    const confirm = p.confirm ? 'the user confirms each command unless its prefix is trusted' : 'eligible commands run without confirmation';
    return `Execution policy (auto_exec_mode=${p.mode}): ${scope}; ${confirm}. Denied commands come back as "command denied by policy"; do not retry them.`;
  }
}

export const DEFAULT_SECTIONS: readonly PromptSection[] = [
  new PersonaSection(),
  new ModeSection(),
  new ToolProtocolSection(),
  new PolicySection(),
];

export function buildSystemPrompt(
  config: Pick<ShellmateConfig, 'system_prompt'>,
  policy: AutoExecPolicy,
  mode: ChatExecutionMode,
  sections: readonly PromptSection[] = DEFAULT_SECTIONS
): string {
  const ctx: PromptContext = { persona: config.system_prompt, mode, policy };
  return sections
    .map((s) => s.build(ctx))
    .filter(Boolean)
    .join('\n\n');
}
