export type Role = 'system' | 'user' | 'assistant' | 'tool';

export type Message = {
  role: Role;
  content: string;
  /** ISO-8601 */
  timestamp: string;
};

export type Session = {
  id: string;
  messages: Message[];
  createdAt: string;
  lastActiveAt: string;
};

// ── Tool protocol ────────────────────────────────────────────────────

/** Closed set of tool kinds the model may invoke. Add a member here to add a tool. */
export type ToolCall = { tool: 'shell'; command: string };

export type ToolKind = ToolCall['tool'];

export const TOOL_KINDS: readonly ToolKind[] = ['shell'];

export type DroppedCall = {
  index: number;
  reason: string;
};

export type ParseHint = 'none' | 'malformed' | 'legacy_shell_block';

export type ParsedToolCalls = {
  calls: ToolCall[];
  dropped: DroppedCall[];
  hint: ParseHint;
};

// ── Auto-exec policy ─────────────────────────────────────────────────

export type AutoExecMode = 'safe' | 'all' | 'custom';

export const AUTO_EXEC_MODES: readonly AutoExecMode[] = ['safe', 'all', 'custom'];

export type AutoExecPolicy = {
  mode: AutoExecMode;
  allow: readonly string[];
  deny: readonly string[];
  trusted: readonly string[];
  /** When false, every eligible command runs without asking. */
  confirm: boolean;
};

export type MatchedRule =
  | { kind: 'deny'; entry: string }
  | { kind: 'safe-whitelist'; entry: string }
  | { kind: 'not-whitelisted' }
  | { kind: 'allow'; entry: string }
  | { kind: 'not-allowed' }
  | { kind: 'confirm-disabled' }
  | { kind: 'trusted'; entry: string }
  | { kind: 'mode-default' };

export type PolicyVerdict = 'allow' | 'deny' | 'ask';

export type PolicyDecision = {
  verdict: PolicyVerdict;
  rule: MatchedRule;
  reason: string;
};

// ── Execution ────────────────────────────────────────────────────────

export type ExecOutcome =
  | { kind: 'completed'; rc: number; out: string; err: string; truncated: boolean }
  | { kind: 'timed_out'; out: string; err: string; timeoutSec: number }
  | { kind: 'aborted' };

export type VerificationStatus = 'skipped' | 'passed' | 'failed' | 'timed_out';

export type VerificationResult = {
  status: VerificationStatus;
  label?: string;
  command?: string;
  rc?: number;
  output: string;
  reason?: string;
};

// ── Agent turn ───────────────────────────────────────────────────────

export type AgentPhase = 'reasoning' | 'tool_execution' | 'verification' | 'final';

export type ToolResultStatus =
  | 'ok'
  | 'failed'
  | 'timed_out'
  | 'denied'
  | 'declined'
  | 'skipped'
  | 'prechecked';

export type ToolResult = {
  call: ToolCall;
  status: ToolResultStatus;
  content: string;
};

export type AgentTurnState = {
  phase: AgentPhase;
  step: number;
  toolOutputs: ToolResult[];
};

export type TurnStatus = 'final' | 'step_limit' | 'error' | 'aborted';

export type TurnResult = {
  status: TurnStatus;
  reply: string;
  steps: number;
  toolCalls: number;
  state: AgentTurnState;
};

// ── Confirmation ─────────────────────────────────────────────────────

/** `always` trusts the proposed prefix; `stop` skips every remaining call in the response. */
export type ConfirmDecision = 'yes' | 'no' | 'always' | 'stop';

export type ConfirmRequest = {
  command: string;
  /** Prefix that `always` would add to the trusted set. */
  prefix: string;
  reason: string;
  signal?: AbortSignal;
};

export interface ConfirmationProvider {
  confirm(req: ConfirmRequest): Promise<ConfirmDecision>;
  showBlocked?(command: string, reason: string): Promise<void>;
}

// ── Chat transport ───────────────────────────────────────────────────

export type ChatRequest = {
  model: string;
  messages: Message[];
  signal?: AbortSignal;
  onToken?: (t: string) => void;
};

export interface ChatClient {
  chat(req: ChatRequest): Promise<string>;
}

export type ModelsResponse = {
  object?: string;
  data: Array<{ id: string; object?: string; owned_by?: string }>;
};

// ── Configuration ────────────────────────────────────────────────────

export type ChatExecutionMode = 'chat' | 'agent-auto' | 'agent-force';

export type ShellmateConfig = {
  endpoint: string;
  model: string;
  api_key_env: string;
  api_key?: string;
  system_prompt?: string;
  temperature: number;
  /** seconds */
  response_timeout: number;
  exec_timeout_sec: number;
  max_exec_bytes: number;
  max_steps: number;
  /** Empty string disables verification; unset means auto-detect. */
  verify_command?: string;
  auto_exec_mode: AutoExecMode;
  auto_exec_allow: string[];
  auto_exec_deny: string[];
  auto_exec_trusted: string[];
  auto_confirm_exec: boolean;
  history_max_messages: number;
  history_max_chars: number;
  execution_mode: ChatExecutionMode;
  verbose: boolean;
};
