import type { ChatExecutionMode } from '../types.js';

// Punctuation becomes spaces and the input is padded, so ' fix ' matches the word
// but not "prefix". Stems without spaces also match longer forms ("implementation").
const AGENT_TASK_KEYWORDS = [
  ' fix ',
  'implement',
  'refactor',
  ' edit ',
  ' change ',
  ' update ',
  ' patch ',
  ' apply ',
  'add feature',
  'write code',
  'run tests',
  ' build ',
  ' compile ',
];

// Matched against the raw input; CJK text has no word boundaries to pad.
const AGENT_TASK_KEYWORDS_ZH = ['修复', '实现', '重构', '修改', '编辑', '补丁', '写代码', '跑测试', '编译', '构建'];

/** Heuristic used by `agent-auto`: does the request ask for changes or a run? */
export function looksLikeAgentTask(input: string): boolean {
  const lower = ` ${input.toLowerCase().replace(/[^a-z0-9]+/g, ' ')} `;
  return AGENT_TASK_KEYWORDS.some((k) => lower.includes(k)) || AGENT_TASK_KEYWORDS_ZH.some((k) => input.includes(k));
}

export function shouldUseAgent(input: string, mode: ChatExecutionMode): boolean {
  switch (mode) {
    case 'agent-force':
      return true;
    case 'chat':
      return false;
    case 'agent-auto':
      return looksLikeAgentTask(input);
  }
}
