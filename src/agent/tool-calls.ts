import {
  TOOL_KINDS,
  type DroppedCall,
  type ParseHint,
  type ParsedToolCalls,
  type ToolCall,
  type ToolKind,
} from '../types.js';
import { isRecord } from '../utils.js';

/** Calls past this index in one response are dropped. */
export const MAX_CALLS_PER_RESPONSE = 8;

const LEGACY_FENCE_RE = /```(?:bash|sh|shell|powershell|pwsh|cmd)\b/i;
const TOOL_HINT_RE = /tool_calls|"tool"\s*:/i;
const JSON_FENCE_RE = /```json[^\n]*\n([\s\S]*?)```/gi;

const tryParse = (s: string): unknown => {
  try {
    return JSON.parse(s);
  } catch {
    return undefined;
  }
};

/**
 * End index (inclusive) of the object opened at `start`, or -1 if it never
 * closes. String literals are skipped so braces inside them do not count.
 */
function matchBrace(text: string, start: number): number {
  let depth = 0;
  let inStr = false;
  let esc = false;

  for (let i = start; i < text.length; i++) {
    const ch = text[i];

    if (inStr) {
      if (esc) {
        esc = false;
      } else if (ch === '\\') {
        esc = true;
      } else if (ch === '"') {
        inStr = false;
      }
      continue;
    }

    if (ch === '"') {
      inStr = true;
    } else if (ch === '{') {
      depth++;
    } else if (ch === '}') {
      depth--;
      if (depth === 0) return i;
    }
  }
  return -1;
}

/**
 * Top-level JSON objects in order of appearance. Prose braces that never
 * close or do not parse are stepped over so later objects are still found.
 */
export function extractJsonObjects(text: string): unknown[] {
  const out: unknown[] = [];
  let i = text.indexOf('{');
  while (i !== -1) {
    const end = matchBrace(text, i);
    const parsed = end === -1 ? undefined : tryParse(text.slice(i, end + 1));
    if (isRecord(parsed)) {
      out.push(parsed);
      i = text.indexOf('{', end + 1);
    } else {
      i = text.indexOf('{', i + 1);
    }
  }
  return out;
}

/** Bodies of ```json fenced blocks, in order. */
export function jsonFenceBodies(text: string): string[] {
  return [...text.matchAll(JSON_FENCE_RE)].map((m) => m[1]);
}

function toolKind(v: unknown): ToolKind | undefined {
  if (typeof v !== 'string') return undefined;
  const name = v.trim().toLowerCase();
  return TOOL_KINDS.find((k) => k === name);
}

function toToolCall(entry: unknown, index: number): ToolCall | DroppedCall {
  if (!isRecord(entry)) return { index, reason: 'entry is not an object' };
  if (typeof entry.tool !== 'string') return { index, reason: 'missing "tool"' };
  const kind = toolKind(entry.tool);
  if (!kind) return { index, reason: `unknown tool "${entry.tool}"` };
  if (typeof entry.command !== 'string' || !entry.command.trim()) {
    return { index, reason: 'missing "command"' };
  }
  switch (kind) {
    case 'shell':
      return { tool: 'shell', command: entry.command.trim() };
  }
}

function isToolCall(v: ToolCall | DroppedCall): v is ToolCall {
  return 'tool' in v;
}

function hintFor(raw: string): ParseHint {
  if (TOOL_HINT_RE.test(raw)) return 'malformed';
  if (LEGACY_FENCE_RE.test(raw)) return 'legacy_shell_block';
  return 'none';
}

/**
 * Extract tool calls from a model response.
 *
 * Candidates are the objects inside ```json fences, then every balanced
 * object in the text. The first one whose top-level `tool_calls` key holds an
 * array is the payload; everything else is commentary.
 * Bad entries are dropped one by one. Never throws.
 */
export function parseToolCalls(raw: string): ParsedToolCalls {
  const candidates = [...jsonFenceBodies(raw).flatMap(extractJsonObjects), ...extractJsonObjects(raw)];
  const payload = candidates.find(
    (o): o is Record<string, unknown> => isRecord(o) && Array.isArray(o.tool_calls)
  );
  if (!payload || !Array.isArray(payload.tool_calls)) {
    return { calls: [], dropped: [], hint: hintFor(raw) };
  }

  const calls: ToolCall[] = [];
  const dropped: DroppedCall[] = [];
  for (const [i, entry] of payload.tool_calls.entries()) {
    const res = toToolCall(entry, i);
    if (!isToolCall(res)) {
      dropped.push(res);
    } else if (calls.length >= MAX_CALLS_PER_RESPONSE) {
      dropped.push({ index: i, reason: `more than ${MAX_CALLS_PER_RESPONSE} calls in one response` });
    } else {
      calls.push(res);
    }
  }

  return { calls, dropped, hint: calls.length === 0 ? 'malformed' : 'none' };
}

/** The exact wire format the model must emit, shown in prompts and warnings. */
export function toolCallExample(command = 'rg --files'): string {
  return JSON.stringify({ tool_calls: [{ tool: 'shell', command }] });
}
