import type { Message } from './types.js';
import { logTag } from './term.js';
import { nowIso } from './utils.js';

export const SUMMARY_PREFIX = '[session-summary]';

const SUMMARY_LINE_CHARS = 220;
const SUMMARY_MAX_LINES = 20;
const SUMMARY_MAX_CHARS = 4000;

export const TRUNCATED_MARKER = '\n[truncated]';

export type HistoryBudget = {
  /** Total message count, system message included. */
  maxMessages: number;
  /** Sum of content lengths, system message excluded. */
  maxChars: number;
};

/** Produces the text of a synthetic message standing in for `dropped`, or null to skip. */
export type Summarizer = (dropped: Message[]) => string | null;

export type CompactResult = {
  messages: Message[];
  dropped: number;
  summarized: boolean;
  /** Messages whose content was cut to fit the char budget. */
  clipped: number;
};

function contentChars(messages: readonly Message[], from: number): number {
  let total = 0;
  for (let i = from; i < messages.length; i++) total += messages[i].content.length;
  return total;
}

function overBudget(messages: readonly Message[], sysStart: number, budget: HistoryBudget): boolean {
  return messages.length > budget.maxMessages || contentChars(messages, sysStart) > budget.maxChars;
}

/**
 * Index just past the span that must leave together with the message at `start`.
 *
 * - A user message takes everything up to the next user message: the
 *   assistant replies and tool results it produced.
 * - An assistant message takes the tool results that follow it.
 * - A stray tool message goes alone.
 */
function groupEnd(messages: readonly Message[], start: number): number {
  const lead = messages[start].role;
  let i = start + 1;
  if (lead === 'user') {
    while (i < messages.length && messages[i].role !== 'user') i++;
  } else if (lead === 'assistant') {
    while (i < messages.length && messages[i].role === 'tool') i++;
  }
  return i;
}

/**
 * Oldest removable span, or null when nothing more may go.
 *
 * The newest user message is the live request: it stays, and so does the most
 * recent exchange after it. Anything older than the live request leaves in
 * whole groups; the live request's own earlier exchanges leave one at a time.
 */
function nextDroppable(messages: readonly Message[], sysStart: number): [number, number] | null {
  let liveUser = -1;
  for (let i = messages.length - 1; i >= sysStart; i--) {
    if (messages[i].role === 'user') {
      liveUser = i;
      break;
    }
  }

  if (liveUser > sysStart) return [sysStart, Math.min(groupEnd(messages, sysStart), liveUser)];

  const from = liveUser === -1 ? sysStart : liveUser + 1;
  if (from >= messages.length) return null;
  const end = groupEnd(messages, from);
  if (end >= messages.length) return null;
  return [from, end];
}

/** Built-in summarizer: one short line per dropped message. */
export function summarizeDropped(dropped: Message[]): string | null {
  if (dropped.length === 0) return null;
  const lines: string[] = [];
  for (const m of dropped.slice(-SUMMARY_MAX_LINES)) {
    const flat = m.content.replace(/\s+/g, ' ').trim();
    const short = flat.length > SUMMARY_LINE_CHARS ? flat.slice(0, SUMMARY_LINE_CHARS) + '...' : flat;
    lines.push(`- ${m.role}: ${short}`);
  }
  let body = lines.join('\n');
  if (body.length > SUMMARY_MAX_CHARS) body = body.slice(0, SUMMARY_MAX_CHARS);
  return `${SUMMARY_PREFIX}\nEarlier conversation, condensed:\n${body}`;
}

/**
 * Fold the live exchange down to its newest call and result. Removes (and
 * returns) everything after the live request except the assistant message that
 * opens the newest group and the newest message itself.
 */
function foldLiveExchange(msgs: Message[], sysStart: number): Message[] {
  let live = sysStart - 1;
  for (let i = msgs.length - 1; i >= sysStart; i--) {
    if (msgs[i].role === 'user') {
      live = i;
      break;
    }
  }
  const last = msgs.length - 1;
  const start = live + 1;
  const from = start < last && msgs[start].role === 'assistant' ? start + 1 : start;
  if (from >= last) return [];
  return msgs.splice(from, last - from);
}

/**
 * Cut message content, newest first, until the char budget holds. A cut
 * message ends with TRUNCATED_MARKER; one too short to carry it is emptied.
 */
function clipToBudget(msgs: Message[], sysStart: number, maxChars: number): number {
  let excess = contentChars(msgs, sysStart) - maxChars;
  let clipped = 0;
  for (let i = msgs.length - 1; i >= sysStart && excess > 0; i--) {
    const m = msgs[i];
    if (!m.content) continue;
    const target = m.content.length - excess;
    const content =
      target >= TRUNCATED_MARKER.length ? m.content.slice(0, target - TRUNCATED_MARKER.length) + TRUNCATED_MARKER : '';
    excess -= m.content.length - content.length;
    msgs[i] = { ...m, content };
    clipped++;
  }
  return clipped;
}

/**
 * Shrink `messages` until both budgets hold. The only history that may stay
 * over budget is a system message alone.
 *
 * 1. Remove the oldest non-system messages in whole exchange groups, keeping
 *    the live request and its newest exchange.
 * 2. If that is not enough, fold the live exchange down to its newest call and
 *    result, then drop from the front (never leaving a tool result first).
 * 3. With a summarizer, everything removed is replaced by one assistant
 *    message, if that still fits.
 * 4. Content still over the char budget is clipped, newest message first.
 *
 * The system message at index 0 is never touched. Pure and idempotent:
 * compacting an already-compacted list returns it unchanged.
 */
export function compactHistory(
  messages: readonly Message[],
  budget: HistoryBudget,
  summarizer?: Summarizer
): CompactResult {
  const sysStart = messages[0]?.role === 'system' ? 1 : 0;
  const msgs = [...messages];
  if (!overBudget(msgs, sysStart, budget)) return { messages: msgs, dropped: 0, summarized: false, clipped: 0 };

  const removed: Message[] = [];
  while (overBudget(msgs, sysStart, budget)) {
    const span = nextDroppable(msgs, sysStart);
    if (!span) break;
    removed.push(...msgs.splice(span[0], span[1] - span[0]));
  }

  if (overBudget(msgs, sysStart, budget)) {
    removed.push(...foldLiveExchange(msgs, sysStart));
    while (msgs.length > budget.maxMessages && msgs.length > sysStart) {
      removed.push(...msgs.splice(sysStart, 1));
      while (msgs[sysStart]?.role === 'tool') removed.push(...msgs.splice(sysStart, 1));
    }
  }

  let summarized = false;
  if (summarizer && removed.length > 0) {
    const text = summarizer(removed);
    if (text) {
      const withSummary = [...msgs];
      withSummary.splice(sysStart, 0, { role: 'assistant', content: text, timestamp: nowIso() });
      if (!overBudget(withSummary, sysStart, budget)) {
        msgs.splice(0, msgs.length, ...withSummary);
        summarized = true;
      }
    }
  }

  const clipped = clipToBudget(msgs, sysStart, budget.maxChars);
  return { messages: msgs, dropped: removed.length, summarized, clipped };
}

/** compactHistory plus the stderr note the CLI shows when something was removed. */
export function compactWithLog(
  messages: readonly Message[],
  budget: HistoryBudget,
  opts: { summarize?: boolean; verbose?: boolean } = {}
): Message[] {
  const res = compactHistory(messages, budget, opts.summarize ? summarizeDropped : undefined);
  if ((res.dropped > 0 || res.clipped > 0) && opts.verbose) {
    logTag(
      'compact',
      `dropped ${res.dropped} old messages (budget ${budget.maxMessages} msgs / ${budget.maxChars} chars)` +
        (res.summarized ? ', kept a summary' : '') +
        (res.clipped ? `, clipped ${res.clipped}` : '')
    );
  }
  return res.messages;
}
