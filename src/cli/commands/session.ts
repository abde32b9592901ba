/**
 * Session commands: /help, /exit, /new, /clear, /session, /compact, /history.
 */

import { freshSessionName, resolveSessionName } from '../../session-store.js';
import { truncateChars } from '../../utils.js';
import { allCommands, type SlashCommand } from '../command-registry.js';

const HISTORY_PREVIEW_CHARS = 100;
const DEFAULT_HISTORY_COUNT = 20;

export const sessionCommands: SlashCommand[] = [
  {
    name: '/help',
    description: 'Show available commands',
    async execute(ctx) {
      for (const c of allCommands()) {
        const head = c.usage ?? c.name;
        ctx.print(`${head.padEnd(34)} ${ctx.S.dim(c.description ?? '')}`);
      }
    },
  },
  {
    name: '/exit',
    aliases: ['/quit'],
    description: 'Save the session and exit',
    async execute(ctx) {
      await ctx.shutdown(0);
    },
  },
  {
    name: '/new',
    usage: '/new [name]',
    description: 'Start a fresh session (default: a new name for this workspace)',
    async execute(ctx, args) {
      const name = args[0] ? resolveSessionName(args[0], ctx.rt.cwd) : freshSessionName(ctx.rt.cwd);
      await ctx.startSession(name);
      ctx.confirm.clearRemembered?.();
      ctx.print(`new session: ${name}`);
    },
  },
  {
    name: '/clear',
    description: 'Drop every message in the current session',
    async execute(ctx) {
      ctx.session.messages = [];
      await ctx.rt.sessions.save(ctx.session);
      ctx.confirm.clearRemembered?.();
      ctx.print(`cleared session ${ctx.session.id}`);
    },
  },
  {
    name: '/session',
    usage: '/session list|use <name>|rm <name>',
    description: 'List, switch or delete stored sessions',
    async execute(ctx, args) {
      const sub = (args[0] ?? 'list').toLowerCase();
      const target = args[1];

      if (sub === 'list') {
        const rows = await ctx.rt.sessions.list();
        if (!rows.length) {
          ctx.print('no stored sessions');
          return;
        }
        for (const r of rows) {
          const mark = r.name === ctx.session.id ? '*' : ' ';
          ctx.print(`${mark} ${r.name}  ${ctx.S.dim(new Date(r.updatedAt).toISOString())}`);
        }
        return;
      }

      if (!target) {
        ctx.print(`usage: /session ${sub} <name>`);
        return;
      }
      const name = resolveSessionName(target, ctx.rt.cwd);

      if (sub === 'use') {
        await ctx.useSession(name);
        ctx.print(`using session ${name} (${ctx.session.messages.length} messages)`);
        return;
      }
      if (sub === 'rm') {
        if (name === ctx.session.id) {
          ctx.print('cannot remove the active session; switch with /new or /session use first');
          return;
        }
        const removed = await ctx.rt.sessions.remove(name);
        ctx.print(removed ? `removed session ${name}` : `no session named ${name}`);
        return;
      }
      ctx.print('usage: /session list|use <name>|rm <name>');
    },
  },
  {
    name: '/compact',
    description: 'Apply the history budget now',
    async execute(ctx) {
      const before = ctx.session.messages.length;
      ctx.rt.sessions.compact(ctx.session);
      await ctx.rt.sessions.save(ctx.session);
      const { maxMessages, maxChars } = ctx.rt.sessions.budget;
      ctx.print(
        `compacted: ${before} → ${ctx.session.messages.length} messages (budget ${maxMessages} msgs / ${maxChars} chars)`
      );
    },
  },
  {
    name: '/history',
    usage: '/history [n]',
    description: 'Show the last n messages (default 20)',
    async execute(ctx, args) {
      const n = Number(args[0]);
      const count = Number.isInteger(n) && n > 0 ? n : DEFAULT_HISTORY_COUNT;
      const msgs = ctx.session.messages.slice(-count);
      if (!msgs.length) {
        ctx.print('(empty)');
        return;
      }
      for (const m of msgs) {
        const firstLine = m.content.split('\n')[0] ?? '';
        ctx.print(`${ctx.S.bold(m.role.padEnd(9))} ${truncateChars(firstLine, HISTORY_PREVIEW_CHARS)}`);
      }
    },
  },
];
