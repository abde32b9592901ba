/**
 * Local file commands: /read, /ls, /grep. Results are recorded in the session
 * as tool output so the next question to the model can refer to them.
 */

import path from 'node:path';

import { makeMessage } from '../../session-store.js';
import { clipOutput, grepFiles, listFiles, readTextFile } from '../../tools/fs-tools.js';
import type { SlashCommand } from '../command-registry.js';
import type { ReplContext } from '../repl-context.js';

const NO_MATCHES = 'No matches found.';

async function record(ctx: ReplContext, line: string, tool: string, output: string): Promise<void> {
  ctx.session.messages.push(
    makeMessage('user', line),
    makeMessage('tool', `tool[${tool}] output:\n${clipOutput(output)}`),
  );
  await ctx.rt.sessions.save(ctx.session);
}

export const fileCommands: SlashCommand[] = [
  {
    name: '/read',
    usage: '/read <file>',
    description: 'Load a file into the conversation without showing it',
    async execute(ctx, args) {
      const file = args[0];
      if (!file) {
        ctx.print('usage: /read <file>');
        return;
      }
      const text = await readTextFile(path.resolve(ctx.rt.cwd, file));
      await record(ctx, `/read ${file}`, 'fs.read', text);
      ctx.print(`Read ${file} (content hidden). Ask a follow-up question to analyze it.`);
    },
  },
  {
    name: '/ls',
    usage: '/ls [path]',
    description: 'List files under a path (default: workspace)',
    async execute(ctx, args) {
      const root = args[0] ?? '.';
      const files = await listFiles(root, ctx.rt.cwd);
      const out = files.join('\n');
      await record(ctx, `/ls ${root}`, 'fs.list', out);
      ctx.print(clipOutput(out));
    },
  },
  {
    name: '/grep',
    usage: '/grep <pattern> [path]',
    description: 'Case-insensitive search in files under a path',
    async execute(ctx, args) {
      const pattern = args[0];
      if (!pattern) {
        ctx.print('usage: /grep <pattern> [path]');
        return;
      }
      const root = args[1] ?? '.';
      const hits = await grepFiles(root, pattern, { cwd: ctx.rt.cwd });
      const out = hits.length ? hits.join('\n') : NO_MATCHES;
      await record(ctx, `/grep ${pattern} ${root}`, 'fs.grep', out);
      ctx.print(clipOutput(out));
    },
  },
];
