import type { Command } from 'commander';

import { runEdit } from '../file-tasks.js';
import { createClient } from '../runtime.js';

import { runtimeFor } from './shared.js';

type EditOpts = { instruction: string; apply: boolean };

export function registerEditCommand(program: Command) {
  program
    .command('edit')
    .description('Rewrite one file from an instruction (dry run unless --apply)')
    .argument('<file>', 'File to edit')
    .requiredOption('-i, --instruction <text>', 'What to change')
    .option('--apply', 'Write the result and keep a .bak copy of the original', false)
    .action(async (file: string, opts: EditOpts, cmd: Command) => {
      const rt = await runtimeFor(cmd);
      const result = await runEdit(
        { client: createClient(rt.config), model: rt.config.model, persona: rt.config.system_prompt },
        file,
        opts.instruction,
        opts.apply,
      );
      if (!result.backup) {
        console.log(result.edited);
        console.log(rt.S.dim('\nDry run only. Use --apply to write changes.'));
        return;
      }
      console.log(`Updated ${file}`);
      console.log(`Backup  ${result.backup}`);
    });
}
