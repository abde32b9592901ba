import type { Command } from 'commander';

import { runReview } from '../file-tasks.js';
import { createClient } from '../runtime.js';

import { runtimeFor } from './shared.js';

type ReviewOpts = { prompt?: string };

export function registerReviewCommand(program: Command) {
  program
    .command('review')
    .description('Ask the model to review one file')
    .argument('<file>', 'File to review')
    .option('-p, --prompt <text>', 'Extra requirement for the review')
    .action(async (file: string, opts: ReviewOpts, cmd: Command) => {
      const rt = await runtimeFor(cmd);
      const answer = await runReview(
        { client: createClient(rt.config), model: rt.config.model, persona: rt.config.system_prompt },
        file,
        opts.prompt,
      );
      console.log(answer);
    });
}
