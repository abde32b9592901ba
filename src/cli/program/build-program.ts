import { Command } from 'commander';

import { PKG_VERSION } from '../../utils.js';

import { registerAgentCommand } from './register.agent.js';
import { registerChatCommand } from './register.chat.js';
import { registerConfigCommands } from './register.config.js';
import { registerDoctorCommand } from './register.doctor.js';
import { registerEditCommand } from './register.edit.js';
import { registerReviewCommand } from './register.review.js';

export function buildProgram(): Command {
  const program = new Command();
  program
    .name('shellmate')
    .description('Chat with an OpenAI-compatible model that can run commands in your shell')
    .version(PKG_VERSION)
    .option('-c, --config <path>', 'Config file (default: ~/.config/shellmate/config.json)')
    .option('--endpoint <url>', 'OpenAI-compatible base URL')
    .option('-m, --model <id>', 'Model id')
    .option('-v, --verbose', 'Verbose diagnostics on stderr')
    .option('--no-color', 'Disable colors');

  registerChatCommand(program);
  registerAgentCommand(program);
  registerConfigCommands(program);
  registerReviewCommand(program);
  registerEditCommand(program);
  registerDoctorCommand(program);
  return program;
}
