import type { Command } from 'commander';

import { defaultConfigPath, loadConfig } from '../../config.js';
import { configInit, configSet, configShow } from '../config-cmd.js';

import { cliOverrides, readGlobalFlags } from './shared.js';

function configPathOf(cmd: Command): string {
  return readGlobalFlags(cmd).config ?? defaultConfigPath();
}

export function registerConfigCommands(program: Command) {
  const config = program.command('config').description('Show or edit the config file');

  config
    .command('show')
    .description('Print the effective config (file + env + flags)')
    .action(async (_opts: Record<string, never>, cmd: Command) => {
      const flags = readGlobalFlags(cmd);
      const { config: effective } = await loadConfig({ configPath: flags.config, cli: cliOverrides(flags) });
      console.log(configShow(effective));
    });

  config
    .command('path')
    .description('Print the config file location')
    .action((_opts: Record<string, never>, cmd: Command) => {
      console.log(configPathOf(cmd));
    });

  config
    .command('set')
    .description('Set one key (lists take comma-separated values)')
    .argument('<key>')
    .argument('<value>')
    .action(async (key: string, value: string, _opts: Record<string, never>, cmd: Command) => {
      const file = configPathOf(cmd);
      await configSet(file, key, value);
      console.log(`${key} saved to ${file}`);
    });

  config
    .command('init')
    .description('Write a config file with the defaults')
    .option('--force', 'Overwrite an existing file', false)
    .action(async (opts: { force?: boolean }, cmd: Command) => {
      const file = configPathOf(cmd);
      const outcome = await configInit(file, Boolean(opts.force));
      if (outcome === 'exists') {
        console.error(`${file} already exists (use --force to overwrite)`);
        process.exitCode = 1;
        return;
      }
      console.log(`wrote ${file}`);
    });
}
