import type { Command } from 'commander';

import { OpenAIClient } from '../../client.js';
import { doctorExitCode, formatChecks, runDoctor } from '../doctor.js';

import { runtimeFor } from './shared.js';

export function registerDoctorCommand(program: Command) {
  program
    .command('doctor')
    .description('Check endpoint, API key and model reachability')
    .action(async (_opts: Record<string, never>, cmd: Command) => {
      const rt = await runtimeFor(cmd);
      const checks = await runDoctor(rt.config, {
        makeClient: (config, apiKey) =>
          new OpenAIClient(config.endpoint, apiKey, {
            temperature: config.temperature,
            responseTimeout: config.response_timeout,
            verbose: config.verbose,
          }),
      });
      for (const line of formatChecks(checks, rt.S)) console.log(line);
      process.exitCode = doctorExitCode(checks);
    });
}
