#!/usr/bin/env node

import { buildProgram } from './cli/program/build-program.js';
import { friendlyError, isAbortError } from './errors.js';
import { err as errFmt, makeStyler, resolveColorMode } from './term.js';

async function main() {
  await buildProgram().parseAsync(process.argv);
  // Pooled keep-alive sockets would otherwise hold the process open.
  process.exit(process.exitCode ?? 0);
}

main().catch((e: unknown) => {
  if (isAbortError(e)) {
    process.stdout.write('\n');
    process.exit(130);
  }
  const S = makeStyler(resolveColorMode('auto').enabled);
  console.error(errFmt(friendlyError(e), S));
  process.exit(1);
});
