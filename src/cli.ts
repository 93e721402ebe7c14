#!/usr/bin/env node

import { buildProgram, defaultIO } from './cli/program.js';
import { errorMessage } from './errors.js';
import { err, makeStyler, resolveColorMode } from './term.js';

async function main(): Promise<void> {
  await buildProgram(defaultIO).parseAsync(process.argv);
}

main().catch((e: unknown) => {
  const s = makeStyler(resolveColorMode('auto').enabled);
  process.stderr.write(err(errorMessage(e), s) + '\n');
  process.exitCode = 1;
});
