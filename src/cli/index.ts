#!/usr/bin/env node

import { readFileSync } from 'node:fs';
import { Command } from 'commander';
import { z } from 'zod';
import { CLIError } from './helpers.js';
import { registerAskCommand } from './ask.js';
import { registerModelsCommand } from './models.js';

const program = new Command();

const pkg = z
  .object({ version: z.string() })
  .parse(JSON.parse(readFileSync(new URL('../../package.json', import.meta.url), 'utf-8')));
program
  .name('fact-council')
  .description('Fact-checking council: answer, cross-check, rank, synthesize')
  .version(pkg.version);

registerAskCommand(program);
registerModelsCommand(program);

// Exit once the command finishes; in-flight timers of abandoned calls must not hold the process
program.hook('postAction', () => {
  process.exit(0);
});

program.parseAsync(process.argv).catch((err: unknown) => {
  if (err instanceof CLIError) {
    if (err.message) console.error(err.message);
    process.exit(err.exitCode);
  }
  throw err;
});
