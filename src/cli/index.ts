#!/usr/bin/env node
import { Command } from 'commander';
import { createRequire } from 'node:module';
import { registerFindCommand } from './commands/find.js';
import { registerGrepCommand } from './commands/grep.js';
import { registerWorkerCommand } from './commands/worker.js';

const require = createRequire(import.meta.url);

const pkg = require('../../package.json') as { version: string; description: string };

async function main(): Promise<void> {
  const program = new Command();

  program
    .name('lineseek')
    .description(pkg.description)
    .version(pkg.version);

  registerFindCommand(program);
  registerGrepCommand(program);
  registerWorkerCommand(program);

  await program.parseAsync(process.argv);
}

main().catch((err: unknown) => {
  const message = err instanceof Error ? err.message : String(err);
  process.stderr.write(`[lineseek] Error: ${message}\n`);
  process.exit(1);
});
