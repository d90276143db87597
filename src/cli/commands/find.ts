import type { Command } from 'commander';
import { runInteractive, type InteractiveOptions } from '../interactive.js';

export function registerFindCommand(program: Command): void {
  program
    .command('find [dir]')
    .description('Fuzzy-find files under a directory')
    .option('--transform <name>', 'Pattern transform: regex, substring or fuzzy')
    .option('--limit <n>', 'Candidates to display')
    .option('--timeout <ms>', 'Give up on a query after this many ms (0 waits forever)')
    .action(async (dir: string | undefined, opts: InteractiveOptions) => {
      await runInteractive('find', dir ?? '.', opts);
    });
}
