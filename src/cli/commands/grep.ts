import type { Command } from 'commander';
import { runInteractive, type InteractiveOptions } from '../interactive.js';

export function registerGrepCommand(program: Command): void {
  program
    .command('grep [dir]')
    .description('Search the text content of files under a directory')
    .option('--transform <name>', 'Pattern transform: regex, substring or fuzzy')
    .option('--limit <n>', 'Candidates to display')
    .option('--timeout <ms>', 'Give up on a query after this many ms (0 waits forever)')
    .action(async (dir: string | undefined, opts: InteractiveOptions) => {
      await runInteractive('grep', dir ?? '.', opts);
    });
}
