import type { AppConfig } from '../types/config.types.js';
import { fileURLToPath } from 'node:url';

// The built CLI entry hosts the worker as well (`lineseek worker --endpoint ...`).
const CLI_ENTRY = fileURLToPath(new URL('../cli/index.js', import.meta.url));

export const DEFAULT_CONFIG: AppConfig = {
  search: {
    findCommand: "find {dir} -type f -not -path '*/.git/*'",
    grepCommand: "grep -rnI --color=never -e '' {dir}",
    transform: 'regex',
  },
  worker: {
    command: process.execPath,
    args: [CLI_ENTRY, 'worker'],
    maxCandidates: 200,
    chunkSize: 4096,
    shell: process.platform === 'win32' ? 'cmd.exe' : '/bin/sh',
  },
  session: {
    requestTimeoutMs: 0,
  },
  picker: {
    limit: 20,
  },
  logLevel: 'warn',
};
