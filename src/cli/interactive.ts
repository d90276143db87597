import { createInterface } from 'node:readline';
import type { Readable, Writable } from 'node:stream';
import { resolve } from 'node:path';
import { loadConfig } from '../config/loader.js';
import { ConfigValidationError, validateConfig } from '../config/validator.js';
import { createQuerySession } from '../session/index.js';
import type { QuerySession } from '../session/querySession.js';
import type { SearchMode } from '../session/searchCommand.js';
import type { AppConfig, TransformName } from '../types/config.types.js';
import { TerminalPicker } from './picker.js';

export interface InteractiveOptions {
  transform?: string;
  limit?: string;
  timeout?: string;
}

const TRANSFORMS: readonly TransformName[] = ['regex', 'substring', 'fuzzy'];

function isTransformName(value: string): value is TransformName {
  return TRANSFORMS.some((name) => name === value);
}

/** Apply command-line flags on top of the loaded configuration. */
export function applyFlags(config: AppConfig, opts: InteractiveOptions): AppConfig {
  const next: AppConfig = {
    ...config,
    search: { ...config.search },
    session: { ...config.session },
    picker: { ...config.picker },
  };
  if (opts.transform !== undefined) {
    if (!isTransformName(opts.transform)) {
      throw new ConfigValidationError(`Unknown transform "${opts.transform}" (expected ${TRANSFORMS.join(', ')})`);
    }
    next.search.transform = opts.transform;
  }
  if (opts.limit !== undefined) next.picker.limit = parseInt(opts.limit, 10);
  if (opts.timeout !== undefined) next.session.requestTimeoutMs = parseInt(opts.timeout, 10);
  return next;
}

/**
 * Feed input lines to the session as patterns until the input ends or
 * SIGINT arrives, then destroy the session.
 */
export function runPrompt(session: QuerySession, input: Readable, output: Writable): Promise<void> {
  return new Promise<void>((done) => {
    const rl = createInterface({ input, output, terminal: false });
    let finished = false;
    const finish = (): void => {
      if (finished) return;
      finished = true;
      process.off('SIGINT', finish);
      rl.close();
      session.destroy();
      done();
    };

    rl.on('line', (line) => {
      session.input(line.trim());
    });
    rl.on('close', finish);
    process.once('SIGINT', finish);
  });
}

export async function runInteractive(mode: SearchMode, dir: string, opts: InteractiveOptions): Promise<void> {
  const config = applyFlags(loadConfig(), opts);
  validateConfig(config);

  const session = createQuerySession(config, { mode, dir: resolve(dir) });
  const picker = new TerminalPicker(session, {
    limit: config.picker.limit,
    output: process.stdout,
    color: process.stdout.isTTY,
  });
  try {
    await session.setup();
    process.stderr.write(`[lineseek] ${mode} in ${resolve(dir)}: type a pattern and press enter\n`);
    await runPrompt(session, process.stdin, process.stdout);
  } finally {
    session.destroy();
    picker.close();
  }
}
