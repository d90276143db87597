import type { LogLevel } from '../types/config.types.js';

const LOG_LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

export type LogSink = (line: string) => void;

const stderrSink: LogSink = (line) => {
  process.stderr.write(line);
};

/**
 * Levelled logger writing `[lineseek:<scope>] <level>: <message>` lines.
 * Messages below `minimumLevel` are dropped.
 */
export function createLogger(minimumLevel: LogLevel, scope: string, sink: LogSink = stderrSink): Logger {
  const log = (level: LogLevel, message: string): void => {
    if (LOG_LEVEL_ORDER[level] < LOG_LEVEL_ORDER[minimumLevel]) return;
    sink(`[lineseek:${scope}] ${level}: ${message}\n`);
  };

  return {
    debug: (message) => log('debug', message),
    info: (message) => log('info', message),
    warn: (message) => log('warn', message),
    error: (message) => log('error', message),
  };
}

export const silentLogger: Logger = {
  debug: () => undefined,
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
};

export function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
