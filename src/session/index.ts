import type { AppConfig } from '../types/config.types.js';
import { QuerySession } from './querySession.js';
import { renderSearchCommand, type SearchMode } from './searchCommand.js';
import { PATTERN_TRANSFORMS } from './patternTransform.js';
import { SocketTransport } from '../transport/socketTransport.js';
import { ProcessSupervisor } from '../worker/processSupervisor.js';
import { createLogger, type Logger } from '../logging/logger.js';

export { QuerySession } from './querySession.js';
export type { SessionOptions } from './querySession.js';

export interface CreateSessionOptions {
  mode: SearchMode;
  dir: string;
  logger?: Logger;
}

/**
 * Factory that wires a QuerySession to a socket transport and a supervisor
 * spawning `config.worker.command` as the worker.
 */
export function createQuerySession(config: AppConfig, options: CreateSessionOptions): QuerySession {
  const logger = options.logger ?? createLogger(config.logLevel, 'session');
  const transport = new SocketTransport({ logger });
  const supervisor = new ProcessSupervisor({
    command: config.worker.command,
    args: config.worker.args,
    transport,
    logger,
  });
  const template = options.mode === 'find' ? config.search.findCommand : config.search.grepCommand;

  return new QuerySession({
    searchCommand: renderSearchCommand(template, options.dir),
    transport,
    supervisor,
    transform: PATTERN_TRANSFORMS[config.search.transform],
    requestTimeoutMs: config.session.requestTimeoutMs,
    logger,
  });
}
