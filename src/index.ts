// Public API: explicit named exports only (no re-export *)

export type { AppConfig, LogLevel, TransformName } from './types/config.types.js';
export type {
  SessionEvent,
  SessionEventListener,
  SessionState,
  PatternTransform,
  HighlightFunction,
  HighlightSegment,
} from './types/session.types.js';
export type { Instruction } from './types/protocol.types.js';
export type { Transport, RequestHandle, CompletionCallback } from './transport/transport.js';
export type { WorkerSupervisor, WorkerHandle } from './worker/processSupervisor.js';
export type { SessionOptions } from './session/querySession.js';
export type { SearchMode } from './session/searchCommand.js';
export type { Logger } from './logging/logger.js';

export { QuerySession } from './session/querySession.js';
export { createQuerySession } from './session/index.js';
export { regexTransform, substringTransform, fuzzyTransform, PATTERN_TRANSFORMS } from './session/patternTransform.js';
export { highlightMatches } from './session/highlight.js';
export { renderSearchCommand } from './session/searchCommand.js';
export { SocketTransport } from './transport/socketTransport.js';
export { decodeCandidates } from './transport/resultDecoder.js';
export { createEndpointName, endpointPath } from './transport/endpoint.js';
export { quoteArg, unquoteArg } from './protocol/quoting.js';
export { ProcessSupervisor } from './worker/processSupervisor.js';
export { WorkerServer, startWorkerServer } from './worker/workerServer.js';
export { loadConfig } from './config/loader.js';
export { validateConfig, ConfigValidationError } from './config/validator.js';
export { createLogger } from './logging/logger.js';
export { LineseekError } from './errors/base.js';
export { WorkerSpawnError } from './errors/worker.js';
export { ProtocolError } from './errors/protocol.js';
export { SessionStateError } from './errors/session.js';
