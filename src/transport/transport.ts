import type { Instruction } from '../types/protocol.types.js';

export type RequestState = 'open' | 'completed' | 'aborted';

/** One request in flight over its own connection. */
export interface RequestHandle {
  readonly id: number;
  readonly endpointName: string;
  readonly instruction: Instruction;
  readonly state: RequestState;
}

/**
 * Receives the accumulated response payload once the connection closes,
 * or `null` when nothing was accumulated (including connection failures).
 */
export type CompletionCallback = (payload: string | null) => void;

export interface Transport {
  /** Open a fresh connection, write the request, return without waiting. */
  send(endpointName: string, instruction: Instruction, onComplete: CompletionCallback): RequestHandle;

  /** Close the connection and drop its completion callback. Idempotent, never throws. */
  abort(handle: RequestHandle): void;

  /** Send and ignore the reply. Never throws. */
  post(endpointName: string, instruction: Instruction): void;
}
