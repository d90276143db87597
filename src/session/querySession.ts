import type {
  HighlightFunction,
  PatternTransform,
  SessionEvent,
  SessionEventListener,
  SessionState,
} from '../types/session.types.js';
import type { RequestHandle, Transport } from '../transport/transport.js';
import type { WorkerHandle, WorkerSupervisor } from '../worker/processSupervisor.js';
import { createEndpointName } from '../transport/endpoint.js';
import { decodeCandidates } from '../transport/resultDecoder.js';
import { SessionStateError } from '../errors/session.js';
import { describeError, silentLogger, type Logger } from '../logging/logger.js';
import { regexTransform } from './patternTransform.js';
import { highlightMatches } from './highlight.js';
import { accepts, nextState, type TransitionTrigger } from './transitions.js';

export interface SessionOptions {
  /** Shell command whose output lines are the candidates. */
  searchCommand: string;
  transport: Transport;
  supervisor: WorkerSupervisor;
  transform?: PatternTransform;
  highlight?: HighlightFunction;
  /** Abort a request that has not completed after this many ms. 0 or absent disables. */
  requestTimeoutMs?: number;
  endpointName?: string;
  logger?: Logger;
}

/** Internal commands driving the state machine. */
type SessionCommand =
  | { type: 'input'; text: string }
  | { type: 'complete'; requestId: number; payload: string | null }
  | { type: 'timeout'; requestId: number };

interface InFlightRequest {
  id: number;
  pattern: string;
  terms: string[];
  handle: RequestHandle;
  timer: NodeJS.Timeout | null;
}

/**
 * One interactive query session bound to its own worker process.
 *
 * At most one filter request is in flight: every new pattern aborts the
 * previous request before dispatching, and completions of superseded
 * requests are dropped. Consumers observe
 * `begin`, then `flush` / `append` / `refresh` per completed request, then `destroyed`.
 */
export class QuerySession {
  readonly endpointName: string;
  readonly searchCommand: string;
  readonly highlight: HighlightFunction;

  private readonly transport: Transport;
  private readonly supervisor: WorkerSupervisor;
  private readonly transform: PatternTransform;
  private readonly requestTimeoutMs: number;
  private readonly logger: Logger;
  private readonly listeners = new Set<SessionEventListener>();

  private currentState: SessionState = 'uninitialized';
  private setupStarted = false;
  private worker: WorkerHandle | null = null;
  private lastPattern: string | null = null;
  private inFlight: InFlightRequest | null = null;
  private nextRequestId = 1;

  constructor(options: SessionOptions) {
    this.endpointName = options.endpointName ?? createEndpointName();
    this.searchCommand = options.searchCommand;
    this.transport = options.transport;
    this.supervisor = options.supervisor;
    this.transform = options.transform ?? regexTransform;
    this.highlight = options.highlight ?? highlightMatches;
    this.requestTimeoutMs = options.requestTimeoutMs ?? 0;
    this.logger = options.logger ?? silentLogger;
  }

  get state(): SessionState {
    return this.currentState;
  }

  /** The last pattern that was dispatched to the worker. */
  get lastDispatchedPattern(): string | null {
    return this.lastPattern;
  }

  get hasRequestInFlight(): boolean {
    return this.inFlight !== null;
  }

  /** Subscribe to session events. Returns the unsubscribe function. */
  on(listener: SessionEventListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  /**
   * Emit `begin`, start the worker, wait for its endpoint and hand it the backing command.
   * Rejects with WorkerSpawnError when the worker cannot be started; the
   * session is then finished and emits nothing further.
   */
  async setup(): Promise<void> {
    if (this.setupStarted || this.currentState !== 'uninitialized') {
      throw new SessionStateError(`setup() called in state "${this.currentState}"`, this.currentState);
    }
    this.setupStarted = true;
    this.emit({ type: 'begin' });

    let worker: WorkerHandle;
    try {
      worker = await this.supervisor.spawn(this.endpointName);
    } catch (err: unknown) {
      this.logger.error(`session ${this.endpointName} setup failed: ${describeError(err)}`);
      this.currentState = 'destroyed';
      throw err;
    }
    this.worker = worker;

    if (this.state === 'destroyed') {
      // destroy() ran while the worker was starting
      this.terminateWorker();
      return;
    }

    this.bestEffort('initialize', () => {
      this.supervisor.initialize(this.endpointName, this.searchCommand);
    });
    this.transition('setup');
    this.logger.debug(`session ${this.endpointName} ready (worker pid ${worker.pid ?? 'unknown'})`);
  }

  /** Submit the current input text. Empty or repeated text is ignored. */
  input(text: string): void {
    this.dispatch({ type: 'input', text });
  }

  /** Abort any request, shut the worker down, emit `destroyed`. Safe to call repeatedly. */
  destroy(): void {
    if (this.currentState === 'destroyed') return;
    this.abortInFlight();
    this.terminateWorker();
    this.transition('destroy');
    this.emit({ type: 'destroyed' });
    this.logger.debug(`session ${this.endpointName} destroyed`);
  }

  private dispatch(command: SessionCommand): void {
    switch (command.type) {
      case 'input':
        this.handleInput(command.text);
        return;
      case 'complete':
        this.handleComplete(command.requestId, command.payload);
        return;
      case 'timeout':
        this.handleTimeout(command.requestId);
        return;
      default: {
        const _exhaustive: never = command;
        return _exhaustive;
      }
    }
  }

  private handleInput(text: string): void {
    if (!accepts(this.currentState, 'dispatch')) return;
    if (text === '' || text === this.lastPattern) return;

    this.abortInFlight();

    const terms = this.transform(text);
    const id = this.nextRequestId++;
    // Recorded now, not on completion, so a quick second keystroke supersedes this one.
    this.lastPattern = text;

    const handle = this.transport.send(this.endpointName, { op: 'filter', terms }, (payload) => {
      this.dispatch({ type: 'complete', requestId: id, payload });
    });
    this.inFlight = { id, pattern: text, terms, handle, timer: this.startTimer(id) };
    this.transition('dispatch');
    this.logger.debug(`request #${id} dispatched for "${text}" (${terms.length} terms)`);
  }

  private handleComplete(requestId: number, payload: string | null): void {
    const request = this.inFlight;
    if (!request || request.id !== requestId) return;
    if (!accepts(this.currentState, 'complete')) return;

    this.clearTimer(request);
    this.inFlight = null;
    const candidates = decodeCandidates(payload);

    this.transition('complete');
    const sequence: SessionEvent[] = [
      { type: 'flush' },
      { type: 'append', candidates },
      { type: 'refresh', terms: request.terms },
    ];
    for (const event of sequence) {
      // A listener may destroy the session mid-sequence; `destroyed` stays last.
      if (this.currentState === 'destroyed') return;
      this.emit(event);
    }
  }

  private handleTimeout(requestId: number): void {
    const request = this.inFlight;
    if (!request || request.id !== requestId) return;
    this.logger.warn(`request for "${request.pattern}" timed out after ${this.requestTimeoutMs}ms`);
    request.timer = null;
    this.transport.abort(request.handle);
    this.handleComplete(requestId, null);
  }

  private startTimer(requestId: number): NodeJS.Timeout | null {
    if (this.requestTimeoutMs <= 0) return null;
    const timer = setTimeout(() => {
      this.dispatch({ type: 'timeout', requestId });
    }, this.requestTimeoutMs);
    timer.unref();
    return timer;
  }

  private clearTimer(request: InFlightRequest): void {
    if (request.timer) clearTimeout(request.timer);
    request.timer = null;
  }

  private abortInFlight(): void {
    const request = this.inFlight;
    if (!request) return;
    this.inFlight = null;
    this.clearTimer(request);
    this.bestEffort('abort', () => {
      this.transport.abort(request.handle);
    });
  }

  private terminateWorker(): void {
    if (!this.worker) return;
    this.worker = null;
    this.bestEffort('terminate', () => {
      this.supervisor.terminate(this.endpointName);
    });
  }

  private bestEffort(operation: string, run: () => void): void {
    try {
      run();
    } catch (err: unknown) {
      this.logger.debug(`${operation} failed for ${this.endpointName}: ${describeError(err)}`);
    }
  }

  private transition(trigger: TransitionTrigger): void {
    const next = nextState(this.currentState, trigger);
    if (next !== undefined) this.currentState = next;
  }

  private emit(event: SessionEvent): void {
    for (const listener of this.listeners) {
      try {
        listener(event);
      } catch (err: unknown) {
        this.logger.error(`session ${this.endpointName} listener failed on ${event.type}: ${describeError(err)}`);
      }
    }
  }
}
