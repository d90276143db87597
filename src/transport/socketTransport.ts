import { createConnection, type Socket } from 'node:net';
import type { Instruction } from '../types/protocol.types.js';
import type { CompletionCallback, RequestHandle, RequestState, Transport } from './transport.js';
import { accumulate, encodeRequest, parseResponseLine } from '../protocol/wire.js';
import { endpointPath } from './endpoint.js';
import { describeError, silentLogger, type Logger } from '../logging/logger.js';

export interface SocketTransportOptions {
  logger?: Logger;
  /** Maps an endpoint name to the socket path to dial. */
  resolvePath?: (endpointName: string) => string;
}

class SocketRequest implements RequestHandle {
  state: RequestState = 'open';
  /** Accumulated response payload; null until the first print line. */
  payload: string | null = null;
  /** Trailing bytes of a line whose newline has not arrived yet. */
  pending = '';

  constructor(
    readonly id: number,
    readonly endpointName: string,
    readonly instruction: Instruction,
    readonly socket: Socket,
  ) {}

  consume(text: string): void {
    const lines = (this.pending + text).split('\n');
    this.pending = lines.pop() ?? '';
    for (const line of lines) {
      this.payload = accumulate(this.payload, parseResponseLine(line));
    }
  }

  flushPending(): void {
    if (this.pending === '') return;
    this.payload = accumulate(this.payload, parseResponseLine(this.pending));
    this.pending = '';
  }
}

/**
 * Transport over Unix domain sockets (named pipes on Windows).
 *
 * One request per connection: the request line is written as soon as the
 * socket is created and the response ends when the worker closes it.
 */
export class SocketTransport implements Transport {
  private readonly logger: Logger;
  private readonly resolvePath: (endpointName: string) => string;
  private nextId = 1;

  constructor(options: SocketTransportOptions = {}) {
    this.logger = options.logger ?? silentLogger;
    this.resolvePath = options.resolvePath ?? ((name) => endpointPath(name));
  }

  send(endpointName: string, instruction: Instruction, onComplete: CompletionCallback): RequestHandle {
    const socket = createConnection({ path: this.resolvePath(endpointName) });
    const request = new SocketRequest(this.nextId++, endpointName, instruction, socket);

    socket.setEncoding('utf8');
    socket.on('data', (chunk: string) => {
      request.consume(chunk);
    });
    // A failed or dropped connection still ends in 'close'; the caller sees "no result".
    socket.on('error', (err: Error) => {
      this.logger.debug(`request #${request.id} (${instruction.op}) to ${endpointName} failed: ${err.message}`);
    });
    socket.on('close', () => {
      if (request.state !== 'open') return;
      request.flushPending();
      request.state = 'completed';
      onComplete(request.payload);
    });

    socket.write(encodeRequest(instruction));
    this.logger.debug(`request #${request.id} (${instruction.op}) sent to ${endpointName}`);
    return request;
  }

  abort(handle: RequestHandle): void {
    if (!(handle instanceof SocketRequest) || handle.state !== 'open') return;
    const request = handle;
    request.state = 'aborted';
    request.payload = null;
    request.pending = '';
    request.socket.removeAllListeners('data');
    request.socket.removeAllListeners('close');
    try {
      request.socket.destroy();
    } catch (err: unknown) {
      this.logger.debug(`abort of request #${request.id} failed: ${describeError(err)}`);
    }
    this.logger.debug(`request #${request.id} aborted`);
  }

  post(endpointName: string, instruction: Instruction): void {
    this.send(endpointName, instruction, (payload) => {
      this.logger.debug(
        `${instruction.op} to ${endpointName} finished${payload === null ? ' without a reply' : ''}`,
      );
    });
  }
}
