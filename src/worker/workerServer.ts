import { createServer, type Server, type Socket } from 'node:net';
import { rm } from 'node:fs/promises';
import type { Instruction } from '../types/protocol.types.js';
import { decodeRequest, encodeGreeting, encodeResponse } from '../protocol/wire.js';
import { encodeCandidates } from '../transport/resultDecoder.js';
import { endpointPath } from '../transport/endpoint.js';
import { CandidateSource } from './candidateSource.js';
import { filterCandidates } from './candidateFilter.js';
import { describeError, silentLogger, type Logger } from '../logging/logger.js';

export interface WorkerServerOptions {
  endpointName: string;
  maxCandidates: number;
  chunkSize: number;
  shell: string;
  logger?: Logger;
  /** Defaults to the platform socket path for `endpointName`. */
  socketPath?: string;
}

/**
 * Reference worker. Listens on the endpoint, reads one `-eval` request per
 * connection, answers `filter` requests with `-print`/`-print-nonl` lines and
 * closes the connection to end the response.
 */
export class WorkerServer {
  readonly socketPath: string;
  private readonly server: Server;
  private readonly logger: Logger;
  private readonly connections = new Set<Socket>();
  private source: CandidateSource | null = null;
  private closing: Promise<void> | null = null;
  private resolveClosed: () => void = () => undefined;

  /** Settles once the worker has shut down. */
  readonly closed: Promise<void>;

  constructor(private readonly options: WorkerServerOptions) {
    this.logger = options.logger ?? silentLogger;
    this.socketPath = options.socketPath ?? endpointPath(options.endpointName);
    this.server = createServer((socket) => {
      this.handleConnection(socket);
    });
    this.closed = new Promise<void>((resolve) => {
      this.resolveClosed = () => resolve();
    });
  }

  /** Candidates collected so far from the backing command. */
  get candidates(): readonly string[] {
    return this.source?.candidates ?? [];
  }

  async listen(): Promise<void> {
    if (process.platform !== 'win32') {
      await rm(this.socketPath, { force: true });
    }
    await new Promise<void>((resolve, reject) => {
      this.server.once('error', reject);
      this.server.listen(this.socketPath, () => {
        this.server.off('error', reject);
        resolve();
      });
    });
    this.server.on('error', (err) => {
      this.logger.error(`worker socket error: ${err.message}`);
    });
    this.logger.info(`worker listening on ${this.socketPath}`);
  }

  close(): Promise<void> {
    this.closing ??= this.shutdown();
    return this.closing;
  }

  private async shutdown(): Promise<void> {
    this.source?.stop();
    const closed = new Promise<void>((resolve) => {
      this.server.close(() => {
        resolve();
      });
    });
    for (const socket of this.connections) socket.end();
    await closed;
    if (process.platform !== 'win32') {
      await rm(this.socketPath, { force: true });
    }
    this.logger.info('worker stopped');
    this.resolveClosed();
  }

  private handleConnection(socket: Socket): void {
    let buffer = '';
    let handled = false;

    this.connections.add(socket);
    socket.on('close', () => {
      this.connections.delete(socket);
    });
    socket.setEncoding('utf8');
    socket.on('error', (err) => {
      this.logger.debug(`client connection error: ${err.message}`);
    });
    socket.on('data', (chunk: string) => {
      if (handled) return;
      buffer += chunk;
      const newline = buffer.indexOf('\n');
      if (newline === -1) return;
      handled = true;
      this.handleRequest(socket, buffer.slice(0, newline));
    });

    socket.write(encodeGreeting(process.pid));
  }

  private handleRequest(socket: Socket, line: string): void {
    let instruction: Instruction;
    try {
      instruction = decodeRequest(line);
    } catch (err: unknown) {
      this.logger.warn(`dropping request: ${describeError(err)}`);
      socket.end();
      return;
    }

    switch (instruction.op) {
      case 'filter': {
        const matches = filterCandidates(this.candidates, instruction.terms, this.options.maxCandidates);
        this.logger.debug(`filter [${instruction.terms.join(', ')}] -> ${matches.length} candidates`);
        socket.end(encodeResponse(encodeCandidates(matches), this.options.chunkSize));
        return;
      }
      case 'start': {
        this.source?.stop();
        this.source = new CandidateSource(instruction.command, this.options.shell, this.logger);
        this.source.start();
        this.logger.info(`backing command started: ${instruction.command}`);
        socket.end();
        return;
      }
      case 'shutdown': {
        socket.end();
        this.close().catch((err: unknown) => {
          this.logger.error(`worker shutdown failed: ${describeError(err)}`);
        });
        return;
      }
      default: {
        const _exhaustive: never = instruction;
        socket.end();
        return _exhaustive;
      }
    }
  }
}

export async function startWorkerServer(options: WorkerServerOptions): Promise<WorkerServer> {
  const server = new WorkerServer(options);
  await server.listen();
  return server;
}
