import { spawn, type ChildProcess } from 'node:child_process';
import type { Transport } from '../transport/transport.js';
import { endpointPath, waitForEndpoint } from '../transport/endpoint.js';
import { WorkerSpawnError } from '../errors/worker.js';
import { describeError, silentLogger, type Logger } from '../logging/logger.js';

export interface WorkerHandle {
  endpointName: string;
  pid: number | undefined;
}

export interface WorkerSupervisor {
  /** Launch a worker bound to `endpointName`. Resolves once the endpoint accepts connections. */
  spawn(endpointName: string): Promise<WorkerHandle>;
  /** Tell the worker which backing command to run. Not awaited. */
  initialize(endpointName: string, searchCommand: string): void;
  /** Ask the worker to shut down. Not awaited. */
  terminate(endpointName: string): void;
}

export interface ProcessSupervisorOptions {
  command: string;
  args: string[];
  transport: Transport;
  logger?: Logger;
  /** Kill a worker still running this long after `terminate`. 0 disables. */
  killGraceMs?: number;
  /** Give up on a worker whose endpoint is not reachable after this long. */
  readyTimeoutMs?: number;
  readyIntervalMs?: number;
  /** Maps an endpoint name to the socket path the worker listens on. */
  resolvePath?: (endpointName: string) => string;
}

/** Supervises worker processes spawned as detached children of this process. */
export class ProcessSupervisor implements WorkerSupervisor {
  private readonly logger: Logger;
  private readonly children = new Map<string, ChildProcess>();
  private readonly resolvePath: (endpointName: string) => string;

  constructor(private readonly options: ProcessSupervisorOptions) {
    this.logger = options.logger ?? silentLogger;
    this.resolvePath = options.resolvePath ?? ((name) => endpointPath(name));
  }

  async spawn(endpointName: string): Promise<WorkerHandle> {
    const child = await this.launch(endpointName);
    const exited = (): boolean => child.exitCode !== null || child.signalCode !== null;
    const timeoutMs = this.options.readyTimeoutMs ?? 10_000;

    const reachable = await waitForEndpoint(this.resolvePath(endpointName), {
      timeoutMs,
      intervalMs: this.options.readyIntervalMs,
      shouldStop: exited,
    });
    if (!reachable) {
      const reason = exited() ? 'exited before it was reachable' : `was not reachable after ${timeoutMs}ms`;
      this.children.delete(endpointName);
      if (!exited()) child.kill();
      throw new WorkerSpawnError(`Worker ${endpointName} ${reason}`, endpointName);
    }

    this.logger.debug(`worker ${endpointName} reachable`);
    return { endpointName, pid: child.pid };
  }

  private launch(endpointName: string): Promise<ChildProcess> {
    const args = [...this.options.args, '--endpoint', endpointName, '--parent-pid', String(process.pid)];

    return new Promise<ChildProcess>((resolve, reject) => {
      let child: ChildProcess;
      try {
        child = spawn(this.options.command, args, {
          detached: true,
          stdio: 'ignore',
          windowsHide: true,
        });
      } catch (err: unknown) {
        reject(new WorkerSpawnError(`Could not start worker: ${describeError(err)}`, endpointName, err));
        return;
      }

      child.once('spawn', () => {
        child.unref();
        this.children.set(endpointName, child);
        this.logger.debug(`worker ${endpointName} started (pid ${child.pid ?? 'unknown'})`);
        resolve(child);
      });
      child.once('error', (err) => {
        reject(new WorkerSpawnError(`Could not start worker: ${err.message}`, endpointName, err));
      });
      // Errors after start (e.g. a failed kill) are not fatal to the session.
      child.on('error', (err) => {
        this.logger.debug(`worker ${endpointName}: ${err.message}`);
      });
      child.once('exit', (code, signal) => {
        this.children.delete(endpointName);
        this.logger.debug(`worker ${endpointName} exited (${code ?? signal ?? 'unknown'})`);
      });
    });
  }

  initialize(endpointName: string, searchCommand: string): void {
    this.options.transport.post(endpointName, { op: 'start', command: searchCommand });
  }

  terminate(endpointName: string): void {
    this.options.transport.post(endpointName, { op: 'shutdown' });

    const child = this.children.get(endpointName);
    const grace = this.options.killGraceMs ?? 2000;
    if (!child || grace <= 0) return;

    const timer = setTimeout(() => {
      if (child.exitCode !== null || child.signalCode !== null) return;
      this.logger.debug(`worker ${endpointName} still running, killing it`);
      child.kill();
    }, grace);
    timer.unref();
  }
}
