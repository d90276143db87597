import { spawn, type ChildProcess } from 'node:child_process';
import { createInterface } from 'node:readline';
import { describeError, silentLogger, type Logger } from '../logging/logger.js';

/**
 * Runs a backing shell command and collects its stdout lines as candidates.
 * Lines are available to filters as soon as they arrive.
 */
export class CandidateSource {
  private readonly lines: string[] = [];
  private child: ChildProcess | null = null;
  private finished = false;

  constructor(
    readonly command: string,
    private readonly shell: string,
    private readonly logger: Logger = silentLogger,
  ) {}

  get candidates(): readonly string[] {
    return this.lines;
  }

  get done(): boolean {
    return this.finished;
  }

  start(): void {
    if (this.child) return;
    const child = spawn(this.command, {
      shell: this.shell,
      stdio: ['ignore', 'pipe', 'ignore'],
      windowsHide: true,
    });
    this.child = child;

    child.on('error', (err) => {
      this.logger.warn(`backing command failed to start: ${err.message}`);
      this.finished = true;
    });
    child.on('close', (code) => {
      this.finished = true;
      this.logger.debug(`backing command exited (${code ?? 'signal'}) with ${this.lines.length} candidates`);
    });

    if (child.stdout) {
      const reader = createInterface({ input: child.stdout, crlfDelay: Infinity });
      reader.on('line', (line) => {
        if (line !== '') this.lines.push(line);
      });
    }
  }

  stop(): void {
    const child = this.child;
    if (!child || this.finished) return;
    try {
      child.kill();
    } catch (err: unknown) {
      this.logger.debug(`could not stop backing command: ${describeError(err)}`);
    }
  }
}
