import { LineseekError } from './base.js';

export class WorkerSpawnError extends LineseekError {
  constructor(
    message: string,
    public readonly endpointName: string,
    cause?: unknown,
  ) {
    super(message, 'WORKER_SPAWN_ERROR', cause);
  }
}
