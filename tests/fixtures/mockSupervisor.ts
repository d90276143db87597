import type { WorkerHandle, WorkerSupervisor } from '../../src/worker/processSupervisor.js';
import { WorkerSpawnError } from '../../src/errors/worker.js';

/**
 * Mock WorkerSupervisor for tests.
 * Set `shouldFail` to reject spawns, or `spawnGate` to hold them open.
 */
export class MockSupervisor implements WorkerSupervisor {
  spawned: string[] = [];
  initialized: { endpointName: string; searchCommand: string }[] = [];
  terminated: string[] = [];
  shouldFail = false;
  throwOnTerminate = false;
  spawnGate: Promise<void> | null = null;

  async spawn(endpointName: string): Promise<WorkerHandle> {
    this.spawned.push(endpointName);
    if (this.spawnGate) await this.spawnGate;
    if (this.shouldFail) throw new WorkerSpawnError('mock spawn failure', endpointName);
    return { endpointName, pid: 4242 };
  }

  initialize(endpointName: string, searchCommand: string): void {
    this.initialized.push({ endpointName, searchCommand });
  }

  terminate(endpointName: string): void {
    this.terminated.push(endpointName);
    if (this.throwOnTerminate) throw new Error('worker already gone');
  }
}
