import type { Command } from 'commander';
import { loadConfig } from '../../config/loader.js';
import { createLogger, describeError } from '../../logging/logger.js';
import { isValidEndpointName } from '../../transport/endpoint.js';
import { startWorkerServer } from '../../worker/workerServer.js';
import { watchParent } from '../../worker/parentWatch.js';

export function registerWorkerCommand(program: Command): void {
  program
    .command('worker')
    .description('Run a search worker (started by find/grep sessions)')
    .requiredOption('--endpoint <name>', 'Endpoint name to listen on')
    .option('--parent-pid <pid>', 'Shut down when this process exits')
    .action(async (opts: { endpoint: string; parentPid?: string }) => {
      if (!isValidEndpointName(opts.endpoint)) {
        throw new Error(`Invalid endpoint name: ${opts.endpoint}`);
      }
      const config = loadConfig();
      const logger = createLogger(config.logLevel, 'worker');
      const server = await startWorkerServer({
        endpointName: opts.endpoint,
        maxCandidates: config.worker.maxCandidates,
        chunkSize: config.worker.chunkSize,
        shell: config.worker.shell,
        logger,
      });

      const parentPid = opts.parentPid !== undefined ? parseInt(opts.parentPid, 10) : NaN;
      if (Number.isInteger(parentPid) && parentPid > 0) {
        const stopWatching = watchParent(parentPid, () => {
          logger.info(`parent ${parentPid} exited, shutting down`);
          server.close().catch((err: unknown) => {
            logger.error(`worker shutdown failed: ${describeError(err)}`);
          });
        });
        await server.closed;
        stopWatching();
        return;
      }
      await server.closed;
    });
}
