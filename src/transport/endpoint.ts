import { randomBytes } from 'node:crypto';
import { createConnection } from 'node:net';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { setTimeout as delay } from 'node:timers/promises';

const ENDPOINT_NAME = /^[A-Za-z0-9._-]+$/;

/** A fresh endpoint name, unique per process and call. */
export function createEndpointName(prefix = 'lineseek'): string {
  return `${prefix}-${process.pid}-${randomBytes(6).toString('hex')}`;
}

export function isValidEndpointName(name: string): boolean {
  return ENDPOINT_NAME.test(name);
}

/** Socket path for an endpoint: a named pipe on Windows, a socket file in tmpdir elsewhere. */
export function endpointPath(
  name: string,
  platform: NodeJS.Platform = process.platform,
  dir: string = tmpdir(),
): string {
  if (platform === 'win32') return `\\\\.\\pipe\\${name}`;
  return join(dir, `${name}.sock`);
}

export interface WaitForEndpointOptions {
  timeoutMs: number;
  intervalMs?: number;
  /** Checked between attempts; returning true gives up early. */
  shouldStop?: () => boolean;
}

/** Resolves true once something accepts a connection on `path`. */
export function canConnect(path: string): Promise<boolean> {
  return new Promise((resolve) => {
    const socket = createConnection({ path });
    socket.once('connect', () => {
      socket.destroy();
      resolve(true);
    });
    socket.once('error', () => {
      socket.destroy();
      resolve(false);
    });
  });
}

/**
 * Poll `path` until it accepts a connection. Resolves false when the
 * deadline passes or `shouldStop` returns true first.
 */
export async function waitForEndpoint(path: string, options: WaitForEndpointOptions): Promise<boolean> {
  const deadline = Date.now() + options.timeoutMs;
  const interval = options.intervalMs ?? 25;
  for (;;) {
    if (await canConnect(path)) return true;
    if (options.shouldStop?.() === true || Date.now() >= deadline) return false;
    await delay(interval);
  }
}
