import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { existsSync } from 'node:fs';
import { mkdtemp, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { QuerySession } from '../../src/session/querySession.js';
import { SocketTransport } from '../../src/transport/socketTransport.js';
import type { SessionEvent } from '../../src/types/session.types.js';
import { InProcessSupervisor, socketPathIn } from '../fixtures/inProcessSupervisor.js';

describe('QuerySession against the reference worker', () => {
  let dir: string;
  let transport: SocketTransport;
  let supervisor: InProcessSupervisor;
  let events: SessionEvent[];

  async function startSession(searchCommand: string, expectedCandidates: number): Promise<QuerySession> {
    const session = new QuerySession({ searchCommand, transport, supervisor, endpointName: 'integration' });
    session.on((event) => {
      events.push(event);
    });
    await session.setup();
    await vi.waitFor(() => {
      expect(supervisor.servers.get('integration')?.candidates).toHaveLength(expectedCandidates);
    });
    return session;
  }

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'lineseek-it-'));
    transport = new SocketTransport({ resolvePath: socketPathIn(dir) });
    supervisor = new InProcessSupervisor(dir, transport);
    events = [];
  });

  afterEach(async () => {
    await supervisor.closeAll();
    await rm(dir, { recursive: true, force: true });
  });

  it('filters the backing command output and emits one update cycle', async () => {
    const session = await startSession('echo foo', 1);

    session.input('fo');
    await vi.waitFor(() => {
      expect(events.at(-1)?.type).toBe('refresh');
    });

    expect(events).toEqual([
      { type: 'begin' },
      { type: 'flush' },
      { type: 'append', candidates: ['foo'] },
      { type: 'refresh', terms: ['fo'] },
    ]);
    session.destroy();
  });

  it('reassembles replies longer than one chunk', async () => {
    const session = await startSession("printf 'src/alpha.ts\\nsrc/beta.ts\\nlib/gamma.ts\\n'", 3);

    session.input('src');
    await vi.waitFor(() => {
      expect(events.at(-1)?.type).toBe('refresh');
    });

    expect(events[2]).toEqual({ type: 'append', candidates: ['src/alpha.ts', 'src/beta.ts'] });
    session.destroy();
  });

  it('delivers only the result of the latest pattern when typing quickly', async () => {
    const session = await startSession("printf 'x-file\\ny-file\\n'", 2);

    session.input('x');
    session.input('y');
    await vi.waitFor(() => {
      expect(events.at(-1)?.type).toBe('refresh');
    });
    // Give a stray reply for "x" time to arrive.
    await new Promise((resolve) => setTimeout(resolve, 50));

    expect(events).toEqual([
      { type: 'begin' },
      { type: 'flush' },
      { type: 'append', candidates: ['y-file'] },
      { type: 'refresh', terms: ['y'] },
    ]);
    session.destroy();
  });

  it('ends with destroyed when destroyed during a request and shuts the worker down', async () => {
    const session = await startSession('echo foo', 1);
    const server = supervisor.servers.get('integration');

    session.input('fo');
    session.destroy();
    await server?.closed;
    await new Promise((resolve) => setTimeout(resolve, 50));

    expect(events).toEqual([{ type: 'begin' }, { type: 'destroyed' }]);
    expect(existsSync(join(dir, 'integration.sock'))).toBe(false);
  });
});
