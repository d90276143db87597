import { describe, it, expect, beforeEach } from 'vitest';
import { PassThrough } from 'node:stream';
import { applyFlags, runPrompt } from '../../../src/cli/interactive.js';
import { ConfigValidationError } from '../../../src/config/validator.js';
import { DEFAULT_CONFIG } from '../../../src/config/defaults.js';
import { QuerySession } from '../../../src/session/querySession.js';
import { MockTransport } from '../../fixtures/mockTransport.js';
import { MockSupervisor } from '../../fixtures/mockSupervisor.js';

describe('applyFlags', () => {
  it('applies transform, limit and timeout flags', () => {
    const config = applyFlags(DEFAULT_CONFIG, { transform: 'fuzzy', limit: '5', timeout: '300' });

    expect(config.search.transform).toBe('fuzzy');
    expect(config.picker.limit).toBe(5);
    expect(config.session.requestTimeoutMs).toBe(300);
  });

  it('leaves the input config untouched', () => {
    applyFlags(DEFAULT_CONFIG, { transform: 'substring', limit: '3' });

    expect(DEFAULT_CONFIG.search.transform).toBe('regex');
    expect(DEFAULT_CONFIG.picker.limit).toBe(20);
  });

  it('returns an equal config when no flags are given', () => {
    expect(applyFlags(DEFAULT_CONFIG, {})).toEqual(DEFAULT_CONFIG);
  });

  it('rejects an unknown transform', () => {
    expect(() => applyFlags(DEFAULT_CONFIG, { transform: 'glob' })).toThrow(ConfigValidationError);
    expect(() => applyFlags(DEFAULT_CONFIG, { transform: 'glob' })).toThrow(
      'Unknown transform "glob" (expected regex, substring, fuzzy)',
    );
  });
});

describe('runPrompt', () => {
  let transport: MockTransport;
  let session: QuerySession;

  beforeEach(async () => {
    transport = new MockTransport();
    session = new QuerySession({
      searchCommand: 'echo foo',
      transport,
      supervisor: new MockSupervisor(),
      endpointName: 'prompt-test',
    });
    await session.setup();
  });

  it('sends each trimmed line as a pattern and destroys the session at end of input', async () => {
    const input = new PassThrough();
    const output = new PassThrough();
    const done = runPrompt(session, input, output);

    input.write('fo\n');
    input.write('  bar  \n');
    input.end();
    await done;

    expect(transport.sent.map((request) => request.instruction)).toEqual([
      { op: 'filter', terms: ['fo'] },
      { op: 'filter', terms: ['bar'] },
    ]);
    expect(transport.sent[0]?.state).toBe('aborted');
    expect(session.state).toBe('destroyed');
  });

  it('removes its SIGINT handler when it finishes', async () => {
    const before = process.listenerCount('SIGINT');
    const input = new PassThrough();
    const done = runPrompt(session, input, new PassThrough());
    expect(process.listenerCount('SIGINT')).toBe(before + 1);

    input.end();
    await done;

    expect(process.listenerCount('SIGINT')).toBe(before);
  });
});
