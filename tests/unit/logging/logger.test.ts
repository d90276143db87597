import { describe, it, expect } from 'vitest';
import { createLogger, describeError, silentLogger } from '../../../src/logging/logger.js';

describe('createLogger', () => {
  it('writes scoped lines at or above the minimum level', () => {
    const lines: string[] = [];
    const logger = createLogger('info', 'session', (line) => lines.push(line));

    logger.debug('hidden');
    logger.info('ready');
    logger.warn('slow');
    logger.error('broken');

    expect(lines).toEqual([
      '[lineseek:session] info: ready\n',
      '[lineseek:session] warn: slow\n',
      '[lineseek:session] error: broken\n',
    ]);
  });

  it('writes everything at debug level', () => {
    const lines: string[] = [];
    createLogger('debug', 'worker', (line) => lines.push(line)).debug('details');
    expect(lines).toEqual(['[lineseek:worker] debug: details\n']);
  });

  it('silentLogger drops everything', () => {
    expect(() => {
      silentLogger.error('nothing');
    }).not.toThrow();
  });
});

describe('describeError', () => {
  it('uses the message of an Error and stringifies anything else', () => {
    expect(describeError(new Error('boom'))).toBe('boom');
    expect(describeError(42)).toBe('42');
  });
});
