import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { isProcessAlive, watchParent } from '../../../src/worker/parentWatch.js';

describe('isProcessAlive', () => {
  it('is true for the current process', () => {
    expect(isProcessAlive(process.pid)).toBe(true);
  });
});

describe('watchParent', () => {
  beforeEach(() => {
    vi.useFakeTimers();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('calls onGone once the parent disappears', () => {
    let alive = true;
    const onGone = vi.fn();
    watchParent(99, onGone, 1000, () => alive);

    vi.advanceTimersByTime(3000);
    expect(onGone).not.toHaveBeenCalled();

    alive = false;
    vi.advanceTimersByTime(1000);
    vi.advanceTimersByTime(5000);
    expect(onGone).toHaveBeenCalledTimes(1);
  });

  it('stops polling when the returned function is called', () => {
    const isAlive = vi.fn(() => true);
    const stop = watchParent(99, vi.fn(), 1000, isAlive);

    vi.advanceTimersByTime(2000);
    stop();
    vi.advanceTimersByTime(5000);
    expect(isAlive).toHaveBeenCalledTimes(2);
  });
});
