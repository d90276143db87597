export function isProcessAlive(pid: number): boolean {
  try {
    process.kill(pid, 0);
    return true;
  } catch (err: unknown) {
    // EPERM: the process exists but belongs to someone else.
    return err instanceof Error && 'code' in err && err.code === 'EPERM';
  }
}

/**
 * Call `onGone` once the process `pid` has exited. The interval does not keep
 * the event loop alive. Returns a function that stops watching.
 */
export function watchParent(
  pid: number,
  onGone: () => void,
  intervalMs = 2000,
  isAlive: (pid: number) => boolean = isProcessAlive,
): () => void {
  const timer = setInterval(() => {
    if (isAlive(pid)) return;
    clearInterval(timer);
    onGone();
  }, intervalMs);
  timer.unref();
  return () => {
    clearInterval(timer);
  };
}
