import type { CancelTimer, TimerPort } from '@/ports/TimerPort';

/**
 * TimerPort backed by Node timers. Timers are unref'd so a pending retry or
 * tick never keeps the process alive on its own.
 */
export const nodeTimers: TimerPort = {
  schedule(delayMs: number, callback: () => void): CancelTimer {
    const handle = setTimeout(callback, Math.max(0, delayMs));
    handle.unref();
    return () => clearTimeout(handle);
  },
  every(intervalMs: number, callback: () => void): CancelTimer {
    const handle = setInterval(callback, Math.max(1, intervalMs));
    handle.unref();
    return () => clearInterval(handle);
  },
  sleep(delayMs: number): Promise<void> {
    return new Promise((resolve) => {
      setTimeout(resolve, Math.max(0, delayMs));
    });
  },
};
