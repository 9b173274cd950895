/** Cancels a scheduled callback; calling it twice is harmless. */
export type CancelTimer = () => void;

/**
 * Scheduled callbacks. Timers are not guaranteed to fire while the process is
 * suspended, so callers recompute from the clock instead of counting firings.
 */
export interface TimerPort {
  schedule(delayMs: number, callback: () => void): CancelTimer;
  every(intervalMs: number, callback: () => void): CancelTimer;
  sleep(delayMs: number): Promise<void>;
}
