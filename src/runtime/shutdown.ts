import type { Runtime } from '@/runtime/bootstrap';
import { createLogger, type ScopedLog } from '@/shared/logging/logger';

export interface ShutdownOptions {
  /** Extra cleanup that runs before the runtime stops, e.g. closing stdin. */
  beforeStop?: () => void;
  forceExitAfterMs?: number;
  log?: ScopedLog;
}

/**
 * Stops the runtime on SIGINT/SIGTERM. Returns the shutdown routine so other
 * triggers (end of input) share the same path.
 */
export function registerShutdownHandlers(
  runtime: Pick<Runtime, 'stop'>,
  options: ShutdownOptions = {},
): () => Promise<void> {
  const log = options.log ?? createLogger('Server');
  let shuttingDown = false;

  const shutdown = async (): Promise<void> => {
    if (shuttingDown) {
      return;
    }
    shuttingDown = true;
    log.info('shutting down');

    // Watchdog: a stop hook that never settles must not keep the process alive.
    const forceExit = setTimeout(() => {
      log.warn('shutdown timed out; forcing exit');
      process.exit(1);
    }, options.forceExitAfterMs ?? 8000);
    forceExit.unref();

    options.beforeStop?.();
    await runtime.stop();

    clearTimeout(forceExit);
    process.exitCode = 0;
  };

  const onSignal = (): void => {
    void shutdown();
  };
  process.once('SIGINT', onSignal);
  process.once('SIGTERM', onSignal);
  return shutdown;
}
