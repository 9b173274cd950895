/**
 * Runs `task` with an abort signal and rejects with `onTimeout()` once
 * `timeoutMs` passes, whichever stage of the task is still pending. The signal
 * is aborted at the deadline so the task can release its resources.
 */
export async function withDeadline<T>(
  timeoutMs: number,
  task: (signal: AbortSignal) => Promise<T>,
  onTimeout: () => Error,
): Promise<T> {
  const controller = new AbortController();
  let timeoutHandle: NodeJS.Timeout | null = null;
  const deadline = new Promise<never>((_resolve, reject) => {
    timeoutHandle = setTimeout(() => {
      controller.abort();
      reject(onTimeout());
    }, timeoutMs);
  });

  return Promise.race([task(controller.signal), deadline]).finally(() => {
    if (timeoutHandle) {
      clearTimeout(timeoutHandle);
    }
  });
}
