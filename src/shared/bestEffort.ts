import type { ScopedLog } from '@/shared/logging/logger';
import { errorMessage } from '@/shared/logging/logger';

export type BestEffortOptions<T> = {
  fallback: T;
  onError?: 'ignore' | 'debug' | 'warn';
  label?: string;
  context?: Record<string, unknown>;
  log?: ScopedLog;
};

function logBestEffortFailure(error: unknown, options: BestEffortOptions<unknown>): void {
  if (!options.log || !options.onError || options.onError === 'ignore') {
    return;
  }
  const label = options.label ?? 'best-effort fallback used';
  const context = { ...options.context, message: errorMessage(error) };
  if (options.onError === 'warn') {
    options.log.warn(label, context);
  } else {
    options.log.debug(label, context);
  }
}

export async function bestEffort<T>(
  fn: () => Promise<T>,
  options: BestEffortOptions<T>,
): Promise<T> {
  try {
    return await fn();
  } catch (error) {
    logBestEffortFailure(error, options);
    return options.fallback;
  }
}

export function bestEffortSync<T>(fn: () => T, options: BestEffortOptions<T>): T {
  try {
    return fn();
  } catch (error) {
    logBestEffortFailure(error, options);
    return options.fallback;
  }
}

export function safeJsonParse(
  raw: string,
  options: Omit<BestEffortOptions<unknown>, 'fallback'> = {},
): unknown {
  return bestEffortSync<unknown>(() => JSON.parse(raw), { ...options, fallback: undefined });
}

export async function safeReadText(
  response: { text: () => Promise<string> },
  fallback = '',
  options: Omit<BestEffortOptions<string>, 'fallback'> = {},
): Promise<string> {
  return bestEffort(() => response.text(), { ...options, fallback });
}
