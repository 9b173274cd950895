import {
  canChangeIntent,
  describeIntent,
  isSessionActive,
  type AppIntent,
} from '@/domain/intent/appIntent';
import type { TrainingMode } from '@/domain/training/types';
import { bestEffortSync } from '@/shared/bestEffort';
import { createLogger, type ScopedLog } from '@/shared/logging/logger';

export type IntentListener = (intent: AppIntent, previous: AppIntent) => void;

/**
 * Owns what the user is doing right now. Other components read it to decide
 * whether background work (reconnects, polling) is worth doing.
 */
export class IntentCoordinator {
  private intent: AppIntent = { activity: 'idle', inForeground: true };
  private readonly listeners = new Set<IntentListener>();
  private readonly log: ScopedLog;

  constructor(log?: ScopedLog) {
    this.log = log ?? createLogger('Session', 'Intent');
  }

  public get current(): AppIntent {
    return this.intent;
  }

  public subscribe(listener: IntentListener): () => void {
    this.listeners.add(listener);
    return () => this.listeners.delete(listener);
  }

  public enterSetup(mode: TrainingMode): boolean {
    return this.change({ activity: 'setup', mode, inForeground: this.intent.inForeground });
  }

  public activate(mode: TrainingMode): boolean {
    return this.change({ activity: 'active', mode, inForeground: this.intent.inForeground });
  }

  public complete(mode: TrainingMode): boolean {
    return this.change({ activity: 'complete', mode, inForeground: this.intent.inForeground });
  }

  public reset(): boolean {
    if (this.intent.activity === 'idle') return true;
    return this.change({ activity: 'idle', inForeground: this.intent.inForeground });
  }

  public setForeground(inForeground: boolean): void {
    if (this.intent.inForeground === inForeground) return;
    this.apply({ ...this.intent, inForeground });
  }

  public isSessionActive(): boolean {
    return isSessionActive(this.intent);
  }

  public get inForeground(): boolean {
    return this.intent.inForeground;
  }

  private change(next: AppIntent): boolean {
    if (!canChangeIntent(this.intent, next)) {
      this.log.warn('illegal intent change rejected', {
        from: describeIntent(this.intent),
        to: describeIntent(next),
      });
      return false;
    }
    this.apply(next);
    return true;
  }

  private apply(next: AppIntent): void {
    const previous = this.intent;
    this.intent = next;
    this.log.debug('intent changed', { from: describeIntent(previous), to: describeIntent(next) });
    for (const listener of this.listeners) {
      bestEffortSync(() => listener(next, previous), {
        fallback: undefined,
        onError: 'debug',
        label: 'intent listener failed',
        log: this.log,
      });
    }
  }
}
