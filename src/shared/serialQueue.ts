import { bestEffort } from '@/shared/bestEffort';

/**
 * Runs async tasks one at a time in submission order. A failed task rejects
 * its own promise but never blocks the tasks queued behind it.
 */
export class SerialQueue {
  private tail: Promise<void> = Promise.resolve();
  private pending = 0;

  public run<T>(task: () => Promise<T>): Promise<T> {
    const previous = this.tail;
    this.pending += 1;
    const next = bestEffort(() => previous, { fallback: undefined }).then(task);
    this.tail = next.then(
      () => this.settle(),
      () => this.settle(),
    );
    return next;
  }

  public get size(): number {
    return this.pending;
  }

  /** Resolves once everything queued so far has settled. */
  public idle(): Promise<void> {
    return this.tail;
  }

  private settle(): void {
    this.pending -= 1;
  }
}
