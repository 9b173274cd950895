import { sameTrackState, type TrackSnapshot, type TrackSource } from '@/domain/tracks/types';
import type { ClockPort } from '@/ports/ClockPort';
import { bestEffortSync } from '@/shared/bestEffort';
import { createLogger, type ScopedLog } from '@/shared/logging/logger';

export const DEFAULT_FRESHNESS_THRESHOLD_MS = 10_000;

export type TrackListener = (track: TrackSnapshot | null) => void;

export type ReconcileOutcome = 'published' | 'replaced-silently' | 'discarded';

export interface DataReconcilerDeps {
  clock: ClockPort;
  freshnessThresholdMs?: number;
  log?: ScopedLog;
}

/**
 * Merges track observations from every source into one displayed snapshot.
 * A lower-ranked source may only take over once the displayed one is stale.
 */
export class DataReconciler {
  private displayed: TrackSnapshot | null = null;
  private readonly bySource = new Map<TrackSource, TrackSnapshot>();
  private readonly listeners = new Set<TrackListener>();
  private readonly freshnessThresholdMs: number;
  private readonly log: ScopedLog;

  constructor(private readonly deps: DataReconcilerDeps) {
    this.freshnessThresholdMs = deps.freshnessThresholdMs ?? DEFAULT_FRESHNESS_THRESHOLD_MS;
    this.log = deps.log ?? createLogger('Music', 'Reconciler');
  }

  public subscribe(listener: TrackListener): () => void {
    this.listeners.add(listener);
    return () => this.listeners.delete(listener);
  }

  public getDisplayed(): TrackSnapshot | null {
    return this.displayed;
  }

  public getSnapshot(source: TrackSource): TrackSnapshot | null {
    return this.bySource.get(source) ?? null;
  }

  public reconcile(snapshot: TrackSnapshot): ReconcileOutcome {
    this.bySource.set(snapshot.source, snapshot);
    const current = this.displayed;

    if (current && !this.accepts(current, snapshot)) {
      this.log.debug('snapshot discarded', {
        source: snapshot.source,
        displayedSource: current.source,
        trackId: snapshot.trackId,
      });
      return 'discarded';
    }

    this.displayed = snapshot;
    if (current && sameTrackState(current, snapshot)) {
      return 'replaced-silently';
    }
    this.log.debug('displayed track updated', {
      source: snapshot.source,
      trackId: snapshot.trackId,
      isPlaying: snapshot.isPlaying,
    });
    this.emit(snapshot);
    return 'published';
  }

  /** Drops one source and falls back to the best snapshot still held. */
  public clearSource(source: TrackSource): void {
    this.bySource.delete(source);
    if (this.displayed?.source !== source) {
      return;
    }
    const fallback = this.bestRemaining();
    const previous = this.displayed;
    this.displayed = fallback;
    if (fallback && sameTrackState(previous, fallback)) {
      return;
    }
    this.emit(fallback);
  }

  public clearAll(): void {
    const hadDisplayed = this.displayed !== null;
    this.bySource.clear();
    this.displayed = null;
    if (hadDisplayed) {
      this.emit(null);
    }
  }

  /** Logs when sources disagree on the current track; returns whether they agree. */
  public validateConsistency(): boolean {
    const snapshots = [...this.bySource.values()];
    const trackIds = new Set(snapshots.map((snapshot) => snapshot.trackId));
    if (trackIds.size <= 1) {
      return true;
    }
    this.log.info('track sources disagree', {
      sources: snapshots.map((snapshot) => `${snapshot.source}:${snapshot.trackId}`).join(','),
      displayed: this.displayed?.source,
    });
    return false;
  }

  private accepts(current: TrackSnapshot, incoming: TrackSnapshot): boolean {
    if (incoming.sourceRank >= current.sourceRank) {
      return true;
    }
    return this.deps.clock.now() - current.observedAt > this.freshnessThresholdMs;
  }

  private bestRemaining(): TrackSnapshot | null {
    let best: TrackSnapshot | null = null;
    for (const snapshot of this.bySource.values()) {
      if (
        !best ||
        snapshot.sourceRank > best.sourceRank ||
        (snapshot.sourceRank === best.sourceRank && snapshot.observedAt > best.observedAt)
      ) {
        best = snapshot;
      }
    }
    return best;
  }

  private emit(track: TrackSnapshot | null): void {
    for (const listener of this.listeners) {
      bestEffortSync(() => listener(track), {
        fallback: undefined,
        onError: 'debug',
        label: 'track listener failed',
        log: this.log,
      });
    }
  }
}
