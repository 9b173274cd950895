import { describeState, statusMessage, type ConnectionState } from '@/domain/connection/connectionState';
import type { TrackSnapshot } from '@/domain/tracks/types';
import type { TrainingView } from '@/domain/training/types';
import type { NotifierPort } from '@/ports/NotifierPort';
import { ExhaustionError, type CoachError } from '@/shared/errors';
import { createLogger, type ScopedLog } from '@/shared/logging/logger';

/**
 * Headless UI stand-in: every state push becomes a log line. Training views are
 * only logged when something other than the countdown changed.
 */
export class LogNotifier implements NotifierPort {
  private lastTrainingKey: string | null = null;
  private readonly log: ScopedLog;

  constructor(log?: ScopedLog) {
    this.log = log ?? createLogger('UI');
  }

  public notifyTrainingChanged(view: TrainingView): void {
    const key = `${view.mode}:${view.phase}:${view.intervalIndex}:${view.isPaused}`;
    if (key === this.lastTrainingKey) {
      this.log.spam('training tick', { remaining: view.formattedRemaining });
      return;
    }
    this.lastTrainingKey = key;
    this.log.info(view.phaseDescription, {
      mode: view.mode ?? undefined,
      interval: view.totalIntervals > 0 ? `${view.intervalIndex}/${view.totalIntervals}` : undefined,
      remaining: view.formattedRemaining,
      paused: view.isPaused || undefined,
    });
  }

  public notifyZoneChanged(zone: number | null): void {
    this.log.info(zone === null ? 'below zone 1' : `zone ${zone}`);
  }

  public notifyConnectionChanged(state: ConnectionState): void {
    this.log.info(statusMessage(state), { state: describeState(state) });
  }

  public notifyTrackChanged(track: TrackSnapshot | null): void {
    if (!track) {
      this.log.info('nothing playing');
      return;
    }
    this.log.info(`${track.isPlaying ? 'playing' : 'paused'}: ${track.artist} - ${track.title}`, {
      source: track.source,
    });
  }

  public notifyUserFacingError(error: CoachError): void {
    this.log.error(error.message, {
      kind: error.kind,
      guidance: error instanceof ExhaustionError ? error.guidance : undefined,
    });
  }

  public notifyReauthRequired(reason: string): void {
    this.log.warn('music service sign-in required', { reason });
  }
}
