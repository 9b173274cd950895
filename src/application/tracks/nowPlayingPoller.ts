import type { ConnectionStateMachine } from '@/application/connection/connectionStateMachine';
import type { MusicServiceConnector } from '@/application/connection/musicServiceConnector';
import type { DataReconciler } from '@/application/tracks/dataReconciler';
import { makeSnapshot } from '@/domain/tracks/types';
import type { ClockPort } from '@/ports/ClockPort';
import type { CredentialPort } from '@/ports/CredentialPort';
import type { MusicApiPort } from '@/ports/MusicApiPort';
import type { CancelTimer, TimerPort } from '@/ports/TimerPort';
import { bestEffort } from '@/shared/bestEffort';
import { createLogger, errorMessage, type ScopedLog } from '@/shared/logging/logger';

export interface NowPlayingPollerDeps {
  api: MusicApiPort;
  credentials: CredentialPort;
  connection: ConnectionStateMachine;
  reconciler: DataReconciler;
  connector: Pick<MusicServiceConnector, 'reportFailure' | 'reportSuccess'>;
  clock: ClockPort;
  timers: TimerPort;
  intervalMs: number;
  log?: ScopedLog;
}

/** Polls the current track through the request API while a session runs. */
export class NowPlayingPoller {
  private cancelTimer: CancelTimer | null = null;
  private generation = 0;
  private inflight = false;
  private readonly log: ScopedLog;

  constructor(private readonly deps: NowPlayingPollerDeps) {
    this.log = deps.log ?? createLogger('Music', 'NowPlaying');
  }

  public start(): void {
    if (this.cancelTimer) return;
    this.generation += 1;
    const generation = this.generation;
    this.log.debug('now playing polling started', { intervalMs: this.deps.intervalMs });
    this.cancelTimer = this.deps.timers.every(this.deps.intervalMs, () => {
      void bestEffort(() => this.pollOnce(generation), {
        fallback: undefined,
        onError: 'debug',
        label: 'now playing poll failed',
        log: this.log,
      });
    });
  }

  public stop(): void {
    if (!this.cancelTimer) return;
    this.cancelTimer();
    this.cancelTimer = null;
    this.generation += 1;
    this.log.debug('now playing polling stopped');
  }

  public isRunning(): boolean {
    return this.cancelTimer !== null;
  }

  public async pollOnce(generation: number = this.generation): Promise<void> {
    if (this.inflight || !this.deps.connection.canUseRequestApi()) {
      return;
    }
    this.inflight = true;
    try {
      const credential = await this.deps.credentials.get();
      const nowPlaying = await this.deps.api.nowPlaying(credential.token);
      if (generation !== this.generation) return;
      this.deps.connector.reportSuccess('poll');
      if (nowPlaying) {
        this.deps.reconciler.reconcile(makeSnapshot('requestApi', nowPlaying, this.deps.clock.now()));
        this.deps.reconciler.validateConsistency();
      }
    } catch (error) {
      if (generation !== this.generation) return;
      this.log.debug('now playing request failed', { message: errorMessage(error) });
      this.deps.connector.reportFailure('poll', error);
    } finally {
      this.inflight = false;
    }
  }
}
