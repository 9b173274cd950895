import type { AnnouncementCoordinator } from '@/application/announcements/announcementCoordinator';
import type { ConnectionStateMachine } from '@/application/connection/connectionStateMachine';
import type { MusicServiceConnector } from '@/application/connection/musicServiceConnector';
import type { HeartRateMonitor, ZoneReading } from '@/application/heartRate/heartRateMonitor';
import type { IntentCoordinator } from '@/application/intent/intentCoordinator';
import type { MusicController } from '@/application/playback/musicController';
import type { DataReconciler } from '@/application/tracks/dataReconciler';
import type { NowPlayingPoller } from '@/application/tracks/nowPlayingPoller';
import {
  validatePlan,
  type IntervalOrchestrator,
  type IntervalView,
} from '@/application/training/intervalOrchestrator';
import type { ConnectionState } from '@/domain/connection/connectionState';
import type { AppIntent } from '@/domain/intent/appIntent';
import type { PlaylistPage, PlaylistSelection } from '@/domain/playback/playlists';
import type { TrackSnapshot } from '@/domain/tracks/types';
import { formatRemaining, type IntervalPlan, type TrainingMode, type TrainingView } from '@/domain/training/types';
import type { HeartRateZone, ZoneBoundaries, ZoneSettings } from '@/domain/zones/types';
import type { ClockPort } from '@/ports/ClockPort';
import type { NotifierPort } from '@/ports/NotifierPort';
import { bestEffort, bestEffortSync } from '@/shared/bestEffort';
import { ConfigurationError } from '@/shared/errors';
import { createLogger, type ScopedLog } from '@/shared/logging/logger';

// Plausible sensor range; anything outside is a glitch, not a heart rate.
const MIN_BPM = 20;
const MAX_BPM = 250;

export interface TrainingSessionControllerDeps {
  orchestrator: IntervalOrchestrator;
  monitor: HeartRateMonitor;
  announcements: AnnouncementCoordinator;
  intent: IntentCoordinator;
  connection: ConnectionStateMachine;
  connector: Pick<MusicServiceConnector, 'connect'>;
  music: Pick<MusicController, 'cancelPending' | 'issue' | 'listPlaylists' | 'getPlaylists' | 'setPlaylists'>;
  poller: Pick<NowPlayingPoller, 'start' | 'stop'>;
  reconciler: DataReconciler;
  notifier: NotifierPort;
  clock: ClockPort;
  defaultPlan: IntervalPlan;
  log?: ScopedLog;
}

export interface SessionState {
  training: TrainingView;
  intent: AppIntent;
  bpm: number | null;
  zone: HeartRateZone | null;
  zoneBoundaries: ZoneBoundaries;
  connection: ConnectionState;
  connectionMessage: string;
  track: TrackSnapshot | null;
  playlists: PlaylistSelection;
  announcementsEnabled: Record<TrainingMode, boolean>;
}

/**
 * Facade the UI talks to. Owns the session lifecycle and routes every BPM
 * sample through classification, announcements and the interval clock.
 */
export class TrainingSessionController {
  private mode: TrainingMode | null = null;
  private readonly log: ScopedLog;
  private readonly unsubscribers: Array<() => void> = [];

  constructor(private readonly deps: TrainingSessionControllerDeps) {
    this.log = deps.log ?? createLogger('Session', 'Controller');
    this.unsubscribers.push(
      deps.orchestrator.subscribe((view) => this.onIntervalView(view)),
      deps.connection.subscribe((state) => this.notify(() => deps.notifier.notifyConnectionChanged(state))),
      deps.reconciler.subscribe((track) => this.notify(() => deps.notifier.notifyTrackChanged(track))),
    );
  }

  public dispose(): void {
    for (const unsubscribe of this.unsubscribers.splice(0)) {
      unsubscribe();
    }
  }

  public startInterval(options: Partial<IntervalPlan> = {}): void {
    const plan: IntervalPlan = { ...this.deps.defaultPlan, ...options };
    this.guardConfiguration(() => validatePlan(plan));
    this.endActiveSession();
    this.beginSession('interval');
    this.deps.orchestrator.start(plan);
  }

  public startFree(): void {
    this.endActiveSession();
    this.beginSession('free');
    this.notify(() => this.deps.notifier.notifyTrainingChanged(this.trainingView()));
  }

  public pause(): void {
    if (this.mode !== 'interval') {
      this.log.debug('pause ignored outside interval training', { mode: this.mode });
      return;
    }
    this.deps.orchestrator.pause();
  }

  public resume(): void {
    if (this.mode !== 'interval') {
      this.log.debug('resume ignored outside interval training', { mode: this.mode });
      return;
    }
    this.deps.orchestrator.resume();
  }

  public stop(): void {
    if (this.mode === null) {
      return;
    }
    const mode = this.mode;
    this.deps.music.cancelPending();
    if (mode === 'interval') {
      this.deps.orchestrator.stop();
    }
    this.teardownSession(mode);
    this.deps.intent.reset();
    this.log.info('training stopped', { mode });
    this.notify(() => this.deps.notifier.notifyTrainingChanged(this.trainingView()));
  }

  /** Leaves the completion screen. */
  public dismissCompletion(): void {
    if (this.deps.intent.current.activity !== 'complete') {
      return;
    }
    this.deps.orchestrator.reset();
    this.deps.intent.reset();
  }

  public ingestBpm(bpm: number): ZoneReading | null {
    if (!Number.isInteger(bpm) || bpm < MIN_BPM || bpm > MAX_BPM) {
      this.log.debug('implausible bpm sample dropped', { bpm });
      return null;
    }
    const reading = this.deps.monitor.process(bpm);
    if (reading.changed) {
      this.notify(() => this.deps.notifier.notifyZoneChanged(reading.zone));
    }
    if (this.mode !== null) {
      this.deps.announcements.handleZone(this.mode, reading.zone);
    }
    if (this.mode === 'interval') {
      this.deps.orchestrator.tick(this.deps.clock.now());
    }
    return reading;
  }

  public updateZoneSettings(settings: ZoneSettings): void {
    this.guardConfiguration(() => this.deps.monitor.updateSettings(settings));
  }

  public setAnnouncementsEnabled(mode: TrainingMode, enabled: boolean): void {
    this.deps.announcements.setEnabled(mode, enabled);
  }

  public skipTrack(): void {
    this.deps.music.issue('skipNext');
  }

  public listPlaylists(): Promise<PlaylistPage> {
    return this.deps.music.listPlaylists();
  }

  public selectPlaylists(selection: PlaylistSelection): void {
    this.guardConfiguration(() => this.deps.music.setPlaylists(selection));
  }

  public setForeground(inForeground: boolean): void {
    this.deps.intent.setForeground(inForeground);
    if (inForeground && this.mode === 'interval') {
      this.deps.orchestrator.recomputeOnResume(this.deps.clock.now());
    }
  }

  public getState(): SessionState {
    return {
      training: this.trainingView(),
      intent: this.deps.intent.current,
      bpm: this.deps.monitor.getLastBpm(),
      zone: this.deps.monitor.getCurrentZone(),
      zoneBoundaries: this.deps.monitor.getBoundaries(),
      connection: this.deps.connection.current,
      connectionMessage: this.deps.connection.statusMessage(),
      track: this.deps.reconciler.getDisplayed(),
      playlists: this.deps.music.getPlaylists(),
      announcementsEnabled: {
        free: this.deps.announcements.isEnabled('free'),
        interval: this.deps.announcements.isEnabled('interval'),
      },
    };
  }

  private beginSession(mode: TrainingMode): void {
    const intent = this.deps.intent;
    if (intent.current.activity !== 'idle') {
      intent.reset();
    }
    intent.enterSetup(mode);
    intent.activate(mode);
    this.mode = mode;

    this.deps.monitor.reset();
    this.deps.announcements.reset(mode);
    this.deps.announcements.activate(mode);
    this.deps.poller.start();
    this.log.info('training started', { mode });

    if (!this.deps.connection.isChannelConnected()) {
      void bestEffort(() => this.deps.connector.connect(), {
        fallback: false,
        onError: 'warn',
        label: 'music connect at session start failed',
        log: this.log,
      });
    }
  }

  private endActiveSession(): void {
    if (this.mode !== null) {
      this.stop();
    }
  }

  private teardownSession(mode: TrainingMode): void {
    this.deps.poller.stop();
    this.deps.announcements.deactivate();
    this.deps.announcements.reset(mode);
    this.mode = null;
  }

  private onIntervalView(view: IntervalView): void {
    this.notify(() => this.deps.notifier.notifyTrainingChanged({ mode: 'interval', ...view }));
    if (view.phase === 'completed' && this.mode === 'interval') {
      this.teardownSession('interval');
      this.deps.intent.complete('interval');
      this.log.info('interval training complete', { totalIntervals: view.totalIntervals });
    }
  }

  private trainingView(): TrainingView {
    if (this.mode === 'free') {
      return {
        mode: 'free',
        phase: 'notStarted',
        intervalIndex: 0,
        totalIntervals: 0,
        remainingSeconds: 0,
        formattedRemaining: formatRemaining(0),
        phaseDescription: 'Free Training',
        progress: 0,
        isActive: true,
        isPaused: false,
      };
    }
    const view = this.deps.orchestrator.getView(this.deps.clock.now());
    return { mode: view.isActive || view.phase === 'completed' ? 'interval' : null, ...view };
  }

  private guardConfiguration(action: () => void): void {
    try {
      action();
    } catch (error) {
      if (error instanceof ConfigurationError) {
        this.log.warn('configuration rejected', { field: error.field, message: error.message });
        this.notify(() => this.deps.notifier.notifyUserFacingError(error));
      }
      throw error;
    }
  }

  private notify(action: () => void): void {
    bestEffortSync(action, {
      fallback: undefined,
      onError: 'debug',
      label: 'notifier failed',
      log: this.log,
    });
  }
}
