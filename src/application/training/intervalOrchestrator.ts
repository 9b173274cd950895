import type { PlaybackCommand } from '@/domain/playback/commands';
import {
  PHASE_DESCRIPTIONS,
  formatRemaining,
  type IntervalPlan,
  type IntervalSessionState,
  type PhaseClock,
  type TrainingPhase,
  type TrainingView,
} from '@/domain/training/types';
import type { ClockPort } from '@/ports/ClockPort';
import type { CancelTimer, TimerPort } from '@/ports/TimerPort';
import { bestEffortSync } from '@/shared/bestEffort';
import { ConfigurationError } from '@/shared/errors';
import { createLogger, type ScopedLog } from '@/shared/logging/logger';

/** Receives playback commands; must return immediately (fire-and-forget). */
export interface PlaybackCommandSink {
  issue(command: PlaybackCommand): void;
}

export type IntervalViewListener = (view: IntervalView) => void;

export type IntervalView = Omit<TrainingView, 'mode'>;

export interface IntervalOrchestratorDeps {
  clock: ClockPort;
  timers: TimerPort;
  commands: PlaybackCommandSink;
  tickIntervalMs?: number;
  log?: ScopedLog;
}

export function validatePlan(plan: IntervalPlan): void {
  if (!Number.isInteger(plan.totalIntervals) || plan.totalIntervals < 1) {
    throw new ConfigurationError('total intervals must be a positive integer', 'totalIntervals');
  }
  if (!(plan.highDurationMs > 0)) {
    throw new ConfigurationError('high intensity duration must be positive', 'highDurationMs');
  }
  if (!(plan.restDurationMs > 0)) {
    throw new ConfigurationError('rest duration must be positive', 'restDurationMs');
  }
}

/**
 * Wall-clock driven high/rest interval state machine.
 *
 * Time is never counted from timer firings: every tick recomputes elapsed time
 * from `phaseStart`, so ticks may come from the periodic timer, a heart-rate
 * sample or the foreground hook in any mix. On a boundary the next phase starts
 * at the tick's `now`; overshoot past the boundary is discarded, and a single
 * tick advances at most one phase.
 */
export class IntervalOrchestrator {
  private state: IntervalSessionState = { status: 'idle' };
  private generation = 0;
  private lastIssuedBoundary: string | null = null;
  private cancelTicker: CancelTimer | null = null;
  private lastPublished: string | null = null;
  private readonly listeners = new Set<IntervalViewListener>();
  private readonly tickIntervalMs: number;
  private readonly log: ScopedLog;

  constructor(private readonly deps: IntervalOrchestratorDeps) {
    this.tickIntervalMs = deps.tickIntervalMs ?? 1000;
    this.log = deps.log ?? createLogger('Training', 'Intervals');
  }

  public subscribe(listener: IntervalViewListener): () => void {
    this.listeners.add(listener);
    return () => this.listeners.delete(listener);
  }

  public start(plan: IntervalPlan): void {
    validatePlan(plan);
    if (this.state.status === 'running' || this.state.status === 'paused') {
      this.log.warn('interval session restarted while active', { status: this.state.status });
      this.stopTicker();
    }
    const now = this.deps.clock.now();
    this.generation += 1;
    this.lastIssuedBoundary = null;
    this.state = {
      status: 'running',
      plan: { ...plan },
      clock: { phase: 'high', intervalIndex: 1, phaseStart: now, phaseDuration: plan.highDurationMs },
    };
    this.log.info('interval session started', {
      totalIntervals: plan.totalIntervals,
      highMs: plan.highDurationMs,
      restMs: plan.restDurationMs,
    });
    this.issueAtBoundary(this.state.clock, 'playHighIntensity');
    this.startTicker();
    this.publish(now, true);
  }

  /**
   * Recomputes the phase clock at `now`. Returns true when a phase boundary was
   * crossed. Safe to call any number of times from any event source.
   */
  public tick(now: number = this.deps.clock.now()): boolean {
    const state = this.state;
    if (state.status !== 'running') {
      return false;
    }
    const { clock } = state;
    const elapsed = Math.max(0, now - clock.phaseStart);
    const remaining = Math.max(0, clock.phaseDuration - elapsed);

    this.log.spam('tick', { phase: clock.phase, interval: clock.intervalIndex, remainingMs: remaining });

    // Exact remaining decides the boundary; the published value is floored.
    if (remaining > 0) {
      this.publish(now, false);
      return false;
    }
    this.advance(state.plan, clock, now);
    return true;
  }

  /** Foreground hook: catches up on time lost while timers were suspended. */
  public recomputeOnResume(now: number = this.deps.clock.now()): boolean {
    if (this.state.status !== 'running') {
      return false;
    }
    this.log.debug('recomputing phase clock after resume');
    return this.tick(now);
  }

  public pause(): void {
    const state = this.state;
    if (state.status !== 'running') {
      this.log.debug('pause ignored', { status: state.status });
      return;
    }
    const now = this.deps.clock.now();
    this.stopTicker();
    this.state = { status: 'paused', plan: state.plan, clock: { ...state.clock }, pausedAt: now };
    this.log.info('interval session paused', { interval: state.clock.intervalIndex, phase: state.clock.phase });
    this.issue('pause');
    this.publish(now, true);
  }

  public resume(): void {
    const state = this.state;
    if (state.status !== 'paused') {
      this.log.debug('resume ignored', { status: state.status });
      return;
    }
    const now = this.deps.clock.now();
    const pausedFor = Math.max(0, now - state.pausedAt);
    this.state = {
      status: 'running',
      plan: state.plan,
      clock: { ...state.clock, phaseStart: state.clock.phaseStart + pausedFor },
    };
    this.log.info('interval session resumed', { pausedMs: pausedFor });
    this.issue('resume');
    this.startTicker();
    this.publish(now, true);
  }

  /** Ends the session early. Late callbacks from it become no-ops. */
  public stop(): void {
    const previous = this.state.status;
    if (previous === 'idle') {
      return;
    }
    this.generation += 1;
    this.stopTicker();
    this.state = { status: 'idle' };
    this.lastIssuedBoundary = null;
    if (previous === 'running' || previous === 'paused') {
      this.issue('stop');
    }
    this.log.info('interval session stopped', { previous });
    this.publish(this.deps.clock.now(), true);
  }

  /** Leaves the completion state for a fresh setup. */
  public reset(): void {
    if (this.state.status === 'completed') {
      this.state = { status: 'idle' };
      this.publish(this.deps.clock.now(), true);
      return;
    }
    this.stop();
  }

  public getState(): IntervalSessionState {
    return this.state;
  }

  public getGeneration(): number {
    return this.generation;
  }

  public isActive(): boolean {
    return this.state.status === 'running' || this.state.status === 'paused';
  }

  public getView(now: number = this.deps.clock.now()): IntervalView {
    const state = this.state;
    switch (state.status) {
      case 'idle':
        return buildView('notStarted', 0, 0, 0, false, false);
      case 'completed':
        return buildView('completed', state.plan.totalIntervals, state.plan.totalIntervals, 0, false, false);
      case 'running':
      case 'paused': {
        const reference = state.status === 'paused' ? state.pausedAt : now;
        const remainingMs = Math.max(0, state.clock.phaseDuration - Math.max(0, reference - state.clock.phaseStart));
        return buildView(
          state.clock.phase,
          state.clock.intervalIndex,
          state.plan.totalIntervals,
          Math.floor(remainingMs / 1000),
          true,
          state.status === 'paused',
        );
      }
    }
  }

  private advance(plan: IntervalPlan, clock: PhaseClock, now: number): void {
    if (clock.phase === 'high') {
      const next: PhaseClock = {
        phase: 'rest',
        intervalIndex: clock.intervalIndex,
        phaseStart: now,
        phaseDuration: plan.restDurationMs,
      };
      this.state = { status: 'running', plan, clock: next };
      this.log.info('phase boundary reached', { interval: next.intervalIndex, phase: next.phase });
      this.issueAtBoundary(next, 'playRest');
      this.publish(now, true);
      return;
    }

    const nextIndex = clock.intervalIndex + 1;
    if (nextIndex > plan.totalIntervals) {
      this.stopTicker();
      this.state = { status: 'completed', plan };
      this.log.info('interval session completed', { totalIntervals: plan.totalIntervals });
      if (this.lastIssuedBoundary !== 'completed') {
        this.lastIssuedBoundary = 'completed';
        this.issue('stop');
      }
      this.publish(now, true);
      return;
    }

    const next: PhaseClock = {
      phase: 'high',
      intervalIndex: nextIndex,
      phaseStart: now,
      phaseDuration: plan.highDurationMs,
    };
    this.state = { status: 'running', plan, clock: next };
    this.log.info('phase boundary reached', { interval: next.intervalIndex, phase: next.phase });
    this.issueAtBoundary(next, 'playHighIntensity');
    this.publish(now, true);
  }

  // One playlist switch per (interval, phase), however many ticks land on the boundary.
  private issueAtBoundary(clock: PhaseClock, command: PlaybackCommand): void {
    const key = `${clock.intervalIndex}:${clock.phase}`;
    if (this.lastIssuedBoundary === key) {
      return;
    }
    this.lastIssuedBoundary = key;
    this.issue(command);
  }

  private issue(command: PlaybackCommand): void {
    bestEffortSync(() => this.deps.commands.issue(command), {
      fallback: undefined,
      onError: 'warn',
      label: 'playback command dispatch failed',
      context: { command },
      log: this.log,
    });
  }

  private startTicker(): void {
    this.stopTicker();
    const generation = this.generation;
    this.cancelTicker = this.deps.timers.every(this.tickIntervalMs, () => {
      if (generation !== this.generation) return;
      this.tick(this.deps.clock.now());
    });
  }

  private stopTicker(): void {
    if (this.cancelTicker) {
      this.cancelTicker();
      this.cancelTicker = null;
    }
  }

  private publish(now: number, force: boolean): void {
    const view = this.getView(now);
    const key = `${view.phase}:${view.intervalIndex}:${view.remainingSeconds}:${view.isPaused}`;
    if (!force && key === this.lastPublished) {
      return;
    }
    this.lastPublished = key;
    for (const listener of this.listeners) {
      bestEffortSync(() => listener(view), {
        fallback: undefined,
        onError: 'debug',
        label: 'interval listener failed',
        log: this.log,
      });
    }
  }
}

function buildView(
  phase: TrainingPhase,
  intervalIndex: number,
  totalIntervals: number,
  remainingSeconds: number,
  isActive: boolean,
  isPaused: boolean,
): IntervalView {
  const progress =
    phase === 'completed' ? 1 : totalIntervals > 0 ? Math.max(0, intervalIndex - 1) / totalIntervals : 0;
  return {
    phase,
    intervalIndex,
    totalIntervals,
    remainingSeconds,
    formattedRemaining: formatRemaining(remainingSeconds),
    phaseDescription: PHASE_DESCRIPTIONS[phase],
    progress,
    isActive,
    isPaused,
  };
}
