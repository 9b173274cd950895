export type TrainingMode = 'free' | 'interval';

export type TrainingPhase = 'notStarted' | 'high' | 'rest' | 'completed';

export interface IntervalPlan {
  totalIntervals: number;
  highDurationMs: number;
  restDurationMs: number;
}

/** Clock of the running phase; all values in epoch ms. */
export interface PhaseClock {
  phase: 'high' | 'rest';
  intervalIndex: number;
  phaseStart: number;
  phaseDuration: number;
}

export type IntervalSessionState =
  | { status: 'idle' }
  | { status: 'running'; plan: IntervalPlan; clock: PhaseClock }
  | { status: 'paused'; plan: IntervalPlan; clock: PhaseClock; pausedAt: number }
  | { status: 'completed'; plan: IntervalPlan };

/** Read-only view of the interval workout published to the UI. */
export interface TrainingView {
  mode: TrainingMode | null;
  phase: TrainingPhase;
  intervalIndex: number;
  totalIntervals: number;
  remainingSeconds: number;
  formattedRemaining: string;
  phaseDescription: string;
  progress: number;
  isActive: boolean;
  isPaused: boolean;
}

export const PHASE_DESCRIPTIONS: Record<TrainingPhase, string> = {
  notStarted: 'Ready to Start',
  high: 'High Intensity',
  rest: 'Rest',
  completed: 'Training Complete!',
};

export function formatRemaining(seconds: number): string {
  const whole = Math.max(0, Math.floor(seconds));
  const minutes = Math.floor(whole / 60);
  const rest = whole % 60;
  return `${String(minutes).padStart(2, '0')}:${String(rest).padStart(2, '0')}`;
}
