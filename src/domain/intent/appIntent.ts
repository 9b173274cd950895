import type { TrainingMode } from '@/domain/training/types';

export type Activity = 'idle' | 'setup' | 'active' | 'complete';

export type AppIntent =
  | { activity: 'idle'; inForeground: boolean }
  | { activity: 'setup' | 'active' | 'complete'; mode: TrainingMode; inForeground: boolean };

const LEGAL_ACTIVITY_EDGES: Record<Activity, readonly Activity[]> = {
  idle: ['setup'],
  setup: ['active', 'idle'],
  active: ['complete', 'idle'],
  complete: ['setup', 'idle'],
};

export function canChangeIntent(from: AppIntent, to: AppIntent): boolean {
  if (from.activity === to.activity) {
    // Same activity: only the foreground flag may change, never the mode.
    return from.activity === 'idle' || to.activity === 'idle' || from.mode === to.mode;
  }
  if (from.activity !== 'idle' && to.activity !== 'idle' && from.mode !== to.mode) {
    return false;
  }
  return LEGAL_ACTIVITY_EDGES[from.activity].includes(to.activity);
}

export function isSessionActive(intent: AppIntent): boolean {
  return intent.activity === 'active';
}

export function describeIntent(intent: AppIntent): string {
  const where = intent.inForeground ? 'foreground' : 'background';
  return intent.activity === 'idle' ? `idle(${where})` : `${intent.mode}:${intent.activity}(${where})`;
}
