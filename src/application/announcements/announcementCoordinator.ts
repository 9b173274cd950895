import type { HeartRateZone } from '@/domain/zones/types';
import type { TrainingMode } from '@/domain/training/types';
import type { AnnouncerPort } from '@/ports/AnnouncerPort';
import type { ClockPort } from '@/ports/ClockPort';
import type { CancelTimer, TimerPort } from '@/ports/TimerPort';
import { bestEffortSync } from '@/shared/bestEffort';
import { createLogger, type ScopedLog } from '@/shared/logging/logger';

export const DEFAULT_ANNOUNCEMENT_COOLDOWN_MS = 5000;

export interface AnnouncementState {
  enabled: boolean;
  currentZone: HeartRateZone | null;
  lastAnnouncedZone: HeartRateZone | null;
  lastAnnouncementTime: number | null;
  pendingZone: HeartRateZone | null;
  cooldownDeadline: number | null;
}

interface ModeSlot extends AnnouncementState {
  generation: number;
  cancelCooldown: CancelTimer | null;
}

export interface AnnouncementCoordinatorDeps {
  announcer: AnnouncerPort;
  clock: ClockPort;
  timers: TimerPort;
  cooldownMs?: number;
  log?: ScopedLog;
}

/**
 * Debounces zone announcements per training mode.
 *
 * A zone change is spoken immediately when the cooldown has elapsed. During the
 * cooldown the latest zone is parked as the only pending one and spoken at
 * expiry if the runner is still in it. The zone spoken last is never repeated
 * within a session.
 */
export class AnnouncementCoordinator {
  private readonly slots = new Map<TrainingMode, ModeSlot>();
  private readonly cooldownMs: number;
  private readonly log: ScopedLog;
  private activeMode: TrainingMode | null = null;

  constructor(private readonly deps: AnnouncementCoordinatorDeps) {
    this.cooldownMs = deps.cooldownMs ?? DEFAULT_ANNOUNCEMENT_COOLDOWN_MS;
    this.log = deps.log ?? createLogger('Announcements', 'Coordinator');
  }

  /** Makes `mode` the only mode allowed to speak; other modes lose their pending zone. */
  public activate(mode: TrainingMode): void {
    if (this.activeMode === mode) return;
    for (const [otherMode, slot] of this.slots) {
      if (otherMode !== mode) {
        this.cancelCooldown(slot);
        slot.pendingZone = null;
      }
    }
    this.activeMode = mode;
    this.log.debug('announcement mode activated', { mode });
  }

  public deactivate(): void {
    if (this.activeMode) {
      const slot = this.slot(this.activeMode);
      this.cancelCooldown(slot);
      slot.pendingZone = null;
    }
    this.activeMode = null;
  }

  public setEnabled(mode: TrainingMode, enabled: boolean): void {
    const slot = this.slot(mode);
    slot.enabled = enabled;
    if (!enabled) {
      slot.pendingZone = null;
    }
    this.log.info('zone announcements toggled', { mode, enabled });
  }

  public isEnabled(mode: TrainingMode): boolean {
    return this.slot(mode).enabled;
  }

  public handleZone(mode: TrainingMode, zone: HeartRateZone | null): void {
    if (this.activeMode !== mode) {
      this.log.debug('zone ignored for inactive mode', { mode, zone });
      return;
    }
    const slot = this.slot(mode);
    if (zone === slot.currentZone) {
      return;
    }
    slot.currentZone = zone;

    if (!slot.enabled || zone === null) {
      return;
    }
    if (zone === slot.lastAnnouncedZone) {
      this.log.debug('zone equals last announced; not repeating', { mode, zone });
      return;
    }

    const now = this.deps.clock.now();
    if (slot.cooldownDeadline === null || now >= slot.cooldownDeadline) {
      this.announce(mode, slot, zone, now);
      return;
    }

    slot.pendingZone = zone;
    this.log.debug('zone parked until cooldown expiry', {
      mode,
      zone,
      remainingMs: slot.cooldownDeadline - now,
    });
  }

  /** Clears one mode, or every mode when called without arguments. */
  public reset(mode?: TrainingMode): void {
    const modes = mode ? [mode] : [...this.slots.keys()];
    for (const key of modes) {
      const slot = this.slot(key);
      this.cancelCooldown(slot);
      slot.generation += 1;
      slot.currentZone = null;
      slot.lastAnnouncedZone = null;
      slot.lastAnnouncementTime = null;
      slot.pendingZone = null;
      slot.cooldownDeadline = null;
    }
  }

  public getState(mode: TrainingMode): AnnouncementState {
    const { enabled, currentZone, lastAnnouncedZone, lastAnnouncementTime, pendingZone, cooldownDeadline } =
      this.slot(mode);
    return { enabled, currentZone, lastAnnouncedZone, lastAnnouncementTime, pendingZone, cooldownDeadline };
  }

  private announce(mode: TrainingMode, slot: ModeSlot, zone: HeartRateZone, now: number): void {
    bestEffortSync(() => this.deps.announcer.announce(zone), {
      fallback: undefined,
      onError: 'warn',
      label: 'zone announcement failed',
      context: { mode, zone },
      log: this.log,
    });
    slot.lastAnnouncedZone = zone;
    slot.lastAnnouncementTime = now;
    slot.cooldownDeadline = now + this.cooldownMs;
    slot.pendingZone = null;
    this.log.info('zone announced', { mode, zone });

    this.cancelCooldown(slot);
    const generation = slot.generation;
    slot.cancelCooldown = this.deps.timers.schedule(this.cooldownMs, () => {
      if (slot.generation !== generation) return;
      slot.cancelCooldown = null;
      this.handleCooldownExpired(mode, slot);
    });
  }

  private handleCooldownExpired(mode: TrainingMode, slot: ModeSlot): void {
    const pending = slot.pendingZone;
    slot.pendingZone = null;
    if (pending === null) {
      return;
    }
    const stillCurrent = pending === slot.currentZone && pending !== slot.lastAnnouncedZone;
    if (!stillCurrent || !slot.enabled || this.activeMode !== mode) {
      this.log.debug('pending zone dropped at cooldown expiry', {
        mode,
        pending,
        current: slot.currentZone,
      });
      return;
    }
    this.announce(mode, slot, pending, this.deps.clock.now());
  }

  private cancelCooldown(slot: ModeSlot): void {
    if (slot.cancelCooldown) {
      slot.cancelCooldown();
      slot.cancelCooldown = null;
    }
  }

  private slot(mode: TrainingMode): ModeSlot {
    let slot = this.slots.get(mode);
    if (!slot) {
      slot = {
        enabled: true,
        currentZone: null,
        lastAnnouncedZone: null,
        lastAnnouncementTime: null,
        pendingZone: null,
        cooldownDeadline: null,
        generation: 0,
        cancelCooldown: null,
      };
      this.slots.set(mode, slot);
    }
    return slot;
  }
}
