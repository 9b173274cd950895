import {
  classifyWithBoundaries,
  describeZoneBoundaries,
  resolveZoneBoundaries,
  sameZoneSettings,
  validateZoneSettings,
} from '@/domain/zones/zoneClassifier';
import type { HeartRateZone, ZoneBoundaries, ZoneSettings } from '@/domain/zones/types';
import { createLogger, type ScopedLog } from '@/shared/logging/logger';

export interface ZoneReading {
  bpm: number;
  zone: HeartRateZone | null;
  previousZone: HeartRateZone | null;
  changed: boolean;
}

/**
 * Tracks the live zone across BPM samples. Boundaries are resolved once per
 * settings change rather than per sample.
 */
export class HeartRateMonitor {
  private settings: ZoneSettings;
  private bounds: ZoneBoundaries;
  private currentZone: HeartRateZone | null = null;
  private lastBpm: number | null = null;

  constructor(
    settings: ZoneSettings,
    private readonly log: ScopedLog = createLogger('HeartRate', 'Monitor'),
  ) {
    validateZoneSettings(settings);
    this.settings = settings;
    this.bounds = resolveZoneBoundaries(settings);
  }

  public updateSettings(next: ZoneSettings): void {
    validateZoneSettings(next);
    if (sameZoneSettings(this.settings, next)) {
      return;
    }
    this.settings = next;
    this.bounds = resolveZoneBoundaries(next);
    this.log.info('zone settings updated', {
      auto: next.useAutoZones,
      restingHR: next.restingHR,
      maxHR: next.maxHR,
      zones: describeZoneBoundaries(this.bounds),
    });
  }

  public process(bpm: number): ZoneReading {
    const zone = classifyWithBoundaries(bpm, this.bounds);
    const previousZone = this.currentZone;
    this.currentZone = zone;
    this.lastBpm = bpm;
    return { bpm, zone, previousZone, changed: zone !== previousZone };
  }

  public reset(): void {
    this.currentZone = null;
    this.lastBpm = null;
  }

  public getCurrentZone(): HeartRateZone | null {
    return this.currentZone;
  }

  public getLastBpm(): number | null {
    return this.lastBpm;
  }

  public getSettings(): ZoneSettings {
    return this.settings;
  }

  public getBoundaries(): ZoneBoundaries {
    return { ...this.bounds };
  }
}
