import { ConfigurationError } from '@/shared/errors';
import type { HeartRateZone, ZoneBoundaries, ZoneSettings } from '@/domain/zones/types';

// Percent of heart-rate reserve for zone1Lower and the five upper bounds.
const LOWER_PERCENT = 40;
const UPPER_PERCENTS = [60, 70, 80, 90, 100] as const;

/**
 * Karvonen boundaries from heart-rate reserve. The lower bound floors, the
 * upper bounds round; integer arithmetic keeps results exact.
 */
export function computeAutoZoneBoundaries(restingHR: number, maxHR: number): ZoneBoundaries {
  const reserve = maxHR - restingHR;
  const upper = UPPER_PERCENTS.map((percent) => restingHR + Math.round((reserve * percent) / 100));
  return {
    zone1Lower: restingHR + Math.floor((reserve * LOWER_PERCENT) / 100),
    zone1Upper: upper[0],
    zone2Upper: upper[1],
    zone3Upper: upper[2],
    zone4Upper: upper[3],
    zone5Upper: upper[4],
  };
}

export function resolveZoneBoundaries(settings: ZoneSettings): ZoneBoundaries {
  return settings.useAutoZones
    ? computeAutoZoneBoundaries(settings.restingHR, settings.maxHR)
    : { ...settings.manual };
}

export function classifyWithBoundaries(bpm: number, bounds: ZoneBoundaries): HeartRateZone | null {
  if (bpm < bounds.zone1Lower) return null;
  if (bpm <= bounds.zone1Upper) return 1;
  if (bpm <= bounds.zone2Upper) return 2;
  if (bpm <= bounds.zone3Upper) return 3;
  if (bpm <= bounds.zone4Upper) return 4;
  return 5;
}

/**
 * Zone for a BPM reading. Saturates at zone 5; below zone 1 there is no zone.
 */
export function classifyZone(bpm: number, settings: ZoneSettings): HeartRateZone | null {
  return classifyWithBoundaries(bpm, resolveZoneBoundaries(settings));
}

export function describeZoneBoundaries(bounds: ZoneBoundaries): string {
  return [
    `Z1(${bounds.zone1Lower}-${bounds.zone1Upper})`,
    `Z2(${bounds.zone1Upper + 1}-${bounds.zone2Upper})`,
    `Z3(${bounds.zone2Upper + 1}-${bounds.zone3Upper})`,
    `Z4(${bounds.zone3Upper + 1}-${bounds.zone4Upper})`,
    `Z5(${bounds.zone4Upper + 1}-${bounds.zone5Upper})`,
  ].join(' ');
}

export function validateZoneSettings(settings: ZoneSettings): void {
  const { restingHR, maxHR } = settings;
  if (!Number.isInteger(restingHR) || restingHR <= 0) {
    throw new ConfigurationError('resting heart rate must be a positive integer', 'restingHR');
  }
  if (!Number.isInteger(maxHR) || maxHR <= restingHR) {
    throw new ConfigurationError('max heart rate must be an integer above resting heart rate', 'maxHR');
  }
  if (settings.useAutoZones) {
    return;
  }
  const m = settings.manual;
  const ordered = [m.zone1Lower, m.zone1Upper, m.zone2Upper, m.zone3Upper, m.zone4Upper, m.zone5Upper];
  if (ordered.some((value) => !Number.isInteger(value) || value <= 0)) {
    throw new ConfigurationError('manual zone boundaries must be positive integers', 'manual');
  }
  for (let i = 1; i < ordered.length; i += 1) {
    if (ordered[i] <= ordered[i - 1]) {
      throw new ConfigurationError('manual zone boundaries must be strictly increasing', 'manual');
    }
  }
}

export function sameZoneSettings(left: ZoneSettings, right: ZoneSettings): boolean {
  return (
    left.restingHR === right.restingHR &&
    left.maxHR === right.maxHR &&
    left.useAutoZones === right.useAutoZones &&
    left.manual.zone1Lower === right.manual.zone1Lower &&
    left.manual.zone1Upper === right.manual.zone1Upper &&
    left.manual.zone2Upper === right.manual.zone2Upper &&
    left.manual.zone3Upper === right.manual.zone3Upper &&
    left.manual.zone4Upper === right.manual.zone4Upper &&
    left.manual.zone5Upper === right.manual.zone5Upper
  );
}
