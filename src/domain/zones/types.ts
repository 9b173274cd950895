export type HeartRateZone = 1 | 2 | 3 | 4 | 5;

export interface ZoneBoundaries {
  zone1Lower: number;
  zone1Upper: number;
  zone2Upper: number;
  zone3Upper: number;
  zone4Upper: number;
  zone5Upper: number;
}

export interface ZoneSettings {
  readonly restingHR: number;
  readonly maxHR: number;
  readonly useAutoZones: boolean;
  readonly manual: Readonly<ZoneBoundaries>;
}

export const DEFAULT_MANUAL_BOUNDARIES: Readonly<ZoneBoundaries> = Object.freeze({
  zone1Lower: 60,
  zone1Upper: 70,
  zone2Upper: 80,
  zone3Upper: 90,
  zone4Upper: 100,
  zone5Upper: 110,
});

export const DEFAULT_ZONE_SETTINGS: ZoneSettings = Object.freeze({
  restingHR: 60,
  maxHR: 190,
  useAutoZones: true,
  manual: DEFAULT_MANUAL_BOUNDARIES,
});

export const ZONE_NAMES: Record<HeartRateZone, string> = {
  1: 'Active Recovery',
  2: 'Aerobic Base',
  3: 'Aerobic Threshold',
  4: 'Lactate Threshold',
  5: 'VO2 Max',
};

export function isHeartRateZone(value: number): value is HeartRateZone {
  return value === 1 || value === 2 || value === 3 || value === 4 || value === 5;
}
