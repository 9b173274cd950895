import type { EnvironmentConfig } from '@/config/environment';
import type { IntervalPlan } from '@/domain/training/types';
import { DEFAULT_ZONE_SETTINGS, type ZoneSettings } from '@/domain/zones/types';

export interface TrainingConfig {
  plan: IntervalPlan;
  tickIntervalMs: number;
  zoneSettings: ZoneSettings;
  announcementCooldownMs: number;
  nowPlayingPollMs: number;
}

/**
 * Interval workout defaults: eight 4-minute efforts with 3-minute recoveries.
 */
export function buildTrainingConfig(
  env: EnvironmentConfig,
  overrides: Partial<TrainingConfig> = {},
): TrainingConfig {
  return {
    plan: { totalIntervals: 8, highDurationMs: 4 * 60_000, restDurationMs: 3 * 60_000 },
    tickIntervalMs: 1000,
    zoneSettings: DEFAULT_ZONE_SETTINGS,
    announcementCooldownMs: 5000,
    // Polling only matters while the channel is down; test runs keep it tight.
    nowPlayingPollMs: env.nodeEnv === 'test' ? 1000 : 5000,
    ...overrides,
  };
}
