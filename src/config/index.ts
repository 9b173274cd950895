import { loadEnvironment, type EnvironmentConfig } from '@/config/environment';
import {
  buildCredentialConfig,
  buildMusicServiceConfig,
  buildRecoveryConfig,
  type CredentialConfig,
  type MusicServiceConfig,
  type RecoveryConfig,
} from '@/config/musicService';
import { buildTrainingConfig, type TrainingConfig } from '@/config/training';

export interface ConfigOverrides {
  env?: Partial<EnvironmentConfig>;
  training?: Partial<TrainingConfig>;
  credentials?: Partial<CredentialConfig>;
  recovery?: Partial<RecoveryConfig>;
  musicService?: Partial<MusicServiceConfig>;
}

/**
 * Aggregates all configuration builders into a single bootstrap helper.
 */
export const loadConfig = (overrides: ConfigOverrides = {}) => {
  const env = loadEnvironment(overrides.env);
  return {
    env,
    training: buildTrainingConfig(env, overrides.training),
    credentials: buildCredentialConfig(env, overrides.credentials),
    recovery: buildRecoveryConfig(overrides.recovery),
    musicService: buildMusicServiceConfig(overrides.musicService),
  };
};

export type AppConfig = ReturnType<typeof loadConfig>;
