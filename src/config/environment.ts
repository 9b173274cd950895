import { isLogLevel, type LogLevel } from '@/types/logLevel';

/**
 * Canonical view of the process environment consumed by the application.
 */
export interface EnvironmentConfig {
  nodeEnv: 'development' | 'production' | 'test';
  logLevel: LogLevel;
  logJson: boolean;
  deviceId: string;
}

const DEFAULT_ENVIRONMENT: EnvironmentConfig = {
  nodeEnv: 'development',
  logLevel: 'info',
  logJson: false,
  deviceId: 'local-device',
};

export function loadEnvironment(overrides: Partial<EnvironmentConfig> = {}): EnvironmentConfig {
  return { ...DEFAULT_ENVIRONMENT, ...overrides };
}

/**
 * Picks the recognised variables out of `source`. Unknown or malformed values
 * are skipped so the defaults apply.
 */
export function readEnvironmentOverrides(
  source: Record<string, string | undefined> = process.env,
): Partial<EnvironmentConfig> {
  const overrides: Partial<EnvironmentConfig> = {};
  const nodeEnv = source.NODE_ENV;
  if (nodeEnv === 'development' || nodeEnv === 'production' || nodeEnv === 'test') {
    overrides.nodeEnv = nodeEnv;
  }
  const level = source.LOG_LEVEL?.toLowerCase();
  if (isLogLevel(level)) {
    overrides.logLevel = level;
  }
  if (source.LOG_JSON !== undefined) {
    overrides.logJson = source.LOG_JSON === '1' || source.LOG_JSON.toLowerCase() === 'true';
  }
  const deviceId = source.COACH_DEVICE_ID?.trim();
  if (deviceId) {
    overrides.deviceId = deviceId;
  }
  return overrides;
}
