import type { EnvironmentConfig } from '@/config/environment';

export interface CredentialConfig {
  deviceId: string;
  /** Base URLs in priority order; each already includes the API prefix. */
  endpoints: string[];
  requestTimeoutMs: number;
  safetyMarginMs: number;
  maxCacheAgeMs: number;
  maxAttempts: number;
}

export interface RecoveryConfig {
  baseDelayMs: number;
  maxDelayMs: number;
  jitterMs: number;
  maxAttempts: number;
}

export interface MusicServiceConfig {
  channelUrl: string;
  apiBaseUrl: string;
  requestTimeoutMs: number;
  highIntensityPlaylistUri: string;
  restPlaylistUri: string;
  /** Preferred target when playback has to be moved to a device; empty picks one. */
  playbackDeviceName: string;
  freshnessThresholdMs: number;
}

export function buildCredentialConfig(
  env: EnvironmentConfig,
  overrides: Partial<CredentialConfig> = {},
): CredentialConfig {
  const endpoints = overrides.endpoints ?? [
    'https://coach-backend.example.com/api/v1',
    'http://localhost:8000/api/v1',
    'http://127.0.0.1:8000/api/v1',
  ];
  return {
    deviceId: env.deviceId,
    requestTimeoutMs: 5000,
    safetyMarginMs: 5 * 60_000,
    maxCacheAgeMs: 30 * 60_000,
    maxAttempts: 3,
    ...overrides,
    endpoints: dedupe(endpoints.map(trimTrailingSlash)),
  };
}

export function buildRecoveryConfig(overrides: Partial<RecoveryConfig> = {}): RecoveryConfig {
  return {
    baseDelayMs: 2000,
    maxDelayMs: 30_000,
    jitterMs: 2000,
    maxAttempts: 3,
    ...overrides,
  };
}

export function buildMusicServiceConfig(
  overrides: Partial<MusicServiceConfig> = {},
): MusicServiceConfig {
  return {
    channelUrl: 'ws://127.0.0.1:7300/remote',
    apiBaseUrl: 'https://api.spotify.com/v1',
    requestTimeoutMs: 8000,
    highIntensityPlaylistUri: '',
    restPlaylistUri: '',
    playbackDeviceName: '',
    freshnessThresholdMs: 10_000,
    ...overrides,
  };
}

function trimTrailingSlash(url: string): string {
  return url.replace(/\/+$/, '');
}

function dedupe(values: string[]): string[] {
  return [...new Set(values.filter((value) => value.length > 0))];
}
