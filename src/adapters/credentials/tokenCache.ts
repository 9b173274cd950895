import type { CredentialConfig } from '@/config/musicService';
import type { CachedCredential, StoreCredentialRequest, TokenResponse } from '@/domain/credentials/types';
import type { ClockPort } from '@/ports/ClockPort';
import type { CredentialPort } from '@/ports/CredentialPort';
import type { CredentialBackendClient } from '@/adapters/credentials/credentialBackendClient';
import { CredentialError } from '@/shared/errors';
import { createLogger, type ScopedLog } from '@/shared/logging/logger';

export interface TokenCacheDeps {
  backend: CredentialBackendClient;
  clock: ClockPort;
  config: Pick<CredentialConfig, 'safetyMarginMs' | 'maxCacheAgeMs'>;
  log?: ScopedLog;
}

export interface TokenCacheStatus {
  cached: boolean;
  valid: boolean;
  expiresInMs: number | null;
  ageMs: number | null;
  refreshing: boolean;
  stickyEndpoint: string | null;
}

/**
 * Access-token cache in front of the credential backend. Concurrent callers of
 * `get()` share one in-flight fetch.
 */
export class TokenCache implements CredentialPort {
  private cached: CachedCredential | null = null;
  private inflight: Promise<CachedCredential> | null = null;
  private generation = 0;
  private readonly log: ScopedLog;

  constructor(private readonly deps: TokenCacheDeps) {
    this.log = deps.log ?? createLogger('Credentials', 'TokenCache');
  }

  public async get(): Promise<CachedCredential> {
    const cached = this.cached;
    if (cached && this.isUsable(cached, this.deps.clock.now())) {
      return cached;
    }
    if (this.inflight) {
      return this.inflight;
    }
    const flight = this.refresh().finally(() => {
      if (this.inflight === flight) {
        this.inflight = null;
      }
    });
    this.inflight = flight;
    return flight;
  }

  public peek(): CachedCredential | null {
    return this.cached;
  }

  /** Drops the cached credential; a fetch already in flight will not repopulate it. */
  public invalidate(): void {
    if (this.cached || this.inflight) {
      this.log.debug('credential cache invalidated');
    }
    this.cached = null;
    this.inflight = null;
    this.generation += 1;
  }

  public async store(credential: StoreCredentialRequest): Promise<void> {
    await this.deps.backend.storeToken(credential);
    this.invalidate();
    this.log.info('credential stored at backend');
  }

  public async revoke(): Promise<void> {
    this.invalidate();
    await this.deps.backend.revokeToken();
    this.log.info('credential revoked at backend');
  }

  public status(): TokenCacheStatus {
    const now = this.deps.clock.now();
    const cached = this.cached;
    return {
      cached: cached !== null,
      valid: cached !== null && this.isUsable(cached, now),
      expiresInMs: cached ? cached.expiresAt - now : null,
      ageMs: cached ? now - cached.fetchedAt : null,
      refreshing: this.inflight !== null,
      stickyEndpoint: this.deps.backend.getStickyEndpoint(),
    };
  }

  public isUsable(credential: CachedCredential, now: number): boolean {
    const { safetyMarginMs, maxCacheAgeMs } = this.deps.config;
    return now < credential.expiresAt - safetyMarginMs && now - credential.fetchedAt < maxCacheAgeMs;
  }

  private async refresh(): Promise<CachedCredential> {
    const generation = this.generation;
    let response: TokenResponse;
    try {
      response = await this.deps.backend.fetchToken();
    } catch (error) {
      if (error instanceof CredentialError && error.reason === 'missing') {
        this.log.warn('backend has no credential for this device');
        this.invalidate();
      }
      throw error;
    }

    const now = this.deps.clock.now();
    const credential: CachedCredential = {
      token: response.accessToken,
      refreshToken: response.refreshToken,
      expiresAt: resolveExpiry(response, now),
      fetchedAt: now,
    };
    if (generation === this.generation) {
      this.cached = credential;
    }
    this.log.debug('credential fetched', { expiresInMs: credential.expiresAt - now });
    return credential;
  }
}

/** Prefers the backend's absolute expiry; falls back to `expiresIn` seconds from now. */
export function resolveExpiry(response: TokenResponse, now: number): number {
  const absolute = Date.parse(response.expiresAt);
  if (!Number.isNaN(absolute)) {
    return absolute;
  }
  return now + response.expiresIn * 1000;
}
