import type { CachedCredential } from '@/domain/credentials/types';

/**
 * Credential source used by the application layer; implemented by the token
 * cache adapter.
 */
export interface CredentialPort {
  get(): Promise<CachedCredential>;
  invalidate(): void;
  revoke(): Promise<void>;
}
