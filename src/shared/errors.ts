/**
 * Error taxonomy shared by every component.
 *
 * Only {@link ConfigurationError} and {@link ExhaustionError} are meant to reach
 * the user-visible layer; the rest are absorbed by the component that owns the
 * failing operation and fed into the recovery policy.
 */
export type CoachErrorKind =
  | 'configuration'
  | 'connectivity'
  | 'credential'
  | 'protocol'
  | 'exhaustion'
  | 'http-status';

export abstract class CoachError extends Error {
  public abstract readonly kind: CoachErrorKind;

  protected constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }

  /** Whether this error should be shown to the user as-is. */
  public get userFacing(): boolean {
    return this.kind === 'configuration' || this.kind === 'exhaustion';
  }
}

export class ConfigurationError extends CoachError {
  public readonly kind = 'configuration';

  constructor(
    message: string,
    public readonly field?: string,
  ) {
    super(message);
  }
}

export type ConnectivityScope = 'channel' | 'network';

export class ConnectivityError extends CoachError {
  public readonly kind = 'connectivity';

  constructor(
    message: string,
    public readonly scope: ConnectivityScope,
    options?: { cause?: unknown },
  ) {
    super(message, options);
  }
}

export type CredentialErrorReason = 'expired' | 'missing' | 'revoked';

export class CredentialError extends CoachError {
  public readonly kind = 'credential';

  constructor(
    message: string,
    public readonly reason: CredentialErrorReason,
  ) {
    super(message);
  }
}

export class ProtocolError extends CoachError {
  public readonly kind = 'protocol';

  constructor(
    message: string,
    public readonly detail?: string,
  ) {
    super(message);
  }
}

export class ExhaustionError extends CoachError {
  public readonly kind = 'exhaustion';

  constructor(
    message: string,
    public readonly attempts: number,
    public readonly guidance = 'Training continues with heart-rate tracking only. Check your connection and reconnect the music service.',
    options?: { cause?: unknown },
  ) {
    super(message, options);
  }
}

export class HttpStatusError extends CoachError {
  public readonly kind = 'http-status';

  constructor(
    public readonly status: number,
    public readonly url: string,
    public readonly retryAfterMs?: number,
    public readonly body?: string,
  ) {
    super(`HTTP ${status} from ${url}`);
  }
}

/** Parses a `Retry-After` header given in seconds or as an HTTP date. */
export function parseRetryAfter(header: string | null, nowMs: number): number | undefined {
  if (!header) return undefined;
  const trimmed = header.trim();
  if (/^\d+(\.\d+)?$/.test(trimmed)) {
    return Math.round(Number(trimmed) * 1000);
  }
  const date = Date.parse(trimmed);
  if (Number.isNaN(date)) return undefined;
  return Math.max(0, date - nowMs);
}
