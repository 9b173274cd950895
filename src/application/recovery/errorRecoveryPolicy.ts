import type { RecoveryConfig } from '@/config/musicService';
import {
  CoachError,
  ConnectivityError,
  CredentialError,
  ExhaustionError,
  HttpStatusError,
} from '@/shared/errors';
import { createLogger, errorMessage, type ScopedLog } from '@/shared/logging/logger';

export type FailureClass =
  | { kind: 'channel-disconnected' }
  | { kind: 'credential-expired' }
  | { kind: 'rate-limited'; retryAfterMs?: number }
  | { kind: 'transient-network' }
  | { kind: 'permanent-auth-failure'; reason: string }
  | { kind: 'unrecoverable'; reason: string };

export type RecoveryAction =
  | 'reconnect-channel'
  | 'refresh-credential'
  | 'wait-then-retry'
  | 'prompt-user-reauth'
  | 'give-up';

export type DeferReason = 'backgrounded' | 'idle';

export type RecoveryDecision =
  | { kind: 'act'; action: RecoveryAction; delayMs: number; attempt: number }
  | { kind: 'defer'; action: RecoveryAction; reason: DeferReason };

export interface RecoveryContext {
  sessionActive: boolean;
  inForeground: boolean;
}

/** Attempt counters are tracked per operation, e.g. `channel` or `request`. */
export type RecoveryOperation = 'channel' | 'credential' | 'request' | 'poll';

export interface ErrorRecoveryPolicyDeps {
  config: RecoveryConfig;
  random?: () => number;
  log?: ScopedLog;
}

export function classifyFailure(error: unknown): FailureClass {
  if (error instanceof ConnectivityError) {
    return error.scope === 'channel' ? { kind: 'channel-disconnected' } : { kind: 'transient-network' };
  }
  if (error instanceof CredentialError) {
    return error.reason === 'expired'
      ? { kind: 'credential-expired' }
      : { kind: 'permanent-auth-failure', reason: error.message };
  }
  if (error instanceof HttpStatusError) {
    return classifyStatus(error);
  }
  if (error instanceof ExhaustionError) {
    return { kind: 'unrecoverable', reason: error.message };
  }
  if (error instanceof CoachError && error.kind === 'configuration') {
    return { kind: 'unrecoverable', reason: error.message };
  }
  // Protocol errors, aborted requests and fetch TypeErrors are all worth another try.
  return { kind: 'transient-network' };
}

function classifyStatus(error: HttpStatusError): FailureClass {
  const { status } = error;
  if (status === 401) return { kind: 'credential-expired' };
  if (status === 403) return { kind: 'permanent-auth-failure', reason: `access denied (${status})` };
  if (status === 429) return { kind: 'rate-limited', retryAfterMs: error.retryAfterMs };
  // 404 from the player API means no active device yet.
  if (status === 404 || status === 408 || status >= 500) return { kind: 'transient-network' };
  return { kind: 'unrecoverable', reason: `request rejected (${status})` };
}

/**
 * Maps failures to recovery actions with capped exponential backoff.
 *
 * Request-level failures are bounded by `maxAttempts`; channel reconnection is
 * unbounded while a session runs in the foreground and deferred otherwise.
 */
export class ErrorRecoveryPolicy {
  private readonly attempts = new Map<RecoveryOperation, number>();
  private readonly random: () => number;
  private readonly log: ScopedLog;

  constructor(private readonly deps: ErrorRecoveryPolicyDeps) {
    this.random = deps.random ?? Math.random;
    this.log = deps.log ?? createLogger('Music', 'Recovery');
  }

  public backoffDelay(attempt: number): number {
    const { baseDelayMs, maxDelayMs, jitterMs } = this.deps.config;
    const exponent = Math.max(0, attempt - 1);
    const base = Math.min(maxDelayMs, baseDelayMs * 2 ** exponent);
    return base + Math.floor(this.random() * jitterMs);
  }

  public decide(operation: RecoveryOperation, error: unknown, context: RecoveryContext): RecoveryDecision {
    const failure = classifyFailure(error);
    const decision = this.decideFor(operation, failure, context);
    this.log.info('recovery decision', {
      operation,
      failure: failure.kind,
      error: errorMessage(error),
      decision: decision.kind === 'act' ? decision.action : `defer:${decision.reason}`,
      delayMs: decision.kind === 'act' ? decision.delayMs : undefined,
      attempt: decision.kind === 'act' ? decision.attempt : undefined,
    });
    return decision;
  }

  public decideFor(operation: RecoveryOperation, failure: FailureClass, context: RecoveryContext): RecoveryDecision {
    const { maxAttempts } = this.deps.config;

    switch (failure.kind) {
      case 'channel-disconnected': {
        if (!context.sessionActive) {
          return { kind: 'defer', action: 'reconnect-channel', reason: 'idle' };
        }
        if (!context.inForeground) {
          return { kind: 'defer', action: 'reconnect-channel', reason: 'backgrounded' };
        }
        const attempt = this.nextAttempt(operation);
        return { kind: 'act', action: 'reconnect-channel', delayMs: this.backoffDelay(attempt), attempt };
      }
      case 'credential-expired': {
        const attempt = this.nextAttempt(operation);
        if (attempt > maxAttempts) {
          this.recordSuccess(operation);
          return { kind: 'act', action: 'prompt-user-reauth', delayMs: 0, attempt };
        }
        const delayMs = attempt === 1 ? 0 : this.backoffDelay(attempt - 1);
        return { kind: 'act', action: 'refresh-credential', delayMs, attempt };
      }
      case 'permanent-auth-failure':
        this.recordSuccess(operation);
        return { kind: 'act', action: 'prompt-user-reauth', delayMs: 0, attempt: 1 };
      case 'rate-limited':
      case 'transient-network': {
        const attempt = this.nextAttempt(operation);
        if (attempt > maxAttempts) {
          this.recordSuccess(operation);
          return { kind: 'act', action: 'give-up', delayMs: 0, attempt };
        }
        // A server-provided delay only ever lengthens the wait.
        const retryAfter = failure.kind === 'rate-limited' ? failure.retryAfterMs ?? 0 : 0;
        return {
          kind: 'act',
          action: 'wait-then-retry',
          delayMs: Math.max(retryAfter, this.backoffDelay(attempt)),
          attempt,
        };
      }
      case 'unrecoverable':
        this.recordSuccess(operation);
        return { kind: 'act', action: 'give-up', delayMs: 0, attempt: 1 };
    }
  }

  public recordSuccess(operation: RecoveryOperation): void {
    this.attempts.delete(operation);
  }

  public attemptsFor(operation: RecoveryOperation): number {
    return this.attempts.get(operation) ?? 0;
  }

  public reset(): void {
    this.attempts.clear();
  }

  private nextAttempt(operation: RecoveryOperation): number {
    const attempt = this.attemptsFor(operation) + 1;
    this.attempts.set(operation, attempt);
    return attempt;
  }
}
