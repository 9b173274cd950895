import type { ConnectionStateMachine } from '@/application/connection/connectionStateMachine';
import type { IntentCoordinator } from '@/application/intent/intentCoordinator';
import type {
  ErrorRecoveryPolicy,
  RecoveryContext,
  RecoveryDecision,
  RecoveryOperation,
} from '@/application/recovery/errorRecoveryPolicy';
import type { DataReconciler } from '@/application/tracks/dataReconciler';
import type { AppIntent } from '@/domain/intent/appIntent';
import { makeSnapshot } from '@/domain/tracks/types';
import type { ClockPort } from '@/ports/ClockPort';
import type { CredentialPort } from '@/ports/CredentialPort';
import type { NotifierPort } from '@/ports/NotifierPort';
import type { ChannelListener, RemoteChannelPort } from '@/ports/RemoteChannelPort';
import type { CancelTimer, TimerPort } from '@/ports/TimerPort';
import { bestEffort } from '@/shared/bestEffort';
import { CoachError } from '@/shared/errors';
import { createLogger, errorMessage, type ScopedLog } from '@/shared/logging/logger';
import { SerialQueue } from '@/shared/serialQueue';

export interface MusicServiceConnectorDeps {
  credentials: CredentialPort;
  channel: RemoteChannelPort;
  connection: ConnectionStateMachine;
  recovery: ErrorRecoveryPolicy;
  intent: IntentCoordinator;
  reconciler: DataReconciler;
  clock: ClockPort;
  timers: TimerPort;
  notifier: Pick<NotifierPort, 'notifyReauthRequired' | 'notifyUserFacingError'>;
  log?: ScopedLog;
}

/**
 * Drives the connection lifecycle: authenticate, open the channel, and recover
 * from drops according to the recovery policy. All multi-step work runs through
 * one queue so two connects never interleave.
 */
export class MusicServiceConnector {
  private readonly queue = new SerialQueue();
  private readonly log: ScopedLog;
  private generation = 0;
  private cancelRetry: CancelTimer | null = null;
  private deferred = false;
  private unsubscribeIntent: (() => void) | null = null;

  constructor(private readonly deps: MusicServiceConnectorDeps) {
    this.log = deps.log ?? createLogger('Music', 'Connector');
  }

  public start(): void {
    if (this.unsubscribeIntent) return;
    this.unsubscribeIntent = this.deps.intent.subscribe((intent) => this.onIntentChanged(intent));
  }

  public async stop(): Promise<void> {
    this.unsubscribeIntent?.();
    this.unsubscribeIntent = null;
    this.generation += 1;
    this.clearRetry();
    this.deferred = false;
    this.deps.channel.disconnect();
    await this.queue.idle();
  }

  /** Resolves once the attempt settles; true when the channel is up. */
  public connect(): Promise<boolean> {
    const generation = this.generation;
    return this.queue.run(async () => {
      await this.advance(generation);
      return this.deps.connection.isChannelConnected();
    });
  }

  public logout(): Promise<void> {
    this.generation += 1;
    this.clearRetry();
    this.deferred = false;
    return this.queue.run(async () => {
      await bestEffort(() => this.deps.credentials.revoke(), {
        fallback: undefined,
        onError: 'warn',
        label: 'credential revoke failed',
        log: this.log,
      });
      this.deps.credentials.invalidate();
      this.deps.channel.disconnect();
      this.deps.reconciler.clearAll();
      this.deps.connection.logout();
      this.deps.recovery.reset();
      this.log.info('logged out of the music service');
    });
  }

  /**
   * Entry point for failures seen by other components. Connection-level
   * actions are applied here; the returned decision tells the caller whether
   * its own operation is worth retrying.
   */
  public reportFailure(operation: RecoveryOperation, error: unknown): RecoveryDecision {
    const decision = this.deps.recovery.decide(operation, error, this.context());
    if (decision.kind === 'act') {
      if (decision.action === 'refresh-credential' || decision.action === 'prompt-user-reauth') {
        this.applyDecision(decision, error);
      } else if (decision.action === 'give-up') {
        this.surface(error);
      }
    }
    return decision;
  }

  public reportSuccess(operation: RecoveryOperation): void {
    this.deps.recovery.recordSuccess(operation);
  }

  public isReconnectDeferred(): boolean {
    return this.deferred;
  }

  private context(): RecoveryContext {
    return {
      sessionActive: this.deps.intent.isSessionActive(),
      inForeground: this.deps.intent.inForeground,
    };
  }

  // Walks the state machine forward from wherever it is.
  private async advance(generation: number): Promise<void> {
    const connection = this.deps.connection;
    if (generation !== this.generation) return;

    const initial = connection.current.status;
    if (initial === 'connected') return;
    if (initial === 'disconnected') connection.beginAuthentication();
    if (initial === 'error') connection.retry();

    if (connection.current.status === 'authenticating') {
      const authenticated = await this.authenticate(generation);
      if (!authenticated) return;
    }
    if (connection.current.status === 'authenticated') {
      connection.beginChannelConnect();
    }
    if (connection.current.status === 'connecting') {
      await this.openChannel(generation);
    }
  }

  private async authenticate(generation: number): Promise<boolean> {
    try {
      const credential = await this.deps.credentials.get();
      if (generation !== this.generation) return false;
      this.deps.connection.authenticationSucceeded(credential.token);
      this.deps.recovery.recordSuccess('credential');
      return true;
    } catch (error) {
      if (generation !== this.generation) return false;
      this.log.warn('authentication failed', { message: errorMessage(error) });
      const decision = this.deps.recovery.decide('credential', error, this.context());
      this.applyDecision(decision, error);
      return false;
    }
  }

  private async openChannel(generation: number): Promise<void> {
    const token = this.deps.connection.credential;
    if (token === null) return;
    try {
      await this.deps.channel.connect(token, this.channelListener(generation));
    } catch (error) {
      if (generation !== this.generation) return;
      // A credential refresh may have taken over while the attempt was pending.
      if (this.deps.connection.current.status !== 'connecting') {
        this.log.debug('stale channel connect failure ignored', { message: errorMessage(error) });
        return;
      }
      this.log.warn('channel connect failed', { message: errorMessage(error) });
      const decision = this.deps.recovery.decide('channel', error, this.context());
      this.applyDecision(decision, error);
      return;
    }
    if (generation !== this.generation || this.deps.connection.current.status !== 'connecting') {
      this.deps.channel.disconnect();
      return;
    }
    this.deps.connection.channelConnected();
    this.deps.recovery.recordSuccess('channel');
  }

  private channelListener(generation: number): ChannelListener {
    return {
      onPlayerState: (state) => {
        if (generation !== this.generation) return;
        this.deps.reconciler.reconcile(makeSnapshot('channel', state, this.deps.clock.now()));
      },
      onDisconnected: (error) => {
        if (generation !== this.generation || !error) return;
        this.handleChannelDrop(error);
      },
    };
  }

  private handleChannelDrop(error: Error): void {
    this.log.warn('channel dropped', { message: error.message });
    this.deps.reconciler.clearSource('channel');
    this.deps.connection.transientFailure();
    const decision = this.deps.recovery.decide('channel', error, this.context());
    this.applyDecision(decision, error);
  }

  private applyDecision(decision: RecoveryDecision, error: unknown): void {
    const reason = errorMessage(error);
    if (decision.kind === 'defer') {
      this.enterError(reason);
      this.deferred = true;
      this.log.info('reconnect deferred', { reason: decision.reason });
      return;
    }

    switch (decision.action) {
      case 'reconnect-channel':
      case 'wait-then-retry':
        this.enterError(reason);
        this.scheduleRetry(decision.delayMs);
        return;
      case 'refresh-credential':
        this.deps.credentials.invalidate();
        this.enterAuthenticating();
        this.scheduleRetry(decision.delayMs);
        return;
      case 'prompt-user-reauth':
        this.deps.credentials.invalidate();
        this.enterAuthenticating();
        this.deps.connection.authenticationFailed(reason);
        this.deps.notifier.notifyReauthRequired(reason);
        return;
      case 'give-up':
        this.enterError(reason);
        this.surface(error);
        return;
    }
  }

  /** Moves into an error state, keeping the credential whenever one is held. */
  private enterError(reason: string): void {
    const connection = this.deps.connection;
    switch (connection.current.status) {
      case 'authenticating':
        connection.authenticationFailed(reason);
        return;
      case 'authenticated':
      case 'connected':
        connection.beginChannelConnect();
        connection.channelFailed(reason);
        return;
      case 'connecting':
        connection.channelFailed(reason);
        return;
      default:
        return;
    }
  }

  private enterAuthenticating(): void {
    const connection = this.deps.connection;
    if (this.deps.channel.isOpen()) {
      this.deps.channel.disconnect();
    }
    switch (connection.current.status) {
      case 'authenticating':
        return;
      case 'disconnected':
        connection.beginAuthentication();
        return;
      case 'error':
      case 'authenticated':
        // Reach authenticating through the connecting edge when a credential is held.
        if (connection.isAuthenticated()) {
          connection.beginChannelConnect();
          connection.credentialInvalid();
        } else {
          connection.retry();
        }
        return;
      case 'connecting':
      case 'connected':
        connection.credentialInvalid();
        return;
    }
  }

  private scheduleRetry(delayMs: number): void {
    this.clearRetry();
    const generation = this.generation;
    this.log.debug('connection retry scheduled', { delayMs });
    this.cancelRetry = this.deps.timers.schedule(delayMs, () => {
      this.cancelRetry = null;
      if (generation !== this.generation) return;
      void bestEffort(() => this.connect(), {
        fallback: false,
        onError: 'warn',
        label: 'scheduled reconnect failed',
        log: this.log,
      });
    });
  }

  private clearRetry(): void {
    if (this.cancelRetry) {
      this.cancelRetry();
      this.cancelRetry = null;
    }
  }

  private onIntentChanged(intent: AppIntent): void {
    if (!this.deferred || intent.activity !== 'active' || !intent.inForeground) {
      return;
    }
    this.deferred = false;
    this.log.info('resuming deferred reconnect');
    void bestEffort(() => this.connect(), {
      fallback: false,
      onError: 'warn',
      label: 'deferred reconnect failed',
      log: this.log,
    });
  }

  private surface(error: unknown): void {
    if (error instanceof CoachError && error.userFacing) {
      this.deps.notifier.notifyUserFacingError(error);
      return;
    }
    this.log.warn('giving up on music operation', { message: errorMessage(error) });
  }
}
