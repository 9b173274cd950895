import {
  credentialOf,
  describeState,
  isLegalTransition,
  statusMessage,
  type ConnectionState,
} from '@/domain/connection/connectionState';
import { bestEffortSync } from '@/shared/bestEffort';
import { createLogger, type ScopedLog } from '@/shared/logging/logger';

export type ConnectionListener = (state: ConnectionState, previous: ConnectionState) => void;

/**
 * Single authority over the music connection lifecycle. Named events map onto
 * `transition`; anything the edge table does not allow is logged and refused.
 */
export class ConnectionStateMachine {
  private state: ConnectionState = { status: 'disconnected' };
  private readonly listeners = new Set<ConnectionListener>();
  private readonly log: ScopedLog;

  constructor(log?: ScopedLog) {
    this.log = log ?? createLogger('Music', 'Connection');
  }

  public get current(): ConnectionState {
    return this.state;
  }

  public subscribe(listener: ConnectionListener): () => void {
    this.listeners.add(listener);
    return () => this.listeners.delete(listener);
  }

  public transition(next: ConnectionState): boolean {
    const previous = this.state;
    if (!isLegalTransition(previous, next)) {
      this.log.warn('illegal connection transition rejected', {
        from: describeState(previous),
        to: describeState(next),
      });
      return false;
    }
    this.state = next;
    this.log.info('connection state changed', {
      from: describeState(previous),
      to: describeState(next),
    });
    for (const listener of this.listeners) {
      bestEffortSync(() => listener(next, previous), {
        fallback: undefined,
        onError: 'debug',
        label: 'connection listener failed',
        log: this.log,
      });
    }
    return true;
  }

  public beginAuthentication(): boolean {
    return this.transition({ status: 'authenticating' });
  }

  public authenticationSucceeded(credential: string): boolean {
    return this.transition({ status: 'authenticated', credential });
  }

  public authenticationFailed(reason: string): boolean {
    return this.transition({ status: 'error', reason, demotesAuth: true });
  }

  public beginChannelConnect(): boolean {
    const credential = credentialOf(this.state);
    if (credential === null) {
      this.log.warn('channel connect requested without a credential', { state: describeState(this.state) });
      return false;
    }
    return this.transition({ status: 'connecting', credential });
  }

  public channelConnected(): boolean {
    const credential = credentialOf(this.state);
    if (credential === null) return false;
    return this.transition({ status: 'connected', credential });
  }

  /** Channel attempt failed; the credential is still considered valid. */
  public channelFailed(reason: string): boolean {
    const credential = credentialOf(this.state);
    if (credential === null) return false;
    return this.transition({ status: 'error', reason, demotesAuth: false, credential });
  }

  /** Live channel dropped; goes straight back to connecting. */
  public transientFailure(): boolean {
    return this.beginChannelConnect();
  }

  public credentialInvalid(): boolean {
    return this.beginAuthentication();
  }

  /** Leaves an error state along its only legal edge. */
  public retry(): boolean {
    const state = this.state;
    if (state.status !== 'error') {
      return false;
    }
    return state.demotesAuth ? this.beginAuthentication() : this.beginChannelConnect();
  }

  public logout(): boolean {
    if (this.state.status === 'disconnected') return false;
    return this.transition({ status: 'disconnected' });
  }

  public get credential(): string | null {
    return credentialOf(this.state);
  }

  public isAuthenticated(): boolean {
    return this.credential !== null;
  }

  public isChannelConnected(): boolean {
    return this.state.status === 'connected';
  }

  /** The request API only needs a credential, not a live channel. */
  public canUseRequestApi(): boolean {
    return this.isAuthenticated();
  }

  public statusMessage(): string {
    return statusMessage(this.state);
  }
}
