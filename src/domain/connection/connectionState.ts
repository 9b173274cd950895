/**
 * Music service connection lifecycle. Authentication (holding a credential)
 * and channel connectivity (the live remote-control session) are separate, so
 * losing the channel keeps the credential and only costs a reconnect.
 */
export type ConnectionState =
  | { status: 'disconnected' }
  | { status: 'authenticating' }
  | { status: 'authenticated'; credential: string }
  | { status: 'connecting'; credential: string }
  | { status: 'connected'; credential: string }
  | { status: 'error'; reason: string; demotesAuth: true }
  | { status: 'error'; reason: string; demotesAuth: false; credential: string };

export type ConnectionStatus = ConnectionState['status'];

/** Edge label used in the transition table; errors split on whether they keep the credential. */
export type ConnectionNode = Exclude<ConnectionStatus, 'error'> | 'error:keep' | 'error:demote';

export function nodeOf(state: ConnectionState): ConnectionNode {
  if (state.status !== 'error') return state.status;
  return state.demotesAuth ? 'error:demote' : 'error:keep';
}

const LEGAL_EDGES: Record<ConnectionNode, readonly ConnectionNode[]> = {
  disconnected: ['authenticating'],
  authenticating: ['authenticated', 'error:demote'],
  authenticated: ['connecting'],
  connecting: ['connected', 'error:keep', 'authenticating'],
  connected: ['connecting', 'authenticating'],
  'error:keep': ['connecting'],
  'error:demote': ['authenticating'],
};

/** Logout may force `disconnected` from anywhere. */
export function isLegalTransition(from: ConnectionState, to: ConnectionState): boolean {
  if (to.status === 'disconnected') {
    return from.status !== 'disconnected';
  }
  return LEGAL_EDGES[nodeOf(from)].includes(nodeOf(to));
}

export function credentialOf(state: ConnectionState): string | null {
  switch (state.status) {
    case 'authenticated':
    case 'connecting':
    case 'connected':
      return state.credential;
    case 'error':
      return state.demotesAuth ? null : state.credential;
    default:
      return null;
  }
}

export function isAuthenticated(state: ConnectionState): boolean {
  return credentialOf(state) !== null;
}

export function isChannelConnected(state: ConnectionState): boolean {
  return state.status === 'connected';
}

export function statusMessage(state: ConnectionState): string {
  switch (state.status) {
    case 'disconnected':
      return 'Not connected';
    case 'authenticating':
      return 'Authenticating with the music service...';
    case 'authenticated':
      return 'Authenticated - connecting...';
    case 'connecting':
      return 'Connecting to the music service...';
    case 'connected':
      return 'Connected to the music service';
    case 'error':
      return state.demotesAuth
        ? `Authentication failed: ${state.reason}`
        : `Connection issue: ${state.reason}`;
  }
}

export function describeState(state: ConnectionState): string {
  return nodeOf(state);
}
