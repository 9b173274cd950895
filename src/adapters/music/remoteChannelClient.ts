import WebSocket from 'ws';
import type { PlaybackCommand } from '@/domain/playback/commands';
import type { ChannelListener, ChannelPlayerState, RemoteChannelPort } from '@/ports/RemoteChannelPort';
import { bestEffortSync, safeJsonParse } from '@/shared/bestEffort';
import { ConnectivityError, CredentialError, ProtocolError } from '@/shared/errors';
import { createLogger, type ScopedLog } from '@/shared/logging/logger';

export interface RemoteChannelOptions {
  url: string;
  commandTimeoutMs?: number;
  heartbeatIntervalMs?: number;
  heartbeatTimeoutMs?: number;
  log?: ScopedLog;
}

interface PendingCommand {
  resolve: () => void;
  reject: (reason: Error) => void;
  timeout: NodeJS.Timeout;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function parsePlayerState(data: unknown): ChannelPlayerState | null {
  if (!isRecord(data)) return null;
  const { trackId, title, artist, isPlaying } = data;
  if (typeof trackId !== 'string' || trackId.length === 0 || typeof isPlaying !== 'boolean') {
    return null;
  }
  return {
    trackId,
    title: typeof title === 'string' ? title : '',
    artist: typeof artist === 'string' ? artist : '',
    isPlaying,
  };
}

/**
 * Websocket remote-control session with the music service.
 *
 * Commands are JSON `{message_id, command, args}` frames acknowledged by a
 * frame with the same `message_id`; player updates arrive as
 * `{event: 'player_state', data}`. The client never reconnects on its own:
 * drops are reported to the listener and the connector decides what to do.
 */
export class RemoteChannelClient implements RemoteChannelPort {
  private ws?: WebSocket;
  private listener: ChannelListener | null = null;
  private pending = new Map<number, PendingCommand>();
  private nextMsgId = 0;
  private heartbeatTimer?: NodeJS.Timeout;
  private lastPong = Date.now();
  private closingOnPurpose = false;
  private readonly log: ScopedLog;
  private readonly commandTimeoutMs: number;
  private readonly heartbeatIntervalMs: number;
  private readonly heartbeatTimeoutMs: number;

  constructor(private readonly options: RemoteChannelOptions) {
    this.log = options.log ?? createLogger('Music', 'Channel');
    this.commandTimeoutMs = options.commandTimeoutMs ?? 5000;
    this.heartbeatIntervalMs = options.heartbeatIntervalMs ?? 10_000;
    this.heartbeatTimeoutMs = options.heartbeatTimeoutMs ?? 30_000;
  }

  public connect(accessToken: string, listener: ChannelListener): Promise<void> {
    const previous = this.ws;
    if (previous) {
      this.teardown();
      previous.terminate();
    }
    this.closingOnPurpose = false;
    this.listener = listener;
    const url = this.options.url;

    return new Promise<void>((resolve, reject) => {
      const ws = new WebSocket(url, { headers: { Authorization: `Bearer ${accessToken}` } });
      this.ws = ws;
      let opened = false;

      ws.on('open', () => {
        if (this.ws !== ws) return;
        opened = true;
        this.lastPong = Date.now();
        this.startHeartbeat(ws);
        this.log.info('remote channel connected', { url });
        resolve();
      });
      ws.on('pong', () => {
        this.lastPong = Date.now();
      });
      ws.on('message', (data) => {
        if (this.ws !== ws) return;
        this.handleMessage(data.toString());
      });
      ws.on('unexpected-response', (_request, response) => {
        if (this.ws !== ws) return;
        const status = response.statusCode ?? 0;
        ws.terminate();
        if (opened) return;
        if (status === 401) {
          reject(new CredentialError('channel rejected the access token', 'expired'));
        } else if (status === 403) {
          reject(new CredentialError('channel access revoked', 'revoked'));
        } else {
          reject(new ConnectivityError(`channel handshake rejected (${status})`, 'channel'));
        }
      });
      ws.on('error', (error) => {
        this.log.warn('remote channel socket error', { url, message: error.message });
        if (!opened) {
          reject(new ConnectivityError(`channel connect failed: ${error.message}`, 'channel', { cause: error }));
        }
      });
      ws.on('close', (code) => {
        if (this.ws !== ws) return;
        const onPurpose = this.closingOnPurpose;
        this.teardown();
        if (!opened) {
          reject(new ConnectivityError(`channel closed during connect (${code})`, 'channel'));
          return;
        }
        this.log.info('remote channel closed', { url, code, onPurpose });
        const listener = this.listener;
        this.listener = null;
        if (listener) {
          const error = onPurpose ? undefined : new ConnectivityError(`channel closed (${code})`, 'channel');
          bestEffortSync(() => listener.onDisconnected(error), {
            fallback: undefined,
            onError: 'debug',
            label: 'channel disconnect listener failed',
            log: this.log,
          });
        }
      });
    });
  }

  public disconnect(): void {
    const ws = this.ws;
    if (!ws) return;
    this.closingOnPurpose = true;
    if (ws.readyState === WebSocket.CONNECTING) {
      ws.terminate();
      return;
    }
    ws.close(1000, 'client disconnect');
  }

  public isOpen(): boolean {
    return this.ws?.readyState === WebSocket.OPEN;
  }

  public send(command: PlaybackCommand, playlistUri?: string): Promise<void> {
    const ws = this.ws;
    if (!ws || ws.readyState !== WebSocket.OPEN) {
      return Promise.reject(new ConnectivityError('channel not connected', 'channel'));
    }
    const messageId = ++this.nextMsgId;
    const frame: Record<string, unknown> = { message_id: messageId, command };
    if (playlistUri) {
      frame.args = { uri: playlistUri };
    }

    return new Promise<void>((resolve, reject) => {
      const timeout = setTimeout(() => {
        this.pending.delete(messageId);
        reject(new ConnectivityError(`channel command timed out: ${command}`, 'channel'));
      }, this.commandTimeoutMs);
      this.pending.set(messageId, { resolve, reject, timeout });

      ws.send(JSON.stringify(frame), (error) => {
        if (!error) return;
        const entry = this.pending.get(messageId);
        if (!entry) return;
        clearTimeout(entry.timeout);
        this.pending.delete(messageId);
        entry.reject(new ConnectivityError(`channel send failed: ${error.message}`, 'channel', { cause: error }));
      });
    });
  }

  private handleMessage(raw: string): void {
    const message = safeJsonParse(raw, { onError: 'debug', label: 'channel frame is not JSON', log: this.log });
    if (!isRecord(message)) {
      return;
    }

    const messageId = message.message_id;
    if (typeof messageId === 'number') {
      const entry = this.pending.get(messageId);
      if (!entry) return;
      clearTimeout(entry.timeout);
      this.pending.delete(messageId);
      if ('error_code' in message) {
        const detail = typeof message.details === 'string' ? message.details : '';
        entry.reject(new ProtocolError(`channel command rejected: ${String(message.error_code)}`, detail));
      } else {
        entry.resolve();
      }
      return;
    }

    if (message.event === 'player_state') {
      const state = parsePlayerState(message.data);
      const listener = this.listener;
      if (!state || !listener) {
        this.log.debug('player state frame ignored', { valid: state !== null });
        return;
      }
      bestEffortSync(() => listener.onPlayerState(state), {
        fallback: undefined,
        onError: 'debug',
        label: 'player state listener failed',
        log: this.log,
      });
    }
  }

  private startHeartbeat(ws: WebSocket): void {
    this.stopHeartbeat();
    this.heartbeatTimer = setInterval(() => {
      if (ws.readyState !== WebSocket.OPEN) return;
      if (Date.now() - this.lastPong > this.heartbeatTimeoutMs) {
        this.log.warn('remote channel heartbeat lost', { url: this.options.url });
        ws.terminate();
        return;
      }
      bestEffortSync(() => ws.ping(), {
        fallback: undefined,
        onError: 'debug',
        label: 'channel ping failed',
        log: this.log,
      });
    }, this.heartbeatIntervalMs);
    this.heartbeatTimer.unref();
  }

  private stopHeartbeat(): void {
    if (this.heartbeatTimer) {
      clearInterval(this.heartbeatTimer);
      this.heartbeatTimer = undefined;
    }
  }

  private teardown(): void {
    this.stopHeartbeat();
    this.ws = undefined;
    const lost = new ConnectivityError('channel connection lost', 'channel');
    this.pending.forEach((entry) => {
      clearTimeout(entry.timeout);
      entry.reject(lost);
    });
    this.pending.clear();
  }
}
