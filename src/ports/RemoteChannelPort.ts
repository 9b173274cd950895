import type { PlaybackCommand } from '@/domain/playback/commands';

export interface ChannelPlayerState {
  trackId: string;
  title: string;
  artist: string;
  isPlaying: boolean;
}

export interface ChannelListener {
  onPlayerState(state: ChannelPlayerState): void;
  /** `error` is undefined when the channel was closed on purpose. */
  onDisconnected(error?: Error): void;
}

/**
 * Persistent low-latency remote-control session with the music service.
 */
export interface RemoteChannelPort {
  connect(accessToken: string, listener: ChannelListener): Promise<void>;
  disconnect(): void;
  isOpen(): boolean;
  send(command: PlaybackCommand, playlistUri?: string): Promise<void>;
}
