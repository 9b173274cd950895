import type { PlaybackCommand } from '@/domain/playback/commands';
import type { PlayerDevice } from '@/domain/playback/devices';
import type { PlaylistPage } from '@/domain/playback/playlists';

export interface NowPlaying {
  trackId: string;
  title: string;
  artist: string;
  isPlaying: boolean;
}

export interface PageRequest {
  limit: number;
  offset: number;
}

/**
 * Stateless request/response API of the music service.
 */
export interface MusicApiPort {
  execute(accessToken: string, command: PlaybackCommand, playlistUri?: string): Promise<void>;
  nowPlaying(accessToken: string): Promise<NowPlaying | null>;
  listDevices(accessToken: string): Promise<PlayerDevice[]>;
  /** Moves playback to `deviceId` without starting it. */
  transferPlayback(accessToken: string, deviceId: string): Promise<void>;
  listPlaylists(accessToken: string, page: PageRequest): Promise<PlaylistPage>;
}
