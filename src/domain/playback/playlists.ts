import { ConfigurationError } from '@/shared/errors';

/** Context URIs started by the two playlist commands; empty resumes the current context. */
export interface PlaylistSelection {
  highIntensity: string;
  rest: string;
}

export interface MusicPlaylist {
  id: string;
  uri: string;
  name: string;
  description: string;
  trackCount: number;
  imageUrl: string | null;
  owner: string;
}

export interface PlaylistPage {
  items: MusicPlaylist[];
  total: number;
  limit: number;
  offset: number;
}

export const PLAYLIST_PAGE_LIMIT = 50;

export function validatePlaylistSelection(selection: PlaylistSelection): PlaylistSelection {
  const highIntensity = selection.highIntensity.trim();
  const rest = selection.rest.trim();
  if (highIntensity && highIntensity === rest) {
    throw new ConfigurationError('high intensity and rest playlists must differ', 'playlists');
  }
  return { highIntensity, rest };
}
