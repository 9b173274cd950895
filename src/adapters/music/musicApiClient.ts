import type { FetchLike } from '@/adapters/credentials/credentialBackendClient';
import type { PlaybackCommand } from '@/domain/playback/commands';
import type { PlayerDevice } from '@/domain/playback/devices';
import type { MusicPlaylist, PlaylistPage } from '@/domain/playback/playlists';
import type { MusicApiPort, NowPlaying, PageRequest } from '@/ports/MusicApiPort';
import { safeReadText } from '@/shared/bestEffort';
import { withDeadline } from '@/shared/deadline';
import { ConnectivityError, HttpStatusError, ProtocolError, parseRetryAfter } from '@/shared/errors';
import { createLogger, errorMessage, type ScopedLog } from '@/shared/logging/logger';

export interface MusicApiClientOptions {
  baseUrl: string;
  /** Covers the whole exchange, body included. */
  requestTimeoutMs: number;
  fetchImpl?: FetchLike;
  log?: ScopedLog;
}

type Method = 'GET' | 'PUT' | 'POST';

interface RouteSpec {
  method: Method;
  path: string;
  body?: Record<string, unknown>;
}

function routeFor(command: PlaybackCommand, playlistUri?: string): RouteSpec {
  switch (command) {
    case 'playHighIntensity':
    case 'playRest':
      return { method: 'PUT', path: '/me/player/play', body: playlistUri ? { context_uri: playlistUri } : undefined };
    case 'resume':
      return { method: 'PUT', path: '/me/player/play' };
    case 'pause':
    case 'stop':
      return { method: 'PUT', path: '/me/player/pause' };
    case 'skipNext':
      return { method: 'POST', path: '/me/player/next' };
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function stringOr(value: unknown, fallback: string): string {
  return typeof value === 'string' ? value : fallback;
}

function numberOr(value: unknown, fallback: number): number {
  return typeof value === 'number' && Number.isFinite(value) ? value : fallback;
}

/** Maps a `currently-playing` body onto the fields the reconciler needs. */
export function parseNowPlaying(raw: unknown): NowPlaying | null {
  if (!isRecord(raw)) {
    throw new ProtocolError('now playing response is not an object');
  }
  const item = raw.item;
  if (item === null || item === undefined) {
    return null;
  }
  if (!isRecord(item) || typeof item.id !== 'string') {
    throw new ProtocolError('now playing item is malformed');
  }
  const artists = Array.isArray(item.artists) ? item.artists : [];
  const artist = artists
    .map((entry) => (isRecord(entry) && typeof entry.name === 'string' ? entry.name : ''))
    .filter((name) => name.length > 0)
    .join(', ');
  return {
    trackId: item.id,
    title: stringOr(item.name, ''),
    artist,
    isPlaying: raw.is_playing === true,
  };
}

/** Devices without an id cannot be targeted and are left out. */
export function parseDevices(raw: unknown): PlayerDevice[] {
  if (!isRecord(raw) || !Array.isArray(raw.devices)) {
    throw new ProtocolError('device list response is malformed');
  }
  const devices: PlayerDevice[] = [];
  for (const entry of raw.devices) {
    if (!isRecord(entry) || typeof entry.id !== 'string' || entry.id.length === 0) {
      continue;
    }
    devices.push({
      id: entry.id,
      name: stringOr(entry.name, ''),
      type: stringOr(entry.type, 'Unknown'),
      isActive: entry.is_active === true,
    });
  }
  return devices;
}

function parsePlaylist(raw: unknown): MusicPlaylist {
  if (!isRecord(raw) || typeof raw.id !== 'string' || typeof raw.name !== 'string') {
    throw new ProtocolError('playlist entry is malformed');
  }
  const tracks = isRecord(raw.tracks) ? raw.tracks : {};
  const images = Array.isArray(raw.images) ? raw.images : [];
  const firstImage = images.find(isRecord);
  const owner = isRecord(raw.owner) ? raw.owner : {};
  return {
    id: raw.id,
    uri: stringOr(raw.uri, `spotify:playlist:${raw.id}`),
    name: raw.name,
    description: stringOr(raw.description, ''),
    trackCount: numberOr(tracks.total, 0),
    imageUrl: firstImage && typeof firstImage.url === 'string' ? firstImage.url : null,
    owner: stringOr(owner.display_name, ''),
  };
}

export function parsePlaylistPage(raw: unknown, requested: PageRequest): PlaylistPage {
  if (!isRecord(raw) || !Array.isArray(raw.items)) {
    throw new ProtocolError('playlist response is malformed');
  }
  const items = raw.items.map(parsePlaylist);
  return {
    items,
    total: numberOr(raw.total, items.length),
    limit: numberOr(raw.limit, requested.limit),
    offset: numberOr(raw.offset, requested.offset),
  };
}

async function readJson(response: Response, what: string): Promise<unknown> {
  const text = await response.text();
  if (text.trim().length === 0) {
    return undefined;
  }
  try {
    return JSON.parse(text);
  } catch {
    throw new ProtocolError(`${what} response is not JSON`, text.slice(0, 200));
  }
}

/**
 * Request/response player API. Used when the channel is down, for polling the
 * current track and for the device and playlist listings.
 */
export class MusicApiClient implements MusicApiPort {
  private readonly fetchImpl: FetchLike;
  private readonly log: ScopedLog;

  constructor(private readonly options: MusicApiClientOptions) {
    this.fetchImpl = options.fetchImpl ?? ((url, init) => fetch(url, init));
    this.log = options.log ?? createLogger('Music', 'Api');
  }

  public async execute(accessToken: string, command: PlaybackCommand, playlistUri?: string): Promise<void> {
    const route = routeFor(command, playlistUri);
    await this.request(accessToken, route, async () => undefined);
    this.log.debug('player command sent', { command });
  }

  public nowPlaying(accessToken: string): Promise<NowPlaying | null> {
    return this.request(accessToken, { method: 'GET', path: '/me/player/currently-playing' }, async (response) => {
      if (response.status === 204) {
        return null;
      }
      const body = await readJson(response, 'now playing');
      return body === undefined ? null : parseNowPlaying(body);
    });
  }

  public listDevices(accessToken: string): Promise<PlayerDevice[]> {
    return this.request(accessToken, { method: 'GET', path: '/me/player/devices' }, async (response) =>
      parseDevices(await readJson(response, 'device list')),
    );
  }

  public async transferPlayback(accessToken: string, deviceId: string): Promise<void> {
    await this.request(
      accessToken,
      { method: 'PUT', path: '/me/player', body: { device_ids: [deviceId], play: false } },
      async () => undefined,
    );
    this.log.debug('playback transferred', { deviceId });
  }

  public listPlaylists(accessToken: string, page: PageRequest): Promise<PlaylistPage> {
    const path = `/me/playlists?limit=${page.limit}&offset=${page.offset}`;
    return this.request(accessToken, { method: 'GET', path }, async (response) =>
      parsePlaylistPage(await readJson(response, 'playlist'), page),
    );
  }

  private request<T>(accessToken: string, route: RouteSpec, read: (response: Response) => Promise<T>): Promise<T> {
    const { method, path, body } = route;
    const url = `${this.options.baseUrl}${path}`;
    return withDeadline(
      this.options.requestTimeoutMs,
      async (signal) => {
        let response: Response;
        try {
          response = await this.fetchImpl(url, {
            method,
            headers: {
              Authorization: `Bearer ${accessToken}`,
              Accept: 'application/json',
              ...(body ? { 'Content-Type': 'application/json' } : {}),
            },
            body: body ? JSON.stringify(body) : undefined,
            signal,
          });
        } catch (error) {
          throw new ConnectivityError(`music api request failed: ${errorMessage(error)}`, 'network', { cause: error });
        }

        if (!response.ok) {
          const text = await safeReadText(response, '', {
            onError: 'debug',
            log: this.log,
            label: 'music api error body read failed',
            context: { status: response.status },
          });
          this.log.debug('music api request rejected', { method, path, status: response.status });
          throw new HttpStatusError(
            response.status,
            url,
            parseRetryAfter(response.headers.get('retry-after'), Date.now()),
            text.slice(0, 200),
          );
        }
        return read(response);
      },
      () => new ConnectivityError(`music api request timed out: ${method} ${path}`, 'network'),
    );
  }
}
