import type { ConnectionStateMachine } from '@/application/connection/connectionStateMachine';
import type { MusicServiceConnector } from '@/application/connection/musicServiceConnector';
import type { PlaybackCommandSink } from '@/application/training/intervalOrchestrator';
import type { DataReconciler } from '@/application/tracks/dataReconciler';
import { isPlaylistCommand, type PlaybackCommand } from '@/domain/playback/commands';
import { choosePlaybackDevice } from '@/domain/playback/devices';
import {
  PLAYLIST_PAGE_LIMIT,
  validatePlaylistSelection,
  type PlaylistPage,
  type PlaylistSelection,
} from '@/domain/playback/playlists';
import { makeSnapshot } from '@/domain/tracks/types';
import type { ClockPort } from '@/ports/ClockPort';
import type { CredentialPort } from '@/ports/CredentialPort';
import type { MusicApiPort } from '@/ports/MusicApiPort';
import type { RemoteChannelPort } from '@/ports/RemoteChannelPort';
import type { TimerPort } from '@/ports/TimerPort';
import { bestEffort } from '@/shared/bestEffort';
import { HttpStatusError } from '@/shared/errors';
import { createLogger, errorMessage, type ScopedLog } from '@/shared/logging/logger';
import { SerialQueue } from '@/shared/serialQueue';

export interface MusicControllerDeps {
  connector: Pick<MusicServiceConnector, 'reportFailure' | 'reportSuccess'>;
  connection: ConnectionStateMachine;
  credentials: CredentialPort;
  channel: RemoteChannelPort;
  api: MusicApiPort;
  reconciler: DataReconciler;
  clock: ClockPort;
  timers: TimerPort;
  playlists: PlaylistSelection;
  /** Device to move playback to when the service reports none active. */
  playbackDeviceName?: string;
  log?: ScopedLog;
}

export type CommandRoute = 'channel' | 'requestApi';

/** The player API answers 404 when no device is active for the account. */
function isNoActiveDevice(error: unknown): boolean {
  return error instanceof HttpStatusError && error.status === 404;
}

/**
 * Executes playback commands in issue order. The channel is used while it is
 * up; otherwise the request API with a cached credential. A newer command
 * supersedes the retries of an older one.
 */
export class MusicController implements PlaybackCommandSink {
  private readonly queue = new SerialQueue();
  private readonly log: ScopedLog;
  private generation = 0;
  private sequence = 0;
  private playlists: PlaylistSelection;

  constructor(private readonly deps: MusicControllerDeps) {
    this.log = deps.log ?? createLogger('Music', 'Controller');
    this.playlists = validatePlaylistSelection(deps.playlists);
  }

  /** Fire-and-forget entry used by the training side. */
  public issue(command: PlaybackCommand): void {
    void bestEffort(() => this.execute(command), {
      fallback: false,
      onError: 'warn',
      label: 'playback command failed',
      context: { command },
      log: this.log,
    });
  }

  /** Resolves true once the command reached the music service. */
  public execute(command: PlaybackCommand): Promise<boolean> {
    this.sequence += 1;
    const sequence = this.sequence;
    const generation = this.generation;
    this.postOptimistic(command);
    return this.queue.run(() => this.run(command, sequence, generation));
  }

  /** Abandons queued retries; used when the session ends. */
  public cancelPending(): void {
    this.generation += 1;
  }

  public async idle(): Promise<void> {
    await this.queue.idle();
  }

  public getPlaylists(): PlaylistSelection {
    return { ...this.playlists };
  }

  /** Applies to commands executed from now on. */
  public setPlaylists(selection: PlaylistSelection): void {
    this.playlists = validatePlaylistSelection(selection);
    this.log.info('playlists selected', { ...this.playlists });
  }

  public async listPlaylists(page = { limit: PLAYLIST_PAGE_LIMIT, offset: 0 }): Promise<PlaylistPage> {
    try {
      const credential = await this.deps.credentials.get();
      const result = await this.deps.api.listPlaylists(credential.token, page);
      this.deps.connector.reportSuccess('request');
      return result;
    } catch (error) {
      this.deps.connector.reportFailure('request', error);
      throw error;
    }
  }

  private async run(command: PlaybackCommand, sequence: number, generation: number): Promise<boolean> {
    let activationTried = false;
    for (;;) {
      if (generation !== this.generation) {
        return false;
      }
      try {
        const route = await this.dispatch(command);
        this.deps.connector.reportSuccess('request');
        this.log.info('playback command executed', { command, route });
        return true;
      } catch (error) {
        if (generation !== this.generation) return false;
        if (!activationTried && isNoActiveDevice(error)) {
          activationTried = true;
          if (await this.activateDevice(command)) continue;
        }
        const decision = this.deps.connector.reportFailure('request', error);
        const retryable =
          decision.kind === 'act' &&
          (decision.action === 'wait-then-retry' || decision.action === 'refresh-credential');
        if (!retryable) {
          this.log.warn('playback command dropped', { command, message: errorMessage(error) });
          return false;
        }
        if (this.superseded(command, sequence)) {
          return false;
        }
        await this.deps.timers.sleep(decision.delayMs);
        if (generation !== this.generation || this.superseded(command, sequence)) {
          return false;
        }
      }
    }
  }

  private superseded(command: PlaybackCommand, sequence: number): boolean {
    if (sequence === this.sequence || !isPlaylistCommand(command)) {
      return false;
    }
    this.log.debug('superseded command not retried', { command });
    return true;
  }

  /** True when a device is ready for an immediate retry. */
  private activateDevice(command: PlaybackCommand): Promise<boolean> {
    return bestEffort(
      async () => {
        const credential = await this.deps.credentials.get();
        const devices = await this.deps.api.listDevices(credential.token);
        const device = choosePlaybackDevice(devices, this.deps.playbackDeviceName);
        if (!device) {
          this.log.warn('no playback device available', { command });
          return false;
        }
        if (!device.isActive) {
          await this.deps.api.transferPlayback(credential.token, device.id);
          this.log.info('playback moved to device', { device: device.name, type: device.type });
        }
        return true;
      },
      { fallback: false, onError: 'warn', label: 'device activation failed', context: { command }, log: this.log },
    );
  }

  private async dispatch(command: PlaybackCommand): Promise<CommandRoute> {
    const playlistUri = this.playlistFor(command);
    if (this.deps.connection.isChannelConnected() && this.deps.channel.isOpen()) {
      try {
        await this.deps.channel.send(command, playlistUri);
        return 'channel';
      } catch (error) {
        this.log.debug('channel send failed; falling back to request api', {
          command,
          message: errorMessage(error),
        });
      }
    }
    const credential = await this.deps.credentials.get();
    await this.deps.api.execute(credential.token, command, playlistUri);
    return 'requestApi';
  }

  private playlistFor(command: PlaybackCommand): string | undefined {
    if (!isPlaylistCommand(command)) return undefined;
    const uri = command === 'playHighIntensity' ? this.playlists.highIntensity : this.playlists.rest;
    if (!uri) {
      this.log.debug('no playlist configured; resuming current context', { command });
      return undefined;
    }
    return uri;
  }

  private postOptimistic(command: PlaybackCommand): void {
    if (command !== 'pause' && command !== 'resume' && command !== 'stop') return;
    const displayed = this.deps.reconciler.getDisplayed();
    if (!displayed) return;
    this.deps.reconciler.reconcile(
      makeSnapshot(
        'optimistic',
        {
          trackId: displayed.trackId,
          title: displayed.title,
          artist: displayed.artist,
          isPlaying: command === 'resume',
        },
        this.deps.clock.now(),
      ),
    );
  }
}
