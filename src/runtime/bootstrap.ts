import { loadConfig, type AppConfig, type ConfigOverrides } from '@/config';
import { createLogger, logManager } from '@/shared/logging/logger';
import { LogAnnouncer } from '@/adapters/announcer/logAnnouncer';
import { CredentialBackendClient, type FetchLike } from '@/adapters/credentials/credentialBackendClient';
import { TokenCache } from '@/adapters/credentials/tokenCache';
import { MusicApiClient } from '@/adapters/music/musicApiClient';
import { RemoteChannelClient } from '@/adapters/music/remoteChannelClient';
import { LogNotifier } from '@/adapters/notifier/logNotifier';
import { AnnouncementCoordinator } from '@/application/announcements/announcementCoordinator';
import { ConnectionStateMachine } from '@/application/connection/connectionStateMachine';
import { MusicServiceConnector } from '@/application/connection/musicServiceConnector';
import { HeartRateMonitor } from '@/application/heartRate/heartRateMonitor';
import { IntentCoordinator } from '@/application/intent/intentCoordinator';
import { MusicController } from '@/application/playback/musicController';
import { ErrorRecoveryPolicy } from '@/application/recovery/errorRecoveryPolicy';
import { TrainingSessionController } from '@/application/session/trainingSessionController';
import { DataReconciler } from '@/application/tracks/dataReconciler';
import { NowPlayingPoller } from '@/application/tracks/nowPlayingPoller';
import { IntervalOrchestrator } from '@/application/training/intervalOrchestrator';
import { nodeTimers } from '@/infrastructure/time/nodeTimers';
import { systemClock } from '@/infrastructure/time/systemClock';
import type { AnnouncerPort } from '@/ports/AnnouncerPort';
import type { ClockPort } from '@/ports/ClockPort';
import type { MusicApiPort } from '@/ports/MusicApiPort';
import type { NotifierPort } from '@/ports/NotifierPort';
import type { RemoteChannelPort } from '@/ports/RemoteChannelPort';
import type { TimerPort } from '@/ports/TimerPort';
import { stopWithTimeout } from '@/runtime/stopWithTimeout';

/**
 * Descriptor for services that need graceful shutdown coordination.
 */
type LifecycleService = {
  name: string;
  stop: () => Promise<void>;
};

/** Collaborators a host may swap out; everything else is built here. */
export interface RuntimeOptions {
  config?: ConfigOverrides;
  clock?: ClockPort;
  timers?: TimerPort;
  announcer?: AnnouncerPort;
  notifier?: NotifierPort;
  channel?: RemoteChannelPort;
  musicApi?: MusicApiPort;
  fetchImpl?: FetchLike;
  random?: () => number;
  stopTimeoutMs?: number;
}

export type Runtime = {
  start: () => Promise<void>;
  stop: () => Promise<void>;
  session: TrainingSessionController;
  connector: MusicServiceConnector;
  tokenCache: TokenCache;
  config: AppConfig;
};

export function createRuntime(options: RuntimeOptions = {}): Runtime {
  const config = loadConfig(options.config);
  logManager.configure({ level: config.env.logLevel, json: config.env.logJson });

  const clock = options.clock ?? systemClock;
  const timers = options.timers ?? nodeTimers;
  const notifier = options.notifier ?? new LogNotifier();
  const announcer = options.announcer ?? new LogAnnouncer();

  const backend = new CredentialBackendClient({
    config: config.credentials,
    timers,
    fetchImpl: options.fetchImpl,
  });
  const tokenCache = new TokenCache({ backend, clock, config: config.credentials });
  const channel =
    options.channel ??
    new RemoteChannelClient({
      url: config.musicService.channelUrl,
      commandTimeoutMs: config.musicService.requestTimeoutMs,
    });
  const musicApi =
    options.musicApi ??
    new MusicApiClient({
      baseUrl: config.musicService.apiBaseUrl,
      requestTimeoutMs: config.musicService.requestTimeoutMs,
      fetchImpl: options.fetchImpl,
    });

  const connection = new ConnectionStateMachine();
  const intent = new IntentCoordinator();
  const recovery = new ErrorRecoveryPolicy({ config: config.recovery, random: options.random });
  const reconciler = new DataReconciler({
    clock,
    freshnessThresholdMs: config.musicService.freshnessThresholdMs,
  });
  const connector = new MusicServiceConnector({
    credentials: tokenCache,
    channel,
    connection,
    recovery,
    intent,
    reconciler,
    clock,
    timers,
    notifier,
  });
  const music = new MusicController({
    connector,
    connection,
    credentials: tokenCache,
    channel,
    api: musicApi,
    reconciler,
    clock,
    timers,
    playlists: {
      highIntensity: config.musicService.highIntensityPlaylistUri,
      rest: config.musicService.restPlaylistUri,
    },
    playbackDeviceName: config.musicService.playbackDeviceName,
  });
  const poller = new NowPlayingPoller({
    api: musicApi,
    credentials: tokenCache,
    connection,
    reconciler,
    connector,
    clock,
    timers,
    intervalMs: config.training.nowPlayingPollMs,
  });
  const orchestrator = new IntervalOrchestrator({
    clock,
    timers,
    commands: music,
    tickIntervalMs: config.training.tickIntervalMs,
  });
  const announcements = new AnnouncementCoordinator({
    announcer,
    clock,
    timers,
    cooldownMs: config.training.announcementCooldownMs,
  });
  const monitor = new HeartRateMonitor(config.training.zoneSettings);
  const session = new TrainingSessionController({
    orchestrator,
    monitor,
    announcements,
    intent,
    connection,
    connector,
    music,
    poller,
    reconciler,
    notifier,
    clock,
    defaultPlan: config.training.plan,
  });

  const stopTimeoutMs = options.stopTimeoutMs ?? 6000;
  let started = false;

  async function startServices(): Promise<void> {
    const log = createLogger('Server');
    if (started) {
      log.debug('runtime already started');
      return;
    }
    started = true;
    connector.start();
    log.info('startup complete', {
      device: config.env.deviceId,
      intervals: config.training.plan.totalIntervals,
      endpoints: config.credentials.endpoints.length,
    });
  }

  async function stopServices(): Promise<void> {
    const log = createLogger('Server');
    if (!started) {
      return;
    }
    started = false;
    const services: LifecycleService[] = [
      {
        name: 'session',
        stop: async () => {
          session.stop();
          session.dispose();
        },
      },
      { name: 'now-playing', stop: async () => poller.stop() },
      { name: 'music-commands', stop: () => music.idle() },
      { name: 'music-connection', stop: () => connector.stop() },
    ];

    await Promise.all(
      services.map((service) => stopWithTimeout(service.name, service.stop, stopTimeoutMs, log)),
    );
  }

  return {
    start: startServices,
    stop: stopServices,
    session,
    connector,
    tokenCache,
    config,
  };
}
