import assert from 'node:assert/strict';
import { test } from './testHarness';
import { ConnectionStateMachine } from '../src/application/connection/connectionStateMachine';
import type { MusicServiceConnector } from '../src/application/connection/musicServiceConnector';
import { MusicController } from '../src/application/playback/musicController';
import { ErrorRecoveryPolicy, type RecoveryOperation } from '../src/application/recovery/errorRecoveryPolicy';
import { DataReconciler } from '../src/application/tracks/dataReconciler';
import { NowPlayingPoller } from '../src/application/tracks/nowPlayingPoller';
import { buildRecoveryConfig } from '../src/config/musicService';
import { choosePlaybackDevice, type PlayerDevice } from '../src/domain/playback/devices';
import { makeSnapshot } from '../src/domain/tracks/types';
import { ConnectivityError, HttpStatusError } from '../src/shared/errors';
import { FakeChannel, FakeCredentials, FakeMusicApi } from './fakes/musicPorts';
import { makeRecordingLog } from './fakes/recordingLog';
import { makeFakeTime, settle } from './fakes/time';

const HIGH = 'music:playlist:high-test';
const REST = 'music:playlist:rest-test';

function makeMusic(playlists = { highIntensity: HIGH, rest: REST }) {
  const time = makeFakeTime();
  const { log } = makeRecordingLog();
  const policy = new ErrorRecoveryPolicy({ config: buildRecoveryConfig(), random: () => 0, log });
  const failures: Array<{ operation: RecoveryOperation; error: unknown }> = [];
  const successes: RecoveryOperation[] = [];
  const connector: Pick<MusicServiceConnector, 'reportFailure' | 'reportSuccess'> = {
    reportFailure: (operation, error) => {
      failures.push({ operation, error });
      return policy.decide(operation, error, { sessionActive: true, inForeground: true });
    },
    reportSuccess: (operation) => {
      successes.push(operation);
      policy.recordSuccess(operation);
    },
  };
  const connection = new ConnectionStateMachine(log);
  const channel = new FakeChannel();
  const api = new FakeMusicApi();
  const credentials = new FakeCredentials();
  const reconciler = new DataReconciler({ clock: time.clock, log });
  const controller = new MusicController({
    connector,
    connection,
    credentials,
    channel,
    api,
    reconciler,
    clock: time.clock,
    timers: time.timers,
    playlists,
    log,
  });
  const poller = new NowPlayingPoller({
    api,
    credentials,
    connection,
    reconciler,
    connector,
    clock: time.clock,
    timers: time.timers,
    intervalMs: 5000,
    log,
  });

  const authenticate = (): void => {
    connection.beginAuthentication();
    connection.authenticationSucceeded('test-token');
  };
  const connectChannel = async (): Promise<void> => {
    authenticate();
    connection.beginChannelConnect();
    await channel.connect('test-token', { onPlayerState: () => undefined, onDisconnected: () => undefined });
    connection.channelConnected();
  };
  return { time, controller, poller, channel, api, credentials, reconciler, failures, successes, authenticate, connectChannel };
}

test('commands go over the channel while it is connected', async () => {
  const { controller, channel, api, successes, connectChannel } = makeMusic();
  await connectChannel();
  assert.equal(await controller.execute('playHighIntensity'), true);
  assert.deepEqual(channel.sent, [{ command: 'playHighIntensity', playlistUri: HIGH }]);
  assert.deepEqual(api.executed, []);
  assert.deepEqual(successes, ['request']);
});

test('commands use the request API when only a credential is held', async () => {
  const { controller, channel, api, authenticate } = makeMusic();
  authenticate();
  assert.equal(await controller.execute('playRest'), true);
  assert.deepEqual(api.executed, [{ command: 'playRest', playlistUri: REST, token: 'test-token' }]);
  assert.deepEqual(channel.sent, []);
});

test('a failed channel send falls back to the request API', async () => {
  const { controller, channel, api, connectChannel } = makeMusic();
  await connectChannel();
  channel.sendFailure = new Error('send timed out');
  assert.equal(await controller.execute('pause'), true);
  assert.deepEqual(api.executed, [{ command: 'pause', playlistUri: undefined, token: 'test-token' }]);
});

test('without a configured playlist the current context resumes', async () => {
  const { controller, api, authenticate } = makeMusic({ highIntensity: '', rest: '' });
  authenticate();
  await controller.execute('playHighIntensity');
  assert.deepEqual(api.executed, [{ command: 'playHighIntensity', playlistUri: undefined, token: 'test-token' }]);
});

test('issued commands run in issue order', async () => {
  const { controller, api, authenticate } = makeMusic();
  authenticate();
  controller.issue('playHighIntensity');
  controller.issue('pause');
  controller.issue('resume');
  await controller.idle();
  assert.deepEqual(
    api.executed.map((entry) => entry.command),
    ['playHighIntensity', 'pause', 'resume'],
  );
});

test('a transient failure is retried after the recovery delay', async () => {
  const { time, controller, api, failures, authenticate } = makeMusic();
  authenticate();
  api.executeFailures.push(new ConnectivityError('offline', 'network'));
  assert.equal(await controller.execute('playRest'), true);
  assert.deepEqual(time.sleeps, [2000]);
  assert.equal(api.executed.length, 1);
  assert.equal(failures.length, 1);
  assert.equal(failures[0].operation, 'request');
});

test('a command is dropped once retries are exhausted', async () => {
  const { time, controller, api, authenticate } = makeMusic();
  authenticate();
  for (let i = 0; i < 4; i += 1) {
    api.executeFailures.push(new HttpStatusError(503, 'https://music.test/me/player/play'));
  }
  assert.equal(await controller.execute('playRest'), false);
  assert.deepEqual(time.sleeps, [2000, 4000, 8000]);
  assert.deepEqual(api.executed, []);
});

test('a rejected credential is retried immediately', async () => {
  const { time, controller, api, authenticate } = makeMusic();
  authenticate();
  api.executeFailures.push(new HttpStatusError(401, 'https://music.test/me/player/play'));
  assert.equal(await controller.execute('resume'), true);
  assert.deepEqual(time.sleeps, [0]);
});

test('a superseded playlist switch is not retried', async () => {
  const { controller, api, authenticate } = makeMusic();
  authenticate();
  api.executeFailures.push(new ConnectivityError('offline', 'network'));
  const first = controller.execute('playHighIntensity');
  const second = controller.execute('playRest');
  assert.equal(await first, false);
  assert.equal(await second, true);
  assert.deepEqual(
    api.executed.map((entry) => entry.command),
    ['playRest'],
  );
});

test('a playlist switch issued during the retry wait replaces the older one', async () => {
  const { time, controller, api, authenticate } = makeMusic();
  authenticate();
  let releaseSleep: () => void = () => undefined;
  time.timers.sleep = () =>
    new Promise<void>((resolve) => {
      releaseSleep = resolve;
    });
  api.executeFailures.push(new ConnectivityError('offline', 'network'));

  const first = controller.execute('playRest');
  await settle();
  const second = controller.execute('playHighIntensity');
  releaseSleep();

  assert.equal(await first, false);
  assert.equal(await second, true);
  assert.deepEqual(
    api.executed.map((entry) => entry.command),
    ['playHighIntensity'],
  );
});

test('a command cancelled during the retry wait is abandoned', async () => {
  const { time, controller, api, authenticate } = makeMusic();
  authenticate();
  let releaseSleep: () => void = () => undefined;
  time.timers.sleep = () =>
    new Promise<void>((resolve) => {
      releaseSleep = resolve;
    });
  api.executeFailures.push(new ConnectivityError('offline', 'network'));

  const pending = controller.execute('pause');
  await settle();
  controller.cancelPending();
  releaseSleep();

  assert.equal(await pending, false);
  assert.deepEqual(api.executed, []);
});

const PHONE: PlayerDevice = { id: 'phone-1', name: 'Test Phone', type: 'Smartphone', isActive: false };
const DESK: PlayerDevice = { id: 'desk-1', name: 'Desk', type: 'Computer', isActive: false };

test('no active device moves playback to a handheld and retries at once', async () => {
  const { time, controller, api, failures, authenticate } = makeMusic();
  authenticate();
  api.devices = [DESK, PHONE];
  api.executeFailures.push(new HttpStatusError(404, 'https://music.test/me/player/play'));

  assert.equal(await controller.execute('playHighIntensity'), true);
  assert.deepEqual(api.transfers, ['phone-1']);
  assert.deepEqual(time.sleeps, []);
  assert.equal(failures.length, 0);
  assert.deepEqual(
    api.executed.map((entry) => entry.playlistUri),
    [HIGH],
  );
});

test('device activation is tried once per command', async () => {
  const { time, controller, api, failures, authenticate } = makeMusic();
  authenticate();
  api.devices = [{ ...PHONE, isActive: true }];
  api.executeFailures.push(
    new HttpStatusError(404, 'https://music.test/me/player/play'),
    new HttpStatusError(404, 'https://music.test/me/player/play'),
  );

  assert.equal(await controller.execute('resume'), true);
  assert.equal(api.deviceListings, 1);
  assert.deepEqual(api.transfers, []);
  assert.deepEqual(time.sleeps, [2000]);
  assert.equal(failures.length, 1);
});

test('without any device the command falls back to the recovery delay', async () => {
  const { time, controller, api, authenticate } = makeMusic();
  authenticate();
  api.executeFailures.push(new HttpStatusError(404, 'https://music.test/me/player/play'));

  assert.equal(await controller.execute('playRest'), true);
  assert.equal(api.deviceListings, 1);
  assert.deepEqual(time.sleeps, [2000]);
});

test('the playback device is picked by name, then activity, then type', () => {
  const active: PlayerDevice = { ...DESK, id: 'desk-2', isActive: true };
  assert.equal(choosePlaybackDevice([PHONE, DESK], 'desk')?.id, 'desk-1');
  assert.equal(choosePlaybackDevice([PHONE, active], 'kitchen')?.id, 'desk-2');
  assert.equal(choosePlaybackDevice([DESK, PHONE])?.id, 'phone-1');
  assert.equal(choosePlaybackDevice([DESK])?.id, 'desk-1');
  assert.equal(choosePlaybackDevice([]), null);
});

test('skipping a track is a transport command', async () => {
  const { controller, api, reconciler, authenticate } = makeMusic();
  authenticate();
  assert.equal(await controller.execute('skipNext'), true);
  assert.deepEqual(api.executed, [{ command: 'skipNext', playlistUri: undefined, token: 'test-token' }]);
  assert.equal(reconciler.getDisplayed(), null);
});

test('selected playlists apply to later commands', async () => {
  const { controller, api, authenticate } = makeMusic();
  authenticate();
  controller.setPlaylists({ highIntensity: 'music:playlist:new-high', rest: REST });
  await controller.execute('playHighIntensity');
  assert.deepEqual(controller.getPlaylists(), { highIntensity: 'music:playlist:new-high', rest: REST });
  assert.deepEqual(
    api.executed.map((entry) => entry.playlistUri),
    ['music:playlist:new-high'],
  );
});

test('playlists are listed with the cached credential', async () => {
  const { controller, api, successes, failures } = makeMusic();
  const page = await controller.listPlaylists();
  assert.deepEqual(page.items.map((item) => item.name), ['High']);
  assert.deepEqual(api.playlistRequests, [{ limit: 50, offset: 0 }]);
  assert.deepEqual(successes, ['request']);

  api.playlistFailures.push(new HttpStatusError(401, 'https://music.test/me/playlists'));
  await assert.rejects(controller.listPlaylists({ limit: 10, offset: 10 }), HttpStatusError);
  assert.equal(failures.length, 1);
  assert.equal(failures[0].operation, 'request');
});

test('cancelled commands never reach the service', async () => {
  const { controller, api, authenticate } = makeMusic();
  authenticate();
  const pending = controller.execute('playHighIntensity');
  controller.cancelPending();
  assert.equal(await pending, false);
  assert.deepEqual(api.executed, []);
});

test('pause shows an optimistic state once the displayed track is stale', async () => {
  const { time, controller, reconciler, authenticate } = makeMusic();
  authenticate();
  reconciler.reconcile(
    makeSnapshot('requestApi', { trackId: 'track-1', title: 'Warmup', artist: 'Test Artist', isPlaying: true }, time.now()),
  );
  time.advance(10_001);
  await controller.execute('pause');
  assert.equal(reconciler.getDisplayed()?.source, 'optimistic');
  assert.equal(reconciler.getDisplayed()?.isPlaying, false);
  assert.equal(reconciler.getDisplayed()?.trackId, 'track-1');
});

test('an optimistic state never overrides a fresh observation', async () => {
  const { time, controller, reconciler, authenticate } = makeMusic();
  authenticate();
  reconciler.reconcile(
    makeSnapshot('channel', { trackId: 'track-1', title: 'Warmup', artist: 'Test Artist', isPlaying: true }, time.now()),
  );
  await controller.execute('pause');
  assert.equal(reconciler.getDisplayed()?.source, 'channel');
  assert.equal(reconciler.getSnapshot('optimistic')?.isPlaying, false);
});

test('polling is skipped without a credential', async () => {
  const { poller, api } = makeMusic();
  await poller.pollOnce();
  assert.equal(api.nowPlayingCalls, 0);
});

test('a poll result is fed to the reconciler', async () => {
  const { poller, api, reconciler, successes, authenticate } = makeMusic();
  authenticate();
  api.nowPlayingResults.push({ trackId: 'track-2', title: 'Climb', artist: 'Test Artist', isPlaying: true });
  await poller.pollOnce();
  assert.equal(reconciler.getDisplayed()?.source, 'requestApi');
  assert.equal(reconciler.getDisplayed()?.trackId, 'track-2');
  assert.deepEqual(successes, ['poll']);
});

test('a failed poll is reported for recovery', async () => {
  const { poller, api, failures, authenticate } = makeMusic();
  authenticate();
  api.nowPlayingResults.push(new HttpStatusError(429, 'https://music.test/me/player/currently-playing', 3000));
  await poller.pollOnce();
  assert.equal(failures.length, 1);
  assert.equal(failures[0].operation, 'poll');
});

test('the poller runs on its interval until stopped', async () => {
  const { time, poller, api, authenticate } = makeMusic();
  authenticate();
  poller.start();
  poller.start();
  assert.equal(poller.isRunning(), true);
  time.advance(5000);
  await settle();
  time.advance(5000);
  await settle();
  assert.equal(api.nowPlayingCalls, 2);

  poller.stop();
  assert.equal(poller.isRunning(), false);
  assert.equal(time.pendingCount(), 0);
  time.advance(10_000);
  await settle();
  assert.equal(api.nowPlayingCalls, 2);
});
