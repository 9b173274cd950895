import assert from 'node:assert/strict';
import { test } from './testHarness';
import { ConnectionStateMachine } from '../src/application/connection/connectionStateMachine';
import { MusicServiceConnector } from '../src/application/connection/musicServiceConnector';
import { IntentCoordinator } from '../src/application/intent/intentCoordinator';
import { ErrorRecoveryPolicy } from '../src/application/recovery/errorRecoveryPolicy';
import { DataReconciler } from '../src/application/tracks/dataReconciler';
import { buildRecoveryConfig } from '../src/config/musicService';
import { describeState } from '../src/domain/connection/connectionState';
import {
  ConnectivityError,
  CredentialError,
  ExhaustionError,
  HttpStatusError,
} from '../src/shared/errors';
import { FakeChannel, FakeCredentials } from './fakes/musicPorts';
import { makeNotifierFake } from './fakes/notifierPort';
import { makeRecordingLog } from './fakes/recordingLog';
import { makeFakeTime, settle } from './fakes/time';

function makeConnector() {
  const time = makeFakeTime();
  const { log } = makeRecordingLog();
  const credentials = new FakeCredentials();
  const channel = new FakeChannel();
  const connection = new ConnectionStateMachine(log);
  const intent = new IntentCoordinator(log);
  const recovery = new ErrorRecoveryPolicy({ config: buildRecoveryConfig(), random: () => 0, log });
  const reconciler = new DataReconciler({ clock: time.clock, log });
  const { notifier, record } = makeNotifierFake();
  const connector = new MusicServiceConnector({
    credentials,
    channel,
    connection,
    recovery,
    intent,
    reconciler,
    clock: time.clock,
    timers: time.timers,
    notifier,
    log,
  });
  connector.start();
  const states: string[] = [];
  connection.subscribe((state) => states.push(describeState(state)));
  const activate = (): void => {
    intent.enterSetup('interval');
    intent.activate('interval');
  };
  const advance = async (ms: number): Promise<void> => {
    time.advance(ms);
    await settle();
  };
  return { time, credentials, channel, connection, intent, recovery, reconciler, record, connector, states, activate, advance };
}

const channelDrop = () => new ConnectivityError('socket closed', 'channel');

test('connect authenticates and opens the channel', async () => {
  const { connector, connection, channel, credentials, states } = makeConnector();
  assert.equal(await connector.connect(), true);
  assert.deepEqual(states, ['authenticating', 'authenticated', 'connecting', 'connected']);
  assert.deepEqual(channel.connectCalls, ['test-token']);
  assert.equal(credentials.getCalls, 1);
  assert.equal(connection.credential, 'test-token');

  assert.equal(await connector.connect(), true);
  assert.equal(channel.connectCalls.length, 1);
});

test('channel pushes reach the reconciler', async () => {
  const { connector, channel, reconciler } = makeConnector();
  await connector.connect();
  channel.emitState({ trackId: 'track-1', title: 'Warmup', artist: 'Test Artist', isPlaying: true });
  assert.equal(reconciler.getDisplayed()?.source, 'channel');
  assert.equal(reconciler.getDisplayed()?.trackId, 'track-1');
});

test('a dropped channel reconnects after backoff without re-authenticating', async () => {
  const { connector, connection, channel, credentials, reconciler, recovery, activate, advance } = makeConnector();
  activate();
  await connector.connect();
  channel.emitState({ trackId: 'track-1', title: 'Warmup', artist: 'Test Artist', isPlaying: true });

  channel.drop(channelDrop());
  assert.equal(describeState(connection.current), 'error:keep');
  assert.equal(reconciler.getDisplayed(), null);
  assert.equal(connection.canUseRequestApi(), true);

  await advance(1999);
  assert.equal(channel.connectCalls.length, 1);
  await advance(1);
  assert.equal(channel.connectCalls.length, 2);
  assert.equal(connection.current.status, 'connected');
  assert.equal(credentials.getCalls, 1);
  assert.equal(recovery.attemptsFor('channel'), 0);
});

test('repeated connect failures back off exponentially during a session', async () => {
  const { connector, connection, channel, activate, advance } = makeConnector();
  activate();
  channel.connectFailures.push(channelDrop(), channelDrop());

  assert.equal(await connector.connect(), false);
  await advance(2000);
  assert.equal(channel.connectCalls.length, 2);
  await advance(3999);
  assert.equal(channel.connectCalls.length, 2);
  await advance(1);
  assert.equal(channel.connectCalls.length, 3);
  assert.equal(connection.current.status, 'connected');
});

test('a drop with no active session defers until training starts', async () => {
  const { connector, channel, activate, advance } = makeConnector();
  await connector.connect();
  channel.drop(channelDrop());
  assert.equal(connector.isReconnectDeferred(), true);

  await advance(120_000);
  assert.equal(channel.connectCalls.length, 1);

  activate();
  await settle();
  assert.equal(connector.isReconnectDeferred(), false);
  assert.equal(channel.connectCalls.length, 2);
  assert.equal(channel.isOpen(), true);
});

test('a drop while backgrounded defers until the app returns', async () => {
  const { connector, channel, intent, activate } = makeConnector();
  activate();
  await connector.connect();
  intent.setForeground(false);
  channel.drop(channelDrop());
  assert.equal(connector.isReconnectDeferred(), true);

  intent.setForeground(true);
  await settle();
  assert.equal(channel.connectCalls.length, 2);
});

test('an expired credential is refreshed and the connect retried', async () => {
  const { connector, connection, credentials, activate, advance } = makeConnector();
  activate();
  credentials.failures.push(new CredentialError('stale', 'expired'));

  assert.equal(await connector.connect(), false);
  assert.equal(credentials.invalidations, 1);
  assert.equal(connection.current.status, 'authenticating');

  await advance(0);
  assert.equal(connection.current.status, 'connected');
  assert.equal(credentials.getCalls, 2);
});

test('a credential that keeps failing to refresh asks the user to sign in again', async () => {
  const { connector, connection, credentials, record, activate, advance, time } = makeConnector();
  activate();
  for (let i = 0; i < 4; i += 1) {
    credentials.failures.push(new CredentialError('stale', 'expired'));
  }
  await connector.connect();
  await advance(0);
  await advance(2000);
  await advance(4000);

  assert.equal(credentials.getCalls, 4);
  assert.deepEqual(record.reauth, ['stale']);
  assert.equal(describeState(connection.current), 'error:demote');
  assert.equal(time.pendingCount(), 0);
});

test('a missing credential prompts for sign-in without retrying', async () => {
  const { connector, connection, record, credentials, time } = makeConnector();
  credentials.failures.push(new CredentialError('No credential stored for this device', 'missing'));
  assert.equal(await connector.connect(), false);
  assert.deepEqual(record.reauth, ['No credential stored for this device']);
  assert.equal(describeState(connection.current), 'error:demote');
  assert.equal(connection.statusMessage(), 'Authentication failed: No credential stored for this device');
  assert.equal(time.pendingCount(), 0);
});

test('a rejected request credential tears down the channel and re-authenticates', async () => {
  const { connector, connection, channel, credentials, activate, advance } = makeConnector();
  activate();
  await connector.connect();

  const decision = connector.reportFailure('request', new HttpStatusError(401, 'https://music.test/me/player/play'));
  assert.deepEqual(decision, { kind: 'act', action: 'refresh-credential', delayMs: 0, attempt: 1 });
  assert.equal(channel.isOpen(), false);
  assert.equal(connection.current.status, 'authenticating');

  await advance(0);
  assert.equal(connection.current.status, 'connected');
  assert.equal(credentials.getCalls, 2);
  assert.equal(channel.connectCalls.length, 2);
});

test('a channel attempt failing after a credential refresh leaves the refresh in charge', async () => {
  const { connector, connection, channel, record, time, activate, advance } = makeConnector();
  activate();
  channel.holdNextConnect = true;
  const pending = connector.connect();
  await settle();
  assert.equal(connection.current.status, 'connecting');

  connector.reportFailure('request', new HttpStatusError(401, 'https://music.test/me/player/play'));
  assert.equal(connection.current.status, 'authenticating');
  channel.releaseConnect(new ConnectivityError('connection refused', 'channel'));

  assert.equal(await pending, false);
  assert.equal(connection.current.status, 'authenticating');
  assert.equal(connection.statusMessage(), 'Authenticating with the music service...');
  assert.equal(record.errors.length, 0);
  assert.equal(time.pendingCount(), 1);

  await advance(0);
  assert.equal(connection.current.status, 'connected');
  assert.equal(channel.connectCalls.length, 2);
});

test('a channel attempt completing after a credential refresh is closed again', async () => {
  const { connector, connection, channel, activate, advance } = makeConnector();
  activate();
  channel.holdNextConnect = true;
  const pending = connector.connect();
  await settle();

  connector.reportFailure('request', new HttpStatusError(401, 'https://music.test/me/player/play'));
  channel.releaseConnect();

  assert.equal(await pending, false);
  assert.equal(connection.current.status, 'authenticating');
  assert.equal(channel.disconnects, 1);

  await advance(0);
  assert.equal(connection.current.status, 'connected');
});

test('only user-facing failures reach the notifier when giving up', () => {
  const { connector, record } = makeConnector();
  connector.reportFailure('request', new HttpStatusError(400, 'https://music.test/me/player/play'));
  assert.equal(record.errors.length, 0);

  const exhausted = new ExhaustionError('Could not reach the credential service', 3);
  connector.reportFailure('credential', exhausted);
  assert.deepEqual(record.errors, [exhausted]);
});

test('logout revokes, clears tracks and cancels pending retries', async () => {
  const { connector, connection, channel, credentials, reconciler, time, activate } = makeConnector();
  activate();
  await connector.connect();
  channel.emitState({ trackId: 'track-1', title: 'Warmup', artist: 'Test Artist', isPlaying: true });
  channel.drop(channelDrop());
  assert.equal(time.pendingCount(), 1);

  await connector.logout();
  assert.equal(time.pendingCount(), 0);
  assert.equal(credentials.revocations, 1);
  assert.equal(credentials.invalidations, 1);
  assert.equal(reconciler.getDisplayed(), null);
  assert.deepEqual(connection.current, { status: 'disconnected' });
});

test('stop silences deferred reconnects', async () => {
  const { connector, channel, activate } = makeConnector();
  await connector.connect();
  channel.drop(channelDrop());
  await connector.stop();

  activate();
  await settle();
  assert.equal(channel.connectCalls.length, 1);
  assert.equal(connector.isReconnectDeferred(), false);
});
