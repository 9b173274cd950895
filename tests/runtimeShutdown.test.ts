import assert from 'node:assert/strict';
import { test } from './testHarness';
import { stopWithTimeout } from '../src/runtime/stopWithTimeout';
import { makeRecordingLog } from './fakes/recordingLog';

const delay = (ms: number) => new Promise((resolve) => setTimeout(resolve, ms));

test('stopWithTimeout logs stopped on clean shutdown', async () => {
  const { log, entries } = makeRecordingLog();
  const result = await stopWithTimeout('demo', async () => {
    await delay(5);
  }, 50, log);

  assert.equal(result.kind, 'stopped');
  assert.deepEqual(entries, [{ level: 'debug', message: 'demo stopped', data: undefined }]);
});

test('stopWithTimeout logs timeout without clean stop', async () => {
  const { log, entries } = makeRecordingLog();
  const result = await stopWithTimeout('demo', async () => {
    await delay(30);
  }, 5, log);

  assert.equal(result.kind, 'timeout');
  await delay(40);

  assert.deepEqual(entries, [{ level: 'warn', message: 'demo stop timed out', data: { timeoutMs: 5 } }]);
});

test('stopWithTimeout logs errors on failure', async () => {
  const { log, entries } = makeRecordingLog();
  const result = await stopWithTimeout('demo', async () => {
    throw new Error('boom');
  }, 50, log);

  assert.equal(result.kind, 'error');
  assert.deepEqual(entries, [{ level: 'error', message: 'demo failed to stop', data: { message: 'boom' } }]);
});

test('stopWithTimeout still reports a failure that lands after the deadline', async () => {
  const { log, entries } = makeRecordingLog();
  const result = await stopWithTimeout('demo', async () => {
    await delay(20);
    throw new Error('late boom');
  }, 5, log);

  assert.equal(result.kind, 'timeout');
  await delay(40);
  assert.deepEqual(
    entries.map((entry) => `${entry.level}:${entry.message}`),
    ['warn:demo stop timed out', 'error:demo failed to stop'],
  );
});
