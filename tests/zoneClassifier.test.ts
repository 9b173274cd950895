import assert from 'node:assert/strict';
import { test } from './testHarness';
import { HeartRateMonitor } from '../src/application/heartRate/heartRateMonitor';
import {
  classifyZone,
  computeAutoZoneBoundaries,
  describeZoneBoundaries,
  resolveZoneBoundaries,
  validateZoneSettings,
} from '../src/domain/zones/zoneClassifier';
import { DEFAULT_MANUAL_BOUNDARIES, DEFAULT_ZONE_SETTINGS, type ZoneSettings } from '../src/domain/zones/types';
import { ConfigurationError } from '../src/shared/errors';
import { makeRecordingLog } from './fakes/recordingLog';

const manualSettings: ZoneSettings = {
  restingHR: 60,
  maxHR: 190,
  useAutoZones: false,
  manual: DEFAULT_MANUAL_BOUNDARIES,
};

test('auto zones use heart-rate reserve for resting 60 / max 190', () => {
  assert.deepEqual(computeAutoZoneBoundaries(60, 190), {
    zone1Lower: 112,
    zone1Upper: 138,
    zone2Upper: 151,
    zone3Upper: 164,
    zone4Upper: 177,
    zone5Upper: 190,
  });
  assert.equal(classifyZone(185, DEFAULT_ZONE_SETTINGS), 5);
});

test('auto zones floor the lower bound and round the upper bounds', () => {
  assert.equal(computeAutoZoneBoundaries(60, 193).zone1Lower, 113);
  const bounds = computeAutoZoneBoundaries(50, 185);
  assert.equal(bounds.zone1Lower, 104);
  assert.equal(bounds.zone1Upper, 131);
  assert.equal(bounds.zone2Upper, 145);
  assert.equal(bounds.zone4Upper, 172);
});

test('zone edges are inclusive on the upper bound', () => {
  assert.equal(classifyZone(111, DEFAULT_ZONE_SETTINGS), null);
  assert.equal(classifyZone(112, DEFAULT_ZONE_SETTINGS), 1);
  assert.equal(classifyZone(138, DEFAULT_ZONE_SETTINGS), 1);
  assert.equal(classifyZone(139, DEFAULT_ZONE_SETTINGS), 2);
  assert.equal(classifyZone(177, DEFAULT_ZONE_SETTINGS), 4);
  assert.equal(classifyZone(178, DEFAULT_ZONE_SETTINGS), 5);
});

test('classification saturates at zone 5 above the top bound', () => {
  assert.equal(classifyZone(191, DEFAULT_ZONE_SETTINGS), 5);
  assert.equal(classifyZone(240, DEFAULT_ZONE_SETTINGS), 5);
  assert.equal(classifyZone(200, manualSettings), 5);
});

test('classification is monotonic in bpm', () => {
  for (const settings of [DEFAULT_ZONE_SETTINGS, manualSettings]) {
    let previous = 0;
    for (let bpm = 30; bpm <= 230; bpm += 1) {
      const zone = classifyZone(bpm, settings) ?? 0;
      assert.ok(zone >= previous, `zone dropped at ${bpm}`);
      previous = zone;
    }
  }
});

test('manual zones use the configured boundaries', () => {
  assert.deepEqual(resolveZoneBoundaries(manualSettings), { ...DEFAULT_MANUAL_BOUNDARIES });
  assert.equal(classifyZone(59, manualSettings), null);
  assert.equal(classifyZone(60, manualSettings), 1);
  assert.equal(classifyZone(70, manualSettings), 1);
  assert.equal(classifyZone(71, manualSettings), 2);
  assert.equal(classifyZone(105, manualSettings), 5);
});

test('zone boundaries render as a compact log line', () => {
  assert.equal(
    describeZoneBoundaries(computeAutoZoneBoundaries(60, 190)),
    'Z1(112-138) Z2(139-151) Z3(152-164) Z4(165-177) Z5(178-190)',
  );
});

test('invalid zone settings raise configuration errors', () => {
  assert.throws(
    () => validateZoneSettings({ ...DEFAULT_ZONE_SETTINGS, maxHR: 60 }),
    (error: unknown) => error instanceof ConfigurationError && error.field === 'maxHR',
  );
  assert.throws(
    () =>
      validateZoneSettings({
        ...manualSettings,
        manual: { ...DEFAULT_MANUAL_BOUNDARIES, zone3Upper: 75 },
      }),
    (error: unknown) => error instanceof ConfigurationError && error.field === 'manual',
  );
  // Manual boundaries are not checked while auto zones are on.
  validateZoneSettings({ ...DEFAULT_ZONE_SETTINGS, manual: { ...DEFAULT_MANUAL_BOUNDARIES, zone3Upper: 75 } });
});

test('heart rate monitor reports zone changes only', () => {
  const { log } = makeRecordingLog();
  const monitor = new HeartRateMonitor(DEFAULT_ZONE_SETTINGS, log);

  assert.deepEqual(monitor.process(100), { bpm: 100, zone: null, previousZone: null, changed: false });
  assert.deepEqual(monitor.process(120), { bpm: 120, zone: 1, previousZone: null, changed: true });
  assert.equal(monitor.process(125).changed, false);
  assert.deepEqual(monitor.process(185), { bpm: 185, zone: 5, previousZone: 1, changed: true });
  assert.equal(monitor.getLastBpm(), 185);

  monitor.reset();
  assert.equal(monitor.getCurrentZone(), null);
  assert.equal(monitor.getLastBpm(), null);
});

test('heart rate monitor applies new settings and rejects invalid ones', () => {
  const { log, entries } = makeRecordingLog();
  const monitor = new HeartRateMonitor(DEFAULT_ZONE_SETTINGS, log);

  monitor.updateSettings(manualSettings);
  assert.equal(monitor.process(75).zone, 2);
  assert.equal(entries.filter((entry) => entry.message === 'zone settings updated').length, 1);

  monitor.updateSettings(manualSettings);
  assert.equal(entries.filter((entry) => entry.message === 'zone settings updated').length, 1);

  assert.throws(() => monitor.updateSettings({ ...manualSettings, restingHR: 0 }), ConfigurationError);
  assert.equal(monitor.getSettings(), manualSettings);
});
