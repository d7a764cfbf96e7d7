import assert from 'node:assert/strict';
import test from 'node:test';

import { DEFAULT_CONFIG, type ZonelightConfig } from '../src/config/defaults.js';
import { DEFAULT_LAYOUT_CONFIG, EMPTY_ZONE_COUNTS } from '../src/layout/layout.js';
import { formatSimulation, simulateSession, summarizeZones } from '../src/runtime/simulate.js';
import { MemoryTransport } from '../src/transport/memoryTransport.js';
import { FakeTimers, silentLogger } from './helpers/fakeTimers.js';

const CONFIG: ZonelightConfig = {
  ...DEFAULT_CONFIG,
  updateRate: 2,
  defaultPattern: 'all_on',
  layout: { ...DEFAULT_LAYOUT_CONFIG, counts: { ...EMPTY_ZONE_COUNTS, front: 2, back: 1 } },
  audio: { ...DEFAULT_CONFIG.audio, source: 'none' },
  transport: { ...DEFAULT_CONFIG.transport, createRetries: 0, removeRetries: 0 },
  control: { port: null, host: '127.0.0.1' },
};

const simulate = async (seconds: number) => {
  const timers = new FakeTimers();
  const log = silentLogger();
  const summary = await simulateSession(CONFIG, {
    seconds,
    timers,
    logger: log.logger,
    wait: async (ms) => {
      timers.advance(ms);
    },
  });
  return { summary, log };
};

test('summarizeZones reports zones in order and skips empty ones', async () => {
  const transport = new MemoryTransport();
  const spec = (zone: 'back' | 'left', index: number, globalIndex: number) => ({
    zone,
    index,
    globalIndex,
    position: { x: 0, y: 0, z: 0 },
  });
  const back = await transport.createLight(spec('back', 0, 0));
  const left = await transport.createLight(spec('left', 0, 1));
  await transport.createLight(spec('left', 1, 2));
  transport.updateLight(back, { color: { r: 1, g: 1, b: 1 }, intensity: 0.5 });
  transport.updateLight(left, { color: { r: 1, g: 1, b: 1 }, intensity: 0.8 });

  const zones = summarizeZones(transport.lights.values());
  assert.deepEqual(Object.keys(zones), ['left', 'back']);
  assert.equal(zones.left?.lights, 2);
  assert.ok(Math.abs((zones.left?.meanIntensity ?? 0) - 0.4) < 1e-9);
  assert.deepEqual(zones.back, { lights: 1, meanIntensity: 0.5 });
});

test('removed lights keep their last state for the summary', async () => {
  const transport = new MemoryTransport();
  const handle = await transport.createLight({ zone: 'top', index: 0, globalIndex: 0, position: { x: 0, y: 3, z: 0 } });
  transport.updateLight(handle, { color: { r: 0, g: 0, b: 1 }, intensity: 0.25 });
  await transport.removeLight(handle);
  assert.equal(transport.lights.size, 0);
  assert.deepEqual(summarizeZones(transport.retired.values()), { top: { lights: 1, meanIntensity: 0.25 } });
});

test('a simulation summarizes every zone after the lights are removed', async () => {
  const { summary } = await simulate(1);
  assert.deepEqual(summary, {
    pattern: 'all_on',
    ticks: 2,
    updatesSent: 3,
    updateFailures: 0,
    teardown: { removed: 3, failed: 0, timedOut: false },
    zones: {
      front: { lights: 2, meanIntensity: 1 },
      back: { lights: 1, meanIntensity: 1 },
    },
  });
});

test('the text summary lists each zone', async () => {
  const { summary } = await simulate(1);
  assert.deepEqual(formatSimulation(summary, 1), [
    '✔ Simulated all_on for 1s',
    '  ticks:   2',
    '  updates: 3 (0 failed)',
    '  front   2 lights, mean intensity 1.00',
    '  back    1 lights, mean intensity 1.00',
  ]);
});

test('the text summary flags a timed-out teardown', () => {
  const lines = formatSimulation(
    {
      pattern: 'chase',
      ticks: 0,
      updatesSent: 0,
      updateFailures: 0,
      teardown: { removed: 1, failed: 2, timedOut: true },
      zones: {},
    },
    2,
  );
  assert.deepEqual(lines, [
    '✔ Simulated chase for 2s',
    '  ticks:   0',
    '  updates: 0 (0 failed)',
    '  teardown timed out (2 lights not confirmed removed)',
  ]);
});

test('attach sees the running session and is released after stop', async () => {
  const timers = new FakeTimers();
  const events: string[] = [];
  await simulateSession(CONFIG, {
    seconds: 0.5,
    timers,
    logger: silentLogger().logger,
    wait: async (ms) => {
      timers.advance(ms);
    },
    attach: (session) => {
      events.push(`attach ${session.status().state}`);
      return () => events.push(`detach ${session.status().state}`);
    },
  });
  assert.deepEqual(events, ['attach running', 'detach terminated']);
});
