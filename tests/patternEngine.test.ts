import assert from 'node:assert/strict';
import test from 'node:test';

import { SILENCE_SNAPSHOT } from '../src/audio/snapshot.js';
import { hsvToRgb } from '../src/color/colorSpaces.js';
import { DEFAULT_LAYOUT_CONFIG, EMPTY_ZONE_COUNTS, createLayout } from '../src/layout/layout.js';
import { PatternEngine } from '../src/patterns/engine.js';

const layout = createLayout({ ...DEFAULT_LAYOUT_CONFIG, counts: { ...EMPTY_ZONE_COUNTS, front: 3 } });

test('engine evaluates the active pattern without rotation by default', () => {
  const engine = new PatternEngine(layout, 'all_on');
  assert.equal(engine.activePattern, 'all_on');
  const frames = engine.evaluate(1, SILENCE_SNAPSHOT);
  assert.equal(frames.length, 3);
  assert.ok(frames.every((frame) => frame.intensity === 1 && !('rotation' in frame)));
  assert.deepEqual(engine.patternOptions, { chaseTail: 3, chaseStepSeconds: 0.1 });
});

test('rotation advances with pattern time and is shared by all lights', () => {
  const engine = new PatternEngine(layout, 'all_on', { rotation: { enabled: true, speed: 90, audioBoost: false } });
  assert.equal(engine.evaluate(0, SILENCE_SNAPSHOT)[0].rotation, 0);
  const frames = engine.evaluate(1, SILENCE_SNAPSHOT);
  assert.deepEqual(
    frames.map((frame) => frame.rotation),
    [90, 90, 90],
  );
  assert.equal(engine.evaluate(5, SILENCE_SNAPSHOT)[2].rotation, 90);
  assert.equal(engine.getYaw(), 90);
});

test('bass boosts the rotation speed', () => {
  const engine = new PatternEngine(layout, 'all_on', { rotation: { enabled: true, speed: 90 } });
  engine.evaluate(0, SILENCE_SNAPSHOT);
  assert.equal(engine.evaluate(1, { ...SILENCE_SNAPSHOT, low: 1 })[0].rotation, 180);
});

test('switching resets pattern time for rotation and state', () => {
  const engine = new PatternEngine(layout, 'beat_hue', { rotation: { enabled: true, speed: 10, audioBoost: false } });
  engine.evaluate(0, { ...SILENCE_SNAPSHOT, beatCount: 0 });
  const afterBeat = engine.evaluate(2, { ...SILENCE_SNAPSHOT, beatCount: 1 });
  assert.deepEqual(afterBeat[0].color, hsvToRgb(137.5));
  assert.equal(afterBeat[0].rotation, 20);

  engine.switchTo('beat_hue');
  const restarted = engine.evaluate(0.5, { ...SILENCE_SNAPSHOT, beatCount: 1 });
  assert.deepEqual(restarted[0].color, hsvToRgb(0));
  assert.equal(restarted[0].rotation, 25);
});

test('custom chase options reach the pattern', () => {
  const engine = new PatternEngine(layout, 'chase', { patterns: { chaseTail: 1, chaseStepSeconds: 1 } });
  assert.deepEqual(
    engine.evaluate(1.5, SILENCE_SNAPSHOT).map((frame) => frame.intensity),
    [0, 1, 0],
  );
});
