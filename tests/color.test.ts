import assert from 'node:assert/strict';
import test from 'node:test';

import {
  BLACK,
  WARM_WHITE,
  clamp01,
  clampColor,
  energyToColor,
  energyToHue,
  hsvToRgb,
  lerpColor,
  wrapHue,
} from '../src/color/colorSpaces.js';

const near = (actual: number, expected: number, epsilon = 1e-9) =>
  assert.ok(Math.abs(actual - expected) < epsilon, `expected ${expected}, got ${actual}`);

test('hsvToRgb hits the primaries', () => {
  assert.deepEqual(hsvToRgb(0), { r: 1, g: 0, b: 0 });
  assert.deepEqual(hsvToRgb(120), { r: 0, g: 1, b: 0 });
  assert.deepEqual(hsvToRgb(240), { r: 0, g: 0, b: 1 });
  assert.deepEqual(hsvToRgb(360), { r: 1, g: 0, b: 0 });
});

test('hsvToRgb blends between sectors', () => {
  const yellow = hsvToRgb(60);
  near(yellow.r, 1);
  near(yellow.g, 1);
  near(yellow.b, 0);
  const dim = hsvToRgb(0, 1, 0.5);
  assert.deepEqual(dim, { r: 0.5, g: 0, b: 0 });
});

test('wrapHue keeps hues in [0, 360)', () => {
  assert.equal(wrapHue(-30), 330);
  assert.equal(wrapHue(720), 0);
  assert.equal(wrapHue(Number.NaN), 0);
  assert.equal(wrapHue(Number.POSITIVE_INFINITY), 0);
});

test('clamp01 maps NaN to zero', () => {
  assert.equal(clamp01(Number.NaN), 0);
  assert.equal(clamp01(-1), 0);
  assert.equal(clamp01(2), 1);
  assert.equal(clamp01(0.25), 0.25);
});

test('energyToHue shifts the base hue by up to 108 degrees', () => {
  assert.equal(energyToHue(0, 200), 200);
  assert.equal(energyToHue(0.5, 300), 354);
  assert.equal(energyToHue(1, 300), 48);
  assert.equal(energyToHue(5), 108);
});

test('energyToColor brightens with energy', () => {
  const quiet = energyToColor(0);
  near(quiet.r, 0.3);
  near(quiet.g, 0.03);
  near(quiet.b, 0.03);
  const loud = energyToColor(1);
  assert.ok(loud.r + loud.g + loud.b > quiet.r + quiet.g + quiet.b);
});

test('lerpColor and clampColor', () => {
  assert.deepEqual(lerpColor(BLACK, WARM_WHITE, 0.5), { r: 0.5, g: 0.25, b: 0.1 });
  assert.deepEqual(lerpColor(BLACK, WARM_WHITE, 3), WARM_WHITE);
  assert.deepEqual(clampColor({ r: 1.5, g: -0.2, b: Number.NaN }), { r: 1, g: 0, b: 0 });
});
