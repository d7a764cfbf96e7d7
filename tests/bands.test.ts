import assert from 'node:assert/strict';
import test from 'node:test';

import {
  AttackReleaseSmoother,
  DEFAULT_BAND_EDGES,
  RunningMaxNormalizer,
  computeBandBins,
  meanMagnitude,
  rawBandEnergies,
} from '../src/audio/bands.js';

test('band bins are contiguous for the default edges', () => {
  const ranges = computeBandBins(DEFAULT_BAND_EDGES, 44100, 2048);
  assert.deepEqual(ranges, {
    low: { start: 0, end: 11 },
    mid: { start: 11, end: 92 },
    high: { start: 92, end: 929 },
    overall: { start: 0, end: 929 },
  });
});

test('band bins stop at the Nyquist bin', () => {
  const ranges = computeBandBins(DEFAULT_BAND_EDGES, 8000, 256);
  assert.deepEqual(ranges.high, { start: 64, end: 129 });
  assert.deepEqual(ranges.overall, { start: 0, end: 129 });
});

test('mean magnitude over a range', () => {
  const magnitudes = [1, 2, 3, 4];
  assert.equal(meanMagnitude(magnitudes, { start: 1, end: 3 }), 2.5);
  assert.equal(meanMagnitude(magnitudes, { start: 2, end: 2 }), 0);
  const energies = rawBandEnergies(magnitudes, {
    low: { start: 0, end: 1 },
    mid: { start: 1, end: 2 },
    high: { start: 2, end: 4 },
    overall: { start: 0, end: 4 },
  });
  assert.deepEqual(energies, { low: 1, mid: 2, high: 3.5, overall: 2.5 });
});

test('normalizer scales against the running maximum', () => {
  const normalizer = new RunningMaxNormalizer(4, 0.01);
  assert.equal(normalizer.normalize(0.5, 0), 1);
  assert.equal(normalizer.normalize(0.25, 0), 0.5);
  assert.equal(normalizer.getPeak(), 0.5);
  assert.equal(normalizer.normalize(Number.NaN, 0), 0);
  assert.equal(normalizer.normalize(-3, 0), 0);
});

test('normalizer peak decays and never drops below the noise floor', () => {
  const normalizer = new RunningMaxNormalizer(4, 0.01);
  normalizer.normalize(0.5, 0);
  assert.equal(normalizer.normalize(0.25, 1000), 1);
  const quiet = new RunningMaxNormalizer(4, 0.01);
  assert.equal(quiet.normalize(0.005, 0), 0.5);
  quiet.normalize(0.5, 0);
  quiet.reset();
  assert.equal(quiet.getPeak(), 0.01);
});

test('smoother rises with the attack constant and falls with the release constant', () => {
  const instant = new AttackReleaseSmoother(0, 0);
  assert.equal(instant.next(0.7, 0.01), 0.7);

  const smoother = new AttackReleaseSmoother(0, 10);
  assert.equal(smoother.next(1, 0.1), 1);
  assert.ok(Math.abs(smoother.next(0, 0.1) - Math.exp(-0.01)) < 1e-12);

  const slow = new AttackReleaseSmoother(1, 1);
  assert.ok(Math.abs(slow.next(1, 1) - (1 - Math.exp(-1))) < 1e-12);
  slow.reset();
  assert.equal(slow.getValue(), 0);
});
