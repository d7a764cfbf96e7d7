import assert from 'node:assert/strict';
import test from 'node:test';
import fc from 'fast-check';

import type { AudioSnapshot } from '../src/audio/snapshot.js';
import { DEFAULT_LAYOUT_CONFIG, createLayout } from '../src/layout/layout.js';
import { PATTERNS } from '../src/patterns/registry.js';
import { PATTERN_NAMES, type PatternOptions } from '../src/patterns/types.js';

const unit = () => fc.double({ min: 0, max: 1, noNaN: true });

const countsArb = fc.record({
  left: fc.integer({ min: 0, max: 6 }),
  right: fc.integer({ min: 0, max: 6 }),
  front: fc.integer({ min: 0, max: 6 }),
  back: fc.integer({ min: 0, max: 6 }),
  top: fc.integer({ min: 0, max: 6 }),
  bottom: fc.integer({ min: 0, max: 6 }),
});

const audioArb: fc.Arbitrary<AudioSnapshot> = fc.record({
  low: unit(),
  mid: unit(),
  high: unit(),
  overall: unit(),
  beat: fc.boolean(),
  beatCount: fc.nat({ max: 10_000 }),
  timestamp: fc.nat(),
});

const optionsArb: fc.Arbitrary<PatternOptions> = fc.record({
  chaseTail: fc.integer({ min: 1, max: 12 }),
  chaseStepSeconds: fc.double({ min: 0.01, max: 2, noNaN: true }),
});

const inUnit = (value: number) => Number.isFinite(value) && value >= 0 && value <= 1;

test('every pattern yields one in-range frame per light', () => {
  fc.assert(
    fc.property(
      fc.constantFrom(...PATTERN_NAMES),
      countsArb,
      fc.array(fc.tuple(fc.double({ min: 0, max: 10_000, noNaN: true }), audioArb), { minLength: 1, maxLength: 6 }),
      optionsArb,
      (name, counts, steps, options) => {
        const layout = createLayout({ ...DEFAULT_LAYOUT_CONFIG, counts });
        const instance = PATTERNS[name].instantiate(layout, options);
        for (const [elapsed, audio] of steps) {
          const frames = instance.step({ layout, elapsed, audio, options });
          assert.equal(frames.length, layout.total);
          for (const frame of frames) {
            assert.ok(inUnit(frame.intensity), `${name} intensity ${frame.intensity}`);
            assert.ok(inUnit(frame.color.r) && inUnit(frame.color.g) && inUnit(frame.color.b), `${name} color`);
          }
        }
      },
    ),
    { numRuns: 300 },
  );
});

test('time patterns depend only on pattern time', () => {
  const timePatterns = PATTERN_NAMES.filter((name) => PATTERNS[name].family === 'time');
  const layout = createLayout(DEFAULT_LAYOUT_CONFIG);
  fc.assert(
    fc.property(
      fc.constantFrom(...timePatterns),
      fc.double({ min: 0, max: 1000, noNaN: true }),
      fc.double({ min: 0, max: 1000, noNaN: true }),
      audioArb,
      (name, earlier, elapsed, audio) => {
        const options = { chaseTail: 3, chaseStepSeconds: 0.1 };
        const fresh = PATTERNS[name].instantiate(layout, options);
        const used = PATTERNS[name].instantiate(layout, options);
        used.step({ layout, elapsed: earlier, audio, options });
        assert.deepEqual(
          used.step({ layout, elapsed, audio, options }),
          fresh.step({ layout, elapsed, audio: { ...audio, low: 0, beat: false }, options }),
        );
      },
    ),
  );
});
