import type { AudioSnapshot } from '../audio/snapshot.js';
import type { Rgb } from '../color/colorSpaces.js';
import type { LightLayout } from '../layout/layout.js';

export const PATTERN_NAMES = [
  'chase',
  'chase_reverse',
  'swirl',
  'front_to_back',
  'back_to_front',
  'left_off',
  'right_off',
  'left_right_alt',
  'center_out',
  'zone_mix',
  'breathing',
  'all_on',
  'upper_bass',
  'bass_flood',
  'treble_hue',
  'band_split',
  'music_color',
  'beat_hue',
] as const;

export type PatternName = (typeof PATTERN_NAMES)[number];

export type PatternFamily = 'time' | 'audio';

export type LightFrame = {
  readonly color: Rgb;
  readonly intensity: number;
};

export type PatternOptions = {
  /** Number of lit lights in a chase, head included. */
  readonly chaseTail: number;
  readonly chaseStepSeconds: number;
};

export const DEFAULT_PATTERN_OPTIONS: PatternOptions = Object.freeze({
  chaseTail: 3,
  chaseStepSeconds: 0.1,
});

export type PatternContext = {
  readonly layout: LightLayout;
  /** Seconds since this pattern became active. */
  readonly elapsed: number;
  readonly audio: AudioSnapshot;
  readonly options: PatternOptions;
};

/**
 * A pattern with its own state shape. `step` returns one frame per light in
 * global layout order and may update `state` in place.
 */
export type PatternDefinition<S> = {
  readonly name: PatternName;
  readonly family: PatternFamily;
  readonly label: string;
  createState(layout: LightLayout, options: PatternOptions): S;
  step(context: PatternContext, state: S): LightFrame[];
};

/** An active pattern with its state captured. */
export type PatternInstance = {
  readonly name: PatternName;
  step(context: PatternContext): LightFrame[];
};

/** Registry entry with the state type erased behind `instantiate`. */
export type PatternEntry = {
  readonly name: PatternName;
  readonly family: PatternFamily;
  readonly label: string;
  instantiate(layout: LightLayout, options: PatternOptions): PatternInstance;
};

export const definePattern = <S>(definition: PatternDefinition<S>): PatternEntry => ({
  name: definition.name,
  family: definition.family,
  label: definition.label,
  instantiate(layout, options) {
    const state = definition.createState(layout, options);
    return {
      name: definition.name,
      step: (context) => definition.step(context, state),
    };
  },
});
