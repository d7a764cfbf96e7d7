import { PatternError } from '../errors.js';
import { bandSplit, bassFlood, beatHue, musicColor, trebleHue, upperBass } from './audioDriven.js';
import {
  allOn,
  backToFront,
  breathing,
  centerOut,
  chase,
  chaseReverse,
  frontToBack,
  leftOff,
  leftRightAlt,
  rightOff,
  swirl,
  zoneMix,
} from './timeDriven.js';
import { PATTERN_NAMES, type PatternEntry, type PatternFamily, type PatternName } from './types.js';

export const PATTERNS: Readonly<Record<PatternName, PatternEntry>> = Object.freeze({
  chase,
  chase_reverse: chaseReverse,
  swirl,
  front_to_back: frontToBack,
  back_to_front: backToFront,
  left_off: leftOff,
  right_off: rightOff,
  left_right_alt: leftRightAlt,
  center_out: centerOut,
  zone_mix: zoneMix,
  breathing,
  all_on: allOn,
  upper_bass: upperBass,
  bass_flood: bassFlood,
  treble_hue: trebleHue,
  band_split: bandSplit,
  music_color: musicColor,
  beat_hue: beatHue,
});

export const isPatternName = (value: unknown): value is PatternName =>
  PATTERN_NAMES.some((name) => name === value);

/**
 * Resolves user input to a pattern: a name (case-insensitive, `-` accepted
 * for `_`) or a 1-based index into PATTERN_NAMES.
 */
export const parsePatternName = (input: string | number): PatternName => {
  const raw = String(input).trim();
  if (/^\d+$/.test(raw)) {
    const index = Number.parseInt(raw, 10);
    const name = PATTERN_NAMES[index - 1];
    if (index >= 1 && name !== undefined) return name;
    throw new PatternError(raw, `Pattern index ${raw} is out of range (1-${PATTERN_NAMES.length})`);
  }
  const normalized = raw.toLowerCase().replace(/-/g, '_');
  if (isPatternName(normalized)) return normalized;
  throw new PatternError(raw);
};

export type PatternListing = {
  index: number;
  name: PatternName;
  label: string;
  family: PatternFamily;
};

export const listPatterns = (): PatternListing[] =>
  PATTERN_NAMES.map((name, i) => ({
    index: i + 1,
    name,
    label: PATTERNS[name].label,
    family: PATTERNS[name].family,
  }));

export const formatPatternList = (active?: PatternName): string =>
  listPatterns()
    .map(({ index, name, family }) =>
      `${name === active ? '*' : ' '} ${String(index).padStart(2)}. ${name.padEnd(15)} ${family}`,
    )
    .join('\n');
