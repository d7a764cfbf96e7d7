import { hsvToRgb, wrapHue } from '../color/colorSpaces.js';
import type { LightLayout } from '../layout/layout.js';
import { ZONES, zoneOrdinal, type Zone } from '../layout/zones.js';
import {
  centerOutFront,
  chaseTailLength,
  frame,
  hueFrame,
  mapLights,
  positiveMod,
  tailIntensity,
  warm,
  zoneRing,
  zoneRingCount,
} from './shared.js';
import { definePattern, type LightFrame, type PatternEntry, type PatternOptions } from './types.js';

const SWIRL_REVOLUTIONS_PER_SECOND = 0.25;
const SWIRL_HUE_DEGREES_PER_SECOND = 30;
const DEPTH_WAVE_SPEED = 0.5;
const DEPTH_WAVE_SHARPNESS = 3;
const ALTERNATE_PERIOD_SECONDS = 1;
const ALTERNATE_OTHER_LEVEL = 0.3;
const CENTER_OUT_PERIOD_SECONDS = 2;
const BREATH_PERIOD_SECONDS = 4;
const BREATH_FLOOR = 0.05;

export const ZONE_MIX_CYCLE_SECONDS = 14;

export const ZONE_MIX_SUBPATTERNS = ['chase', 'pulse', 'solid', 'strobe', 'center_out', 'wave'] as const;

export type ZoneSubPattern = (typeof ZONE_MIX_SUBPATTERNS)[number];

type ChaseState = { tail: number; count: number };

const createChaseState = (layout: LightLayout, options: PatternOptions): ChaseState => ({
  count: layout.total,
  tail: chaseTailLength(options.chaseTail, layout.total),
});

const chaseStep = (elapsed: number, options: PatternOptions): number =>
  Math.floor(Math.max(0, elapsed) / options.chaseStepSeconds);

export const chase = definePattern<ChaseState>({
  name: 'chase',
  family: 'time',
  label: 'Chase',
  createState: createChaseState,
  step({ layout, elapsed, options }, { tail, count }) {
    if (count === 0) return [];
    const head = chaseStep(elapsed, options) % count;
    return mapLights(layout, ({ globalIndex }) =>
      warm(tailIntensity(positiveMod(head - globalIndex, count), tail)),
    );
  },
});

export const chaseReverse = definePattern<ChaseState>({
  name: 'chase_reverse',
  family: 'time',
  label: 'Chase (reverse)',
  createState: createChaseState,
  step({ layout, elapsed, options }, { tail, count }) {
    if (count === 0) return [];
    const head = count - 1 - (chaseStep(elapsed, options) % count);
    return mapLights(layout, ({ globalIndex }) =>
      warm(tailIntensity(positiveMod(globalIndex - head, count), tail)),
    );
  },
});

type SwirlState = { azimuths: number[] };

export const swirl = definePattern<SwirlState>({
  name: 'swirl',
  family: 'time',
  label: 'Swirl',
  createState: (layout) => {
    const { center } = layout.config;
    return {
      azimuths: layout.lights.map(({ position }) =>
        Math.atan2(position.z - center.z, position.x - center.x),
      ),
    };
  },
  step({ layout, elapsed }, { azimuths }) {
    const sweep = 2 * Math.PI * SWIRL_REVOLUTIONS_PER_SECOND * elapsed;
    return mapLights(layout, ({ globalIndex }) => {
      const azimuth = azimuths[globalIndex];
      const hue = wrapHue((azimuth * 180) / Math.PI + SWIRL_HUE_DEGREES_PER_SECOND * elapsed);
      return hueFrame(hue, 0.5 + 0.5 * Math.cos(azimuth - sweep));
    });
  },
});

type DepthState = { depths: number[] };

const createDepthState = (layout: LightLayout, fromFront: boolean): DepthState => {
  const zs = layout.lights.map(({ position }) => position.z);
  const zMin = Math.min(...zs);
  const zMax = Math.max(...zs);
  const range = zMax - zMin;
  return {
    depths: zs.map((z) => {
      if (!(range > 0)) return 0;
      return fromFront ? (zMax - z) / range : (z - zMin) / range;
    }),
  };
};

const depthWave = (layout: LightLayout, elapsed: number, { depths }: DepthState): LightFrame[] => {
  const phase = positiveMod(DEPTH_WAVE_SPEED * elapsed, 1);
  return mapLights(layout, ({ globalIndex }) => {
    const gap = Math.abs(depths[globalIndex] - phase);
    const distance = Math.min(gap, 1 - gap);
    return warm(Math.max(0, 1 - DEPTH_WAVE_SHARPNESS * distance));
  });
};

export const frontToBack = definePattern<DepthState>({
  name: 'front_to_back',
  family: 'time',
  label: 'Front to back',
  createState: (layout) => createDepthState(layout, true),
  step: ({ layout, elapsed }, state) => depthWave(layout, elapsed, state),
});

export const backToFront = definePattern<DepthState>({
  name: 'back_to_front',
  family: 'time',
  label: 'Back to front',
  createState: (layout) => createDepthState(layout, false),
  step: ({ layout, elapsed }, state) => depthWave(layout, elapsed, state),
});

const zoneOff = (name: 'left_off' | 'right_off', label: string, dark: Zone): PatternEntry =>
  definePattern<null>({
    name,
    family: 'time',
    label,
    createState: () => null,
    step: ({ layout }) => mapLights(layout, ({ zone }) => warm(zone === dark ? 0 : 1)),
  });

export const leftOff = zoneOff('left_off', 'Left off', 'left');

export const rightOff = zoneOff('right_off', 'Right off', 'right');

export const leftRightAlt = definePattern<null>({
  name: 'left_right_alt',
  family: 'time',
  label: 'Left/right alternate',
  createState: () => null,
  step({ layout, elapsed }) {
    const leftLit = positiveMod(Math.floor(elapsed / ALTERNATE_PERIOD_SECONDS), 2) === 0;
    return mapLights(layout, ({ zone }) => {
      if (zone === 'left') return warm(leftLit ? 1 : 0);
      if (zone === 'right') return warm(leftLit ? 0 : 1);
      return warm(ALTERNATE_OTHER_LEVEL);
    });
  },
});

type RingState = { rings: number[]; ringCounts: number[] };

const createRingState = (layout: LightLayout): RingState => ({
  rings: layout.lights.map(({ zoneIndex, zoneCount }) => zoneRing(zoneIndex, zoneCount)),
  ringCounts: layout.lights.map(({ zoneCount }) => zoneRingCount(zoneCount)),
});

const ringLit = (state: RingState, globalIndex: number, seconds: number): boolean =>
  state.rings[globalIndex] <=
  centerOutFront(seconds, state.ringCounts[globalIndex], CENTER_OUT_PERIOD_SECONDS);

export const centerOut = definePattern<RingState>({
  name: 'center_out',
  family: 'time',
  label: 'Center out',
  createState: createRingState,
  step: ({ layout, elapsed }, state) =>
    mapLights(layout, ({ globalIndex }) => warm(ringLit(state, globalIndex, elapsed) ? 1 : 0)),
});

/** Sub-pattern per zone (in zone order) for the configuration active at `elapsed`. */
export const zoneMixAssignment = (elapsed: number): Record<Zone, ZoneSubPattern> => {
  const configuration = zoneMixConfiguration(elapsed);
  const count = ZONE_MIX_SUBPATTERNS.length;
  return {
    left: ZONE_MIX_SUBPATTERNS[configuration % count],
    right: ZONE_MIX_SUBPATTERNS[(1 + configuration) % count],
    front: ZONE_MIX_SUBPATTERNS[(2 + configuration) % count],
    back: ZONE_MIX_SUBPATTERNS[(3 + configuration) % count],
    top: ZONE_MIX_SUBPATTERNS[(4 + configuration) % count],
    bottom: ZONE_MIX_SUBPATTERNS[(5 + configuration) % count],
  };
};

export const zoneMixConfiguration = (elapsed: number): number =>
  positiveMod(Math.floor(elapsed / ZONE_MIX_CYCLE_SECONDS), ZONE_MIX_SUBPATTERNS.length);

type ZoneMixState = {
  rings: RingState;
  tails: number[];
  configuration: number;
  /** Pattern time at which the current configuration began. */
  cycleStart: number;
};

const subPatternIntensity = (
  sub: ZoneSubPattern,
  seconds: number,
  zoneIndex: number,
  zoneCount: number,
  tail: number,
  ringOn: boolean,
  options: PatternOptions,
): number => {
  switch (sub) {
    case 'chase': {
      const head = Math.floor(seconds / options.chaseStepSeconds) % zoneCount;
      return tailIntensity(positiveMod(head - zoneIndex, zoneCount), tail);
    }
    case 'pulse':
      return 0.5 - 0.5 * Math.cos(2 * Math.PI * seconds);
    case 'solid':
      return 1;
    case 'strobe':
      return Math.floor(seconds * 8) % 2 === 0 ? 1 : 0;
    case 'center_out':
      return ringOn ? 1 : 0;
    case 'wave':
      return 0.5 + 0.5 * Math.sin(2 * Math.PI * (0.5 * seconds - zoneIndex / zoneCount));
  }
};

export const zoneMix = definePattern<ZoneMixState>({
  name: 'zone_mix',
  family: 'time',
  label: 'Zone mix',
  createState: (layout, options) => ({
    rings: createRingState(layout),
    tails: layout.lights.map(({ zoneCount }) => chaseTailLength(options.chaseTail, zoneCount)),
    configuration: 0,
    cycleStart: 0,
  }),
  step({ layout, elapsed, options }, state) {
    const time = Math.max(0, elapsed);
    state.configuration = zoneMixConfiguration(time);
    state.cycleStart = Math.floor(time / ZONE_MIX_CYCLE_SECONDS) * ZONE_MIX_CYCLE_SECONDS;
    const assignment = zoneMixAssignment(time);
    const local = time - state.cycleStart;
    const colors = ZONES.map((zone) => hsvToRgb(60 * zoneOrdinal(zone)));
    return mapLights(layout, ({ zone, zoneIndex, zoneCount, globalIndex }) =>
      frame(
        colors[zoneOrdinal(zone)],
        subPatternIntensity(
          assignment[zone],
          local,
          zoneIndex,
          zoneCount,
          state.tails[globalIndex],
          ringLit(state.rings, globalIndex, local),
          options,
        ),
      ),
    );
  },
});

export const breathing = definePattern<null>({
  name: 'breathing',
  family: 'time',
  label: 'Breathing',
  createState: () => null,
  step({ layout, elapsed }) {
    const breath = 0.5 - 0.5 * Math.cos((2 * Math.PI * elapsed) / BREATH_PERIOD_SECONDS);
    return mapLights(layout, () => warm(BREATH_FLOOR + (1 - BREATH_FLOOR) * breath));
  },
});

export const allOn = definePattern<null>({
  name: 'all_on',
  family: 'time',
  label: 'All on',
  createState: () => null,
  step: ({ layout }) => mapLights(layout, () => warm(1)),
});
