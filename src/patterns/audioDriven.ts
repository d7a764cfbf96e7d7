import { clamp01, energyToColor, wrapHue } from '../color/colorSpaces.js';
import { IDLE_LEVEL, frame, hueFrame, mapLights } from './shared.js';
import { definePattern } from './types.js';

const GOLDEN_HUE_STEP = 137.5;
const FLOOD_FLOOR = 0.1;

export const upperBass = definePattern<null>({
  name: 'upper_bass',
  family: 'audio',
  label: 'Upper bass',
  createState: () => null,
  step({ layout, audio }) {
    const energy = clamp01(0.6 * audio.low + 0.4 * audio.mid);
    const intensity = IDLE_LEVEL + (1 - IDLE_LEVEL) * energy;
    return mapLights(layout, () => hueFrame(20 + 40 * energy, intensity));
  },
});

export const bassFlood = definePattern<null>({
  name: 'bass_flood',
  family: 'audio',
  label: 'Bass flood',
  createState: () => null,
  step({ layout, audio }) {
    const hue = audio.beat ? 280 : 240;
    const intensity = Math.max(FLOOD_FLOOR, clamp01(audio.low));
    return mapLights(layout, () => hueFrame(hue, intensity));
  },
});

export const trebleHue = definePattern<null>({
  name: 'treble_hue',
  family: 'audio',
  label: 'Treble hue',
  createState: () => null,
  step({ layout, audio }) {
    const high = clamp01(audio.high);
    const intensity = 0.3 + 0.7 * clamp01(audio.overall);
    const total = Math.max(1, layout.total);
    return mapLights(layout, ({ globalIndex }) =>
      hueFrame(wrapHue(180 + 300 * high + (60 * globalIndex) / total), intensity),
    );
  },
});

export const bandSplit = definePattern<null>({
  name: 'band_split',
  family: 'audio',
  label: 'Band split',
  createState: () => null,
  step({ layout, audio }) {
    const hue = 300 * clamp01(audio.high);
    const intensity = Math.max(FLOOD_FLOOR, clamp01(audio.low));
    return mapLights(layout, () => hueFrame(hue, intensity));
  },
});

export const musicColor = definePattern<null>({
  name: 'music_color',
  family: 'audio',
  label: 'Music color',
  createState: () => null,
  step({ layout, audio }) {
    const overall = clamp01(audio.overall);
    const color = energyToColor(audio.mid, 180 * overall);
    return mapLights(layout, () => frame(color, 0.5 + 0.5 * overall));
  },
});

type BeatHueState = {
  hue: number;
  /** Beat count seen on the previous step; null before the first step. */
  lastBeatCount: number | null;
};

export const beatHue = definePattern<BeatHueState>({
  name: 'beat_hue',
  family: 'audio',
  label: 'Beat hue',
  createState: () => ({ hue: 0, lastBeatCount: null }),
  step({ layout, audio }, state) {
    if (state.lastBeatCount !== null && audio.beatCount > state.lastBeatCount) {
      state.hue = wrapHue(state.hue + GOLDEN_HUE_STEP * (audio.beatCount - state.lastBeatCount));
    }
    state.lastBeatCount = audio.beatCount;
    const intensity = IDLE_LEVEL + (1 - IDLE_LEVEL) * clamp01(audio.low);
    return mapLights(layout, () => hueFrame(state.hue, intensity));
  },
});
