import { WARM_WHITE, hsvToRgb, type Rgb } from '../color/colorSpaces.js';
import type { LightDescriptor, LightLayout } from '../layout/layout.js';
import type { LightFrame } from './types.js';

/** Intensity audio-driven patterns sit at on silence. */
export const IDLE_LEVEL = 0.15;

export const positiveMod = (value: number, modulus: number): number => {
  const result = value % modulus;
  return result < 0 ? result + modulus : result;
};

export const frame = (color: Rgb, intensity: number): LightFrame => ({ color, intensity });

export const warm = (intensity: number): LightFrame => frame(WARM_WHITE, intensity);

export const hueFrame = (hue: number, intensity: number): LightFrame => frame(hsvToRgb(hue), intensity);

export const mapLights = (
  layout: LightLayout,
  render: (light: LightDescriptor) => LightFrame,
): LightFrame[] => layout.lights.map(render);

/** Intensity of light `distance` steps behind the head of a chase. */
export const tailIntensity = (distance: number, tail: number): number =>
  distance < tail ? 1 - distance / tail : 0;

export const chaseTailLength = (requested: number, count: number): number =>
  Math.max(1, Math.min(Math.floor(requested), count));

/**
 * Ring of each light within its zone counted outwards from the zone's middle
 * index; the middle light (or pair) is ring 0.
 */
export const zoneRing = (zoneIndex: number, zoneCount: number): number =>
  Math.floor(Math.abs(zoneIndex - (zoneCount - 1) / 2));

export const zoneRingCount = (zoneCount: number): number => Math.ceil(zoneCount / 2);

/** Rings lit by an outward sweep that restarts every `periodSeconds`. */
export const centerOutFront = (seconds: number, rings: number, periodSeconds: number): number =>
  Math.min(rings - 1, Math.floor((positiveMod(seconds, periodSeconds) / periodSeconds) * rings));
