export type Rgb = {
  readonly r: number;
  readonly g: number;
  readonly b: number;
};

export const clamp01 = (value: number): number => {
  if (Number.isNaN(value)) return 0;
  return value < 0 ? 0 : value > 1 ? 1 : value;
};

export const wrapHue = (hue: number): number => {
  if (!Number.isFinite(hue)) return 0;
  const wrapped = hue % 360;
  return wrapped < 0 ? wrapped + 360 : wrapped;
};

export const WARM_WHITE: Rgb = Object.freeze({ r: 1, g: 0.5, b: 0.2 });

export const BLACK: Rgb = Object.freeze({ r: 0, g: 0, b: 0 });

/** Hue in degrees, saturation and value in [0,1]. */
export const hsvToRgb = (hue: number, saturation = 1, value = 1): Rgb => {
  const h = wrapHue(hue) / 60;
  const s = clamp01(saturation);
  const v = clamp01(value);
  const sector = Math.floor(h) % 6;
  const f = h - Math.floor(h);
  const p = v * (1 - s);
  const q = v * (1 - s * f);
  const t = v * (1 - s * (1 - f));
  switch (sector) {
    case 0:
      return { r: v, g: t, b: p };
    case 1:
      return { r: q, g: v, b: p };
    case 2:
      return { r: p, g: v, b: t };
    case 3:
      return { r: p, g: q, b: v };
    case 4:
      return { r: t, g: p, b: v };
    default:
      return { r: v, g: p, b: q };
  }
};

export const HUE_ENERGY_SPAN = 108;

/** Linear energy to hue shift: 0 keeps the base hue, 1 moves it by HUE_ENERGY_SPAN degrees. */
export const energyToHue = (energy: number, baseHue = 0): number =>
  wrapHue(baseHue + clamp01(energy) * HUE_ENERGY_SPAN);

export const energyToColor = (energy: number, baseHue = 0): Rgb =>
  hsvToRgb(energyToHue(energy, baseHue), 0.9, 0.3 + 0.7 * clamp01(energy));

export const lerp = (a: number, b: number, t: number): number => a + (b - a) * clamp01(t);

export const lerpColor = (from: Rgb, to: Rgb, t: number): Rgb => ({
  r: lerp(from.r, to.r, t),
  g: lerp(from.g, to.g, t),
  b: lerp(from.b, to.b, t),
});

export const clampColor = (color: Rgb): Rgb => ({
  r: clamp01(color.r),
  g: clamp01(color.g),
  b: clamp01(color.b),
});
