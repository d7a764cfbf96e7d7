export const isPowerOfTwo = (value: number): boolean =>
  Number.isInteger(value) && value > 0 && (value & (value - 1)) === 0;

const hannCache = new Map<number, Float64Array>();

export const hannWindow = (size: number): Float64Array => {
  const cached = hannCache.get(size);
  if (cached) return cached;
  const window = new Float64Array(size);
  if (size === 1) {
    window[0] = 1;
  } else {
    for (let i = 0; i < size; i++) {
      window[i] = 0.5 - 0.5 * Math.cos((2 * Math.PI * i) / (size - 1));
    }
  }
  hannCache.set(size, window);
  return window;
};

/** In-place iterative radix-2 Cooley-Tukey transform. */
export const fftInPlace = (re: Float64Array, im: Float64Array): void => {
  const n = re.length;
  if (!isPowerOfTwo(n) || im.length !== n) {
    throw new Error(`FFT size must be a power of two with matching buffers (got ${n}/${im.length})`);
  }

  for (let i = 1, j = 0; i < n; i++) {
    let bit = n >> 1;
    for (; j & bit; bit >>= 1) {
      j ^= bit;
    }
    j ^= bit;
    if (i < j) {
      const tr = re[i];
      re[i] = re[j];
      re[j] = tr;
      const ti = im[i];
      im[i] = im[j];
      im[j] = ti;
    }
  }

  for (let len = 2; len <= n; len <<= 1) {
    const angle = (-2 * Math.PI) / len;
    const wr = Math.cos(angle);
    const wi = Math.sin(angle);
    const half = len >> 1;
    for (let start = 0; start < n; start += len) {
      let cr = 1;
      let ci = 0;
      for (let k = 0; k < half; k++) {
        const a = start + k;
        const b = a + half;
        const xr = re[b] * cr - im[b] * ci;
        const xi = re[b] * ci + im[b] * cr;
        re[b] = re[a] - xr;
        im[b] = im[a] - xi;
        re[a] += xr;
        im[a] += xi;
        const nextCr = cr * wr - ci * wi;
        ci = cr * wi + ci * wr;
        cr = nextCr;
      }
    }
  }
};

/**
 * Hann-windowed magnitude spectrum of a real frame, `size / 2 + 1` bins.
 * Magnitudes are scaled by 2 / size so a full-scale sinusoid centred on a
 * bin reads roughly 0.5 after the window's coherent gain.
 */
export const magnitudeSpectrum = (frame: ArrayLike<number>): Float64Array => {
  const size = frame.length;
  const window = hannWindow(size);
  const re = new Float64Array(size);
  const im = new Float64Array(size);
  for (let i = 0; i < size; i++) {
    re[i] = frame[i] * window[i];
  }
  fftInPlace(re, im);
  const bins = (size >> 1) + 1;
  const magnitudes = new Float64Array(bins);
  const scale = 2 / size;
  for (let k = 0; k < bins; k++) {
    magnitudes[k] = Math.hypot(re[k], im[k]) * scale;
  }
  return magnitudes;
};

export const binFrequency = (bin: number, sampleRate: number, size: number): number =>
  (bin * sampleRate) / size;
