export type BandEdges = {
  readonly lowHz: number;
  readonly lowMidHz: number;
  readonly midHighHz: number;
  readonly highHz: number;
};

export const DEFAULT_BAND_EDGES: BandEdges = Object.freeze({
  lowHz: 20,
  lowMidHz: 250,
  midHighHz: 2000,
  highHz: 20000,
});

export type BinRange = {
  /** Inclusive. */
  readonly start: number;
  /** Exclusive. */
  readonly end: number;
};

export type BandBinRanges = {
  readonly low: BinRange;
  readonly mid: BinRange;
  readonly high: BinRange;
  readonly overall: BinRange;
};

export type BandEnergies = {
  low: number;
  mid: number;
  high: number;
  overall: number;
};

/**
 * Maps the band edges onto FFT bins. Ranges are contiguous: low ends where
 * mid starts and mid ends where high starts. Bins above Nyquist are dropped.
 */
export const computeBandBins = (
  edges: BandEdges,
  sampleRate: number,
  fftSize: number,
): BandBinRanges => {
  const binCount = (fftSize >> 1) + 1;
  const binWidth = sampleRate / fftSize;
  const toBin = (hz: number) => Math.min(binCount, Math.max(0, Math.floor(hz / binWidth)));
  const lowStart = toBin(edges.lowHz);
  const lowMid = Math.max(lowStart, toBin(edges.lowMidHz));
  const midHigh = Math.max(lowMid, toBin(edges.midHighHz));
  const highEnd = Math.max(midHigh, Math.min(binCount, toBin(edges.highHz) + 1));
  return {
    low: { start: lowStart, end: lowMid },
    mid: { start: lowMid, end: midHigh },
    high: { start: midHigh, end: highEnd },
    overall: { start: lowStart, end: highEnd },
  };
};

export const meanMagnitude = (magnitudes: ArrayLike<number>, range: BinRange): number => {
  if (range.end <= range.start) return 0;
  let sum = 0;
  for (let k = range.start; k < range.end; k++) {
    sum += magnitudes[k];
  }
  return sum / (range.end - range.start);
};

export const rawBandEnergies = (
  magnitudes: ArrayLike<number>,
  ranges: BandBinRanges,
): BandEnergies => ({
  low: meanMagnitude(magnitudes, ranges.low),
  mid: meanMagnitude(magnitudes, ranges.mid),
  high: meanMagnitude(magnitudes, ranges.high),
  overall: meanMagnitude(magnitudes, ranges.overall),
});

/**
 * Scales a raw energy against a running maximum that decays exponentially
 * towards the noise floor, so the output adapts to volume changes without
 * re-baselining on every quiet passage.
 */
export class RunningMaxNormalizer {
  private peak: number;

  constructor(
    private readonly decaySeconds: number,
    private readonly noiseFloor: number,
  ) {
    this.peak = noiseFloor;
  }

  normalize(raw: number, dtSeconds: number): number {
    const value = Number.isFinite(raw) && raw > 0 ? raw : 0;
    const retain = this.decaySeconds > 0 ? Math.exp(-Math.max(0, dtSeconds) / this.decaySeconds) : 0;
    this.peak = Math.max(this.noiseFloor, value, this.peak * retain);
    const normalized = value / this.peak;
    return normalized > 1 ? 1 : normalized;
  }

  getPeak(): number {
    return this.peak;
  }

  reset(): void {
    this.peak = this.noiseFloor;
  }
}

/** Exponential follower with separate rise and fall time constants. */
export class AttackReleaseSmoother {
  private value = 0;

  constructor(
    private readonly attackSeconds: number,
    private readonly releaseSeconds: number,
  ) {}

  next(target: number, dtSeconds: number): number {
    const tau = target > this.value ? this.attackSeconds : this.releaseSeconds;
    const alpha = tau > 0 ? 1 - Math.exp(-Math.max(0, dtSeconds) / tau) : 1;
    this.value += (target - this.value) * alpha;
    return this.value;
  }

  getValue(): number {
    return this.value;
  }

  reset(): void {
    this.value = 0;
  }
}
