export type BeatDetectorOptions = {
  /** Multiple of the rolling average the low band must exceed. */
  threshold: number;
  /** Absolute floor so silence with tiny noise never pulses. */
  minEnergy: number;
  refractoryMs: number;
  /** Rolling-average length in analysis frames. */
  historySize: number;
};

export const DEFAULT_BEAT_OPTIONS: BeatDetectorOptions = {
  threshold: 1.5,
  minEnergy: 0.1,
  refractoryMs: 250,
  historySize: 86,
};

export class BeatDetector {
  private readonly options: BeatDetectorOptions;
  private readonly history: number[] = [];
  private historySum = 0;
  private lastBeatAt = Number.NEGATIVE_INFINITY;
  private count = 0;

  constructor(options: Partial<BeatDetectorOptions> = {}) {
    this.options = { ...DEFAULT_BEAT_OPTIONS, ...options };
    this.options.historySize = Math.max(1, Math.floor(this.options.historySize));
  }

  /**
   * Feeds one low-band value observed at `timestampMs`. Returns true when the
   * value is a pulse: above the floor, above `threshold` times the average of
   * the preceding history, and outside the refractory interval.
   */
  update(low: number, timestampMs: number): boolean {
    const value = Number.isFinite(low) ? low : 0;
    const average = this.history.length > 0 ? this.historySum / this.history.length : 0;
    const sinceLast = timestampMs - this.lastBeatAt;
    const isBeat =
      value > this.options.minEnergy &&
      value > average * this.options.threshold &&
      sinceLast >= this.options.refractoryMs;

    this.history.push(value);
    this.historySum += value;
    if (this.history.length > this.options.historySize) {
      this.historySum -= this.history.shift() ?? 0;
    }

    if (isBeat) {
      this.lastBeatAt = timestampMs;
      this.count += 1;
    }
    return isBeat;
  }

  getBeatCount(): number {
    return this.count;
  }

  getAverage(): number {
    return this.history.length > 0 ? this.historySum / this.history.length : 0;
  }

  reset(): void {
    this.history.length = 0;
    this.historySum = 0;
    this.lastBeatAt = Number.NEGATIVE_INFINITY;
  }
}
