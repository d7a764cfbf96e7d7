import type { Logger } from '../errors.js';
import {
  AttackReleaseSmoother,
  DEFAULT_BAND_EDGES,
  RunningMaxNormalizer,
  computeBandBins,
  rawBandEnergies,
  type BandBinRanges,
  type BandEdges,
  type BandEnergies,
} from './bands.js';
import { BeatDetector } from './beatDetector.js';
import { isPowerOfTwo, magnitudeSpectrum } from './fft.js';
import type { AudioSnapshot } from './snapshot.js';
import type { AudioSnapshotCell } from './snapshotCell.js';

export type AnalyzerOptions = {
  sampleRate: number;
  windowSize: number;
  hopSize: number;
  bands: BandEdges;
  normalizerDecaySeconds: number;
  noiseFloor: number;
  attackSeconds: number;
  releaseSeconds: number;
  beatThreshold: number;
  beatMinEnergy: number;
  beatRefractoryMs: number;
  beatHistorySeconds: number;
};

export const DEFAULT_ANALYZER_OPTIONS: Readonly<AnalyzerOptions> = Object.freeze({
  sampleRate: 44100,
  windowSize: 2048,
  hopSize: 512,
  bands: DEFAULT_BAND_EDGES,
  normalizerDecaySeconds: 4,
  noiseFloor: 0.0005,
  attackSeconds: 0.02,
  releaseSeconds: 0.25,
  beatThreshold: 1.5,
  beatMinEnergy: 0.1,
  beatRefractoryMs: 250,
  beatHistorySeconds: 1,
});

type BandKey = keyof BandEnergies;

const BAND_KEYS: readonly BandKey[] = ['low', 'mid', 'high', 'overall'];

const MALFORMED_LOG_INTERVAL = 100;

const defaultNow = () => performance.now();

export type AnalyzerStats = {
  framesAnalyzed: number;
  blocksAccepted: number;
  blocksDropped: number;
  beats: number;
};

/**
 * Turns a PCM stream into smoothed band energies and beat pulses, publishing
 * one snapshot per hop into the shared cell.
 */
export class AudioAnalyzer {
  readonly options: Readonly<AnalyzerOptions>;
  private readonly ranges: BandBinRanges;
  private readonly ring: Float32Array;
  private readonly frame: Float32Array;
  private writeIndex = 0;
  private filled = 0;
  private sinceHop = 0;
  private samplesSeen = 0;
  private readonly normalizers: Record<BandKey, RunningMaxNormalizer>;
  private readonly smoothers: Record<BandKey, AttackReleaseSmoother>;
  private readonly beats: BeatDetector;
  private readonly frameSeconds: number;
  private readonly logger: Logger;
  private readonly now: () => number;
  private stats: AnalyzerStats = { framesAnalyzed: 0, blocksAccepted: 0, blocksDropped: 0, beats: 0 };

  constructor(
    private readonly cell: AudioSnapshotCell,
    options: Partial<AnalyzerOptions> = {},
    deps: { logger?: Logger; now?: () => number } = {},
  ) {
    this.options = Object.freeze({ ...DEFAULT_ANALYZER_OPTIONS, ...options });
    const { windowSize, hopSize, sampleRate } = this.options;
    if (!isPowerOfTwo(windowSize)) {
      throw new RangeError(`windowSize must be a power of two (got ${windowSize})`);
    }
    if (!Number.isInteger(hopSize) || hopSize <= 0 || hopSize > windowSize) {
      throw new RangeError(`hopSize must be an integer in [1, windowSize] (got ${hopSize})`);
    }
    this.ranges = computeBandBins(this.options.bands, sampleRate, windowSize);
    this.ring = new Float32Array(windowSize);
    this.frame = new Float32Array(windowSize);
    this.frameSeconds = hopSize / sampleRate;
    this.normalizers = {
      low: this.createNormalizer(),
      mid: this.createNormalizer(),
      high: this.createNormalizer(),
      overall: this.createNormalizer(),
    };
    this.smoothers = {
      low: this.createSmoother(),
      mid: this.createSmoother(),
      high: this.createSmoother(),
      overall: this.createSmoother(),
    };
    this.beats = new BeatDetector({
      threshold: this.options.beatThreshold,
      minEnergy: this.options.beatMinEnergy,
      refractoryMs: this.options.beatRefractoryMs,
      historySize: Math.max(1, Math.round(this.options.beatHistorySeconds / this.frameSeconds)),
    });
    this.logger = deps.logger ?? console;
    this.now = deps.now ?? defaultNow;
  }

  private createNormalizer() {
    return new RunningMaxNormalizer(this.options.normalizerDecaySeconds, this.options.noiseFloor);
  }

  private createSmoother() {
    return new AttackReleaseSmoother(this.options.attackSeconds, this.options.releaseSeconds);
  }

  /**
   * Accepts one block of mono samples. Malformed blocks are dropped and
   * logged. Returns the most recent snapshot produced by this block, or null
   * when the block did not complete a hop.
   */
  push(block: unknown): AudioSnapshot | null {
    const problem = this.inspectBlock(block);
    if (problem !== null || !(block instanceof Float32Array)) {
      this.stats.blocksDropped += 1;
      if (this.stats.blocksDropped === 1 || this.stats.blocksDropped % MALFORMED_LOG_INTERVAL === 0) {
        this.logger.warn(
          `[audio] dropped malformed block (${problem ?? 'unsupported type'}); ${this.stats.blocksDropped} dropped so far`,
        );
      }
      return null;
    }
    this.stats.blocksAccepted += 1;

    const { windowSize, hopSize } = this.options;
    let latest: AudioSnapshot | null = null;
    for (let i = 0; i < block.length; i++) {
      this.ring[this.writeIndex] = block[i];
      this.writeIndex = (this.writeIndex + 1) % windowSize;
      this.samplesSeen += 1;
      if (this.filled < windowSize) this.filled += 1;
      this.sinceHop += 1;
      if (this.sinceHop >= hopSize && this.filled === windowSize) {
        this.sinceHop = 0;
        latest = this.analyzeWindow();
      }
    }
    return latest;
  }

  private inspectBlock(block: unknown): string | null {
    if (!(block instanceof Float32Array)) return 'expected Float32Array';
    if (block.length === 0) return 'empty block';
    for (let i = 0; i < block.length; i++) {
      if (!Number.isFinite(block[i])) return `non-finite sample at ${i}`;
    }
    return null;
  }

  private analyzeWindow(): AudioSnapshot {
    const { windowSize } = this.options;
    for (let i = 0; i < windowSize; i++) {
      this.frame[i] = this.ring[(this.writeIndex + i) % windowSize];
    }
    const raw = rawBandEnergies(magnitudeSpectrum(this.frame), this.ranges);
    const normalized: BandEnergies = { low: 0, mid: 0, high: 0, overall: 0 };
    const smoothed: BandEnergies = { low: 0, mid: 0, high: 0, overall: 0 };
    for (const key of BAND_KEYS) {
      normalized[key] = this.normalizers[key].normalize(raw[key], this.frameSeconds);
      smoothed[key] = this.smoothers[key].next(normalized[key], this.frameSeconds);
    }

    const streamMs = (this.samplesSeen / this.options.sampleRate) * 1000;
    const beat = this.beats.update(normalized.low, streamMs);
    if (beat) this.stats.beats += 1;
    this.stats.framesAnalyzed += 1;

    const snapshot: AudioSnapshot = Object.freeze({
      low: smoothed.low,
      mid: smoothed.mid,
      high: smoothed.high,
      overall: smoothed.overall,
      beat,
      beatCount: this.beats.getBeatCount(),
      timestamp: this.now(),
    });
    this.cell.publish(snapshot, 'analyzer');
    return snapshot;
  }

  getStats(): AnalyzerStats {
    return { ...this.stats };
  }

  getBandRanges(): BandBinRanges {
    return this.ranges;
  }

  /** Clears buffered samples and smoothing; the normalizer peaks decay naturally. */
  flush(): void {
    this.ring.fill(0);
    this.writeIndex = 0;
    this.filled = 0;
    this.sinceHop = 0;
    for (const key of BAND_KEYS) {
      this.smoothers[key].reset();
    }
  }
}
