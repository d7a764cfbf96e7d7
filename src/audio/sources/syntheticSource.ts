import { BlockPacer } from './pacer.js';
import type { AudioSource } from './types.js';

export type SyntheticSourceOptions = {
  sampleRate: number;
  blockSize: number;
  bpm?: number;
  realtime?: boolean;
  seed?: number;
};

const KICK_HZ = 55;
const KICK_DECAY_SECONDS = 0.12;
const HAT_DECAY_SECONDS = 0.03;
const PAD_HZ = 440;

/**
 * Deterministic four-on-the-floor test signal: a decaying kick on every
 * beat, a noise hat on the off-beat and a quiet sine pad underneath.
 */
export class SyntheticAudioSource implements AudioSource {
  readonly kind = 'synthetic' as const;
  readonly sampleRate: number;
  readonly description: string;
  private readonly blockSize: number;
  private readonly beatSeconds: number;
  private readonly pacer: BlockPacer | null;
  private readonly seed: number;
  private sampleIndex = 0;
  private noiseState: number;

  constructor(options: SyntheticSourceOptions) {
    this.sampleRate = options.sampleRate;
    this.blockSize = Math.max(1, Math.floor(options.blockSize));
    const bpm = options.bpm && options.bpm > 0 ? options.bpm : 120;
    this.beatSeconds = 60 / bpm;
    this.description = `synthetic ${bpm} BPM`;
    this.seed = (options.seed ?? 1337) >>> 0 || 1;
    this.noiseState = this.seed;
    this.pacer = options.realtime === false
      ? null
      : new BlockPacer((this.blockSize / this.sampleRate) * 1000);
  }

  private nextNoise(): number {
    // xorshift32
    let x = this.noiseState;
    x ^= x << 13;
    x ^= x >>> 17;
    x ^= x << 5;
    this.noiseState = x >>> 0;
    return (this.noiseState / 0xffffffff) * 2 - 1;
  }

  private renderSample(index: number): number {
    const t = index / this.sampleRate;
    const beatPhase = t % this.beatSeconds;
    const kick = Math.exp(-beatPhase / KICK_DECAY_SECONDS) * Math.sin(2 * Math.PI * KICK_HZ * beatPhase);
    const offbeat = (t + this.beatSeconds / 2) % this.beatSeconds;
    const hat = Math.exp(-offbeat / HAT_DECAY_SECONDS) * this.nextNoise() * 0.25;
    const pad = 0.05 * Math.sin(2 * Math.PI * PAD_HZ * t);
    return Math.max(-1, Math.min(1, 0.7 * kick + hat + pad));
  }

  async start(): Promise<void> {
    this.sampleIndex = 0;
    this.noiseState = this.seed;
    this.pacer?.reset();
  }

  async read(): Promise<Float32Array> {
    await this.pacer?.wait();
    const block = new Float32Array(this.blockSize);
    for (let i = 0; i < this.blockSize; i++) {
      block[i] = this.renderSample(this.sampleIndex);
      this.sampleIndex += 1;
    }
    return block;
  }

  async stop(): Promise<void> {
    this.pacer?.reset();
  }
}
