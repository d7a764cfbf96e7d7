import { AudioSourceError } from '../../errors.js';
import { BlockPacer } from './pacer.js';
import type { AudioSource } from './types.js';

export type BufferSourceOptions = {
  sampleRate: number;
  blockSize: number;
  /** Deliver blocks at wall-clock speed instead of as fast as they are read. */
  realtime?: boolean;
  label?: string;
};

/** Loops over an in-memory PCM buffer, wrapping around at the end. */
export class BufferAudioSource implements AudioSource {
  readonly kind = 'buffer' as const;
  readonly sampleRate: number;
  readonly description: string;
  private readonly blockSize: number;
  private readonly pacer: BlockPacer | null;
  private position = 0;
  private running = false;

  constructor(
    private readonly samples: Float32Array,
    options: BufferSourceOptions,
  ) {
    this.sampleRate = options.sampleRate;
    this.blockSize = Math.max(1, Math.floor(options.blockSize));
    this.description = options.label ?? `buffer (${samples.length} samples @ ${options.sampleRate} Hz)`;
    this.pacer = options.realtime
      ? new BlockPacer((this.blockSize / this.sampleRate) * 1000)
      : null;
  }

  async start(): Promise<void> {
    if (this.samples.length === 0) {
      throw new AudioSourceError(this.description, 'buffer is empty');
    }
    this.position = 0;
    this.pacer?.reset();
    this.running = true;
  }

  async read(): Promise<Float32Array> {
    if (!this.running) {
      throw new AudioSourceError(this.description, 'source is not started');
    }
    await this.pacer?.wait();
    const block = new Float32Array(this.blockSize);
    for (let i = 0; i < this.blockSize; i++) {
      block[i] = this.samples[this.position];
      this.position = (this.position + 1) % this.samples.length;
    }
    return block;
  }

  async stop(): Promise<void> {
    this.running = false;
  }
}
