export type AudioSourceKind = 'buffer' | 'synthetic' | 'file' | 'pulse' | 'alsa';

/**
 * Producer of mono PCM blocks in [-1, 1] at a declared sample rate. `read`
 * resolves with the next block at the source's own cadence and rejects with
 * an AudioSourceError when the source fails.
 */
export interface AudioSource {
  readonly kind: AudioSourceKind;
  readonly sampleRate: number;
  readonly description: string;
  start(): Promise<void>;
  read(): Promise<Float32Array>;
  stop(): Promise<void>;
}
