import type { AudioSnapshot } from '../audio/snapshot.js';
import { clamp01, wrapHue, type Rgb } from '../color/colorSpaces.js';
import type { LightLayout } from '../layout/layout.js';
import { PATTERNS } from './registry.js';
import {
  DEFAULT_PATTERN_OPTIONS,
  type LightFrame,
  type PatternInstance,
  type PatternName,
  type PatternOptions,
} from './types.js';

export type RotationOptions = {
  readonly enabled: boolean;
  /** Degrees per second. */
  readonly speed: number;
  /** Scale the speed by `1 + low` while audio is playing. */
  readonly audioBoost: boolean;
};

export const DEFAULT_ROTATION: RotationOptions = Object.freeze({
  enabled: false,
  speed: 30,
  audioBoost: true,
});

export type EngineFrame = {
  readonly color: Rgb;
  readonly intensity: number;
  /** Yaw in degrees, present only when rotation is enabled. */
  readonly rotation?: number;
};

export type PatternEngineOptions = {
  patterns?: Partial<PatternOptions>;
  rotation?: Partial<RotationOptions>;
};

/**
 * Holds the active pattern instance and turns (pattern time, audio) into
 * frames. Rotation is applied here so pattern steps stay pure in time.
 */
export class PatternEngine {
  readonly patternOptions: PatternOptions;
  readonly rotation: RotationOptions;
  private active: PatternInstance;
  private yaw = 0;
  private lastElapsed = 0;

  constructor(
    private readonly layout: LightLayout,
    initial: PatternName,
    options: PatternEngineOptions = {},
  ) {
    this.patternOptions = Object.freeze({ ...DEFAULT_PATTERN_OPTIONS, ...options.patterns });
    this.rotation = Object.freeze({ ...DEFAULT_ROTATION, ...options.rotation });
    this.active = PATTERNS[initial].instantiate(layout, this.patternOptions);
  }

  get activePattern(): PatternName {
    return this.active.name;
  }

  /** Replaces the active instance; the previous pattern's state is dropped. */
  switchTo(name: PatternName): void {
    this.active = PATTERNS[name].instantiate(this.layout, this.patternOptions);
    this.lastElapsed = 0;
  }

  getYaw(): number {
    return this.yaw;
  }

  evaluate(elapsed: number, audio: AudioSnapshot): EngineFrame[] {
    const frames = this.active.step({
      layout: this.layout,
      elapsed,
      audio,
      options: this.patternOptions,
    });
    if (!this.rotation.enabled) return frames;

    const dt = Math.max(0, elapsed - this.lastElapsed);
    this.lastElapsed = elapsed;
    const boost = this.rotation.audioBoost ? 1 + clamp01(audio.low) : 1;
    this.yaw = wrapHue(this.yaw + this.rotation.speed * boost * dt);
    const rotation = this.yaw;
    return frames.map((frame: LightFrame) => ({ ...frame, rotation }));
  }
}
