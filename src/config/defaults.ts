import { DEFAULT_ANALYZER_OPTIONS, type AnalyzerOptions } from '../audio/analyzer.js';
import { DEFAULT_LAYOUT_CONFIG, type LayoutConfig } from '../layout/layout.js';
import { DEFAULT_ROTATION, type RotationOptions } from '../patterns/engine.js';
import { DEFAULT_PATTERN_OPTIONS, type PatternName } from '../patterns/types.js';

export const DEFAULT_CONFIG_FILE = 'zonelight.config.json';

export const AUDIO_SOURCE_MODES = ['none', 'synthetic', 'file', 'pulse', 'alsa'] as const;

export type AudioSourceMode = (typeof AUDIO_SOURCE_MODES)[number];

export type AudioConfig = AnalyzerOptions & {
  source: AudioSourceMode;
  path?: string;
  device?: string;
  ffmpeg: string;
  dropoutTimeoutMs: number;
  restartDelayMs: number;
  syntheticBpm: number;
};

export type TransportConfig = {
  url: string;
  parentSlotId: string;
  requestTimeoutMs: number;
  connectTimeoutMs: number;
  createRetries: number;
  removeRetries: number;
  teardownTimeoutMs: number;
  intensityScale: number;
  range: number;
};

export type ControlConfig = {
  /** HTTP control port; null disables the endpoint. */
  port: number | null;
  host: string;
};

export type ZonelightConfig = {
  updateRate: number;
  layout: LayoutConfig;
  defaultPattern: PatternName;
  chaseTail: number;
  chaseStepSeconds: number;
  rotation: RotationOptions;
  audio: AudioConfig;
  transport: TransportConfig;
  control: ControlConfig;
};

export const DEFAULT_CONFIG: ZonelightConfig = {
  updateRate: 30,
  layout: DEFAULT_LAYOUT_CONFIG,
  defaultPattern: 'chase',
  chaseTail: DEFAULT_PATTERN_OPTIONS.chaseTail,
  chaseStepSeconds: DEFAULT_PATTERN_OPTIONS.chaseStepSeconds,
  rotation: DEFAULT_ROTATION,
  audio: {
    ...DEFAULT_ANALYZER_OPTIONS,
    source: 'none',
    ffmpeg: 'ffmpeg',
    dropoutTimeoutMs: 500,
    restartDelayMs: 1000,
    syntheticBpm: 120,
  },
  transport: {
    url: 'ws://localhost:27404/ResoniteLink',
    parentSlotId: 'Root',
    requestTimeoutMs: 5000,
    connectTimeoutMs: 5000,
    createRetries: 2,
    removeRetries: 2,
    teardownTimeoutMs: 3000,
    intensityScale: 2,
    range: 10,
  },
  control: {
    port: null,
    host: '127.0.0.1',
  },
};
