import type { AnalyzerOptions } from '../audio/analyzer.js';
import type { BandEdges } from '../audio/bands.js';
import { isPowerOfTwo } from '../audio/fft.js';
import { ConfigurationError, PatternError, type ConfigIssue } from '../errors.js';
import type { LayoutConfig } from '../layout/layout.js';
import { ZONES, type Vec3, type Zone } from '../layout/zones.js';
import type { RotationOptions } from '../patterns/engine.js';
import { parsePatternName } from '../patterns/registry.js';
import {
  AUDIO_SOURCE_MODES,
  DEFAULT_CONFIG,
  type AudioConfig,
  type AudioSourceMode,
  type ControlConfig,
  type TransportConfig,
  type ZonelightConfig,
} from './defaults.js';

type Path = readonly (string | number)[];

export type ConfigValidationResult = {
  readonly config: ZonelightConfig;
  readonly issues: readonly ConfigIssue[];
};

type NumberRule = {
  min?: number;
  max?: number;
  /** Exclusive lower bound. */
  above?: number;
  integer?: boolean;
};

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

export const formatPath = (path: Path): string => (path.length === 0 ? '<root>' : path.join('.'));

const pushIssue = (
  issues: ConfigIssue[],
  code: string,
  message: string,
  path: Path,
  severity: ConfigIssue['severity'] = 'error',
) => {
  issues.push({ code, message, path, severity });
};

const checkUnknownKeys = (
  record: Record<string, unknown>,
  allowed: readonly string[],
  path: Path,
  issues: ConfigIssue[],
) => {
  for (const key of Object.keys(record)) {
    if (!allowed.includes(key)) {
      pushIssue(issues, 'config/unknown-key', `Unknown option "${formatPath([...path, key])}" is ignored`, [...path, key], 'warning');
    }
  }
};

const describeRule = ({ min, max, above, integer }: NumberRule): string => {
  const parts: string[] = [];
  if (integer) parts.push('an integer');
  if (above !== undefined) parts.push(`> ${above}`);
  if (min !== undefined) parts.push(`>= ${min}`);
  if (max !== undefined) parts.push(`<= ${max}`);
  return parts.join(', ');
};

const readNumber = (
  record: Record<string, unknown>,
  key: string,
  fallback: number,
  path: Path,
  issues: ConfigIssue[],
  rule: NumberRule = {},
): number => {
  const value = record[key];
  const at = [...path, key];
  if (value === undefined) return fallback;
  if (typeof value !== 'number' || !Number.isFinite(value)) {
    pushIssue(issues, 'config/type', `${formatPath(at)} must be a finite number`, at);
    return fallback;
  }
  const outside =
    (rule.integer === true && !Number.isInteger(value)) ||
    (rule.min !== undefined && value < rule.min) ||
    (rule.max !== undefined && value > rule.max) ||
    (rule.above !== undefined && !(value > rule.above));
  if (outside) {
    pushIssue(issues, 'config/range', `${formatPath(at)} must be ${describeRule(rule)} (got ${value})`, at);
    return fallback;
  }
  return value;
};

const readBoolean = (
  record: Record<string, unknown>,
  key: string,
  fallback: boolean,
  path: Path,
  issues: ConfigIssue[],
): boolean => {
  const value = record[key];
  if (value === undefined) return fallback;
  if (typeof value !== 'boolean') {
    pushIssue(issues, 'config/type', `${formatPath([...path, key])} must be true or false`, [...path, key]);
    return fallback;
  }
  return value;
};

const readString = (
  record: Record<string, unknown>,
  key: string,
  path: Path,
  issues: ConfigIssue[],
): string | undefined => {
  const value = record[key];
  if (value === undefined) return undefined;
  if (typeof value !== 'string' || value.trim() === '') {
    pushIssue(issues, 'config/type', `${formatPath([...path, key])} must be a non-empty string`, [...path, key]);
    return undefined;
  }
  return value;
};

const readSection = (
  record: Record<string, unknown>,
  key: string,
  path: Path,
  issues: ConfigIssue[],
): Record<string, unknown> => {
  const value = record[key];
  if (value === undefined) return {};
  if (!isRecord(value)) {
    pushIssue(issues, 'config/type', `${formatPath([...path, key])} must be an object`, [...path, key]);
    return {};
  }
  return value;
};

const LAYOUT_KEYS: readonly string[] = [...ZONES, 'center', 'spacing', 'radius', 'height', 'ceilingHeight', 'floorDepth'];

const validateLayout = (record: Record<string, unknown>, issues: ConfigIssue[]): LayoutConfig => {
  const path = ['layout'];
  const defaults = DEFAULT_CONFIG.layout;
  checkUnknownKeys(record, LAYOUT_KEYS, path, issues);

  const counts: Record<Zone, number> = { ...defaults.counts };
  for (const zone of ZONES) {
    const value = record[zone];
    if (value === undefined) continue;
    if (typeof value !== 'number' || !Number.isInteger(value) || value < 0) {
      pushIssue(
        issues,
        'config/layout/count',
        `layout.${zone} must be a non-negative integer (got ${JSON.stringify(value)})`,
        [...path, zone],
      );
      continue;
    }
    counts[zone] = value;
  }
  if (ZONES.every((zone) => counts[zone] === 0)) {
    pushIssue(issues, 'config/layout/empty', 'Layout has no lights; nothing will be shown', path, 'warning');
  }

  const centerRecord = readSection(record, 'center', path, issues);
  checkUnknownKeys(centerRecord, ['x', 'y', 'z'], [...path, 'center'], issues);
  const center: Vec3 = {
    x: readNumber(centerRecord, 'x', defaults.center.x, [...path, 'center'], issues),
    y: readNumber(centerRecord, 'y', defaults.center.y, [...path, 'center'], issues),
    z: readNumber(centerRecord, 'z', defaults.center.z, [...path, 'center'], issues),
  };

  return {
    counts,
    center,
    spacing: readNumber(record, 'spacing', defaults.spacing, path, issues, { min: 0 }),
    radius: readNumber(record, 'radius', defaults.radius, path, issues, { min: 0 }),
    height: readNumber(record, 'height', defaults.height, path, issues),
    ceilingHeight: readNumber(record, 'ceilingHeight', defaults.ceilingHeight, path, issues, { min: 0 }),
    floorDepth: readNumber(record, 'floorDepth', defaults.floorDepth, path, issues, { min: 0 }),
  };
};

const validateRotation = (record: Record<string, unknown>, issues: ConfigIssue[]): RotationOptions => {
  const path = ['rotation'];
  const defaults = DEFAULT_CONFIG.rotation;
  checkUnknownKeys(record, ['enabled', 'speed', 'audioBoost'], path, issues);
  return {
    enabled: readBoolean(record, 'enabled', defaults.enabled, path, issues),
    speed: readNumber(record, 'speed', defaults.speed, path, issues, { min: -3600, max: 3600 }),
    audioBoost: readBoolean(record, 'audioBoost', defaults.audioBoost, path, issues),
  };
};

const BAND_KEYS = ['lowHz', 'lowMidHz', 'midHighHz', 'highHz'] as const;

const validateBands = (
  record: Record<string, unknown>,
  sampleRate: number,
  issues: ConfigIssue[],
): BandEdges => {
  const path = ['audio', 'bands'];
  const defaults = DEFAULT_CONFIG.audio.bands;
  checkUnknownKeys(record, BAND_KEYS, path, issues);
  const bands: BandEdges = {
    lowHz: readNumber(record, 'lowHz', defaults.lowHz, path, issues, { min: 0 }),
    lowMidHz: readNumber(record, 'lowMidHz', defaults.lowMidHz, path, issues, { above: 0 }),
    midHighHz: readNumber(record, 'midHighHz', defaults.midHighHz, path, issues, { above: 0 }),
    highHz: readNumber(record, 'highHz', defaults.highHz, path, issues, { above: 0 }),
  };
  if (!(bands.lowHz < bands.lowMidHz && bands.lowMidHz < bands.midHighHz && bands.midHighHz < bands.highHz)) {
    pushIssue(
      issues,
      'config/audio/bands',
      `Band edges must ascend: lowHz < lowMidHz < midHighHz < highHz (got ${BAND_KEYS.map((key) => bands[key]).join(', ')})`,
      path,
    );
  }
  if (bands.highHz > sampleRate / 2) {
    pushIssue(
      issues,
      'config/audio/nyquist',
      `audio.bands.highHz (${bands.highHz}) is above the Nyquist frequency (${sampleRate / 2}); the high band is capped there`,
      [...path, 'highHz'],
      'warning',
    );
  }
  return bands;
};

const AUDIO_KEYS: readonly string[] = [
  'source',
  'path',
  'device',
  'ffmpeg',
  'sampleRate',
  'windowSize',
  'hopSize',
  'bands',
  'normalizerDecaySeconds',
  'noiseFloor',
  'attackSeconds',
  'releaseSeconds',
  'beatThreshold',
  'beatMinEnergy',
  'beatRefractoryMs',
  'beatHistorySeconds',
  'dropoutTimeoutMs',
  'restartDelayMs',
  'syntheticBpm',
];

const isAudioSourceMode = (value: unknown): value is AudioSourceMode =>
  AUDIO_SOURCE_MODES.some((mode) => mode === value);

const validateAudio = (record: Record<string, unknown>, issues: ConfigIssue[]): AudioConfig => {
  const path = ['audio'];
  const defaults = DEFAULT_CONFIG.audio;
  checkUnknownKeys(record, AUDIO_KEYS, path, issues);

  let source = defaults.source;
  if (record.source !== undefined) {
    if (isAudioSourceMode(record.source)) {
      source = record.source;
    } else {
      pushIssue(
        issues,
        'config/audio/source',
        `audio.source must be one of ${AUDIO_SOURCE_MODES.join(', ')} (got ${JSON.stringify(record.source)})`,
        [...path, 'source'],
      );
    }
  }
  const filePath = readString(record, 'path', path, issues);
  if (source === 'file' && filePath === undefined) {
    pushIssue(issues, 'config/audio/path', 'audio.path is required when audio.source is "file"', [...path, 'path']);
  }

  const sampleRate = readNumber(record, 'sampleRate', defaults.sampleRate, path, issues, {
    integer: true,
    min: 8000,
    max: 192000,
  });
  let windowSize = readNumber(record, 'windowSize', defaults.windowSize, path, issues, {
    integer: true,
    min: 64,
    max: 65536,
  });
  if (!isPowerOfTwo(windowSize)) {
    pushIssue(issues, 'config/audio/window', `audio.windowSize must be a power of two (got ${windowSize})`, [
      ...path,
      'windowSize',
    ]);
    windowSize = defaults.windowSize;
  }
  const hopSize = readNumber(record, 'hopSize', defaults.hopSize, path, issues, { integer: true, min: 1 });
  if (hopSize > windowSize) {
    pushIssue(issues, 'config/audio/hop', `audio.hopSize (${hopSize}) must not exceed audio.windowSize (${windowSize})`, [
      ...path,
      'hopSize',
    ]);
  }

  const analyzer: AnalyzerOptions = {
    sampleRate,
    windowSize,
    hopSize,
    bands: validateBands(readSection(record, 'bands', path, issues), sampleRate, issues),
    normalizerDecaySeconds: readNumber(record, 'normalizerDecaySeconds', defaults.normalizerDecaySeconds, path, issues, { above: 0 }),
    noiseFloor: readNumber(record, 'noiseFloor', defaults.noiseFloor, path, issues, { above: 0 }),
    attackSeconds: readNumber(record, 'attackSeconds', defaults.attackSeconds, path, issues, { min: 0 }),
    releaseSeconds: readNumber(record, 'releaseSeconds', defaults.releaseSeconds, path, issues, { min: 0 }),
    beatThreshold: readNumber(record, 'beatThreshold', defaults.beatThreshold, path, issues, { above: 0 }),
    beatMinEnergy: readNumber(record, 'beatMinEnergy', defaults.beatMinEnergy, path, issues, { min: 0, max: 1 }),
    beatRefractoryMs: readNumber(record, 'beatRefractoryMs', defaults.beatRefractoryMs, path, issues, { min: 0 }),
    beatHistorySeconds: readNumber(record, 'beatHistorySeconds', defaults.beatHistorySeconds, path, issues, { above: 0 }),
  };

  return {
    ...analyzer,
    source,
    path: filePath,
    device: readString(record, 'device', path, issues),
    ffmpeg: readString(record, 'ffmpeg', path, issues) ?? defaults.ffmpeg,
    dropoutTimeoutMs: readNumber(record, 'dropoutTimeoutMs', defaults.dropoutTimeoutMs, path, issues, { min: 1 }),
    restartDelayMs: readNumber(record, 'restartDelayMs', defaults.restartDelayMs, path, issues, { min: 0 }),
    syntheticBpm: readNumber(record, 'syntheticBpm', defaults.syntheticBpm, path, issues, { min: 20, max: 400 }),
  };
};

const TRANSPORT_KEYS: readonly string[] = [
  'url',
  'parentSlotId',
  'requestTimeoutMs',
  'connectTimeoutMs',
  'createRetries',
  'removeRetries',
  'teardownTimeoutMs',
  'intensityScale',
  'range',
];

const validateTransport = (record: Record<string, unknown>, issues: ConfigIssue[]): TransportConfig => {
  const path = ['transport'];
  const defaults = DEFAULT_CONFIG.transport;
  checkUnknownKeys(record, TRANSPORT_KEYS, path, issues);

  let url = defaults.url;
  const rawUrl = readString(record, 'url', path, issues);
  if (rawUrl !== undefined) {
    if (/^wss?:\/\//i.test(rawUrl)) {
      url = rawUrl;
    } else {
      pushIssue(issues, 'config/transport/url', `transport.url must start with ws:// or wss:// (got ${rawUrl})`, [
        ...path,
        'url',
      ]);
    }
  }

  return {
    url,
    parentSlotId: readString(record, 'parentSlotId', path, issues) ?? defaults.parentSlotId,
    requestTimeoutMs: readNumber(record, 'requestTimeoutMs', defaults.requestTimeoutMs, path, issues, { integer: true, min: 1 }),
    connectTimeoutMs: readNumber(record, 'connectTimeoutMs', defaults.connectTimeoutMs, path, issues, { integer: true, min: 1 }),
    createRetries: readNumber(record, 'createRetries', defaults.createRetries, path, issues, { integer: true, min: 0, max: 10 }),
    removeRetries: readNumber(record, 'removeRetries', defaults.removeRetries, path, issues, { integer: true, min: 0, max: 10 }),
    teardownTimeoutMs: readNumber(record, 'teardownTimeoutMs', defaults.teardownTimeoutMs, path, issues, { integer: true, min: 1 }),
    intensityScale: readNumber(record, 'intensityScale', defaults.intensityScale, path, issues, { above: 0 }),
    range: readNumber(record, 'range', defaults.range, path, issues, { above: 0 }),
  };
};

const validateControl = (record: Record<string, unknown>, issues: ConfigIssue[]): ControlConfig => {
  const path = ['control'];
  checkUnknownKeys(record, ['port', 'host'], path, issues);
  let port = DEFAULT_CONFIG.control.port;
  if (record.port !== undefined && record.port !== null) {
    port = readNumber(record, 'port', -1, path, issues, { integer: true, min: 0, max: 65535 });
    if (port < 0) port = null;
  }
  return {
    port,
    host: readString(record, 'host', path, issues) ?? DEFAULT_CONFIG.control.host,
  };
};

const TOP_LEVEL_KEYS: readonly string[] = [
  '$schema',
  'updateRate',
  'layout',
  'defaultPattern',
  'chaseTail',
  'chaseStepSeconds',
  'rotation',
  'audio',
  'transport',
  'control',
];

/**
 * Validates a parsed configuration document. Missing options take their
 * defaults; unknown keys are warnings. Throws ConfigurationError listing
 * every issue when at least one error is found.
 */
export const validateConfig = (raw: unknown): ConfigValidationResult => {
  const issues: ConfigIssue[] = [];
  if (!isRecord(raw)) {
    pushIssue(issues, 'config/type', 'Configuration must be a JSON object', []);
    throw new ConfigurationError('Configuration must be a JSON object', issues);
  }
  checkUnknownKeys(raw, TOP_LEVEL_KEYS, [], issues);

  let defaultPattern = DEFAULT_CONFIG.defaultPattern;
  if (raw.defaultPattern !== undefined) {
    if (typeof raw.defaultPattern === 'string' || typeof raw.defaultPattern === 'number') {
      try {
        defaultPattern = parsePatternName(raw.defaultPattern);
      } catch (error) {
        if (!(error instanceof PatternError)) throw error;
        pushIssue(issues, 'config/pattern', error.message, ['defaultPattern']);
      }
    } else {
      pushIssue(issues, 'config/type', 'defaultPattern must be a pattern name or index', ['defaultPattern']);
    }
  }

  const config: ZonelightConfig = {
    updateRate: readNumber(raw, 'updateRate', DEFAULT_CONFIG.updateRate, [], issues, { min: 1, max: 240 }),
    layout: validateLayout(readSection(raw, 'layout', [], issues), issues),
    defaultPattern,
    chaseTail: readNumber(raw, 'chaseTail', DEFAULT_CONFIG.chaseTail, [], issues, { integer: true, min: 1 }),
    chaseStepSeconds: readNumber(raw, 'chaseStepSeconds', DEFAULT_CONFIG.chaseStepSeconds, [], issues, { above: 0 }),
    rotation: validateRotation(readSection(raw, 'rotation', [], issues), issues),
    audio: validateAudio(readSection(raw, 'audio', [], issues), issues),
    transport: validateTransport(readSection(raw, 'transport', [], issues), issues),
    control: validateControl(readSection(raw, 'control', [], issues), issues),
  };

  const errors = issues.filter((issue) => issue.severity === 'error');
  if (errors.length > 0) {
    throw new ConfigurationError(
      `Configuration has ${errors.length} error${errors.length === 1 ? '' : 's'}`,
      issues,
    );
  }
  return { config, issues };
};

export const formatIssue = (issue: ConfigIssue): string =>
  `${issue.severity === 'error' ? 'error' : 'warn '} ${formatPath(issue.path)}: ${issue.message} [${issue.code}]`;
