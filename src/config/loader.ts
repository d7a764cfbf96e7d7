import { readFile } from 'node:fs/promises';
import { resolve } from 'node:path';
import process from 'node:process';

import { ConfigurationError, describeError, type ConfigIssue } from '../errors.js';
import { DEFAULT_CONFIG_FILE, type ZonelightConfig } from './defaults.js';
import { validateConfig } from './schema.js';

export type ConfigOverrides = Record<string, unknown>;

export type ConfigLoadResult =
  | {
      readonly kind: 'success';
      readonly config: ZonelightConfig;
      readonly issues: readonly ConfigIssue[];
      /** Null when built-in defaults were used. */
      readonly sourceName: string | null;
    }
  | {
      readonly kind: 'error';
      readonly message: string;
      readonly issues: readonly ConfigIssue[] | undefined;
      readonly sourceName: string | null;
    };

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

/** Overlays `overrides` onto `base`, merging nested objects key by key. */
export const mergeConfigValues = (
  base: Record<string, unknown>,
  overrides: ConfigOverrides,
): Record<string, unknown> => {
  const merged: Record<string, unknown> = { ...base };
  for (const [key, value] of Object.entries(overrides)) {
    if (value === undefined) continue;
    const current = merged[key];
    merged[key] = isRecord(current) && isRecord(value) ? mergeConfigValues(current, value) : value;
  }
  return merged;
};

const validate = (
  parsed: unknown,
  overrides: ConfigOverrides,
  sourceName: string | null,
): ConfigLoadResult => {
  const document = isRecord(parsed) ? mergeConfigValues(parsed, overrides) : parsed;
  try {
    const { config, issues } = validateConfig(document);
    return { kind: 'success', config, issues, sourceName };
  } catch (error) {
    if (error instanceof ConfigurationError) {
      return { kind: 'error', message: error.message, issues: error.issues, sourceName };
    }
    throw error;
  }
};

export const loadConfigFromJson = (
  json: string,
  sourceName: string | null = null,
  overrides: ConfigOverrides = {},
): ConfigLoadResult => {
  let parsed: unknown;
  try {
    parsed = JSON.parse(json);
  } catch (error) {
    return {
      kind: 'error',
      message: `Invalid JSON${sourceName ? ` in ${sourceName}` : ''}: ${describeError(error)}`,
      issues: undefined,
      sourceName,
    };
  }
  return validate(parsed, overrides, sourceName);
};

const isMissingFile = (error: unknown): boolean =>
  error instanceof Error && 'code' in error && error.code === 'ENOENT';

export type LoadConfigOptions = {
  /** Explicit file; a missing explicit file is an error. */
  path?: string;
  cwd?: string;
  overrides?: ConfigOverrides;
};

/**
 * Loads the configuration file. Without an explicit path the default file in
 * the working directory is used when present, and built-in defaults otherwise.
 */
export const loadConfig = async (options: LoadConfigOptions = {}): Promise<ConfigLoadResult> => {
  const cwd = options.cwd ?? process.cwd();
  const overrides = options.overrides ?? {};
  const file = resolve(cwd, options.path ?? DEFAULT_CONFIG_FILE);
  let json: string;
  try {
    json = await readFile(file, 'utf8');
  } catch (error) {
    if (options.path === undefined && isMissingFile(error)) {
      return validate({}, overrides, null);
    }
    return {
      kind: 'error',
      message: `Could not read ${file}: ${describeError(error)}`,
      issues: undefined,
      sourceName: file,
    };
  }
  return loadConfigFromJson(json, file, overrides);
};
