/**
 * Configuration Loader
 * Loads and validates .cinder.yaml configuration files.
 */

import { existsSync, readFileSync } from 'node:fs';
import { join } from 'node:path';
import * as yaml from 'yaml';
import { DEFAULT_LOG_CAPACITY } from './console/console.js';
import { CINDER_ERROR_CODES, ConfigError } from './types.js';

// ============================================================
// CONSTANTS
// ============================================================

/** Configuration file name */
export const CONFIG_FILE_NAME = '.cinder.yaml';

// ============================================================
// TYPES
// ============================================================

export interface CinderConfig {
  /** Application steps per line (undefined = unbounded) */
  stepLimit: number | undefined;
  /** Heap slot limit (undefined = unbounded) */
  maxHeapSlots: number | undefined;
  /** Install the builtin natives */
  builtins: boolean;
  /** Console log lines kept */
  logCapacity: number;
  /** Log the printed result of successful lines */
  echoResults: boolean;
}

type ConfigKey = keyof CinderConfig;

const CONFIG_KEYS: readonly ConfigKey[] = [
  'stepLimit',
  'maxHeapSlots',
  'builtins',
  'logCapacity',
  'echoResults',
];

function isConfigKey(key: string): key is ConfigKey {
  return CONFIG_KEYS.some((known) => known === key);
}

// ============================================================
// DEFAULT CONFIGURATION
// ============================================================

export function createDefaultConfig(): CinderConfig {
  return {
    stepLimit: undefined,
    maxHeapSlots: undefined,
    builtins: true,
    logCapacity: DEFAULT_LOG_CAPACITY,
    echoResults: true,
  };
}

// ============================================================
// VALIDATION
// ============================================================

function invalid(path: string, reason: string): ConfigError {
  return new ConfigError(
    CINDER_ERROR_CODES.CONFIG_INVALID,
    `Invalid configuration: ${reason}`,
    path
  );
}

function positiveInteger(value: unknown, key: string, path: string): number {
  if (typeof value !== 'number' || !Number.isInteger(value) || value < 1) {
    throw invalid(path, `${key} must be a positive integer`);
  }
  return value;
}

function boolean(value: unknown, key: string, path: string): boolean {
  if (typeof value !== 'boolean') {
    throw invalid(path, `${key} must be true or false`);
  }
  return value;
}

/**
 * Validate parsed YAML and merge it over the defaults.
 *
 * @param data - Parsed document (null for an empty file)
 * @param path - Reported in errors
 * @throws {ConfigError} CONFIG_INVALID for unknown keys or bad values
 */
export function parseConfig(data: unknown, path: string): CinderConfig {
  const config = createDefaultConfig();
  if (data === null || data === undefined) return config;

  if (typeof data !== 'object' || Array.isArray(data)) {
    throw invalid(path, 'must be a mapping');
  }

  const entries: [string, unknown][] = Object.entries(data);
  for (const [key, value] of entries) {
    if (!isConfigKey(key)) {
      throw invalid(path, `unknown key ${key}`);
    }
    switch (key) {
      case 'stepLimit':
      case 'maxHeapSlots':
        // null clears a limit
        config[key] = value === null ? undefined : positiveInteger(value, key, path);
        break;
      case 'logCapacity':
        config[key] = positiveInteger(value, key, path);
        break;
      case 'builtins':
      case 'echoResults':
        config[key] = boolean(value, key, path);
        break;
    }
  }
  return config;
}

// ============================================================
// CONFIGURATION LOADING
// ============================================================

/**
 * Load configuration from .cinder.yaml in the specified directory.
 *
 * @param cwd - Directory to search for the configuration file
 * @returns Configuration merged over defaults; defaults when no file exists
 * @throws {ConfigError} CONFIG_UNREADABLE or CONFIG_INVALID
 */
export function loadConfig(cwd: string): CinderConfig {
  const configPath = join(cwd, CONFIG_FILE_NAME);

  // Missing file is not an error
  if (!existsSync(configPath)) {
    return createDefaultConfig();
  }

  let fileContent: string;
  try {
    fileContent = readFileSync(configPath, 'utf-8');
  } catch (err) {
    throw new ConfigError(
      CINDER_ERROR_CODES.CONFIG_UNREADABLE,
      `Invalid configuration: failed to read file (${err instanceof Error ? err.message : String(err)})`,
      configPath
    );
  }

  let parsedData: unknown;
  try {
    parsedData = yaml.parse(fileContent);
  } catch (err) {
    throw invalid(
      configPath,
      `invalid YAML (${err instanceof Error ? err.message : String(err)})`
    );
  }

  return parseConfig(parsedData, configPath);
}
