/**
 * Configuration Loader for tiny-scan
 * Loads and validates .tiny-scan.yaml configuration files.
 */

import { existsSync, readFileSync } from 'node:fs';
import { join } from 'node:path';
import * as yaml from 'yaml';
import { createError } from './error-classes.js';
import {
  DEFAULT_MAX_LINE_LENGTH,
  DEFAULT_MAX_TOKEN_LENGTH,
} from './lexer/index.js';

// ============================================================
// CONSTANTS
// ============================================================

/** Configuration file name */
export const CONFIG_FILE_NAME = '.tiny-scan.yaml';

// ============================================================
// TYPES
// ============================================================

export interface ScanConfig {
  /** Echo every source line to the listing */
  readonly echoSource: boolean;
  /** Print every token to the listing */
  readonly traceScan: boolean;
  readonly maxTokenLength: number;
  readonly maxLineLength: number;
  /** Appended to file names given without an extension */
  readonly defaultExtension: string;
}

type ConfigKey = keyof ScanConfig;

const CONFIG_KEYS: readonly ConfigKey[] = [
  'echoSource',
  'traceScan',
  'maxTokenLength',
  'maxLineLength',
  'defaultExtension',
];

// ============================================================
// DEFAULT CONFIGURATION
// ============================================================

export function createDefaultConfig(): ScanConfig {
  return {
    echoSource: true,
    traceScan: true,
    maxTokenLength: DEFAULT_MAX_TOKEN_LENGTH,
    maxLineLength: DEFAULT_MAX_LINE_LENGTH,
    defaultExtension: '.tny',
  };
}

// ============================================================
// VALIDATION
// ============================================================

function invalid(reason: string): never {
  throw createError('TINY-C001', { reason });
}

function isConfigKey(key: string): key is ConfigKey {
  return CONFIG_KEYS.some((known) => known === key);
}

function isPositiveInteger(value: unknown): value is number {
  return typeof value === 'number' && Number.isInteger(value) && value > 0;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Validate parsed configuration content and return the overrides it sets.
 * Throws ConfigError if the structure or any value is invalid.
 */
function validateConfig(data: unknown): Partial<ScanConfig> {
  // An empty file parses to null
  if (data === null || data === undefined) {
    return {};
  }
  if (!isRecord(data)) {
    invalid('must be a mapping');
  }

  const overrides: {
    -readonly [K in ConfigKey]?: ScanConfig[K];
  } = {};

  for (const [key, value] of Object.entries(data)) {
    if (!isConfigKey(key)) {
      invalid(`unknown key ${key}`);
    }

    switch (key) {
      case 'echoSource':
      case 'traceScan':
        if (typeof value !== 'boolean') {
          invalid(`${key} must be true or false`);
        }
        overrides[key] = value;
        break;
      case 'maxTokenLength':
      case 'maxLineLength':
        if (!isPositiveInteger(value)) {
          invalid(`${key} must be a positive integer`);
        }
        overrides[key] = value;
        break;
      case 'defaultExtension':
        if (typeof value !== 'string' || !/^\.[^./\\]+$/.test(value)) {
          invalid('defaultExtension must look like ".tny"');
        }
        overrides[key] = value;
        break;
    }
  }

  return overrides;
}

// ============================================================
// CONFIGURATION LOADING
// ============================================================

/**
 * Load configuration from .tiny-scan.yaml in the specified directory.
 *
 * @param cwd - Directory to search for the configuration file
 * @returns Full configuration (defaults merged with the file), or null if
 *   the file does not exist
 * @throws ConfigError "Invalid configuration: {reason}" for unreadable
 *   files, malformed YAML, unknown keys or invalid values
 */
export function loadConfig(cwd: string): ScanConfig | null {
  const configPath = join(cwd, CONFIG_FILE_NAME);

  if (!existsSync(configPath)) {
    return null;
  }

  let fileContent: string;
  try {
    fileContent = readFileSync(configPath, 'utf-8');
  } catch (err) {
    invalid(
      `failed to read file (${err instanceof Error ? err.message : String(err)})`
    );
  }

  let parsedData: unknown;
  try {
    parsedData = yaml.parse(fileContent);
  } catch (err) {
    invalid(
      `invalid YAML (${err instanceof Error ? err.message : String(err)})`
    );
  }

  return { ...createDefaultConfig(), ...validateConfig(parsedData) };
}

/** Configuration for a directory: the file if present, defaults otherwise */
export function resolveConfig(cwd: string): ScanConfig {
  return loadConfig(cwd) ?? createDefaultConfig();
}
