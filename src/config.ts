/**
 * Configuration Loader for scenelex
 * Loads and validates .scenelex.yaml configuration files.
 */

import { existsSync, readFileSync } from 'node:fs';
import { join } from 'node:path';
import * as yaml from 'yaml';
import { isOutputFormat, type OutputFormat } from './cli-error-formatter.js';

// ============================================================
// CONSTANTS
// ============================================================

/** Configuration file name */
export const CONFIG_FILE_NAME = '.scenelex.yaml';

const MAX_CONTEXT_LINES = 10;

export interface LexConfig {
  /** Output format for tokens and errors */
  readonly format: OutputFormat;
  /** Print COMMENT tokens */
  readonly includeComments: boolean;
  /** Source lines shown before and after an error */
  readonly contextLines: number;
}

const KNOWN_KEYS = new Set(['format', 'includeComments', 'contextLines']);

// ============================================================
// DEFAULT CONFIGURATION
// ============================================================

export function createDefaultConfig(): LexConfig {
  return { format: 'human', includeComments: true, contextLines: 2 };
}

// ============================================================
// VALIDATION
// ============================================================

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Validate configuration values and merge them over the defaults.
 * Throws Error if configuration is invalid.
 */
function validateConfig(data: unknown): LexConfig {
  const defaults = createDefaultConfig();

  // An empty document parses to null
  if (data === null || data === undefined) {
    return defaults;
  }

  if (!isPlainObject(data)) {
    throw new Error('Invalid configuration: must be a mapping');
  }

  for (const key of Object.keys(data)) {
    if (!KNOWN_KEYS.has(key)) {
      throw new Error(`Invalid configuration: unknown key ${key}`);
    }
  }

  const format = data['format'] ?? defaults.format;
  if (!isOutputFormat(format)) {
    throw new Error(
      `Invalid configuration: format "${String(format)}" (must be 'human', 'json', or 'compact')`
    );
  }

  const includeComments = data['includeComments'] ?? defaults.includeComments;
  if (typeof includeComments !== 'boolean') {
    throw new Error('Invalid configuration: includeComments must be a boolean');
  }

  const contextLines = data['contextLines'] ?? defaults.contextLines;
  if (
    typeof contextLines !== 'number' ||
    !Number.isInteger(contextLines) ||
    contextLines < 0 ||
    contextLines > MAX_CONTEXT_LINES
  ) {
    throw new Error(
      `Invalid configuration: contextLines must be an integer between 0 and ${MAX_CONTEXT_LINES}`
    );
  }

  return { format, includeComments, contextLines };
}

// ============================================================
// CONFIGURATION LOADING
// ============================================================

/**
 * Parse configuration text.
 *
 * @throws Error with "Invalid configuration: {reason}" for malformed YAML or
 *   invalid values
 */
export function parseConfig(text: string): LexConfig {
  let data: unknown;
  try {
    data = yaml.parse(text);
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new Error(`Invalid configuration: ${reason}`);
  }
  return validateConfig(data);
}

/**
 * Load configuration from .scenelex.yaml in the specified directory.
 *
 * @returns LexConfig object, or null if file not found
 */
export function loadConfig(cwd: string): LexConfig | null {
  const configPath = join(cwd, CONFIG_FILE_NAME);

  if (!existsSync(configPath)) {
    return null;
  }

  return parseConfig(readFileSync(configPath, 'utf-8'));
}
