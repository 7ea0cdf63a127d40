/**
 * Configuration Loader
 * Loads and validates .quire.yaml lexer configuration files.
 */

import { existsSync, readFileSync } from 'node:fs';
import { join } from 'node:path';
import { parse as parseYaml } from 'yaml';
import type { CommandFallthrough } from './lexer/types.js';
import type { TokenizeOptions } from './lexer/tokenizer.js';

// ============================================================
// CONSTANTS
// ============================================================

/** Configuration file name */
export const CONFIG_FILE_NAME = '.quire.yaml';

export interface LexerConfig {
  readonly includeComments: boolean;
  readonly includeLineBreaks: boolean;
  readonly commandFallthrough: CommandFallthrough;
}

const KNOWN_KEYS = new Set([
  'includeComments',
  'includeLineBreaks',
  'commandFallthrough',
]);

// ============================================================
// DEFAULT CONFIGURATION
// ============================================================

export function createDefaultConfig(): LexerConfig {
  return {
    includeComments: true,
    includeLineBreaks: true,
    commandFallthrough: 'comment',
  };
}

// ============================================================
// VALIDATION
// ============================================================

function isCommandFallthrough(value: unknown): value is CommandFallthrough {
  return value === 'comment' || value === 'text';
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function readBoolean(
  data: Record<string, unknown>,
  key: 'includeComments' | 'includeLineBreaks',
  fallback: boolean
): boolean {
  const value = data[key];
  if (value === undefined) return fallback;
  if (typeof value !== 'boolean') {
    throw new Error(
      `Invalid configuration: ${key} must be a boolean, got ${JSON.stringify(value)}`
    );
  }
  return value;
}

/**
 * Validate parsed YAML and merge it over the defaults.
 * An empty document yields the defaults.
 */
function validateConfig(data: unknown): LexerConfig {
  const defaults = createDefaultConfig();
  if (data === null || data === undefined) {
    return defaults;
  }

  if (!isRecord(data)) {
    throw new Error('Invalid configuration: must be a mapping');
  }

  for (const key of Object.keys(data)) {
    if (!KNOWN_KEYS.has(key)) {
      throw new Error(`Invalid configuration: unknown option ${key}`);
    }
  }

  const fallthrough = data['commandFallthrough'] ?? defaults.commandFallthrough;
  if (!isCommandFallthrough(fallthrough)) {
    throw new Error(
      `Invalid configuration: commandFallthrough has invalid value ${JSON.stringify(fallthrough)} (must be 'comment' or 'text')`
    );
  }

  return {
    includeComments: readBoolean(data, 'includeComments', defaults.includeComments),
    includeLineBreaks: readBoolean(
      data,
      'includeLineBreaks',
      defaults.includeLineBreaks
    ),
    commandFallthrough: fallthrough,
  };
}

// ============================================================
// CONFIGURATION LOADING
// ============================================================

/**
 * Parse configuration text.
 *
 * @throws Error with "Invalid configuration: {reason}" for bad YAML or values
 */
export function parseConfig(text: string): LexerConfig {
  let parsed: unknown;
  try {
    parsed = parseYaml(text);
  } catch (err) {
    throw new Error(
      `Invalid configuration: invalid YAML (${err instanceof Error ? err.message : String(err)})`
    );
  }
  return validateConfig(parsed);
}

/**
 * Load configuration from .quire.yaml in the specified directory.
 *
 * @returns LexerConfig, or null if the file does not exist
 * @throws Error with "Invalid configuration: {reason}" for bad content
 */
export function loadConfig(cwd: string): LexerConfig | null {
  const configPath = join(cwd, CONFIG_FILE_NAME);

  if (!existsSync(configPath)) {
    return null;
  }

  let fileContent: string;
  try {
    fileContent = readFileSync(configPath, 'utf-8');
  } catch (err) {
    throw new Error(
      `Invalid configuration: failed to read file (${err instanceof Error ? err.message : String(err)})`
    );
  }

  return parseConfig(fileContent);
}

/** Tokenize options equivalent to a configuration */
export function toTokenizeOptions(config: LexerConfig): TokenizeOptions {
  return {
    includeComments: config.includeComments,
    includeLineBreaks: config.includeLineBreaks,
    commandFallthrough: config.commandFallthrough,
  };
}
