/**
 * Configuration Loader for lexloom
 * Loads and validates lexloom.config.yaml configuration files.
 */

import { existsSync, readFileSync } from 'node:fs';
import { dirname, join, resolve } from 'node:path';
import { parse as parseYaml } from 'yaml';
import { ConfigError } from '@lexloom/core';

// ============================================================
// CONSTANTS
// ============================================================

/** Configuration file name looked up in the working directory */
export const CONFIG_FILE_NAME = 'lexloom.config.yaml';

// ============================================================
// TYPES
// ============================================================

export interface LexloomConfig {
  /** Output file; relative paths resolve against the configuration file */
  readonly output?: string | undefined;
  /** Print automaton statistics and timing to standard error */
  readonly debug?: boolean | undefined;
  /** Import specifier of the runtime in generated modules */
  readonly runtimeModule?: string | undefined;
  /** Overrides the specification's `emit_main` instruction */
  readonly emitMain?: boolean | undefined;
}

export interface LoadedConfig {
  readonly path: string;
  readonly config: LexloomConfig;
}

// ============================================================
// VALIDATION
// ============================================================

const CONFIG_KEYS: Readonly<Record<keyof LexloomConfig, 'string' | 'boolean'>> =
  {
    output: 'string',
    debug: 'boolean',
    runtimeModule: 'string',
    emitMain: 'boolean',
  };

function isConfigKey(key: string): key is keyof LexloomConfig {
  return Object.hasOwn(CONFIG_KEYS, key);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Validate configuration structure and values.
 *
 * @throws ConfigError LEX-C001 if configuration is invalid
 */
export function validateConfig(data: unknown): LexloomConfig {
  // An empty YAML document parses to null
  if (data === null || data === undefined) return {};
  if (!isRecord(data)) {
    throw new ConfigError('LEX-C001', { detail: 'must be a mapping' });
  }

  for (const [key, value] of Object.entries(data)) {
    if (!isConfigKey(key)) {
      throw new ConfigError('LEX-C001', { detail: `unknown key ${key}` });
    }
    const expected = CONFIG_KEYS[key];
    if (typeof value !== expected) {
      throw new ConfigError('LEX-C001', {
        detail: `${key} must be a ${expected}`,
      });
    }
  }

  const output = data['output'];
  const debug = data['debug'];
  const runtimeModule = data['runtimeModule'];
  const emitMain = data['emitMain'];
  if (output === '' || runtimeModule === '') {
    throw new ConfigError('LEX-C001', {
      detail: `${output === '' ? 'output' : 'runtimeModule'} must not be empty`,
    });
  }
  return {
    output: typeof output === 'string' ? output : undefined,
    debug: typeof debug === 'boolean' ? debug : undefined,
    runtimeModule:
      typeof runtimeModule === 'string' ? runtimeModule : undefined,
    emitMain: typeof emitMain === 'boolean' ? emitMain : undefined,
  };
}

// ============================================================
// CONFIGURATION LOADING
// ============================================================

/**
 * Load configuration from `configPath`, or from lexloom.config.yaml in
 * `cwd` when no path is given. A relative `output` is resolved against the
 * configuration file's directory.
 *
 * @returns The loaded configuration, or null when no path was given and
 *   the default file does not exist
 * @throws ConfigError LEX-C002 if an explicit path does not exist
 * @throws ConfigError LEX-C001 if the file is not valid YAML or fails
 *   validation
 */
export function loadConfig(
  cwd: string,
  configPath?: string
): LoadedConfig | null {
  const path =
    configPath !== undefined
      ? resolve(cwd, configPath)
      : join(cwd, CONFIG_FILE_NAME);

  if (!existsSync(path)) {
    if (configPath !== undefined) {
      throw new ConfigError('LEX-C002', { path: configPath });
    }
    return null;
  }

  let data: unknown;
  try {
    data = parseYaml(readFileSync(path, 'utf-8'));
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new ConfigError('LEX-C001', { detail: `${path}: ${reason}` });
  }

  const config = validateConfig(data);
  return {
    path,
    config:
      config.output !== undefined
        ? { ...config, output: resolve(dirname(path), config.output) }
        : config,
  };
}
