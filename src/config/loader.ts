/**
 * Configuration loader for the vocab-bridge server.
 *
 * Loads config from YAML file with support for:
 * - Environment variable substitution (${VAR_NAME})
 * - Default values
 * - Validation
 */

import { readFile } from 'node:fs/promises';
import { existsSync } from 'node:fs';
import { resolve } from 'node:path';
import { parse as parseYaml } from 'yaml';
import type { AppConfig, CacheConfig, ServerConfig, VocabConfig } from './types.js';
import { DEFAULT_CONFIG, LOG_LEVELS } from './types.js';

/**
 * Config loading options.
 */
export interface LoadConfigOptions {
  /** Path to config file (default: process.env.CONFIG_PATH or './config.yaml') */
  configPath?: string;
}

/**
 * Config as written in the file: every section and field optional.
 */
export interface PartialAppConfig {
  server?: Partial<ServerConfig>;
  vocab?: Partial<Omit<VocabConfig, 'cache'>> & { cache?: Partial<CacheConfig> };
}

/**
 * Config validation error.
 */
export class ConfigValidationError extends Error {
  constructor(
    message: string,
    public readonly path: string,
    public readonly value: unknown
  ) {
    super(`Config validation error at '${path}': ${message}`);
    this.name = 'ConfigValidationError';
  }
}

/**
 * Environment variable substitution pattern.
 * Matches ${VAR_NAME} and ${VAR_NAME:-default}
 */
const ENV_VAR_PATTERN = /\$\{([A-Z_][A-Z0-9_]*)(?::-([^}]*))?\}/gi;

/**
 * A value that is exactly one placeholder, e.g. `${PORT:-3001}`.
 */
const SINGLE_PLACEHOLDER = /^\$\{[A-Z_][A-Z0-9_]*(?::-[^}]*)?\}$/i;

/**
 * Substitute environment variables in a string.
 *
 * Supports:
 * - ${VAR_NAME} - Replace with env var value
 * - ${VAR_NAME:-default} - Replace with env var or default
 */
function substituteEnvVars(value: string): string {
  return value.replace(ENV_VAR_PATTERN, (_match, varName: string, defaultValue: string | undefined) => {
    const envValue = process.env[varName];
    if (envValue !== undefined) {
      return envValue;
    }
    if (defaultValue !== undefined) {
      return defaultValue;
    }
    console.warn(`Environment variable ${varName} is not set and has no default`);
    return '';
  });
}

/**
 * A whole-value placeholder yields a number or boolean when its text is one.
 */
function coerceScalar(text: string): string | number | boolean {
  if (text === 'true') return true;
  if (text === 'false') return false;
  if (/^-?\d+(\.\d+)?$/.test(text)) return Number(text);
  return text;
}

/**
 * Recursively substitute environment variables in an object.
 */
function substituteEnvVarsRecursive(obj: unknown): unknown {
  if (typeof obj === 'string') {
    const substituted = substituteEnvVars(obj);
    return SINGLE_PLACEHOLDER.test(obj) ? coerceScalar(substituted) : substituted;
  }
  if (Array.isArray(obj)) {
    return obj.map(substituteEnvVarsRecursive);
  }
  if (obj !== null && typeof obj === 'object') {
    const result: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(obj)) {
      result[key] = substituteEnvVarsRecursive(value);
    }
    return result;
  }
  return obj;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

function isPositiveInteger(value: unknown): value is number {
  return typeof value === 'number' && Number.isInteger(value) && value > 0;
}

/**
 * Validate server configuration.
 */
function validateServerConfig(config: unknown, path = 'server'): asserts config is Partial<ServerConfig> {
  if (!isRecord(config)) {
    throw new ConfigValidationError('must be an object', path, config);
  }

  const c = config;

  if (c.port !== undefined && (typeof c.port !== 'number' || c.port < 1 || c.port > 65535)) {
    throw new ConfigValidationError('port must be a number between 1 and 65535', `${path}.port`, c.port);
  }

  if (c.host !== undefined && typeof c.host !== 'string') {
    throw new ConfigValidationError('host must be a string', `${path}.host`, c.host);
  }

  if (c.logLevel !== undefined && !LOG_LEVELS.some((level) => level === c.logLevel)) {
    throw new ConfigValidationError(`logLevel must be one of: ${LOG_LEVELS.join(', ')}`, `${path}.logLevel`, c.logLevel);
  }

  if (c.cors !== undefined && typeof c.cors !== 'boolean') {
    throw new ConfigValidationError('cors must be a boolean', `${path}.cors`, c.cors);
  }
}

/**
 * Validate cache sizes.
 */
function validateCacheConfig(config: unknown, path: string): asserts config is Partial<CacheConfig> {
  if (!isRecord(config)) {
    throw new ConfigValidationError('must be an object', path, config);
  }

  for (const key of ['http', 'context', 'overlap'] as const) {
    const value = config[key];
    if (value !== undefined && !isPositiveInteger(value)) {
      throw new ConfigValidationError(`${key} must be a positive integer`, `${path}.${key}`, value);
    }
  }
}

/**
 * Validate vocabulary registry configuration.
 */
function validateVocabConfig(config: unknown, path = 'vocab'): asserts config is PartialAppConfig['vocab'] {
  if (!isRecord(config)) {
    throw new ConfigValidationError('must be an object', path, config);
  }

  const c = config;

  if (c.dataPath !== undefined && (typeof c.dataPath !== 'string' || c.dataPath.length === 0)) {
    throw new ConfigValidationError('dataPath must be a non-empty string', `${path}.dataPath`, c.dataPath);
  }

  if (c.fetchTimeoutMs !== undefined && !isPositiveInteger(c.fetchTimeoutMs)) {
    throw new ConfigValidationError('fetchTimeoutMs must be a positive integer', `${path}.fetchTimeoutMs`, c.fetchTimeoutMs);
  }

  if (c.turtle !== undefined && typeof c.turtle !== 'boolean') {
    throw new ConfigValidationError('turtle must be a boolean', `${path}.turtle`, c.turtle);
  }

  if (c.aliasCollisions !== undefined && c.aliasCollisions !== 'last-write-wins' && c.aliasCollisions !== 'error') {
    throw new ConfigValidationError(
      'aliasCollisions must be one of: last-write-wins, error',
      `${path}.aliasCollisions`,
      c.aliasCollisions
    );
  }

  if (c.cache !== undefined) {
    validateCacheConfig(c.cache, `${path}.cache`);
  }
}

/**
 * Validate the entire configuration.
 */
export function validateConfig(config: unknown): asserts config is PartialAppConfig {
  if (!isRecord(config)) {
    throw new ConfigValidationError('must be an object', '', config);
  }

  if (config.server !== undefined) {
    validateServerConfig(config.server);
  }

  if (config.vocab !== undefined) {
    validateVocabConfig(config.vocab);
  }
}

/**
 * Apply defaults to a validated partial config.
 */
export function applyDefaults(partial: PartialAppConfig): AppConfig {
  return {
    server: { ...DEFAULT_CONFIG.server, ...partial.server },
    vocab: {
      ...DEFAULT_CONFIG.vocab,
      ...partial.vocab,
      cache: { ...DEFAULT_CONFIG.vocab.cache, ...partial.vocab?.cache },
    },
  };
}

/**
 * Load configuration from a YAML file.
 *
 * @param options - Loading options
 * @returns Loaded and validated configuration
 */
export async function loadConfig(options: LoadConfigOptions = {}): Promise<AppConfig> {
  const configPath = options.configPath
    ?? process.env.CONFIG_PATH
    ?? './config.yaml';

  const absolutePath = resolve(configPath);

  // If config file doesn't exist, return defaults
  if (!existsSync(absolutePath)) {
    console.warn(`Config file not found at ${absolutePath}, using defaults`);
    return applyDefaults({});
  }

  // Read and parse YAML
  const content = await readFile(absolutePath, 'utf-8');
  let parsed: unknown;

  try {
    parsed = parseYaml(content);
  } catch (err) {
    throw new Error(`Failed to parse config file: ${err instanceof Error ? err.message : String(err)}`);
  }

  // An empty file parses to null
  const substituted = substituteEnvVarsRecursive(parsed ?? {});

  validateConfig(substituted);
  return applyDefaults(substituted);
}
