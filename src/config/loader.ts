/**
 * Configuration loader for settings-tree builds.
 *
 * Loads config from YAML file with support for:
 * - Environment variable substitution (${VAR_NAME})
 * - Default values
 * - Validation
 * - Paths relative to the config file
 */

import { readFile } from 'node:fs/promises';
import { existsSync } from 'node:fs';
import { dirname, resolve } from 'node:path';
import { parse as parseYaml } from 'yaml';
import type { HardwareConfig, SettingsConfig, SoftwareConfig } from './types.js';
import { DEFAULT_CONFIG } from './types.js';
import type { LogLevel } from '../logging/logger.js';
import { createLogger } from '../logging/logger.js';

const logger = createLogger('config');

/**
 * Config loading options.
 */
export interface LoadConfigOptions {
  /** Path to config file (default: process.env.SETTINGS_CONFIG or './settings.yaml') */
  configPath?: string;
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

const LOG_LEVELS: readonly LogLevel[] = ['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent'];

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

/**
 * Substitute environment variables in a string.
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
    logger.warn({ variable: varName }, 'Environment variable is not set and has no default');
    return '';
  });
}

/**
 * Recursively substitute environment variables in an object.
 */
export function substituteEnvVarsRecursive(obj: unknown): unknown {
  if (typeof obj === 'string') {
    return substituteEnvVars(obj);
  }
  if (Array.isArray(obj)) {
    return obj.map(substituteEnvVarsRecursive);
  }
  if (isRecord(obj)) {
    const result: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(obj)) {
      result[key] = substituteEnvVarsRecursive(value);
    }
    return result;
  }
  return obj;
}

function readBoolean(value: unknown, path: string, fallback: boolean): boolean {
  if (value === undefined) {
    return fallback;
  }
  if (typeof value !== 'boolean') {
    throw new ConfigValidationError('must be a boolean', path, value);
  }
  return value;
}

function readStringList(value: unknown, path: string, fallback: string[]): string[] {
  if (value === undefined) {
    return [...fallback];
  }
  if (typeof value === 'string') {
    return [value];
  }
  if (!Array.isArray(value)) {
    throw new ConfigValidationError('must be a string or a list of strings', path, value);
  }
  return value.map((item, index) => {
    if (typeof item !== 'string' || item.length === 0) {
      throw new ConfigValidationError('must be a non-empty string', `${path}[${index}]`, item);
    }
    return item;
  });
}

function readLogLevel(value: unknown, path: string): LogLevel {
  if (value === undefined) {
    return DEFAULT_CONFIG.logLevel;
  }
  const level = LOG_LEVELS.find(l => l === value);
  if (level === undefined) {
    throw new ConfigValidationError(`logLevel must be one of: ${LOG_LEVELS.join(', ')}`, path, value);
  }
  return level;
}

/**
 * Validate hardware configuration.
 */
function validateHardwareConfig(config: unknown, path = 'hardware'): HardwareConfig {
  const defaults = DEFAULT_CONFIG.hardware;
  if (config === undefined) {
    return { ...defaults, bindingsDirs: [], inferBindingForPaths: [] };
  }
  if (!isRecord(config)) {
    throw new ConfigValidationError('must be an object', path, config);
  }
  const inferBindingForPaths = readStringList(config.inferBindingForPaths, `${path}.inferBindingForPaths`, defaults.inferBindingForPaths);
  inferBindingForPaths.forEach((nodePath, index) => {
    if (!nodePath.startsWith('/')) {
      throw new ConfigValidationError('must be an absolute node path', `${path}.inferBindingForPaths[${index}]`, nodePath);
    }
  });
  return {
    bindingsDirs: readStringList(config.bindingsDirs, `${path}.bindingsDirs`, defaults.bindingsDirs),
    warnRegUnitAddressMismatch: readBoolean(
      config.warnRegUnitAddressMismatch,
      `${path}.warnRegUnitAddressMismatch`,
      defaults.warnRegUnitAddressMismatch,
    ),
    inferBindingForPaths,
  };
}

/**
 * Validate software configuration.
 */
function validateSoftwareConfig(config: unknown, path = 'software'): SoftwareConfig {
  if (!isRecord(config)) {
    throw new ConfigValidationError('must be an object', path, config);
  }
  const sources = readStringList(config.sources, `${path}.sources`, []);
  if (sources.length === 0) {
    throw new ConfigValidationError('sources is required', `${path}.sources`, config.sources);
  }
  return {
    sources,
    bindingsDirs: readStringList(config.bindingsDirs, `${path}.bindingsDirs`, []),
  };
}

/**
 * Validate the entire configuration and apply defaults.
 */
export function validateConfig(config: unknown): SettingsConfig {
  if (config === null || config === undefined) {
    return structuredClone(DEFAULT_CONFIG);
  }
  if (!isRecord(config)) {
    throw new ConfigValidationError('must be an object', '', config);
  }

  const result: SettingsConfig = {
    logLevel: readLogLevel(config.logLevel, 'logLevel'),
    strict: readBoolean(config.strict, 'strict', DEFAULT_CONFIG.strict),
    vendorPrefixes: readStringList(config.vendorPrefixes, 'vendorPrefixes', DEFAULT_CONFIG.vendorPrefixes),
    hardware: validateHardwareConfig(config.hardware),
  };
  if (config.software !== undefined) {
    result.software = validateSoftwareConfig(config.software);
  }
  return result;
}

/**
 * Resolve every file and directory path against the config file's directory.
 */
function resolvePaths(config: SettingsConfig, baseDir: string): SettingsConfig {
  const abs = (p: string): string => resolve(baseDir, p);
  const result: SettingsConfig = {
    ...config,
    vendorPrefixes: config.vendorPrefixes.map(abs),
    hardware: { ...config.hardware, bindingsDirs: config.hardware.bindingsDirs.map(abs) },
  };
  if (config.software) {
    result.software = {
      sources: config.software.sources.map(abs),
      bindingsDirs: config.software.bindingsDirs.map(abs),
    };
  }
  return result;
}

/**
 * Parse configuration text. Relative paths resolve against `baseDir`.
 */
export function parseConfig(content: string, baseDir: string): SettingsConfig {
  let parsed: unknown;
  try {
    parsed = parseYaml(content);
  } catch (err) {
    throw new Error(`Failed to parse config file: ${err instanceof Error ? err.message : String(err)}`);
  }
  return resolvePaths(validateConfig(substituteEnvVarsRecursive(parsed)), baseDir);
}

/**
 * Load configuration from a YAML file.
 *
 * @returns Loaded and validated configuration
 */
export async function loadConfig(options: LoadConfigOptions = {}): Promise<SettingsConfig> {
  const configPath = options.configPath
    ?? process.env.SETTINGS_CONFIG
    ?? './settings.yaml';

  const absolutePath = resolve(configPath);

  if (!existsSync(absolutePath)) {
    logger.warn({ path: absolutePath }, 'Config file not found, using defaults');
    return structuredClone(DEFAULT_CONFIG);
  }

  const content = await readFile(absolutePath, 'utf-8');
  return parseConfig(content, dirname(absolutePath));
}
