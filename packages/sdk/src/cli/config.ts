/**
 * Loading of docsign.config.yaml and environment overrides.
 *
 * @module cli/config
 */

import { existsSync, readFileSync } from 'node:fs';
import { join, resolve, dirname } from 'node:path';
import { parse as parseYaml } from 'yaml';
import { LOG_LEVELS, isLogLevel, type LogLevel } from '../utils/logger.js';
import type { PrivateKeyFormat, PublicKeyFormat } from '../signing/types.js';

export const CONFIG_FILE_NAMES = ['docsign.config.yaml', 'docsign.config.yml'] as const;

/**
 * Shape of docsign.config.yaml. Every field is optional.
 */
export interface DocsignConfigFile {
  keys?: {
    dir?: string;
    privateKey?: string;
    publicKey?: string;
  };
  export?: {
    privateKeyFormat?: PrivateKeyFormat;
    publicKeyFormat?: PublicKeyFormat;
  };
  logging?: {
    level?: LogLevel;
  };
}

/**
 * Resolved configuration with defaults applied and paths made absolute.
 */
export interface LoadedDocsignConfig {
  /** Config file that was read, or null when running on defaults */
  configPath: string | null;
  keysDir: string;
  privateKeyPath: string;
  publicKeyPath: string;
  privateKeyFormat: PrivateKeyFormat;
  publicKeyFormat: PublicKeyFormat;
  logLevel: LogLevel;
}

export interface LoadConfigOptions {
  /** Directory to search for the config file (default: process.cwd()) */
  cwd?: string;
  /** Explicit config file path */
  configPath?: string;
  /** Environment to read overrides from (default: process.env) */
  env?: NodeJS.ProcessEnv;
}

export const DEFAULT_PRIVATE_KEY_FILE = 'private_key.pem';
export const DEFAULT_PUBLIC_KEY_FILE = 'public_key.pem';

/**
 * Error thrown when the config file or an override is invalid.
 */
export class ConfigError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'ConfigError';
  }
}

const PRIVATE_KEY_FORMATS: readonly PrivateKeyFormat[] = ['pkcs1', 'pkcs8'];
const PUBLIC_KEY_FORMATS: readonly PublicKeyFormat[] = ['spki', 'pkcs1'];

export function findConfigFile(dir: string): string | null {
  for (const name of CONFIG_FILE_NAMES) {
    const path = join(dir, name);
    if (existsSync(path)) {
      return path;
    }
  }
  return null;
}

/**
 * Validate a parsed config document.
 *
 * @throws ConfigError describing the first invalid field
 */
export function validateConfigFile(value: unknown, source: string): DocsignConfigFile {
  if (value === null || value === undefined) {
    return {};
  }
  if (!isRecord(value)) {
    throw new ConfigError(`${source}: config must be a mapping`);
  }

  const config: DocsignConfigFile = {};

  if (value.keys !== undefined) {
    const keys = expectSection(value.keys, 'keys', source);
    config.keys = {
      dir: optionalString(keys.dir, 'keys.dir', source),
      privateKey: optionalString(keys.privateKey, 'keys.privateKey', source),
      publicKey: optionalString(keys.publicKey, 'keys.publicKey', source),
    };
  }

  if (value.export !== undefined) {
    const section = expectSection(value.export, 'export', source);
    config.export = {
      privateKeyFormat: optionalChoice(section.privateKeyFormat, PRIVATE_KEY_FORMATS, 'export.privateKeyFormat', source),
      publicKeyFormat: optionalChoice(section.publicKeyFormat, PUBLIC_KEY_FORMATS, 'export.publicKeyFormat', source),
    };
  }

  if (value.logging !== undefined) {
    const section = expectSection(value.logging, 'logging', source);
    config.logging = { level: optionalChoice(section.level, LOG_LEVELS, 'logging.level', source) };
  }

  return config;
}

/**
 * Read environment overrides.
 *
 * Recognized variables: DOCSIGN_KEYS_DIR, DOCSIGN_PRIVATE_KEY,
 * DOCSIGN_PUBLIC_KEY, DOCSIGN_LOG_LEVEL.
 */
export function loadEnvOverrides(env: NodeJS.ProcessEnv = process.env): DocsignConfigFile {
  const overrides: DocsignConfigFile = {};

  const keys: NonNullable<DocsignConfigFile['keys']> = {};
  if (env.DOCSIGN_KEYS_DIR) keys.dir = env.DOCSIGN_KEYS_DIR;
  if (env.DOCSIGN_PRIVATE_KEY) keys.privateKey = env.DOCSIGN_PRIVATE_KEY;
  if (env.DOCSIGN_PUBLIC_KEY) keys.publicKey = env.DOCSIGN_PUBLIC_KEY;
  if (Object.keys(keys).length > 0) overrides.keys = keys;

  const level = env.DOCSIGN_LOG_LEVEL;
  if (level) {
    if (!isLogLevel(level)) {
      throw new ConfigError(`DOCSIGN_LOG_LEVEL must be one of debug, info, warn, error, silent (got "${level}")`);
    }
    overrides.logging = { level };
  }

  return overrides;
}

/**
 * Load the config file (if any), apply environment overrides and defaults.
 *
 * Relative key paths resolve against the key directory; the key directory
 * resolves against the config file's directory, or `cwd` without one.
 */
export function loadDocsignConfig(options: LoadConfigOptions = {}): LoadedDocsignConfig {
  const cwd = resolve(options.cwd ?? process.cwd());
  const configPath = options.configPath ? resolve(cwd, options.configPath) : findConfigFile(cwd);

  let fileConfig: DocsignConfigFile = {};
  if (configPath) {
    if (!existsSync(configPath)) {
      throw new ConfigError(`Config file not found: ${configPath}`);
    }
    let parsed: unknown;
    try {
      parsed = parseYaml(readFileSync(configPath, 'utf-8'));
    } catch (err) {
      throw new ConfigError(
        `Failed to parse ${configPath}: ${err instanceof Error ? err.message : String(err)}`,
        { cause: err }
      );
    }
    fileConfig = validateConfigFile(parsed, configPath);
  }

  const env = loadEnvOverrides(options.env ?? process.env);
  const baseDir = configPath ? dirname(configPath) : cwd;
  const keysDir = resolve(baseDir, env.keys?.dir ?? fileConfig.keys?.dir ?? '.');

  return {
    configPath,
    keysDir,
    privateKeyPath: resolve(keysDir, env.keys?.privateKey ?? fileConfig.keys?.privateKey ?? DEFAULT_PRIVATE_KEY_FILE),
    publicKeyPath: resolve(keysDir, env.keys?.publicKey ?? fileConfig.keys?.publicKey ?? DEFAULT_PUBLIC_KEY_FILE),
    privateKeyFormat: fileConfig.export?.privateKeyFormat ?? 'pkcs1',
    publicKeyFormat: fileConfig.export?.publicKeyFormat ?? 'spki',
    logLevel: env.logging?.level ?? fileConfig.logging?.level ?? 'info',
  };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function expectSection(value: unknown, field: string, source: string): Record<string, unknown> {
  if (!isRecord(value)) {
    throw new ConfigError(`${source}: ${field} must be a mapping`);
  }
  return value;
}

function optionalString(value: unknown, field: string, source: string): string | undefined {
  if (value === undefined) return undefined;
  if (typeof value !== 'string' || value.length === 0) {
    throw new ConfigError(`${source}: ${field} must be a non-empty string`);
  }
  return value;
}

function optionalChoice<T extends string>(
  value: unknown,
  choices: readonly T[],
  field: string,
  source: string
): T | undefined {
  if (value === undefined) return undefined;
  const match = choices.find((choice) => choice === value);
  if (match === undefined) {
    throw new ConfigError(`${source}: ${field} must be one of ${choices.join(', ')}`);
  }
  return match;
}
