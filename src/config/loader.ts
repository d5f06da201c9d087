/**
 * Configuration loader for the dataset-registry server.
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
import type {
  AppConfig,
  CorsConfig,
  IdentityConfig,
  ListingConfig,
  NotificationsConfig,
  ServerConfig,
  StorageConfig,
} from './types.js';
import { DEFAULT_CONFIG, LOG_LEVELS } from './types.js';

/**
 * Config loading options.
 */
export interface LoadConfigOptions {
  /** Path to config file (default: process.env.CONFIG_PATH or './config.yaml') */
  configPath?: string;
  /** Environment used for substitution and overrides (default: process.env) */
  env?: NodeJS.ProcessEnv;
}

/**
 * Config as written in the file: every field optional.
 */
export interface PartialAppConfig {
  server?: Partial<Omit<ServerConfig, 'cors'>> & { cors?: Partial<CorsConfig> };
  identity?: Partial<IdentityConfig>;
  storage?: Partial<StorageConfig>;
  listing?: Partial<ListingConfig>;
  notifications?: Partial<NotificationsConfig>;
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

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

/**
 * Substitute environment variables in a string.
 *
 * Supports:
 * - ${VAR_NAME} - Replace with env var value
 * - ${VAR_NAME:-default} - Replace with env var or default
 */
export function substituteEnvVars(value: string, env: NodeJS.ProcessEnv = process.env): string {
  return value.replace(ENV_VAR_PATTERN, (_match, varName: string, defaultValue: string | undefined) => {
    const envValue = env[varName];
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
 * Recursively substitute environment variables in an object.
 */
function substituteEnvVarsRecursive(obj: unknown, env: NodeJS.ProcessEnv): unknown {
  if (typeof obj === 'string') {
    return substituteEnvVars(obj, env);
  }
  if (Array.isArray(obj)) {
    return obj.map(item => substituteEnvVarsRecursive(item, env));
  }
  if (isRecord(obj)) {
    const result: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(obj)) {
      result[key] = substituteEnvVarsRecursive(value, env);
    }
    return result;
  }
  return obj;
}

/**
 * Numbers may arrive as strings after env substitution ("${PORT:-3001}").
 */
function coerceNumber(value: unknown): unknown {
  if (typeof value === 'string' && /^\d+$/.test(value.trim())) {
    return Number(value);
  }
  return value;
}

function coerceBoolean(value: unknown): unknown {
  if (value === 'true') return true;
  if (value === 'false') return false;
  return value;
}

function coerceScalars(config: Record<string, unknown>): void {
  const { server, listing, notifications } = config;
  if (isRecord(server)) {
    if ('port' in server) server.port = coerceNumber(server.port);
    if (isRecord(server.cors) && 'enabled' in server.cors) {
      server.cors.enabled = coerceBoolean(server.cors.enabled);
    }
  }
  if (isRecord(listing)) {
    if ('defaultLimit' in listing) listing.defaultLimit = coerceNumber(listing.defaultLimit);
    if ('maxLimit' in listing) listing.maxLimit = coerceNumber(listing.maxLimit);
  }
  if (isRecord(notifications) && 'retain' in notifications) {
    notifications.retain = coerceNumber(notifications.retain);
  }
}

function isPositiveInteger(value: unknown): value is number {
  return typeof value === 'number' && Number.isInteger(value) && value > 0;
}

/**
 * Validate server configuration.
 */
function validateServerConfig(config: unknown, path = 'server'): asserts config is PartialAppConfig['server'] {
  if (!isRecord(config)) {
    throw new ConfigValidationError('must be an object', path, config);
  }

  const port = config.port;
  if (port !== undefined && (!isPositiveInteger(port) || port > 65535)) {
    throw new ConfigValidationError('port must be a number between 1 and 65535', `${path}.port`, port);
  }

  if (config.host !== undefined && typeof config.host !== 'string') {
    throw new ConfigValidationError('host must be a string', `${path}.host`, config.host);
  }

  const logLevel = config.logLevel;
  if (logLevel !== undefined && !LOG_LEVELS.some(level => level === logLevel)) {
    throw new ConfigValidationError(`logLevel must be one of: ${LOG_LEVELS.join(', ')}`, `${path}.logLevel`, logLevel);
  }

  if (config.cors !== undefined) {
    const cors = config.cors;
    if (!isRecord(cors)) {
      throw new ConfigValidationError('must be an object', `${path}.cors`, cors);
    }
    if (cors.enabled !== undefined && typeof cors.enabled !== 'boolean') {
      throw new ConfigValidationError('enabled must be a boolean', `${path}.cors.enabled`, cors.enabled);
    }
    const origins = cors.origins;
    if (
      origins !== undefined &&
      (!Array.isArray(origins) || origins.some(origin => typeof origin !== 'string'))
    ) {
      throw new ConfigValidationError('origins must be a list of strings', `${path}.cors.origins`, origins);
    }
  }
}

/**
 * Validate identity configuration.
 */
function validateIdentityConfig(config: unknown, path = 'identity'): asserts config is PartialAppConfig['identity'] {
  if (!isRecord(config)) {
    throw new ConfigValidationError('must be an object', path, config);
  }

  const header = config.header;
  if (header !== undefined && (typeof header !== 'string' || header.length === 0)) {
    throw new ConfigValidationError('header must be a non-empty string', `${path}.header`, header);
  }
}

/**
 * Validate storage configuration.
 */
function validateStorageConfig(config: unknown, path = 'storage'): asserts config is PartialAppConfig['storage'] {
  if (!isRecord(config)) {
    throw new ConfigValidationError('must be an object', path, config);
  }

  if (config.driver !== undefined && config.driver !== 'memory' && config.driver !== 'file') {
    throw new ConfigValidationError('driver must be one of: memory, file', `${path}.driver`, config.driver);
  }

  const directory = config.directory;
  if (directory !== undefined && (typeof directory !== 'string' || directory.length === 0)) {
    throw new ConfigValidationError('directory must be a non-empty string', `${path}.directory`, directory);
  }
}

/**
 * Validate listing configuration.
 */
function validateListingConfig(config: unknown, path = 'listing'): asserts config is PartialAppConfig['listing'] {
  if (!isRecord(config)) {
    throw new ConfigValidationError('must be an object', path, config);
  }

  if (config.defaultLimit !== undefined && !isPositiveInteger(config.defaultLimit)) {
    throw new ConfigValidationError('defaultLimit must be a positive integer', `${path}.defaultLimit`, config.defaultLimit);
  }

  if (config.maxLimit !== undefined && !isPositiveInteger(config.maxLimit)) {
    throw new ConfigValidationError('maxLimit must be a positive integer', `${path}.maxLimit`, config.maxLimit);
  }
}

/**
 * Validate notification log configuration.
 */
function validateNotificationsConfig(config: unknown, path = 'notifications'): asserts config is PartialAppConfig['notifications'] {
  if (!isRecord(config)) {
    throw new ConfigValidationError('must be an object', path, config);
  }

  if (config.retain !== undefined && !isPositiveInteger(config.retain)) {
    throw new ConfigValidationError('retain must be a positive integer', `${path}.retain`, config.retain);
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

  if (config.identity !== undefined) {
    validateIdentityConfig(config.identity);
  }

  if (config.storage !== undefined) {
    validateStorageConfig(config.storage);
  }

  if (config.listing !== undefined) {
    validateListingConfig(config.listing);
  }

  if (config.notifications !== undefined) {
    validateNotificationsConfig(config.notifications);
  }
}

/**
 * Merge a partial config over the defaults.
 */
export function mergeConfig(partial: PartialAppConfig, base: AppConfig = DEFAULT_CONFIG): AppConfig {
  const merged: AppConfig = {
    server: {
      ...base.server,
      ...partial.server,
      cors: {
        ...base.server.cors,
        ...partial.server?.cors,
      },
    },
    identity: { ...base.identity, ...partial.identity },
    storage: { ...base.storage, ...partial.storage },
    listing: { ...base.listing, ...partial.listing },
    notifications: { ...base.notifications, ...partial.notifications },
  };

  if (merged.listing.defaultLimit > merged.listing.maxLimit) {
    throw new ConfigValidationError(
      'defaultLimit must not exceed maxLimit',
      'listing.defaultLimit',
      merged.listing.defaultLimit
    );
  }

  return merged;
}

/**
 * Apply PORT / HOST environment overrides.
 */
export function applyEnvOverrides(config: AppConfig, env: NodeJS.ProcessEnv = process.env): AppConfig {
  const port = env.PORT !== undefined ? Number.parseInt(env.PORT, 10) : undefined;
  return {
    ...config,
    server: {
      ...config.server,
      ...(port !== undefined && Number.isInteger(port) && port > 0 ? { port } : {}),
      ...(env.HOST ? { host: env.HOST } : {}),
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
  const env = options.env ?? process.env;
  const configPath = options.configPath
    ?? env.CONFIG_PATH
    ?? './config.yaml';

  const absolutePath = resolve(configPath);

  // If config file doesn't exist, return defaults
  if (!existsSync(absolutePath)) {
    console.warn(`Config file not found at ${absolutePath}, using defaults`);
    return applyEnvOverrides(mergeConfig({}), env);
  }

  const content = await readFile(absolutePath, 'utf-8');
  let parsed: unknown;

  try {
    parsed = parseYaml(content);
  } catch (err) {
    throw new Error(`Failed to parse config file: ${err instanceof Error ? err.message : String(err)}`);
  }

  // An empty file parses to null
  const substituted = substituteEnvVarsRecursive(parsed ?? {}, env);
  if (isRecord(substituted)) {
    coerceScalars(substituted);
  }

  validateConfig(substituted);
  return applyEnvOverrides(mergeConfig(substituted), env);
}
