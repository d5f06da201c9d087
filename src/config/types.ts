/**
 * Configuration types for the dataset-registry server.
 *
 * These types define the structure of config.yaml and provide
 * type-safe access to server configuration.
 */

/**
 * Top-level configuration.
 */
export interface AppConfig {
  server: ServerConfig;
  identity: IdentityConfig;
  storage: StorageConfig;
  listing: ListingConfig;
  notifications: NotificationsConfig;
}

export type LogLevel = 'fatal' | 'error' | 'warn' | 'info' | 'debug' | 'trace' | 'silent';

export const LOG_LEVELS: readonly LogLevel[] = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'];

/**
 * Server settings.
 */
export interface ServerConfig {
  /** Port to listen on (default: 3001) */
  port: number;
  /** Host to bind to (default: '0.0.0.0') */
  host: string;
  /** Log level (default: 'info') */
  logLevel: LogLevel;
  /** CORS configuration */
  cors: CorsConfig;
}

/**
 * CORS configuration.
 */
export interface CorsConfig {
  /** Whether CORS is enabled (default: true) */
  enabled: boolean;
  /** Allowed origins (default: ['*']) */
  origins: string[];
}

/**
 * Where the authenticated actor id comes from.
 * The upstream proxy that authenticates callers sets this header.
 */
export interface IdentityConfig {
  /** Request header carrying the actor id (default: 'x-actor-id') */
  header: string;
}

export type StorageDriver = 'memory' | 'file';

/**
 * Persistence settings.
 */
export interface StorageConfig {
  /** Backend: in-memory or YAML files on disk (default: 'memory') */
  driver: StorageDriver;
  /** Directory for the file driver (default: './data') */
  directory: string;
}

/**
 * Defaults and bounds for list endpoints.
 */
export interface ListingConfig {
  /** Page size when the caller gives no limit (default: 100) */
  defaultLimit: number;
  /** Largest page a caller may request (default: 1000) */
  maxLimit: number;
}

/**
 * Outbound notification log settings.
 */
export interface NotificationsConfig {
  /** Notifications kept in memory once every sink has received them (default: 10000) */
  retain: number;
}

/**
 * Default configuration values.
 */
export const DEFAULT_CONFIG: AppConfig = {
  server: {
    port: 3001,
    host: '0.0.0.0',
    logLevel: 'info',
    cors: {
      enabled: true,
      origins: ['*'],
    },
  },
  identity: {
    header: 'x-actor-id',
  },
  storage: {
    driver: 'memory',
    directory: './data',
  },
  listing: {
    defaultLimit: 100,
    maxLimit: 1000,
  },
  notifications: {
    retain: 10000,
  },
};
