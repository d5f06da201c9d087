/**
 * dataset-registry — ownership, visibility and usage counters for
 * registered research datasets.
 *
 * This is the main entry point for the library.
 */

// Types
export * from './types/index.js';

// Errors and events
export * from './core/errors.js';
export * from './core/events.js';

// Registry
export * from './registry/index.js';

// Persistence
export * from './storage/index.js';

// Configuration
export * from './config/types.js';
export { loadConfig, mergeConfig, validateConfig, ConfigValidationError } from './config/loader.js';
export type { LoadConfigOptions, PartialAppConfig } from './config/loader.js';

// Identity
export * from './identity/ActorIdentity.js';

// HTTP API
export * from './api/index.js';

// Server
export { initializeApp, createServer, startServer } from './server.js';
export type { AppContext, InitializeOptions } from './server.js';
