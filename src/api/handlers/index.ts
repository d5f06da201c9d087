/**
 * Handler exports for the API layer.
 */

export * from './DatasetHandlers.js';
export * from './EventHandlers.js';
