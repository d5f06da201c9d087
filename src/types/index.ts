/**
 * Type exports for dataset-registry.
 */

export * from './DatasetRecord.js';
export * from './events.js';
