/**
 * Persistence backends.
 */

export { MemoryBackend } from './MemoryBackend.js';
export { YamlFileBackend, createYamlFileBackend, recordFileName } from './YamlFileBackend.js';
export type { YamlFileBackendConfig } from './YamlFileBackend.js';
export { createBackend } from './createBackend.js';
