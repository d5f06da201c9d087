/**
 * Factory for creating the configured RegistryBackend.
 */

import { resolve } from 'node:path';
import type { StorageConfig } from '../config/types.js';
import type { RegistryBackend } from '../registry/types.js';
import { MemoryBackend } from './MemoryBackend.js';
import { createYamlFileBackend } from './YamlFileBackend.js';

/**
 * Create a backend from storage configuration.
 * Relative directories resolve against `basePath`.
 */
export function createBackend(config: StorageConfig, basePath: string = process.cwd()): RegistryBackend {
  switch (config.driver) {
    case 'memory':
      return new MemoryBackend();
    case 'file':
      return createYamlFileBackend(resolve(basePath, config.directory));
  }
}
