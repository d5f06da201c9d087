/**
 * Dataset registry core.
 */

export { DatasetRegistry, applyWindow } from './DatasetRegistry.js';
export type { DatasetRegistryOptions } from './DatasetRegistry.js';
export { RegistryState } from './RegistryState.js';
export { NotificationLog, DEFAULT_RETAIN } from './NotificationLog.js';
export type { NotificationLogOptions } from './NotificationLog.js';
export { checkOwner, checkReadable, canIncrementCounter, isOwner } from './authorization.js';
export type {
  RegistrySnapshot,
  OwnerIndexEntry,
  RegistryChange,
  RegistryBackend,
  ListWindow,
} from './types.js';
