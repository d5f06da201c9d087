/**
 * Types for the dataset registry and its persistence backends.
 */

import type { ActorId, DatasetId, DatasetRecord } from '../types/DatasetRecord.js';

/**
 * Serializable form of the full registry state.
 * Backends must round-trip it exactly.
 */
export interface RegistrySnapshot {
  /** Next id to assign; equals the number of records */
  nextId: number;
  /** All records in ascending id order */
  records: DatasetRecord[];
  /** Every dataset reference ever accepted */
  refSeen: string[];
  /** Ids per owner, in creation order */
  ownerIndex: OwnerIndexEntry[];
}

export interface OwnerIndexEntry {
  owner: ActorId;
  ids: DatasetId[];
}

/**
 * A committed change, handed to the backend before it is applied in memory.
 */
export type RegistryChange =
  | { type: 'insert'; record: DatasetRecord; nextId: number }
  | { type: 'replace'; record: DatasetRecord; nextId: number };

/**
 * Durable storage for the registry.
 *
 * `commit` must either persist the change fully or reject; the registry
 * leaves its in-memory state untouched when it rejects.
 */
export interface RegistryBackend {
  /** Load persisted state, or null when nothing has been stored yet */
  load(): Promise<RegistrySnapshot | null>;
  /** Persist one change */
  commit(change: RegistryChange): Promise<void>;
}

/**
 * Optional window applied to list results after filtering.
 */
export interface ListWindow {
  /** Number of matching records to skip (default 0) */
  offset?: number;
  /** Maximum records to return (default: all) */
  limit?: number;
}
