/**
 * Authorization predicates, evaluated before any state change.
 *
 * The registry never authenticates; it only compares the supplied actor
 * with a record's stored owner and visibility.
 */

import type { ActorId, DatasetRecord } from '../types/DatasetRecord.js';
import { RegistryError, RegistryErrors } from '../core/errors.js';

export function isOwner(record: DatasetRecord, actor: ActorId): boolean {
  return record.owner === actor;
}

/**
 * Read access: public records are readable by anyone, private ones by the owner.
 */
export function checkReadable(record: DatasetRecord, actor: ActorId): RegistryError | null {
  if (record.isPublic || isOwner(record, actor)) {
    return null;
  }
  return RegistryErrors.accessDenied(record.id);
}

/**
 * Mutation of analysisRef / isPublic: owner only.
 */
export function checkOwner(record: DatasetRecord, actor: ActorId): RegistryError | null {
  return isOwner(record, actor) ? null : RegistryErrors.notOwner(record.id);
}

/**
 * Counter increments are honored on public records for any actor, and on
 * private records for the owner. Unauthorized calls are skipped, not rejected.
 */
export function canIncrementCounter(record: DatasetRecord, actor: ActorId): boolean {
  return record.isPublic || isOwner(record, actor);
}
