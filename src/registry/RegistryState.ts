/**
 * RegistryState — in-memory record set plus its secondary indices.
 *
 * Holds records (by id), the set of seen dataset references and the
 * per-owner id lists. All structures are append-only except that a
 * record value may be replaced by a newer value with the same id.
 * This class performs no authorization; DatasetRegistry does.
 */

import type { ActorId, DatasetId, DatasetRecord } from '../types/DatasetRecord.js';
import { copyRecord } from '../types/DatasetRecord.js';
import { RegistryErrors } from '../core/errors.js';
import type { RegistrySnapshot } from './types.js';

export class RegistryState {
  // Ids are dense from 0, so position == id.
  private readonly records: DatasetRecord[] = [];
  private readonly refSeen = new Set<string>();
  private readonly ownerIndex = new Map<ActorId, DatasetId[]>();

  /**
   * Next id to assign. Equals the number of records.
   */
  get nextId(): number {
    return this.records.length;
  }

  find(id: DatasetId): DatasetRecord | undefined {
    return this.records[id];
  }

  hasRef(datasetRef: string): boolean {
    return this.refSeen.has(datasetRef);
  }

  /**
   * Ids owned by an actor, in creation order. Returns a copy.
   */
  idsOwnedBy(owner: ActorId): DatasetId[] {
    return [...(this.ownerIndex.get(owner) ?? [])];
  }

  ownedCount(owner: ActorId): number {
    return this.ownerIndex.get(owner)?.length ?? 0;
  }

  /**
   * All records in id order. Callers must not mutate the returned values.
   */
  all(): readonly DatasetRecord[] {
    return this.records;
  }

  /**
   * Insert a new record and update every index in one step.
   * The record's id must equal nextId and its reference must be unseen.
   */
  insert(record: DatasetRecord): void {
    if (record.id !== this.nextId) {
      throw new Error(`Insert out of sequence: expected id ${this.nextId}, got ${record.id}`);
    }
    if (this.refSeen.has(record.datasetRef)) {
      throw RegistryErrors.duplicateReference(record.datasetRef);
    }

    this.records.push(copyRecord(record));
    this.refSeen.add(record.datasetRef);
    const owned = this.ownerIndex.get(record.owner);
    if (owned) {
      owned.push(record.id);
    } else {
      this.ownerIndex.set(record.owner, [record.id]);
    }
  }

  /**
   * Replace a record's value. Immutable fields must match the stored record.
   */
  replace(record: DatasetRecord): void {
    const current = this.records[record.id];
    if (!current) {
      throw RegistryErrors.notFound(record.id);
    }
    if (
      current.datasetRef !== record.datasetRef ||
      current.owner !== record.owner ||
      current.createdAt !== record.createdAt
    ) {
      throw new Error(`Immutable fields of dataset ${record.id} may not change`);
    }
    this.records[record.id] = copyRecord(record);
  }

  toSnapshot(): RegistrySnapshot {
    return {
      nextId: this.nextId,
      records: this.records.map(copyRecord),
      refSeen: Array.from(this.refSeen),
      ownerIndex: Array.from(this.ownerIndex, ([owner, ids]) => ({ owner, ids: [...ids] })),
    };
  }

  /**
   * Rebuild state from a snapshot, checking it against the registry
   * invariants. Throws CORRUPT_STATE on any mismatch.
   */
  static fromSnapshot(snapshot: RegistrySnapshot): RegistryState {
    const state = new RegistryState();

    snapshot.records.forEach((record, position) => {
      if (record.id !== position) {
        throw RegistryErrors.corruptState(`record at position ${position} has id ${record.id}`);
      }
      if (record.datasetRef.length === 0) {
        throw RegistryErrors.corruptState(`record ${record.id} has an empty datasetRef`);
      }
      if (state.refSeen.has(record.datasetRef)) {
        throw RegistryErrors.corruptState(`datasetRef ${record.datasetRef} appears more than once`);
      }
      state.insert(record);
    });

    if (snapshot.nextId !== state.nextId) {
      throw RegistryErrors.corruptState(`nextId is ${snapshot.nextId} but ${state.nextId} records exist`);
    }

    const storedRefs = new Set(snapshot.refSeen);
    if (storedRefs.size !== snapshot.refSeen.length) {
      throw RegistryErrors.corruptState('refSeen contains duplicates');
    }
    if (storedRefs.size !== state.refSeen.size || [...storedRefs].some(ref => !state.refSeen.has(ref))) {
      throw RegistryErrors.corruptState('refSeen does not match the stored records');
    }

    const storedOwners = new Set<ActorId>();
    for (const { owner, ids } of snapshot.ownerIndex) {
      if (storedOwners.has(owner)) {
        throw RegistryErrors.corruptState(`owner ${owner} is listed more than once`);
      }
      storedOwners.add(owner);
      const derived = state.ownerIndex.get(owner) ?? [];
      if (ids.length !== derived.length || ids.some((id, i) => id !== derived[i])) {
        throw RegistryErrors.corruptState(`ownerIndex entry for ${owner} does not match the stored records`);
      }
    }
    if (storedOwners.size !== state.ownerIndex.size) {
      throw RegistryErrors.corruptState('ownerIndex is missing owners present in the stored records');
    }

    return state;
  }
}
