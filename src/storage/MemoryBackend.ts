/**
 * MemoryBackend — in-process RegistryBackend.
 *
 * Used by default and in tests. State lives only as long as the process.
 */

import { copyRecord } from '../types/DatasetRecord.js';
import type { RegistryBackend, RegistryChange, RegistrySnapshot } from '../registry/types.js';

function cloneSnapshot(snapshot: RegistrySnapshot): RegistrySnapshot {
  return {
    nextId: snapshot.nextId,
    records: snapshot.records.map(copyRecord),
    refSeen: [...snapshot.refSeen],
    ownerIndex: snapshot.ownerIndex.map(entry => ({ owner: entry.owner, ids: [...entry.ids] })),
  };
}

export class MemoryBackend implements RegistryBackend {
  private snapshot: RegistrySnapshot | null;
  private commits = 0;

  constructor(initial?: RegistrySnapshot) {
    this.snapshot = initial ? cloneSnapshot(initial) : null;
  }

  async load(): Promise<RegistrySnapshot | null> {
    return this.snapshot ? cloneSnapshot(this.snapshot) : null;
  }

  async commit(change: RegistryChange): Promise<void> {
    const snapshot = this.snapshot ?? { nextId: 0, records: [], refSeen: [], ownerIndex: [] };
    const record = copyRecord(change.record);

    if (change.type === 'insert') {
      snapshot.records.push(record);
      snapshot.refSeen.push(record.datasetRef);
      const entry = snapshot.ownerIndex.find(e => e.owner === record.owner);
      if (entry) {
        entry.ids.push(record.id);
      } else {
        snapshot.ownerIndex.push({ owner: record.owner, ids: [record.id] });
      }
    } else {
      snapshot.records[record.id] = record;
    }

    snapshot.nextId = change.nextId;
    this.snapshot = snapshot;
    this.commits++;
  }

  /**
   * Number of commits received (for diagnostics).
   */
  get commitCount(): number {
    return this.commits;
  }
}
