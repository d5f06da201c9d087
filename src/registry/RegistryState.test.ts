import { describe, it, expect } from 'vitest';
import { RegistryState } from './RegistryState.js';
import { RegistryError } from '../core/errors.js';
import { createDatasetRecord } from '../types/DatasetRecord.js';
import type { DatasetRecord } from '../types/DatasetRecord.js';
import type { RegistrySnapshot } from './types.js';

const CREATED = '2026-02-01T00:00:00.000Z';

function record(id: number, owner: string, datasetRef: string, isPublic = true): DatasetRecord {
  return createDatasetRecord(id, owner, { datasetRef, analysisRef: '', isPublic }, CREATED);
}

function validSnapshot(): RegistrySnapshot {
  return {
    nextId: 3,
    records: [record(0, 'alice', 'ref-0'), record(1, 'bob', 'ref-1', false), record(2, 'alice', 'ref-2')],
    refSeen: ['ref-0', 'ref-1', 'ref-2'],
    ownerIndex: [
      { owner: 'alice', ids: [0, 2] },
      { owner: 'bob', ids: [1] },
    ],
  };
}

function corruptionMessage(snapshot: RegistrySnapshot): string {
  try {
    RegistryState.fromSnapshot(snapshot);
  } catch (err) {
    expect(err).toBeInstanceOf(RegistryError);
    expect(err).toMatchObject({ code: 'CORRUPT_STATE' });
    return err instanceof Error ? err.message : String(err);
  }
  throw new Error('expected fromSnapshot to reject the snapshot');
}

describe('RegistryState', () => {
  it('keeps indices in step with inserts', () => {
    const state = new RegistryState();
    state.insert(record(0, 'alice', 'ref-0'));
    state.insert(record(1, 'alice', 'ref-1'));

    expect(state.nextId).toBe(2);
    expect(state.hasRef('ref-1')).toBe(true);
    expect(state.idsOwnedBy('alice')).toEqual([0, 1]);
    expect(state.ownedCount('bob')).toBe(0);
  });

  it('rejects out-of-sequence inserts', () => {
    const state = new RegistryState();
    expect(() => state.insert(record(1, 'alice', 'ref-1'))).toThrow('Insert out of sequence');
  });

  it('rejects replacing immutable fields', () => {
    const state = new RegistryState();
    state.insert(record(0, 'alice', 'ref-0'));

    expect(() => state.replace({ ...record(0, 'alice', 'ref-0'), owner: 'mallory' })).toThrow('Immutable fields');
    expect(state.find(0)?.owner).toBe('alice');
  });

  it('round-trips through a snapshot', () => {
    const restored = RegistryState.fromSnapshot(validSnapshot());

    expect(restored.toSnapshot()).toEqual(validSnapshot());
  });

  it('accepts an empty snapshot', () => {
    const restored = RegistryState.fromSnapshot({ nextId: 0, records: [], refSeen: [], ownerIndex: [] });
    expect(restored.nextId).toBe(0);
  });

  describe('fromSnapshot corruption checks', () => {
    it('detects a gap in ids', () => {
      const snapshot = validSnapshot();
      snapshot.records = [record(0, 'alice', 'ref-0'), record(2, 'alice', 'ref-2')];

      expect(corruptionMessage(snapshot)).toContain('record at position 1 has id 2');
    });

    it('detects a nextId that does not match the record count', () => {
      const snapshot = validSnapshot();
      snapshot.nextId = 4;

      expect(corruptionMessage(snapshot)).toContain('nextId is 4 but 3 records exist');
    });

    it('detects a repeated dataset reference', () => {
      const snapshot = validSnapshot();
      snapshot.records = [record(0, 'alice', 'ref-0'), record(1, 'bob', 'ref-0', false), record(2, 'alice', 'ref-2')];

      expect(corruptionMessage(snapshot)).toContain('datasetRef ref-0 appears more than once');
    });

    it('detects an empty dataset reference', () => {
      const snapshot = validSnapshot();
      snapshot.records = [record(0, 'alice', '')];

      expect(corruptionMessage(snapshot)).toContain('record 0 has an empty datasetRef');
    });

    it('detects refSeen drifting from the records', () => {
      const snapshot = validSnapshot();
      snapshot.refSeen = ['ref-0', 'ref-1', 'ref-9'];

      expect(corruptionMessage(snapshot)).toContain('refSeen does not match the stored records');
    });

    it('detects an owner index entry out of order', () => {
      const snapshot = validSnapshot();
      snapshot.ownerIndex = [
        { owner: 'alice', ids: [2, 0] },
        { owner: 'bob', ids: [1] },
      ];

      expect(corruptionMessage(snapshot)).toContain('ownerIndex entry for alice');
    });

    it('detects an owner missing from the index', () => {
      const snapshot = validSnapshot();
      snapshot.ownerIndex = [{ owner: 'alice', ids: [0, 2] }];

      expect(corruptionMessage(snapshot)).toContain('ownerIndex is missing owners');
    });
  });
});
