/**
 * Tests for DatasetRegistry.
 */

import { describe, it, expect, beforeEach, vi } from 'vitest';
import { DatasetRegistry } from './DatasetRegistry.js';
import { NotificationLog } from './NotificationLog.js';
import { MemoryBackend } from '../storage/MemoryBackend.js';
import { RegistryError } from '../core/errors.js';
import type { Notification } from '../types/events.js';
import type { RegistryChange } from './types.js';

const FIXED_TIME = new Date('2026-01-15T10:00:00.000Z');

async function expectCode(promise: Promise<unknown>, code: string): Promise<void> {
  await expect(promise).rejects.toBeInstanceOf(RegistryError);
  await expect(promise).rejects.toMatchObject({ code });
}

function expectSyncCode(fn: () => unknown, code: string): void {
  let caught: unknown;
  try {
    fn();
  } catch (err) {
    caught = err;
  }
  expect(caught).toBeInstanceOf(RegistryError);
  expect(caught).toMatchObject({ code });
}

/**
 * Backend that can be told to reject the next commit.
 */
class FlakyBackend extends MemoryBackend {
  failNext = false;

  override async commit(change: RegistryChange): Promise<void> {
    if (this.failNext) {
      this.failNext = false;
      throw new Error('disk full');
    }
    await super.commit(change);
  }
}

describe('DatasetRegistry', () => {
  let registry: DatasetRegistry;

  beforeEach(async () => {
    registry = await DatasetRegistry.open({ now: () => FIXED_TIME });
  });

  describe('upload', () => {
    it('should assign sequential ids from 0 and store the record', async () => {
      const first = await registry.upload('alice', 'ref-a', 'analysis-a', true);
      const second = await registry.upload('bob', 'ref-b', '', false);

      expect(first).toBe(0);
      expect(second).toBe(1);
      expect(registry.count()).toBe(2);
      expect(registry.get('alice', 0)).toEqual({
        id: 0,
        datasetRef: 'ref-a',
        analysisRef: 'analysis-a',
        owner: 'alice',
        isPublic: true,
        createdAt: '2026-01-15T10:00:00.000Z',
        views: 0,
        downloads: 0,
        citations: 0,
      });
    });

    it('should reject an empty dataset reference', async () => {
      await expectCode(registry.upload('alice', '', '', true), 'INVALID_ARGUMENT');
      expect(registry.count()).toBe(0);
    });

    it('should reject a reference that was already registered, by anyone', async () => {
      await registry.upload('alice', 'ref-a', '', true);

      await expectCode(registry.upload('bob', 'ref-a', '', false), 'DUPLICATE_REFERENCE');
      expect(registry.count()).toBe(1);
      expect(registry.ownedCount('bob')).toBe(0);
    });

    it('should hand out distinct dense ids to concurrent uploads', async () => {
      const ids = await Promise.all(
        Array.from({ length: 20 }, (_, i) => registry.upload(`actor-${i % 3}`, `ref-${i}`, '', i % 2 === 0))
      );

      expect([...ids].sort((a, b) => a - b)).toEqual(Array.from({ length: 20 }, (_, i) => i));
      expect(registry.count()).toBe(20);
    });

    it('should let exactly one of two concurrent uploads of the same reference win', async () => {
      const results = await Promise.allSettled([
        registry.upload('alice', 'same-ref', '', true),
        registry.upload('bob', 'same-ref', '', true),
      ]);

      expect(results.map(r => r.status)).toEqual(['fulfilled', 'rejected']);
      expect(registry.count()).toBe(1);
    });
  });

  describe('updateAnalysis', () => {
    it('should replace the analysis reference for the owner', async () => {
      const id = await registry.upload('alice', 'ref-a', 'v1', false);

      await registry.updateAnalysis('alice', id, 'v2');

      expect(registry.get('alice', id).analysisRef).toBe('v2');
    });

    it('should allow clearing the analysis reference', async () => {
      const id = await registry.upload('alice', 'ref-a', 'v1', true);

      await registry.updateAnalysis('alice', id, '');

      expect(registry.get('alice', id).analysisRef).toBe('');
    });

    it('should refuse non-owners and leave the record unchanged', async () => {
      const id = await registry.upload('alice', 'ref-a', 'v1', true);

      await expectCode(registry.updateAnalysis('mallory', id, 'hijacked'), 'NOT_OWNER');
      expect(registry.get('alice', id).analysisRef).toBe('v1');
    });

    it('should report unknown ids', async () => {
      await expectCode(registry.updateAnalysis('alice', 7, 'v2'), 'NOT_FOUND');
    });
  });

  describe('setVisibility', () => {
    it('should toggle visibility for the owner', async () => {
      const id = await registry.upload('alice', 'ref-a', '', false);

      await registry.setVisibility('alice', id, true);
      expect(registry.get('bob', id).isPublic).toBe(true);

      await registry.setVisibility('alice', id, false);
      expectSyncCode(() => registry.get('bob', id), 'ACCESS_DENIED');
    });

    it('should refuse non-owners', async () => {
      const id = await registry.upload('alice', 'ref-a', '', false);

      await expectCode(registry.setVisibility('bob', id, true), 'NOT_OWNER');
      expect(registry.get('alice', id).isPublic).toBe(false);
    });
  });

  describe('get', () => {
    it('should let anyone read public records', async () => {
      const id = await registry.upload('alice', 'ref-a', '', true);
      expect(registry.get('stranger', id).owner).toBe('alice');
    });

    it('should hide private records from everyone but the owner', async () => {
      const id = await registry.upload('alice', 'ref-a', '', false);

      expect(registry.get('alice', id).datasetRef).toBe('ref-a');
      expectSyncCode(() => registry.get('bob', id), 'ACCESS_DENIED');
    });

    it('should report unknown and malformed ids as not found', () => {
      expectSyncCode(() => registry.get('alice', 0), 'NOT_FOUND');
      expectSyncCode(() => registry.get('alice', -1), 'NOT_FOUND');
      expectSyncCode(() => registry.get('alice', 1.5), 'NOT_FOUND');
    });

    it('should return copies that do not alias stored state', async () => {
      const id = await registry.upload('alice', 'ref-a', '', true);
      const copy = registry.get('alice', id);
      copy.views = 99;

      expect(registry.get('alice', id).views).toBe(0);
    });
  });

  describe('counters', () => {
    it('should count views, downloads and citations on public records from anyone', async () => {
      const id = await registry.upload('alice', 'ref-a', '', true);

      expect(await registry.recordView('bob', id)).toBe(true);
      expect(await registry.recordView('carol', id)).toBe(true);
      expect(await registry.recordDownload('bob', id)).toBe(true);
      expect(await registry.recordCitation('alice', id)).toBe(true);

      const record = registry.get('alice', id);
      expect(record.views).toBe(2);
      expect(record.downloads).toBe(1);
      expect(record.citations).toBe(1);
    });

    it('should count repeated calls from the same actor each time', async () => {
      const id = await registry.upload('alice', 'ref-a', '', true);

      await registry.recordView('bob', id);
      await registry.recordView('bob', id);
      await registry.recordView('bob', id);

      expect(registry.get('bob', id).views).toBe(3);
    });

    it('should silently skip non-owners on private records', async () => {
      const id = await registry.upload('alice', 'ref-a', '', false);

      expect(await registry.recordView('bob', id)).toBe(false);
      expect(await registry.recordDownload('bob', id)).toBe(false);
      expect(await registry.recordCitation('bob', id)).toBe(false);
      expect(await registry.recordView('alice', id)).toBe(true);

      const record = registry.get('alice', id);
      expect(record.views).toBe(1);
      expect(record.downloads).toBe(0);
      expect(record.citations).toBe(0);
    });

    it('should report unknown ids', async () => {
      await expectCode(registry.recordView('alice', 3), 'NOT_FOUND');
    });

    it('should not lose increments made concurrently', async () => {
      const id = await registry.upload('alice', 'ref-a', '', true);

      await Promise.all(Array.from({ length: 25 }, (_, i) => registry.recordDownload(`reader-${i}`, id)));

      expect(registry.get('alice', id).downloads).toBe(25);
    });
  });

  describe('listing', () => {
    beforeEach(async () => {
      await registry.upload('alice', 'ref-0', '', true);
      await registry.upload('alice', 'ref-1', '', false);
      await registry.upload('bob', 'ref-2', '', true);
      await registry.upload('alice', 'ref-3', '', true);
      await registry.upload('bob', 'ref-4', '', false);
    });

    it('should list public records in id order', () => {
      expect(registry.listPublic().map(r => r.id)).toEqual([0, 2, 3]);
      expect(registry.countPublic()).toBe(3);
    });

    it('should page public records', () => {
      expect(registry.listPublic({ offset: 1, limit: 1 }).map(r => r.id)).toEqual([2]);
      expect(registry.listPublic({ offset: 5 })).toEqual([]);
      expect(registry.listPublic({ limit: 0 })).toEqual([]);
    });

    it('should list every record an actor owns, private ones included', () => {
      expect(registry.listOwnedBy('alice').map(r => r.id)).toEqual([0, 1, 3]);
      expect(registry.listOwnedBy('bob').map(r => r.id)).toEqual([2, 4]);
      expect(registry.listOwnedBy('nobody')).toEqual([]);
      expect(registry.ownedCount('alice')).toBe(3);
    });

    it('should page owned records', () => {
      expect(registry.listOwnedBy('alice', { offset: 1, limit: 5 }).map(r => r.id)).toEqual([1, 3]);
    });

    it('should drop records from the public list once made private', async () => {
      await registry.setVisibility('bob', 2, false);

      expect(registry.listPublic().map(r => r.id)).toEqual([0, 3]);
      expect(registry.count()).toBe(5);
    });
  });

  describe('access walkthroughs', () => {
    it('should open a private record to others once its owner publishes it', async () => {
      expect(await registry.upload('alice', 'cidA', 'cidA-analysis', false)).toBe(0);
      expectSyncCode(() => registry.get('bob', 0), 'ACCESS_DENIED');

      await registry.setVisibility('alice', 0, true);
      expect(registry.get('bob', 0).isPublic).toBe(true);

      expect(await registry.recordView('bob', 0)).toBe(true);
      expect(registry.get('bob', 0).views).toBe(1);
      expect(registry.listPublic().map(r => r.id)).toContain(0);
    });

    it('should refuse a second owner for the same reference', async () => {
      await registry.upload('alice', 'cidA', '', true);

      await expectCode(registry.upload('bob', 'cidA', '', true), 'DUPLICATE_REFERENCE');
      expect(registry.count()).toBe(1);
    });
  });

  describe('persistence failures', () => {
    it('should leave state unchanged when the backend rejects a commit', async () => {
      const backend = new FlakyBackend();
      const flaky = await DatasetRegistry.open({ backend });
      const id = await flaky.upload('alice', 'ref-a', '', true);

      backend.failNext = true;
      await expect(flaky.recordView('bob', id)).rejects.toThrow('disk full');
      expect(flaky.get('alice', id).views).toBe(0);

      backend.failNext = true;
      await expect(flaky.upload('alice', 'ref-b', '', true)).rejects.toThrow('disk full');
      expect(flaky.count()).toBe(1);

      // The failed upload did not consume the reference or the id
      expect(await flaky.upload('alice', 'ref-b', '', true)).toBe(1);
      expect(flaky.notificationLog.lastSequence).toBe(2);
    });

    it('should restore state from the backend when reopened', async () => {
      const backend = new MemoryBackend();
      const first = await DatasetRegistry.open({ backend });
      await first.upload('alice', 'ref-a', 'v1', false);
      await first.upload('bob', 'ref-b', '', true);
      await first.recordCitation('carol', 1);

      const reopened = await DatasetRegistry.open({ backend });

      expect(reopened.count()).toBe(2);
      expect(reopened.get('alice', 0).analysisRef).toBe('v1');
      expect(reopened.get('bob', 1).citations).toBe(1);
      expect(reopened.listOwnedBy('alice').map(r => r.id)).toEqual([0]);
      await expectCode(reopened.upload('dave', 'ref-a', '', true), 'DUPLICATE_REFERENCE');
      expect(backend.commitCount).toBe(3);
    });
  });

  describe('notifications', () => {
    it('should deliver one notification per change in commit order', async () => {
      const received: Notification[] = [];
      registry.subscribe({ deliver: n => { received.push(n); } });

      const id = await registry.upload('alice', 'ref-a', 'v1', false);
      await registry.updateAnalysis('alice', id, 'v2');
      await registry.setVisibility('alice', id, true);
      await registry.recordView('bob', id);
      await registry.recordDownload('bob', id);
      await registry.recordCitation('bob', id);
      await registry.drain();

      expect(received.map(n => n.sequence)).toEqual([1, 2, 3, 4, 5, 6]);
      expect(received.map(n => n.event)).toEqual([
        { type: 'Uploaded', id: 0, owner: 'alice', datasetRef: 'ref-a', analysisRef: 'v1', isPublic: false },
        { type: 'AnalysisUpdated', id: 0, newAnalysisRef: 'v2' },
        { type: 'VisibilityChanged', id: 0, newIsPublic: true },
        { type: 'Viewed', id: 0 },
        { type: 'Downloaded', id: 0 },
        { type: 'Cited', id: 0 },
      ]);
    });

    it('should not notify for failed or skipped operations', async () => {
      const id = await registry.upload('alice', 'ref-a', '', false);
      const before = registry.notificationLog.lastSequence;

      await registry.recordView('bob', id);
      await expect(registry.setVisibility('bob', id, true)).rejects.toBeInstanceOf(RegistryError);
      await expect(registry.upload('bob', 'ref-a', '', true)).rejects.toBeInstanceOf(RegistryError);

      expect(registry.notificationLog.lastSequence).toBe(before);
    });

    it('should keep the registry working when a sink throws', async () => {
      const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);
      registry.subscribe({ deliver: () => { throw new Error('sink down'); } });

      const id = await registry.upload('alice', 'ref-a', '', true);
      await registry.drain();

      expect(registry.get('alice', id).datasetRef).toBe('ref-a');
      expect(warn).toHaveBeenCalled();
      warn.mockRestore();
    });

    it('should stop delivering after unsubscribe', async () => {
      const received: Notification[] = [];
      const unsubscribe = registry.subscribe({ deliver: n => { received.push(n); } });

      await registry.upload('alice', 'ref-a', '', true);
      await registry.drain();
      unsubscribe();
      await registry.upload('alice', 'ref-b', '', true);
      await registry.drain();

      expect(received).toHaveLength(1);
    });

    it('should deliver to a sink that subscribes after unobserved changes', async () => {
      await registry.upload('alice', 'ref-a', '', true);
      await registry.drain();

      const received: Notification[] = [];
      registry.subscribe({ deliver: n => { received.push(n); } });
      await registry.upload('alice', 'ref-b', '', true);
      await registry.drain();

      expect(received.map(n => n.sequence)).toEqual([2]);
    });

    it('should show an actor only notifications about records it may read', async () => {
      await registry.upload('alice', 'ref-private', '', false);
      await registry.upload('bob', 'ref-public', '', true);
      await registry.recordView('alice', 1);

      expect(registry.notificationsVisibleTo('bob', 0).map(n => n.sequence)).toEqual([2, 3]);
      expect(registry.notificationsVisibleTo('alice', 0).map(n => n.sequence)).toEqual([1, 2, 3]);
      expect(registry.notificationsVisibleTo('alice', 0, 2).map(n => n.sequence)).toEqual([1, 2]);
      expect(registry.notificationsVisibleTo('bob', 2).map(n => n.sequence)).toEqual([3]);
    });

    it('should keep only the configured number of delivered notifications', async () => {
      const bounded = await DatasetRegistry.open({ notifications: new NotificationLog({ retain: 2 }) });
      const received: Notification[] = [];
      bounded.subscribe({ deliver: n => { received.push(n); } });

      for (const ref of ['ref-a', 'ref-b', 'ref-c', 'ref-d']) {
        await bounded.upload('alice', ref, '', true);
      }
      await bounded.drain();

      expect(received).toHaveLength(4);
      expect(bounded.notificationLog.firstSequence).toBe(3);
      expect(bounded.notificationsVisibleTo('bob', 0).map(n => n.sequence)).toEqual([3, 4]);
    });
  });
});
