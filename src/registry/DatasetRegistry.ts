/**
 * DatasetRegistry — the registry service.
 *
 * Owns the registry state and is the only way to change it. Mutations run
 * one at a time behind an exclusive lock: each computes the new record
 * value, commits it to the backend, then applies it to memory and appends
 * the notification in a single synchronous step. Reads are synchronous and
 * therefore always see a fully applied state.
 */

import type { ActorId, CounterKind, DatasetId, DatasetRecord } from '../types/DatasetRecord.js';
import { copyRecord, createDatasetRecord, isNonEmptyRef } from '../types/DatasetRecord.js';
import type { EventSink, Notification, RegistryEvent } from '../types/events.js';
import { EventFactory } from '../core/events.js';
import { RegistryErrors } from '../core/errors.js';
import { MemoryBackend } from '../storage/MemoryBackend.js';
import { RegistryState } from './RegistryState.js';
import { NotificationLog } from './NotificationLog.js';
import { canIncrementCounter, checkOwner, checkReadable } from './authorization.js';
import type { ListWindow, RegistryBackend, RegistryChange, RegistrySnapshot } from './types.js';

/**
 * Options for opening a registry.
 */
export interface DatasetRegistryOptions {
  /** Persistence backend (default: MemoryBackend) */
  backend?: RegistryBackend;
  /** Outbound notification log (default: a fresh log) */
  notifications?: NotificationLog;
  /** Clock for createdAt (default: current time) */
  now?: () => Date;
}

/**
 * Apply an offset/limit window to an already filtered list.
 */
export function applyWindow<T>(items: readonly T[], window: ListWindow = {}): T[] {
  const offset = Math.max(0, window.offset ?? 0);
  const end = window.limit !== undefined ? offset + Math.max(0, window.limit) : undefined;
  return items.slice(offset, end);
}

export class DatasetRegistry {
  private readonly state: RegistryState;
  private readonly backend: RegistryBackend;
  private readonly notifications: NotificationLog;
  private readonly now: () => Date;
  private lock: Promise<void> = Promise.resolve();

  private constructor(state: RegistryState, backend: RegistryBackend, options: DatasetRegistryOptions) {
    this.state = state;
    this.backend = backend;
    this.notifications = options.notifications ?? new NotificationLog();
    this.now = options.now ?? (() => new Date());
  }

  /**
   * Open a registry, restoring any state the backend holds.
   */
  static async open(options: DatasetRegistryOptions = {}): Promise<DatasetRegistry> {
    const backend = options.backend ?? new MemoryBackend();
    const snapshot = await backend.load();
    const state = snapshot ? RegistryState.fromSnapshot(snapshot) : new RegistryState();
    return new DatasetRegistry(state, backend, options);
  }

  // ==========================================================================
  // Mutations
  // ==========================================================================

  /**
   * Register a dataset. Returns the assigned id.
   */
  async upload(actor: ActorId, datasetRef: string, analysisRef: string, isPublic: boolean): Promise<DatasetId> {
    if (!isNonEmptyRef(datasetRef)) {
      throw RegistryErrors.invalidArgument('datasetRef must not be empty');
    }

    return this.exclusive(async () => {
      if (this.state.hasRef(datasetRef)) {
        throw RegistryErrors.duplicateReference(datasetRef);
      }

      const record = createDatasetRecord(
        this.state.nextId,
        actor,
        { datasetRef, analysisRef, isPublic },
        this.now().toISOString()
      );
      await this.commit(
        { type: 'insert', record, nextId: record.id + 1 },
        EventFactory.uploaded(record)
      );
      return record.id;
    });
  }

  /**
   * Replace the analysis reference. Owner only.
   */
  async updateAnalysis(actor: ActorId, id: DatasetId, newAnalysisRef: string): Promise<void> {
    await this.exclusive(async () => {
      const record = this.requireRecord(id);
      const denied = checkOwner(record, actor);
      if (denied) throw denied;

      await this.commit(
        { type: 'replace', record: { ...record, analysisRef: newAnalysisRef }, nextId: this.state.nextId },
        EventFactory.analysisUpdated(id, newAnalysisRef)
      );
    });
  }

  /**
   * Make a record public or private. Owner only.
   */
  async setVisibility(actor: ActorId, id: DatasetId, newIsPublic: boolean): Promise<void> {
    await this.exclusive(async () => {
      const record = this.requireRecord(id);
      const denied = checkOwner(record, actor);
      if (denied) throw denied;

      await this.commit(
        { type: 'replace', record: { ...record, isPublic: newIsPublic }, nextId: this.state.nextId },
        EventFactory.visibilityChanged(id, newIsPublic)
      );
    });
  }

  /**
   * Count a view. Returns false (without error) when the caller may not
   * touch the record's counters.
   */
  recordView(actor: ActorId, id: DatasetId): Promise<boolean> {
    return this.incrementCounter(actor, id, 'views');
  }

  recordDownload(actor: ActorId, id: DatasetId): Promise<boolean> {
    return this.incrementCounter(actor, id, 'downloads');
  }

  recordCitation(actor: ActorId, id: DatasetId): Promise<boolean> {
    return this.incrementCounter(actor, id, 'citations');
  }

  // ==========================================================================
  // Reads
  // ==========================================================================

  /**
   * Get a copy of a record the actor may read.
   */
  get(actor: ActorId, id: DatasetId): DatasetRecord {
    const record = this.requireRecord(id);
    const denied = checkReadable(record, actor);
    if (denied) throw denied;
    return copyRecord(record);
  }

  /**
   * Public records in ascending id order.
   */
  listPublic(window?: ListWindow): DatasetRecord[] {
    const matching = this.state.all().filter(record => record.isPublic);
    return applyWindow(matching, window).map(copyRecord);
  }

  /**
   * Number of public records.
   */
  countPublic(): number {
    return this.state.all().reduce((n, record) => (record.isPublic ? n + 1 : n), 0);
  }

  /**
   * Every record the actor created, private ones included, in creation order.
   */
  listOwnedBy(actor: ActorId, window?: ListWindow): DatasetRecord[] {
    const ids = applyWindow(this.state.idsOwnedBy(actor), window);
    const records: DatasetRecord[] = [];
    for (const id of ids) {
      const record = this.state.find(id);
      if (record) records.push(copyRecord(record));
    }
    return records;
  }

  ownedCount(actor: ActorId): number {
    return this.state.ownedCount(actor);
  }

  /**
   * Total records ever created, private ones included.
   */
  count(): number {
    return this.state.nextId;
  }

  // ==========================================================================
  // Notifications
  // ==========================================================================

  /**
   * The outbound notification log.
   */
  get notificationLog(): NotificationLog {
    return this.notifications;
  }

  /**
   * Held notifications after `sequence` whose record the actor may
   * currently read, oldest first.
   */
  notificationsVisibleTo(actor: ActorId, sequence: number, limit?: number): Notification[] {
    const visible = this.notifications.since(sequence).filter(notification => {
      const record = this.state.find(notification.event.id);
      return record !== undefined && checkReadable(record, actor) === null;
    });
    return limit !== undefined ? visible.slice(0, limit) : visible;
  }

  /**
   * Deliver future notifications to a sink. Returns an unsubscribe function.
   */
  subscribe(sink: EventSink): () => void {
    return this.notifications.subscribe(sink);
  }

  /**
   * Wait for pending mutations and notification deliveries.
   */
  async drain(): Promise<void> {
    await this.lock;
    await this.notifications.drain();
  }

  snapshot(): RegistrySnapshot {
    return this.state.toSnapshot();
  }

  // ==========================================================================
  // Internals
  // ==========================================================================

  private requireRecord(id: DatasetId): DatasetRecord {
    const record = Number.isInteger(id) ? this.state.find(id) : undefined;
    if (!record) {
      throw RegistryErrors.notFound(id);
    }
    return record;
  }

  private async incrementCounter(actor: ActorId, id: DatasetId, counter: CounterKind): Promise<boolean> {
    return this.exclusive(async () => {
      const record = this.requireRecord(id);
      if (!canIncrementCounter(record, actor)) {
        return false;
      }

      const next = copyRecord(record);
      next[counter] += 1;
      await this.commit(
        { type: 'replace', record: next, nextId: this.state.nextId },
        EventFactory.counterIncremented(id, counter)
      );
      return true;
    });
  }

  /**
   * Persist a change, then apply it and log its notification. If the
   * backend rejects, nothing is applied.
   */
  private async commit(change: RegistryChange, event: RegistryEvent): Promise<Notification> {
    await this.backend.commit(change);

    if (change.type === 'insert') {
      this.state.insert(change.record);
    } else {
      this.state.replace(change.record);
    }
    return this.notifications.append(event);
  }

  /**
   * Run `fn` after every previously queued mutation has settled. Pending
   * notifications are handed to sinks once the lock is released.
   */
  private async exclusive<T>(fn: () => Promise<T>): Promise<T> {
    const prev = this.lock;
    let release: () => void = () => undefined;
    this.lock = new Promise<void>(resolve => {
      release = resolve;
    });
    await prev;
    const before = this.notifications.lastSequence;
    try {
      return await fn();
    } finally {
      release();
      if (this.notifications.lastSequence !== before) {
        this.notifications.flush().catch((err: unknown) => {
          console.error('Notification flush failed:', err);
        });
      }
    }
  }
}
