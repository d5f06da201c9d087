/**
 * NotificationLog — ordered outbound log of registry notifications.
 *
 * The registry appends synchronously after a change commits. Delivery to
 * sinks runs separately: each sink keeps its own cursor, a failed delivery
 * leaves the cursor in place so the entry is retried on the next flush.
 * Delivery is therefore at-least-once and never affects registry state.
 *
 * At most `retain` entries are held once every sink has received them;
 * older ones are dropped and `firstSequence` moves forward.
 */

import type { EventSink, Notification, RegistryEvent } from '../types/events.js';

interface Subscription {
  sink: EventSink;
  /** Sequence of the last notification delivered to this sink */
  cursor: number;
}

export const DEFAULT_RETAIN = 10000;

export interface NotificationLogOptions {
  /** Sequence of the last notification already persisted elsewhere (default 0) */
  startAfter?: number;
  /** Entries kept after delivery (default 10000) */
  retain?: number;
  /** Clock used for emittedAt (default: current time) */
  now?: () => Date;
}

export class NotificationLog {
  private readonly entries: Notification[] = [];
  private readonly subscriptions = new Set<Subscription>();
  private readonly now: () => Date;
  private readonly retain: number;
  /** Sequence of the last entry dropped from the front */
  private offset: number;
  private flushing: Promise<void> | null = null;
  private flushRequested = false;

  constructor(options: NotificationLogOptions = {}) {
    this.offset = options.startAfter ?? 0;
    this.retain = options.retain ?? DEFAULT_RETAIN;
    this.now = options.now ?? (() => new Date());
  }

  /**
   * Sequence number of the most recent notification (0 when empty).
   */
  get lastSequence(): number {
    return this.offset + this.entries.length;
  }

  /**
   * Sequence number of the oldest notification still held. Exceeds
   * lastSequence by one when nothing is held.
   */
  get firstSequence(): number {
    return this.offset + 1;
  }

  get size(): number {
    return this.entries.length;
  }

  /**
   * Append a notification. Returns the stored entry.
   */
  append(event: RegistryEvent): Notification {
    const notification: Notification = {
      sequence: this.lastSequence + 1,
      emittedAt: this.now().toISOString(),
      event,
    };
    this.entries.push(notification);
    this.trim();
    return notification;
  }

  /**
   * Notifications with sequence greater than `sequence`, oldest first.
   * Entries already trimmed are not returned.
   */
  since(sequence: number, limit?: number): Notification[] {
    const start = Math.max(0, sequence - this.offset);
    const end = limit !== undefined ? start + limit : undefined;
    return this.entries.slice(start, end);
  }

  /**
   * Register a sink. It receives every notification appended from now on
   * (or every held notification, with `fromStart`).
   * Returns an unsubscribe function.
   */
  subscribe(sink: EventSink, options: { fromStart?: boolean } = {}): () => void {
    const subscription: Subscription = {
      sink,
      cursor: options.fromStart ? this.offset : this.lastSequence,
    };
    this.subscriptions.add(subscription);
    return () => {
      this.subscriptions.delete(subscription);
    };
  }

  get subscriberCount(): number {
    return this.subscriptions.size;
  }

  /**
   * Deliver pending notifications to every sink. Concurrent calls coalesce:
   * a flush requested while one is running triggers one more pass.
   */
  flush(): Promise<void> {
    if (this.flushing) {
      this.flushRequested = true;
      return this.flushing;
    }

    this.flushRequested = false;
    // finally() callbacks always run after this assignment, even when
    // deliverAll settles without awaiting anything.
    const run = this.deliverAll().finally(() => {
      this.flushing = null;
      if (this.flushRequested) {
        this.flush().catch((err: unknown) => {
          console.error('Notification flush failed:', err);
        });
      }
    });
    this.flushing = run;
    return run;
  }

  /**
   * Wait for any in-flight delivery to finish.
   */
  async drain(): Promise<void> {
    while (this.flushing) {
      await this.flushing;
    }
  }

  private async deliverAll(): Promise<void> {
    do {
      this.flushRequested = false;
      for (const subscription of this.subscriptions) {
        await this.deliverPending(subscription);
      }
      this.trim();
    } while (this.flushRequested);
  }

  private async deliverPending(subscription: Subscription): Promise<void> {
    for (const notification of this.since(subscription.cursor)) {
      // Unsubscribed mid-flush.
      if (!this.subscriptions.has(subscription)) return;
      try {
        await subscription.sink.deliver(notification);
        subscription.cursor = notification.sequence;
      } catch (error) {
        console.warn(
          `Notification ${notification.sequence} (${notification.event.type}) delivery failed, will retry:`,
          error instanceof Error ? error.message : error
        );
        return;
      }
    }
  }

  /**
   * Drop entries beyond the retention bound that every sink has received.
   */
  private trim(): void {
    const excess = this.entries.length - this.retain;
    if (excess <= 0) return;

    let delivered = this.lastSequence;
    for (const subscription of this.subscriptions) {
      delivered = Math.min(delivered, subscription.cursor);
    }

    const count = Math.min(excess, delivered - this.offset);
    if (count > 0) {
      this.entries.splice(0, count);
      this.offset += count;
    }
  }
}
