/**
 * Event plumbing for the registry.
 * Event factories plus a minimal typed emitter that can act as an EventSink.
 * No business logic.
 */

import type { DatasetRecord, DatasetId, CounterKind } from '../types/DatasetRecord.js';
import type {
  EventSink,
  Notification,
  RegistryEvent,
  RegistryEventType,
} from '../types/events.js';

export type EventHandler<E extends RegistryEvent = RegistryEvent> = (event: E, notification: Notification) => void;

type EventOfType<T extends RegistryEventType> = Extract<RegistryEvent, { type: T }>;

function isEventOfType<T extends RegistryEventType>(event: RegistryEvent, type: T): event is EventOfType<T> {
  return event.type === type;
}

/**
 * Typed in-process emitter. Subscribe it to a NotificationLog to fan
 * notifications out to callbacks keyed by event type.
 */
export class RegistryEventEmitter implements EventSink {
  private listeners = new Map<RegistryEventType | '*', Set<EventHandler>>();

  /**
   * Listen for one event type. Returns an unsubscribe function.
   */
  on<T extends RegistryEventType>(type: T, handler: EventHandler<EventOfType<T>>): () => void {
    return this.add(type, (event, notification) => {
      if (isEventOfType(event, type)) {
        handler(event, notification);
      }
    });
  }

  /**
   * Listen for every event.
   */
  onAny(handler: EventHandler): () => void {
    return this.add('*', handler);
  }

  private add(key: RegistryEventType | '*', handler: EventHandler): () => void {
    let eventListeners = this.listeners.get(key);
    if (!eventListeners) {
      eventListeners = new Set();
      this.listeners.set(key, eventListeners);
    }
    eventListeners.add(handler);

    return () => {
      const current = this.listeners.get(key);
      if (current) {
        current.delete(handler);
        if (current.size === 0) {
          this.listeners.delete(key);
        }
      }
    };
  }

  deliver(notification: Notification): void {
    const { event } = notification;
    for (const key of [event.type, '*'] as const) {
      const eventListeners = this.listeners.get(key);
      if (!eventListeners) continue;
      eventListeners.forEach(handler => {
        try {
          handler(event, notification);
        } catch (error) {
          console.error(`Error in event listener for ${event.type}:`, error);
        }
      });
    }
  }

  getEventNames(): Array<RegistryEventType | '*'> {
    return Array.from(this.listeners.keys());
  }

  listenerCount(type: RegistryEventType | '*'): number {
    return this.listeners.get(type)?.size || 0;
  }
}

/**
 * Event factory functions
 */
export const EventFactory = {
  uploaded(record: DatasetRecord): RegistryEvent {
    return {
      type: 'Uploaded',
      id: record.id,
      owner: record.owner,
      datasetRef: record.datasetRef,
      analysisRef: record.analysisRef,
      isPublic: record.isPublic,
    };
  },

  analysisUpdated(id: DatasetId, newAnalysisRef: string): RegistryEvent {
    return { type: 'AnalysisUpdated', id, newAnalysisRef };
  },

  visibilityChanged(id: DatasetId, newIsPublic: boolean): RegistryEvent {
    return { type: 'VisibilityChanged', id, newIsPublic };
  },

  counterIncremented(id: DatasetId, counter: CounterKind): RegistryEvent {
    switch (counter) {
      case 'views':
        return { type: 'Viewed', id };
      case 'downloads':
        return { type: 'Downloaded', id };
      case 'citations':
        return { type: 'Cited', id };
    }
  },
};
