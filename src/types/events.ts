/**
 * Notification types emitted by the registry after a state change commits.
 */

import type { ActorId, DatasetId } from './DatasetRecord.js';

export interface UploadedEvent {
  type: 'Uploaded';
  id: DatasetId;
  owner: ActorId;
  datasetRef: string;
  analysisRef: string;
  isPublic: boolean;
}

export interface AnalysisUpdatedEvent {
  type: 'AnalysisUpdated';
  id: DatasetId;
  newAnalysisRef: string;
}

export interface VisibilityChangedEvent {
  type: 'VisibilityChanged';
  id: DatasetId;
  newIsPublic: boolean;
}

export interface ViewedEvent {
  type: 'Viewed';
  id: DatasetId;
}

export interface DownloadedEvent {
  type: 'Downloaded';
  id: DatasetId;
}

export interface CitedEvent {
  type: 'Cited';
  id: DatasetId;
}

export type RegistryEvent =
  | UploadedEvent
  | AnalysisUpdatedEvent
  | VisibilityChangedEvent
  | ViewedEvent
  | DownloadedEvent
  | CitedEvent;

export type RegistryEventType = RegistryEvent['type'];

/**
 * A notification as stored in the outbound log.
 */
export interface Notification {
  /** 1-based, gap-free position in the log */
  sequence: number;
  /** When the notification was appended (ISO 8601) */
  emittedAt: string;
  event: RegistryEvent;
}

/**
 * Receiver of registry notifications.
 * Throwing (or rejecting) marks the delivery as failed; it is retried later.
 */
export interface EventSink {
  deliver(notification: Notification): void | Promise<void>;
}
