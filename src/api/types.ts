/**
 * Types for the HTTP API layer.
 *
 * Request/response structures for the REST API. Business rules live in
 * DatasetRegistry; nothing here decides who may do what.
 */

import type { DatasetRecord, DatasetId, CounterKind } from '../types/DatasetRecord.js';
import type { Notification } from '../types/events.js';

// ============================================================================
// Error Response
// ============================================================================

/**
 * Standard error response.
 */
export interface ApiError {
  /** Error type/code */
  error: string;
  /** Human-readable message */
  message: string;
  /** Additional details (optional) */
  details?: unknown;
}

// ============================================================================
// Dataset Endpoints
// ============================================================================

/**
 * Request to register a dataset.
 */
export interface UploadDatasetRequest {
  datasetRef: string;
  /** Empty when no analysis exists yet */
  analysisRef?: string;
  isPublic: boolean;
}

export interface UpdateAnalysisRequest {
  analysisRef: string;
}

export interface SetVisibilityRequest {
  isPublic: boolean;
}

/**
 * Paging query accepted by list endpoints. Values arrive as strings.
 */
export interface ListDatasetsQuery {
  offset?: string;
  limit?: string;
}

export interface UploadDatasetResponse {
  id: DatasetId;
}

export interface DatasetResponse {
  dataset: DatasetRecord;
}

export interface ListDatasetsResponse {
  datasets: DatasetRecord[];
  /** Matching records before paging */
  total: number;
  offset: number;
  limit: number;
}

export interface CountResponse {
  /** Every record ever registered, private ones included */
  count: number;
  public: number;
}

export interface MutationResponse {
  success: true;
  id: DatasetId;
}

export interface CounterResponse {
  id: DatasetId;
  counter: CounterKind;
  /** False when the caller may not touch this record's counters */
  applied: boolean;
}

// ============================================================================
// Notification Endpoints
// ============================================================================

export interface ListEventsQuery {
  since?: string;
  limit?: string;
}

export interface ListEventsResponse {
  /** Notifications about records the caller may read */
  notifications: Notification[];
  /** Oldest sequence number still held; earlier ones were trimmed */
  firstSequence: number;
  /** Highest sequence number assigned so far */
  lastSequence: number;
}

// ============================================================================
// Health
// ============================================================================

export interface HealthResponse {
  status: 'ok' | 'degraded' | 'error';
  timestamp: string;
  components?: {
    datasets?: { total: number; public: number };
    notifications?: { firstSequence: number; lastSequence: number; subscribers: number };
    storage?: { driver: string };
  };
}
