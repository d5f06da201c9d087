/**
 * DatasetRecord — one dataset's entry in the registry.
 *
 * A record pins an immutable content identifier for the raw dataset and a
 * mutable content identifier for its derived analysis. Ownership, creation
 * time and the dataset reference never change once assigned.
 */

/**
 * Opaque, already-authenticated caller identity.
 * Compared by equality only.
 */
export type ActorId = string;

/**
 * Sequentially assigned record identifier (0, 1, 2, ...).
 */
export type DatasetId = number;

/**
 * Usage counters tracked per record.
 */
export type CounterKind = 'views' | 'downloads' | 'citations';

/**
 * A registry record.
 */
export interface DatasetRecord {
  /** Sequential id, immutable */
  id: DatasetId;
  /** Content identifier of the raw dataset; globally unique, immutable */
  datasetRef: string;
  /** Content identifier of the derived analysis (may be empty) */
  analysisRef: string;
  /** Actor that uploaded the record */
  owner: ActorId;
  /** Whether non-owners may read the record */
  isPublic: boolean;
  /** Creation timestamp (ISO 8601) */
  createdAt: string;
  views: number;
  downloads: number;
  citations: number;
}

/**
 * Fields a caller supplies when uploading.
 */
export interface UploadInput {
  datasetRef: string;
  analysisRef: string;
  isPublic: boolean;
}

/**
 * Create a fresh record with zeroed counters.
 */
export function createDatasetRecord(
  id: DatasetId,
  owner: ActorId,
  input: UploadInput,
  createdAt: string = new Date().toISOString()
): DatasetRecord {
  return {
    id,
    datasetRef: input.datasetRef,
    analysisRef: input.analysisRef,
    owner,
    isPublic: input.isPublic,
    createdAt,
    views: 0,
    downloads: 0,
    citations: 0,
  };
}

/**
 * Value copy of a record. Records only hold primitives, so a shallow
 * spread is a full copy.
 */
export function copyRecord(record: DatasetRecord): DatasetRecord {
  return { ...record };
}

/**
 * Whether a string is usable as a content identifier.
 */
export function isNonEmptyRef(value: string): boolean {
  return value.length > 0;
}
