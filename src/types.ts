/**
 * Core data types for the Qdrant REST client.
 *
 * @module types
 */

import { ValidationError } from './errors.js';

// ============================================================================
// Point Identifiers
// ============================================================================

/**
 * Point identifier: an unsigned integer or a UUID string.
 *
 * The runtime type is the variant tag. On the wire both variants are bare JSON
 * values, so a numeric id stays a number and a textual id stays a string
 * through every encode/decode.
 *
 * Numeric ids are exact only up to `Number.MAX_SAFE_INTEGER` (2^53 - 1). Larger
 * ids are rejected when built and when decoded, and a response carrying one
 * fails as a whole with DecodeError; use UUID ids for such ranges.
 */
export type PointId = number | string;

/**
 * Constructors and predicates for {@link PointId}.
 */
export const PointId = {
  /**
   * Numeric id. Must be a non-negative safe integer.
   */
  num(value: number): PointId {
    if (!isValidNumericId(value)) {
      throw new ValidationError(`Invalid numeric point id: ${value}`, { pointId: value });
    }
    return value;
  },

  /**
   * Textual (UUID) id.
   */
  uuid(value: string): PointId {
    if (value.length === 0) {
      throw new ValidationError('Point id string cannot be empty');
    }
    return value;
  },
} as const;

/**
 * Whether the number is usable as a numeric point id.
 */
export function isValidNumericId(value: number): boolean {
  return Number.isSafeInteger(value) && value >= 0;
}

export function isNumericPointId(id: PointId): id is number {
  return typeof id === 'number';
}

export function isUuidPointId(id: PointId): id is string {
  return typeof id === 'string';
}

/**
 * Variant-exact equality: `1` and `"1"` are different ids.
 */
export function pointIdEquals(a: PointId, b: PointId): boolean {
  return typeof a === typeof b && a === b;
}

/**
 * Formats an id for use in a URL path or a log line.
 */
export function formatPointId(id: PointId): string {
  return typeof id === 'number' ? id.toString(10) : id;
}

// ============================================================================
// Payload Types
// ============================================================================

/**
 * Any JSON value.
 */
export type JsonValue =
  | string
  | number
  | boolean
  | null
  | JsonValue[]
  | { [key: string]: JsonValue };

/**
 * Point payload - arbitrary JSON data attached to a point.
 * Keys are caller data and are sent as-is.
 */
export type Payload = Record<string, JsonValue>;

// ============================================================================
// Point Types
// ============================================================================

/**
 * A single vector with optional payload.
 */
export interface Point {
  /** Unique identifier within the collection. */
  readonly id: PointId;
  /** Dense vector; its length must match the collection's size. */
  readonly vector: number[];
  /** Optional payload data. */
  readonly payload?: Payload;
}

/**
 * Search hit. `vector` and `payload` are present when the search asked for them.
 */
export interface ScoredPoint {
  readonly id: PointId;
  /** Similarity score; its direction depends on the collection's distance. */
  readonly score: number;
  readonly vector?: number[];
  readonly payload?: Payload;
  /** Point version reported by the server. */
  readonly version?: number;
}

// ============================================================================
// Collections
// ============================================================================

/**
 * Distance metric for vector similarity calculation.
 */
export enum Distance {
  /** Cosine similarity. Higher is better. */
  Cosine = 'Cosine',
  /** Euclidean distance. Lower is better. */
  Euclid = 'Euclid',
  /** Dot product. Higher is better. */
  Dot = 'Dot',
  /** Manhattan distance. Lower is better. */
  Manhattan = 'Manhattan',
}

/**
 * Overrides for the fixed vector configuration sent on create.
 */
export interface CreateCollectionOptions {
  /** @default Distance.Cosine */
  distance?: Distance;
  /** Store vectors on disk. @default true */
  onDisk?: boolean;
}

/**
 * Collection health as reported by the server.
 */
export type CollectionStatus = 'green' | 'yellow' | 'grey' | 'red';

/**
 * Snapshot of a collection's state returned by `describeCollection`.
 */
export interface CollectionDescription {
  readonly name: string;
  readonly status: CollectionStatus;
  readonly pointsCount: number;
  readonly indexedVectorsCount?: number;
  readonly segmentsCount?: number;
  /** Configured dimensionality, when the collection has a single unnamed vector. */
  readonly vectorSize?: number;
  readonly distance?: Distance;
}

// ============================================================================
// Request Options
// ============================================================================

/**
 * Per-call options accepted by every client operation.
 */
export interface RequestOptions {
  /** Aborts the in-flight HTTP call; the operation rejects with CancelledError. */
  signal?: AbortSignal;
}
