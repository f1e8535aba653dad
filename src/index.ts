/**
 * Typed client for the Qdrant vector database REST API.
 *
 * @module qdrant-http-client
 *
 * @example Basic Client Usage
 * ```typescript
 * import { QdrantClient, Distance } from 'qdrant-http-client';
 *
 * // QDRANT_URL, QDRANT_API_KEY, QDRANT_LOG_LEVEL
 * const client = QdrantClient.fromEnv();
 *
 * await client.createCollection('docs', 4, { distance: Distance.Dot });
 * await client.upsertPoints('docs', [
 *   { id: 1, vector: [0.05, 0.61, 0.76, 0.74], payload: { city: 'Berlin' } },
 * ]);
 * const hits = await client.searchPoints('docs', [0.2, 0.1, 0.9, 0.7], 3);
 * ```
 *
 * @example Cancellation
 * ```typescript
 * const controller = new AbortController();
 * const pending = client.listCollections({ signal: controller.signal });
 * controller.abort(); // pending rejects with CancelledError
 * ```
 */

// ============================================================================
// Core Client
// ============================================================================

export { QdrantClient } from './client.js';
export type { QdrantClientOptions } from './client.js';

// ============================================================================
// Configuration
// ============================================================================

export {
  QdrantConfigBuilder,
  createConfigFromEnv,
  createDefaultConfig,
  validateConfig,
  sanitizeConfigForLogging,
  DEFAULT_BASE_URL,
  DEFAULT_LOG_LEVEL,
} from './config.js';
export type { QdrantConfig } from './config.js';

// ============================================================================
// Errors
// ============================================================================

export {
  QdrantError,
  TransportError,
  CancelledError,
  RequestFailedError,
  DecodeError,
  ConflictError,
  NotFoundError,
  ValidationError,
  ConfigurationError,
  extractServerStatus,
  isQdrantError,
  isTransportError,
} from './errors.js';
export type { QdrantErrorType } from './errors.js';

// ============================================================================
// Types
// ============================================================================

export {
  PointId,
  Distance,
  isValidNumericId,
  isNumericPointId,
  isUuidPointId,
  pointIdEquals,
  formatPointId,
} from './types.js';
export type {
  JsonValue,
  Payload,
  Point,
  ScoredPoint,
  CreateCollectionOptions,
  CollectionStatus,
  CollectionDescription,
  RequestOptions,
} from './types.js';

// ============================================================================
// Transport
// ============================================================================

export { FetchTransport } from './http/transport.js';
export type {
  HttpMethod,
  HttpRequest,
  HttpResponse,
  Transport,
  FetchFunction,
  FetchTransportOptions,
} from './http/transport.js';

// ============================================================================
// Operations and Codec
// ============================================================================

export * from './collection/index.js';
export * from './points/index.js';
export * from './search/index.js';

// ============================================================================
// Observability
// ============================================================================

export * from './observability/index.js';

// ============================================================================
// Default Export
// ============================================================================

export { QdrantClient as default } from './client.js';
