/**
 * Qdrant client implementation.
 *
 * A stateless facade over one REST endpoint. Each operation builds one JSON
 * request, issues one HTTP call and decodes one JSON response.
 *
 * @module client
 */

import { CollectionOperations } from './collection/client.js';
import {
  createConfigFromEnv,
  createDefaultConfig,
  sanitizeConfigForLogging,
  validateConfig,
  type QdrantConfig,
} from './config.js';
import { ValidationError } from './errors.js';
import { HttpClient } from './http/request.js';
import { FetchTransport, type Transport } from './http/transport.js';
import { createLogger, type Logger } from './observability/logging.js';
import { PointOperations } from './points/operations.js';
import { SearchOperations } from './search/client.js';
import type {
  CollectionDescription,
  CreateCollectionOptions,
  Point,
  PointId,
  RequestOptions,
  ScoredPoint,
} from './types.js';

/**
 * Collaborators that can be swapped out.
 */
export interface QdrantClientOptions {
  /** HTTP transport; defaults to {@link FetchTransport}. */
  transport?: Transport;
  /** Logger; defaults to a console logger at the configured level. */
  logger?: Logger;
}

/**
 * Main Qdrant client.
 *
 * Safe to share between concurrent callers: the base URL and credential are
 * fixed at construction and no per-call state is kept. {@link withApiKey}
 * returns a new client rather than mutating this one.
 *
 * @example
 * ```typescript
 * const client = new QdrantClient('http://localhost:6333').withApiKey('test-key');
 *
 * await client.createCollection('docs', 4);
 * await client.upsertPoints('docs', [
 *   { id: 1, vector: [0.05, 0.61, 0.76, 0.74], payload: { city: 'Berlin' } },
 * ]);
 * const hits = await client.searchPoints('docs', [0.2, 0.1, 0.9, 0.7], 3);
 * ```
 */
export class QdrantClient {
  private readonly config: QdrantConfig;
  private readonly transport: Transport;
  private readonly http: HttpClient;
  private readonly logger: Logger;
  private readonly collections: CollectionOperations;
  private readonly points: PointOperations;
  private readonly searcher: SearchOperations;

  /**
   * Creates a new client. No network I/O happens here.
   * @param config - Base URL, or a full configuration.
   * @throws {ConfigurationError} If the configuration is invalid.
   */
  constructor(config: string | QdrantConfig, options: QdrantClientOptions = {}) {
    const resolved: QdrantConfig =
      typeof config === 'string' ? { ...createDefaultConfig(), baseUrl: config } : { ...config };
    validateConfig(resolved);

    this.config = resolved;
    this.transport = options.transport ?? new FetchTransport();
    this.logger = options.logger ?? createLogger(resolved.logLevel);
    this.http = new HttpClient({
      baseUrl: resolved.baseUrl,
      apiKey: resolved.apiKey,
      transport: this.transport,
      logger: this.logger,
    });
    this.collections = new CollectionOperations(this.http, this.logger);
    this.points = new PointOperations(this.http, this.logger);
    this.searcher = new SearchOperations(this.http, this.logger);

    this.logger.debug('Client created', sanitizeConfigForLogging(resolved));
  }

  /**
   * Creates a client from environment variables.
   *
   * Environment variables:
   * - QDRANT_URL: REST endpoint
   * - QDRANT_API_KEY: API key for authentication
   * - QDRANT_LOG_LEVEL: debug | info | warn | error | off
   *
   * @throws {ConfigurationError} If environment configuration is invalid.
   */
  static fromEnv(
    env: Record<string, string | undefined> = process.env,
    options: QdrantClientOptions = {}
  ): QdrantClient {
    return new QdrantClient(createConfigFromEnv(env).build(), options);
  }

  /**
   * The base URL exactly as configured.
   */
  get baseUrl(): string {
    return this.http.baseUrl;
  }

  /**
   * Returns a client that sends `apiKey` in the `api-key` header of every
   * request. Shares this client's transport and logger.
   */
  withApiKey(apiKey: string): QdrantClient {
    if (apiKey.length === 0) {
      throw new ValidationError('API key cannot be empty');
    }
    return new QdrantClient(
      { ...this.config, apiKey },
      { transport: this.transport, logger: this.logger }
    );
  }

  /**
   * Whether requests carry a credential.
   */
  hasApiKey(): boolean {
    return this.http.hasApiKey();
  }

  // ==========================================================================
  // Collections
  // ==========================================================================

  /**
   * Whether the collection exists. A missing collection is `false`, not an error.
   */
  async collectionExists(name: string, options?: RequestOptions): Promise<boolean> {
    return this.collections.exists(name, options);
  }

  /**
   * Creates a collection with the given dimensionality (Cosine distance,
   * vectors on disk, unless overridden).
   * @throws {ConflictError} If it already exists.
   */
  async createCollection(
    name: string,
    dimensionality: number,
    createOptions?: CreateCollectionOptions,
    options?: RequestOptions
  ): Promise<void> {
    return this.collections.create(name, dimensionality, createOptions, options);
  }

  /**
   * Deletes a collection.
   * @throws {NotFoundError} If it does not exist.
   */
  async deleteCollection(name: string, options?: RequestOptions): Promise<void> {
    return this.collections.delete(name, options);
  }

  /**
   * Names of all collections.
   */
  async listCollections(options?: RequestOptions): Promise<string[]> {
    return this.collections.list(options);
  }

  /**
   * Number of points in the collection.
   */
  async collectionInfo(name: string, options?: RequestOptions): Promise<number> {
    return this.collections.pointsCount(name, options);
  }

  /**
   * Status, counters and vector configuration of the collection.
   */
  async describeCollection(name: string, options?: RequestOptions): Promise<CollectionDescription> {
    return this.collections.describe(name, options);
  }

  // ==========================================================================
  // Points
  // ==========================================================================

  /**
   * Inserts or replaces points and waits until the server has applied them.
   */
  async upsertPoints(
    collectionName: string,
    points: readonly Point[],
    options?: RequestOptions
  ): Promise<void> {
    return this.points.upsert(collectionName, points, options);
  }

  async getPoint(collectionName: string, id: PointId, options?: RequestOptions): Promise<Point> {
    return this.points.getOne(collectionName, id, options);
  }

  async getPoints(
    collectionName: string,
    ids: readonly PointId[],
    options?: RequestOptions
  ): Promise<Point[]> {
    return this.points.getMany(collectionName, ids, options);
  }

  /**
   * Deletes points and waits until the server has applied the deletion.
   */
  async deletePoints(
    collectionName: string,
    ids: readonly PointId[],
    options?: RequestOptions
  ): Promise<void> {
    return this.points.delete(collectionName, ids, options);
  }

  // ==========================================================================
  // Search
  // ==========================================================================

  /**
   * Nearest-neighbour search. Hits carry payload and vector, in server order.
   * @param scoreThreshold - Server-side cutoff, 0.0 when omitted.
   */
  async searchPoints(
    collectionName: string,
    vector: readonly number[],
    limit: number,
    scoreThreshold?: number,
    options?: RequestOptions
  ): Promise<ScoredPoint[]> {
    return this.searcher.search(collectionName, vector, limit, scoreThreshold, options);
  }
}

/**
 * Export default client constructor.
 */
export default QdrantClient;
