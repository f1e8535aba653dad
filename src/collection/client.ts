/**
 * Collection lifecycle operations.
 *
 * Create and delete are guarded by an existence check made by the client
 * itself: create never reaches the server for a name that already exists,
 * delete never reaches it for a name that does not.
 *
 * @module collection/client
 */

import { z } from 'zod';
import { ConflictError, NotFoundError, RequestFailedError } from '../errors.js';
import { decodeEnvelope, segment, type HttpClient } from '../http/request.js';
import type { Logger } from '../observability/logging.js';
import {
  Distance,
  type CollectionDescription,
  type CreateCollectionOptions,
  type RequestOptions,
} from '../types.js';
import { requireCollectionName, requirePositiveInteger } from '../validation.js';

/** Distance sent on create unless overridden. */
export const DEFAULT_DISTANCE = Distance.Cosine;

/** Whether vectors are stored on disk unless overridden. */
export const DEFAULT_ON_DISK = true;

const existsEnvelope = z.object({
  result: z.object({ exists: z.boolean() }),
});

const acknowledgedEnvelope = z.object({
  result: z.boolean(),
});

const listEnvelope = z.object({
  result: z.object({
    collections: z.array(z.object({ name: z.string() })),
  }),
});

const countEnvelope = z.object({
  result: z.object({
    points_count: z.number().int().nonnegative(),
  }),
});

const vectorParamsSchema = z.object({
  size: z.number().int().positive(),
  distance: z.nativeEnum(Distance),
});

const describeEnvelope = z.object({
  result: z.object({
    status: z.enum(['green', 'yellow', 'grey', 'red']),
    points_count: z.number().int().nonnegative(),
    indexed_vectors_count: z.number().int().nonnegative().nullish(),
    segments_count: z.number().int().nonnegative().nullish(),
    config: z
      .object({
        params: z.object({ vectors: z.unknown() }).partial().optional(),
      })
      .optional(),
  }),
});

/**
 * Request body sent on create.
 */
export interface CreateCollectionBody {
  vectors: {
    size: number;
    distance: Distance;
    on_disk: boolean;
  };
}

/**
 * Collection lifecycle operations against one endpoint.
 */
export class CollectionOperations {
  constructor(
    private readonly http: HttpClient,
    private readonly logger: Logger
  ) {}

  /**
   * Checks whether a collection exists.
   *
   * A missing collection is `false`, never an error. Servers without the
   * `/exists` endpoint answer it with 404; for those the listing is used.
   */
  async exists(name: string, options: RequestOptions = {}): Promise<boolean> {
    requireCollectionName(name);
    const operation = 'collectionExists';
    this.logger.info('Checking collection existence', { collection: name });

    const response = await this.http.call('GET', `/collections/${segment(name)}/exists`, {
      operation,
      signal: options.signal,
    });

    if (response.status === 404) {
      this.logger.debug('Exists endpoint unavailable, falling back to listing', {
        collection: name,
      });
      const names = await this.list(options);
      return names.includes(name);
    }

    if (!response.ok) {
      throw RequestFailedError.fromResponse(response.status, response.body, operation);
    }

    return decodeEnvelope(existsEnvelope, response.body, operation).result.exists;
  }

  /**
   * Creates a collection of `size`-dimensional vectors.
   *
   * @throws {ConflictError} If the collection already exists; no create request is sent.
   * @throws {RequestFailedError} If the server rejects the request or answers `result: false`.
   */
  async create(
    name: string,
    size: number,
    createOptions: CreateCollectionOptions = {},
    options: RequestOptions = {}
  ): Promise<void> {
    requireCollectionName(name);
    requirePositiveInteger(size, 'dimensionality');
    const operation = 'createCollection';
    this.logger.info('Creating collection', { collection: name, size });

    if (await this.exists(name, options)) {
      this.logger.error('Collection already exists', { collection: name });
      throw new ConflictError(name);
    }

    const body: CreateCollectionBody = {
      vectors: {
        size,
        distance: createOptions.distance ?? DEFAULT_DISTANCE,
        on_disk: createOptions.onDisk ?? DEFAULT_ON_DISK,
      },
    };

    const raw = await this.http.send('PUT', `/collections/${segment(name)}`, {
      operation,
      body,
      signal: options.signal,
    });

    if (!decodeEnvelope(acknowledgedEnvelope, raw, operation).result) {
      throw new RequestFailedError(`Failed to create collection '${name}'`, {
        details: { operation, collection: name },
      });
    }
  }

  /**
   * Deletes a collection and all its points.
   *
   * @throws {NotFoundError} If the collection does not exist; no delete request is sent.
   * @throws {RequestFailedError} If the server rejects the request or answers `result: false`.
   */
  async delete(name: string, options: RequestOptions = {}): Promise<void> {
    requireCollectionName(name);
    const operation = 'deleteCollection';
    this.logger.info('Deleting collection', { collection: name });

    if (!(await this.exists(name, options))) {
      this.logger.error('Collection not found', { collection: name });
      throw new NotFoundError(name);
    }

    const raw = await this.http.send('DELETE', `/collections/${segment(name)}`, {
      operation,
      signal: options.signal,
    });

    if (!decodeEnvelope(acknowledgedEnvelope, raw, operation).result) {
      throw new RequestFailedError(`Failed to delete collection '${name}'`, {
        details: { operation, collection: name },
      });
    }
  }

  /**
   * Lists collection names. No collections is an empty array.
   */
  async list(options: RequestOptions = {}): Promise<string[]> {
    const operation = 'listCollections';
    this.logger.info('Listing collections');

    const raw = await this.http.send('GET', '/collections', {
      operation,
      signal: options.signal,
    });

    return decodeEnvelope(listEnvelope, raw, operation).result.collections.map((c) => c.name);
  }

  /**
   * Returns the number of points stored in a collection.
   */
  async pointsCount(name: string, options: RequestOptions = {}): Promise<number> {
    requireCollectionName(name);
    const operation = 'collectionInfo';
    this.logger.info('Getting collection info', { collection: name });

    const raw = await this.http.send('GET', `/collections/${segment(name)}`, {
      operation,
      signal: options.signal,
    });

    return decodeEnvelope(countEnvelope, raw, operation).result.points_count;
  }

  /**
   * Returns status, counters and vector configuration of a collection.
   */
  async describe(name: string, options: RequestOptions = {}): Promise<CollectionDescription> {
    requireCollectionName(name);
    const operation = 'describeCollection';
    this.logger.info('Describing collection', { collection: name });

    const raw = await this.http.send('GET', `/collections/${segment(name)}`, {
      operation,
      signal: options.signal,
    });

    const { result } = decodeEnvelope(describeEnvelope, raw, operation);

    // named-vector collections have no single size/distance
    const vectors = vectorParamsSchema.safeParse(result.config?.params?.vectors);

    return {
      name,
      status: result.status,
      pointsCount: result.points_count,
      indexedVectorsCount: result.indexed_vectors_count ?? undefined,
      segmentsCount: result.segments_count ?? undefined,
      vectorSize: vectors.success ? vectors.data.size : undefined,
      distance: vectors.success ? vectors.data.distance : undefined,
    };
  }
}
