/**
 * Point operations: upsert, fetch by id, delete by id.
 *
 * Writes are sent with `wait=true`, so they resolve only once the server has
 * applied them.
 */

import { z } from 'zod';
import { RequestFailedError, ValidationError } from '../errors.js';
import { decodeEnvelope, segment, type HttpClient } from '../http/request.js';
import type { Logger } from '../observability/logging.js';
import { formatPointId, type Point, type PointId, type RequestOptions } from '../types.js';
import { requireCollectionName, requirePointId, requireVector } from '../validation.js';
import { encodePoint, fromWirePoint, wirePointSchema, type WirePoint } from './codec.js';

/** Status the server reports for an applied write. */
export const STATUS_OK = 'ok';

const statusEnvelope = z.object({
  status: z.string(),
});

const pointEnvelope = z.object({
  result: wirePointSchema,
});

const pointsEnvelope = z.object({
  result: z.array(wirePointSchema),
});

/**
 * Request body for upsert.
 */
export interface UpsertPointsBody {
  points: WirePoint[];
}

/**
 * Request body for a batch fetch.
 */
export interface GetPointsBody {
  ids: PointId[];
  with_payload: true;
  with_vector: true;
}

/**
 * Request body for delete.
 */
export interface DeletePointsBody {
  points: PointId[];
}

/**
 * Point operations against one endpoint.
 */
export class PointOperations {
  constructor(
    private readonly http: HttpClient,
    private readonly logger: Logger
  ) {}

  /**
   * Inserts or replaces points, in one request.
   *
   * @throws {RequestFailedError} If the server rejects the batch (for example a
   * vector of the wrong dimensionality) or reports a status other than "ok".
   */
  async upsert(
    collectionName: string,
    points: readonly Point[],
    options: RequestOptions = {}
  ): Promise<void> {
    requireCollectionName(collectionName);
    if (points.length === 0) {
      throw new ValidationError('Points array cannot be empty');
    }
    points.forEach((point, index) => {
      requirePointId(point.id);
      requireVector(point.vector, `points[${index}].vector`);
    });

    const operation = 'upsertPoints';
    this.logger.info('Upserting points', {
      collection: collectionName,
      count: points.length,
    });

    const body: UpsertPointsBody = {
      points: points.map((point) => encodePoint(point)),
    };

    const raw = await this.http.send(
      'PUT',
      `/collections/${segment(collectionName)}/points?wait=true`,
      { operation, body, signal: options.signal }
    );

    const { status } = decodeEnvelope(statusEnvelope, raw, operation);
    if (status !== STATUS_OK) {
      throw new RequestFailedError(`Failed to upsert points. Status = ${status}`, {
        serverStatus: status,
        details: { operation, collection: collectionName },
      });
    }
  }

  /**
   * Fetches a single point.
   *
   * @throws {RequestFailedError} If the server does not know the id (HTTP 404).
   */
  async getOne(collectionName: string, id: PointId, options: RequestOptions = {}): Promise<Point> {
    requireCollectionName(collectionName);
    requirePointId(id);
    const operation = 'getPoint';
    this.logger.info('Getting point', { collection: collectionName, id: formatPointId(id) });

    const raw = await this.http.send(
      'GET',
      `/collections/${segment(collectionName)}/points/${segment(id)}`,
      { operation, signal: options.signal }
    );

    return fromWirePoint(decodeEnvelope(pointEnvelope, raw, operation).result);
  }

  /**
   * Fetches points by id. Ids the server does not know are simply absent
   * from the result.
   */
  async getMany(
    collectionName: string,
    ids: readonly PointId[],
    options: RequestOptions = {}
  ): Promise<Point[]> {
    requireCollectionName(collectionName);
    ids.forEach(requirePointId);
    if (ids.length === 0) {
      return [];
    }

    const operation = 'getPoints';
    this.logger.info('Getting points', { collection: collectionName, count: ids.length });

    const body: GetPointsBody = {
      ids: [...ids],
      with_payload: true,
      with_vector: true,
    };

    const raw = await this.http.send('POST', `/collections/${segment(collectionName)}/points`, {
      operation,
      body,
      signal: options.signal,
    });

    return decodeEnvelope(pointsEnvelope, raw, operation).result.map(fromWirePoint);
  }

  /**
   * Deletes points by id. Unknown ids are ignored by the server; no ids
   * means no request.
   */
  async delete(
    collectionName: string,
    ids: readonly PointId[],
    options: RequestOptions = {}
  ): Promise<void> {
    requireCollectionName(collectionName);
    ids.forEach(requirePointId);
    if (ids.length === 0) {
      return;
    }

    const operation = 'deletePoints';
    this.logger.info('Deleting points', { collection: collectionName, count: ids.length });

    const body: DeletePointsBody = {
      points: [...ids],
    };

    await this.http.send(
      'POST',
      `/collections/${segment(collectionName)}/points/delete?wait=true`,
      { operation, body, signal: options.signal }
    );
  }
}
