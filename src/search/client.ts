/**
 * Vector similarity search.
 *
 * Result policy:
 * - `result` absent: empty array. Some server builds omit the field when
 *   nothing matched.
 * - `result` present but not an array of hits: DecodeError.
 * - non-2xx status: RequestFailedError; failed exchange: TransportError.
 *   Neither is turned into an empty result.
 *
 * Hits are returned in server order and are not filtered again by score.
 *
 * @module search/client
 */

import { z } from 'zod';
import { decodeEnvelope, segment, type HttpClient } from '../http/request.js';
import type { Logger } from '../observability/logging.js';
import type { RequestOptions, ScoredPoint } from '../types.js';
import {
  requireCollectionName,
  requireFiniteNumber,
  requirePositiveInteger,
  requireVector,
} from '../validation.js';
import { fromWireScoredPoint, wireScoredPointSchema } from '../points/codec.js';

/** Score threshold sent when the caller gives none. */
export const DEFAULT_SCORE_THRESHOLD = 0.0;

/**
 * Request body for a search. Payload and vector are always requested.
 */
export interface SearchBody {
  vector: number[];
  limit: number;
  with_payload: true;
  with_vector: true;
  score_threshold: number;
}

const searchEnvelope = z.object({
  result: z.array(wireScoredPointSchema).optional(),
});

/**
 * Search operations against one endpoint.
 */
export class SearchOperations {
  constructor(
    private readonly http: HttpClient,
    private readonly logger: Logger
  ) {}

  /**
   * Finds the `limit` points closest to `vector`.
   *
   * @param scoreThreshold - Applied by the server; its direction follows the
   * collection's distance metric.
   */
  async search(
    collectionName: string,
    vector: readonly number[],
    limit: number,
    scoreThreshold: number = DEFAULT_SCORE_THRESHOLD,
    options: RequestOptions = {}
  ): Promise<ScoredPoint[]> {
    requireCollectionName(collectionName);
    requireVector([...vector], 'query vector');
    requirePositiveInteger(limit, 'limit');
    requireFiniteNumber(scoreThreshold, 'scoreThreshold');

    const operation = 'searchPoints';
    this.logger.info('Searching points', { collection: collectionName, limit, scoreThreshold });

    const body: SearchBody = {
      vector: [...vector],
      limit,
      with_payload: true,
      with_vector: true,
      score_threshold: scoreThreshold,
    };

    const raw = await this.http.send(
      'POST',
      `/collections/${segment(collectionName)}/points/search`,
      { operation, body, signal: options.signal }
    );

    const { result } = decodeEnvelope(searchEnvelope, raw ?? {}, operation);

    if (result === undefined) {
      this.logger.warn("Search response has no 'result' field, treating as no matches", {
        collection: collectionName,
      });
      return [];
    }

    return result.map(fromWireScoredPoint);
  }
}
