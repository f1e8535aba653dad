/**
 * Search Tests
 */

import { describe, it, expect, beforeEach, vi } from 'vitest';
import { QdrantClient } from '../../client.js';
import {
  DecodeError,
  RequestFailedError,
  TransportError,
  ValidationError,
} from '../../errors.js';
import type { Logger } from '../../observability/logging.js';
import { CITY_POINTS, CITY_QUERY, createPopulatedCollection } from '../../testing/fixtures.js';
import { MockQdrantServer } from '../../testing/mock.js';
import { Distance } from '../../types.js';

describe('SearchOperations', () => {
  let server: MockQdrantServer;
  let logger: Logger & { warn: ReturnType<typeof vi.fn> };
  let client: QdrantClient;

  beforeEach(async () => {
    server = new MockQdrantServer();
    logger = { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };
    client = new QdrantClient('http://localhost:6333', { transport: server, logger });
    await createPopulatedCollection(client, 'cities');
  });

  it('should return the nearest points best first', async () => {
    const hits = await client.searchPoints('cities', CITY_QUERY, 2);

    expect(hits.map((hit) => hit.id)).toEqual([4, 1]);
    expect(hits[0]?.payload).toEqual({ city: 'New York' });
    expect(hits[0]?.vector).toEqual([0.18, 0.01, 0.85, 0.8]);
    expect(hits[0]?.score).toBeGreaterThan(hits[1]?.score ?? 1);
  });

  it('should request payload and vector with a zero threshold by default', async () => {
    await client.searchPoints('cities', CITY_QUERY, 2);

    expect(server.lastRequest()).toMatchObject({
      method: 'POST',
      path: '/collections/cities/points/search',
      body: {
        vector: [0.2, 0.1, 0.9, 0.7],
        limit: 2,
        with_payload: true,
        with_vector: true,
        score_threshold: 0,
      },
    });
  });

  it('should pass the score threshold to the server', async () => {
    const hits = await client.searchPoints('cities', CITY_QUERY, 10, 0.85);

    expect(hits.map((hit) => hit.id)).toEqual([4, 1, 5]);
  });

  it('should order distance metrics ascending', async () => {
    await client.createCollection('euclid', 4, { distance: Distance.Euclid });
    await client.upsertPoints('euclid', CITY_POINTS);

    const hits = await client.searchPoints('euclid', CITY_POINTS[2]?.vector ?? [], 1, 10);

    expect(hits).toHaveLength(1);
    expect(hits[0]?.id).toBe(3);
    expect(hits[0]?.score).toBe(0);
  });

  it('should return an empty array when nothing matches', async () => {
    await client.createCollection('empty', 4);

    expect(await client.searchPoints('empty', CITY_QUERY, 5)).toEqual([]);
  });

  it('should treat a missing result field as no matches', async () => {
    server.respondNext(200, { status: 'ok', time: 0 });

    expect(await client.searchPoints('cities', CITY_QUERY, 5)).toEqual([]);
    expect(logger.warn).toHaveBeenCalledWith(
      "Search response has no 'result' field, treating as no matches",
      { collection: 'cities' }
    );
  });

  it('should reject a result that is not a list of hits', async () => {
    server.respondNext(200, { result: { points: [] }, status: 'ok' });

    await expect(client.searchPoints('cities', CITY_QUERY, 5)).rejects.toBeInstanceOf(DecodeError);
  });

  it('should surface HTTP errors instead of an empty result', async () => {
    const search = client.searchPoints('ghost', CITY_QUERY, 5);

    await expect(search).rejects.toBeInstanceOf(RequestFailedError);
    await expect(search).rejects.toThrow(
      "searchPoints failed with HTTP 404: Not found: Collection `ghost` doesn't exist!"
    );
  });

  it('should surface a query of the wrong dimensionality', async () => {
    await expect(client.searchPoints('cities', [0.1, 0.2], 5)).rejects.toThrow(
      'searchPoints failed with HTTP 400: Wrong input: Vector dimension error: expected dim: 4, got 2'
    );
  });

  it('should surface transport failures', async () => {
    server.failNextWith();

    await expect(client.searchPoints('cities', CITY_QUERY, 5)).rejects.toThrow(
      new TransportError('Network request failed: connect ECONNREFUSED 127.0.0.1:6333')
    );
  });

  it('should reject a non-finite score threshold without a request', async () => {
    const before = server.requests.length;

    await expect(client.searchPoints('cities', CITY_QUERY, 10, Number.NaN)).rejects.toThrow(
      new ValidationError('scoreThreshold must be a finite number, got NaN')
    );
    await expect(
      client.searchPoints('cities', CITY_QUERY, 10, Number.POSITIVE_INFINITY)
    ).rejects.toThrow('scoreThreshold must be a finite number, got Infinity');
    expect(server.requests.length).toBe(before);
  });

  it('should validate the limit and the query vector', async () => {
    await expect(client.searchPoints('cities', CITY_QUERY, 0)).rejects.toThrow(
      'limit must be a positive integer, got 0'
    );
    await expect(client.searchPoints('cities', [], 5)).rejects.toThrow(
      'query vector cannot be empty'
    );
  });
});
