/**
 * Collection Operations Tests
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { QdrantClient } from '../../client.js';
import {
  ConflictError,
  DecodeError,
  NotFoundError,
  RequestFailedError,
  ValidationError,
} from '../../errors.js';
import { MockQdrantServer } from '../../testing/mock.js';
import { Distance } from '../../types.js';

describe('CollectionOperations', () => {
  let server: MockQdrantServer;
  let client: QdrantClient;

  beforeEach(() => {
    server = new MockQdrantServer();
    client = new QdrantClient('http://localhost:6333', { transport: server });
  });

  describe('createCollection', () => {
    it('should check existence and then create with defaults', async () => {
      await client.createCollection('docs', 4);

      expect(server.requests.map((r) => `${r.method} ${r.path}`)).toEqual([
        'GET /collections/docs/exists',
        'PUT /collections/docs',
      ]);
      expect(server.lastRequest()?.body).toEqual({
        vectors: { size: 4, distance: 'Cosine', on_disk: true },
      });
    });

    it('should send the requested distance and storage', async () => {
      await client.createCollection('docs', 8, { distance: Distance.Dot, onDisk: false });

      expect(server.lastRequest()?.body).toEqual({
        vectors: { size: 8, distance: 'Dot', on_disk: false },
      });
    });

    it('should refuse an existing collection without a second create', async () => {
      await client.createCollection('docs', 4);

      await expect(client.createCollection('docs', 4)).rejects.toThrow(
        new ConflictError('docs')
      );
      expect(server.countRequests('PUT', '/collections/docs')).toBe(1);
    });

    it('should fail when the server does not acknowledge', async () => {
      server
        .respondNext(200, { result: { exists: false }, status: 'ok', time: 0 })
        .respondNext(200, { result: false, status: 'ok', time: 0 });

      const created = client.createCollection('docs', 4);

      await expect(created).rejects.toBeInstanceOf(RequestFailedError);
      await expect(created).rejects.toThrow("Failed to create collection 'docs'");
    });

    it('should encode the name in the path', async () => {
      await client.createCollection('my docs', 4);

      expect(server.lastRequest()?.path).toBe('/collections/my%20docs');
      expect(await client.listCollections()).toEqual(['my docs']);
    });

    it('should validate arguments before any request', async () => {
      await expect(client.createCollection('docs', 0)).rejects.toThrow(
        'dimensionality must be a positive integer, got 0'
      );
      await expect(client.createCollection('  ', 4)).rejects.toThrow(
        new ValidationError('Collection name cannot be empty')
      );
      expect(server.requests).toHaveLength(0);
    });
  });

  describe('deleteCollection', () => {
    it('should delete an existing collection', async () => {
      await client.createCollection('docs', 4);

      await client.deleteCollection('docs');

      expect(server.countRequests('DELETE', '/collections/docs')).toBe(1);
      expect(await client.collectionExists('docs')).toBe(false);
    });

    it('should refuse a missing collection without a delete', async () => {
      await expect(client.deleteCollection('ghost')).rejects.toBeInstanceOf(NotFoundError);
      expect(server.countRequests('DELETE')).toBe(0);
    });
  });

  describe('collectionExists', () => {
    it('should answer false for a missing collection', async () => {
      expect(await client.collectionExists('ghost')).toBe(false);
    });

    it('should fall back to the listing when the endpoint is missing', async () => {
      server = new MockQdrantServer({ withoutExistsEndpoint: true });
      client = new QdrantClient('http://localhost:6333', { transport: server });
      await client.createCollection('docs', 4);

      expect(await client.collectionExists('docs')).toBe(true);
      expect(await client.collectionExists('ghost')).toBe(false);
      expect(server.countRequests('GET', '/collections')).toBe(3);
    });

    it('should fail on a server error', async () => {
      server.respondNext(500, { status: { error: 'Service internal error' }, time: 0 });

      await expect(client.collectionExists('docs')).rejects.toThrow(
        'collectionExists failed with HTTP 500: Service internal error'
      );
    });

    it('should fail on a malformed body', async () => {
      server.respondNext(200, { result: {} });

      await expect(client.collectionExists('docs')).rejects.toBeInstanceOf(DecodeError);
    });
  });

  describe('listCollections', () => {
    it('should return an empty list', async () => {
      expect(await client.listCollections()).toEqual([]);
    });

    it('should return names in server order', async () => {
      await client.createCollection('a', 4);
      await client.createCollection('b', 4);

      expect(await client.listCollections()).toEqual(['a', 'b']);
    });

    it('should fail when the collections field is missing', async () => {
      server.respondNext(200, { result: {}, status: 'ok' });

      await expect(client.listCollections()).rejects.toThrow(
        "listCollections: unexpected response at 'result.collections': Required"
      );
    });
  });

  describe('collectionInfo', () => {
    it('should return the points count', async () => {
      await client.createCollection('docs', 4);

      expect(await client.collectionInfo('docs')).toBe(0);
    });

    it('should fail for a missing collection', async () => {
      await expect(client.collectionInfo('ghost')).rejects.toThrow(
        "collectionInfo failed with HTTP 404: Not found: Collection `ghost` doesn't exist!"
      );
    });
  });

  describe('describeCollection', () => {
    it('should map status, counters and vector parameters', async () => {
      await client.createCollection('docs', 4, { distance: Distance.Euclid });

      expect(await client.describeCollection('docs')).toEqual({
        name: 'docs',
        status: 'green',
        pointsCount: 0,
        indexedVectorsCount: 0,
        segmentsCount: 1,
        vectorSize: 4,
        distance: Distance.Euclid,
      });
    });

    it('should leave vector parameters out for named vectors', async () => {
      server.respondNext(200, {
        result: {
          status: 'yellow',
          points_count: 3,
          config: { params: { vectors: { text: { size: 4, distance: 'Dot' } } } },
        },
        status: 'ok',
      });

      const description = await client.describeCollection('multi');

      expect(description).toEqual({ name: 'multi', status: 'yellow', pointsCount: 3 });
      expect(description.vectorSize).toBeUndefined();
    });
  });
});
