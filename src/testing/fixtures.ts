/**
 * Test Fixtures
 *
 * Helpers that generate points and populated collections for tests.
 */

import { randomUUID } from 'node:crypto';
import type { QdrantClient } from '../client.js';
import type { Payload, Point, PointId } from '../types.js';

/**
 * Four-dimensional points with a `city` payload, used throughout the tests.
 */
export const CITY_POINTS: readonly Point[] = [
  { id: 1, vector: [0.05, 0.61, 0.76, 0.74], payload: { city: 'Berlin' } },
  { id: 2, vector: [0.19, 0.81, 0.75, 0.11], payload: { city: 'London' } },
  { id: 3, vector: [0.36, 0.55, 0.47, 0.94], payload: { city: 'Moscow' } },
  { id: 4, vector: [0.18, 0.01, 0.85, 0.8], payload: { city: 'New York' } },
  { id: 5, vector: [0.24, 0.18, 0.22, 0.44], payload: { city: 'Beijing' } },
  { id: 6, vector: [0.35, 0.08, 0.11, 0.44], payload: { city: 'Mumbai' } },
];

/** Query vector whose two nearest city points (Cosine) are 4 then 1. */
export const CITY_QUERY: readonly number[] = [0.2, 0.1, 0.9, 0.7];

/**
 * Generate a random vector of specified dimensions
 */
export function randomVector(dimensions: number): number[] {
  const vector: number[] = [];
  for (let i = 0; i < dimensions; i++) {
    vector.push(Math.random() * 2 - 1);
  }
  return normalizeVector(vector);
}

/**
 * Normalize a vector to unit length
 */
export function normalizeVector(vector: number[]): number[] {
  const magnitude = Math.sqrt(vector.reduce((sum, val) => sum + val * val, 0));
  if (magnitude === 0) return vector;
  return vector.map((val) => val / magnitude);
}

/**
 * Generate a test payload with common fields
 */
export function testPayload(overrides?: Payload): Payload {
  return {
    content: 'Test document content',
    category: 'testing',
    tags: ['test', 'fixture'],
    ...overrides,
  };
}

export function createTestPoint(id: PointId, dimensions: number, payload?: Payload): Point {
  return {
    id,
    vector: randomVector(dimensions),
    payload: payload ?? testPayload(),
  };
}

/**
 * Create `count` points with sequential numeric ids starting at 1.
 */
export function createTestPoints(count: number, dimensions: number): Point[] {
  return Array.from({ length: count }, (_, i) =>
    createTestPoint(i + 1, dimensions, testPayload({ index: i }))
  );
}

/**
 * Create points with UUID ids.
 */
export function createUuidPoints(count: number, dimensions: number): Point[] {
  return Array.from({ length: count }, (_, i) =>
    createTestPoint(randomUUID(), dimensions, testPayload({ index: i }))
  );
}

/**
 * Creates `name` and fills it with the city points.
 */
export async function createPopulatedCollection(
  client: QdrantClient,
  name: string,
  points: readonly Point[] = CITY_POINTS
): Promise<void> {
  await client.createCollection(name, points[0]?.vector.length ?? 4);
  await client.upsertPoints(name, points);
}
