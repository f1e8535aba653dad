/**
 * Example usage of the Qdrant client.
 *
 * This example demonstrates:
 * - Creating a client from the environment
 * - Creating a collection and upserting points
 * - Searching by vector
 * - Fetching, deleting and cleaning up
 *
 * Runs against a local server (QDRANT_URL, default http://localhost:6333).
 */

import { QdrantClient, ConflictError, isQdrantError } from '../src/index.js';

const COLLECTION = 'example_cities';

async function main(): Promise<void> {
  const client = QdrantClient.fromEnv();

  try {
    await client.createCollection(COLLECTION, 4);
    console.log(`Created collection '${COLLECTION}'`);
  } catch (error) {
    if (!(error instanceof ConflictError)) throw error;
    console.log(`Collection '${COLLECTION}' already exists`);
  }

  await client.upsertPoints(COLLECTION, [
    { id: 1, vector: [0.05, 0.61, 0.76, 0.74], payload: { city: 'Berlin' } },
    { id: 2, vector: [0.19, 0.81, 0.75, 0.11], payload: { city: 'London' } },
    { id: 3, vector: [0.36, 0.55, 0.47, 0.94], payload: { city: 'Moscow' } },
    { id: 4, vector: [0.18, 0.01, 0.85, 0.8], payload: { city: 'New York' } },
  ]);
  console.log(`Points stored: ${await client.collectionInfo(COLLECTION)}`);

  const hits = await client.searchPoints(COLLECTION, [0.2, 0.1, 0.9, 0.7], 2);
  for (const hit of hits) {
    console.log(`  ${hit.id} score=${hit.score.toFixed(4)} payload=${JSON.stringify(hit.payload)}`);
  }

  const [berlin] = await client.getPoints(COLLECTION, [1]);
  console.log('Fetched:', berlin);

  await client.deletePoints(COLLECTION, [1]);
  await client.deleteCollection(COLLECTION);
  console.log(`Remaining collections: ${(await client.listCollections()).join(', ') || '(none)'}`);
}

main().catch((error: unknown) => {
  console.error(isQdrantError(error) ? error.toJSON() : error);
  process.exitCode = 1;
});
