/**
 * Collection lifecycle operations.
 */

export { CollectionOperations, DEFAULT_DISTANCE, DEFAULT_ON_DISK } from './client.js';
export type { CreateCollectionBody } from './client.js';
