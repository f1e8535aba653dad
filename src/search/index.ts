export { SearchOperations, DEFAULT_SCORE_THRESHOLD } from './client.js';
export type { SearchBody } from './client.js';
