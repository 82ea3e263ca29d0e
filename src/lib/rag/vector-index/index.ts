/**
 * Vector index adapters.
 */

export type { VectorIndex, DeleteOptions } from './types';
export { InMemoryVectorIndex } from './in-memory';
export { PgVectorIndex, ITERATIVE_SCAN_STATEMENT, needsIterativeScan, toIndexError } from './pgvector';
export type { PgVectorIndexOptions } from './pgvector';
export { cosineSimilarity, compareScored, assertDimensions } from './similarity';
