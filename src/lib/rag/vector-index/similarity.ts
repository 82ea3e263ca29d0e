/**
 * Cosine similarity and result ordering shared by the index adapters.
 */

import { InvalidRequestError } from '@/lib/errors';
import type { EmbeddingVector, IndexEntry, ScoredEntry } from '@/types/rag';

export function cosineSimilarity(a: EmbeddingVector, b: EmbeddingVector): number {
  if (a.length !== b.length) {
    throw new InvalidRequestError(`Vector length mismatch: ${a.length} vs ${b.length}`);
  }

  let dot = 0;
  let normA = 0;
  let normB = 0;
  for (let i = 0; i < a.length; i++) {
    dot += a[i] * b[i];
    normA += a[i] * a[i];
    normB += b[i] * b[i];
  }

  // Zero vectors have no direction
  if (normA === 0 || normB === 0) return 0;
  return dot / (Math.sqrt(normA) * Math.sqrt(normB));
}

/**
 * Descending similarity, then ascending chunkId.
 */
export function compareScored(a: ScoredEntry, b: ScoredEntry): number {
  if (b.similarity !== a.similarity) return b.similarity - a.similarity;
  if (a.chunkId < b.chunkId) return -1;
  if (a.chunkId > b.chunkId) return 1;
  return 0;
}

/**
 * Throw unless every entry has the expected vector length.
 */
export function assertDimensions(entries: IndexEntry[], dimensions: number): void {
  for (const entry of entries) {
    if (entry.vector.length !== dimensions) {
      throw new InvalidRequestError(
        `Entry ${entry.chunkId} has ${entry.vector.length} dimensions, index expects ${dimensions}`,
        { context: { chunkId: entry.chunkId } }
      );
    }
  }
}
