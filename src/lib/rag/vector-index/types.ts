/**
 * Vector index port.
 */

import type { EmbeddingVector, IndexEntry, QueryFilter, ScoredEntry } from '@/types/rag';

export interface DeleteOptions {
  /** Chunk ids of the document to keep */
  exceptChunkIds?: string[];
}

export interface VectorIndex {
  readonly dimensions: number;

  /**
   * Insert or replace entries by chunkId. Either every entry is written or none is.
   */
  upsert(entries: IndexEntry[]): Promise<void>;

  /**
   * Up to `k` entries by descending cosine similarity, ties by ascending chunkId.
   */
  query(vector: EmbeddingVector, k: number, filter?: QueryFilter): Promise<ScoredEntry[]>;

  /**
   * Remove a document's entries. Returns how many were removed.
   */
  delete(documentId: string, options?: DeleteOptions): Promise<number>;

  count(documentId?: string): Promise<number>;
}
