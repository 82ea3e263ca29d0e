/**
 * In-memory vector index with an exact cosine scan.
 *
 * For tests and local runs. Entries are copied on the way in and out.
 */

import type { EmbeddingVector, IndexEntry, QueryFilter, ScoredEntry } from '@/types/rag';
import { InvalidRequestError } from '@/lib/errors';
import { loggers } from '@/lib/logger';
import { assertDimensions, compareScored, cosineSimilarity } from './similarity';
import type { DeleteOptions, VectorIndex } from './types';

const log = loggers.index.child({ service: 'InMemoryVectorIndex' });

export class InMemoryVectorIndex implements VectorIndex {
  private readonly entries = new Map<string, IndexEntry>();

  constructor(readonly dimensions: number) {}

  async upsert(entries: IndexEntry[]): Promise<void> {
    assertDimensions(entries, this.dimensions);

    for (const entry of entries) {
      this.entries.set(entry.chunkId, copyEntry(entry));
    }

    log.debug({ event: 'index_upsert', entries: entries.length }, 'Upserted entries');
  }

  async query(vector: EmbeddingVector, k: number, filter: QueryFilter = {}): Promise<ScoredEntry[]> {
    if (vector.length !== this.dimensions) {
      throw new InvalidRequestError(
        `Query vector has ${vector.length} dimensions, index expects ${this.dimensions}`
      );
    }
    if (k <= 0) return [];

    const documentIds = filter.documentIds ? new Set(filter.documentIds) : null;
    const scored: ScoredEntry[] = [];

    for (const entry of this.entries.values()) {
      if (documentIds && !documentIds.has(entry.documentId)) continue;

      const similarity = cosineSimilarity(vector, entry.vector);
      if (filter.minSimilarity !== undefined && similarity < filter.minSimilarity) continue;

      scored.push({ ...copyEntry(entry), similarity });
    }

    return scored.sort(compareScored).slice(0, k);
  }

  async delete(documentId: string, options: DeleteOptions = {}): Promise<number> {
    const keep = new Set(options.exceptChunkIds ?? []);
    let removed = 0;

    for (const [chunkId, entry] of this.entries) {
      if (entry.documentId === documentId && !keep.has(chunkId)) {
        this.entries.delete(chunkId);
        removed++;
      }
    }

    log.debug({ event: 'index_delete', documentId, removed }, 'Deleted entries');
    return removed;
  }

  async count(documentId?: string): Promise<number> {
    if (documentId === undefined) return this.entries.size;

    let total = 0;
    for (const entry of this.entries.values()) {
      if (entry.documentId === documentId) total++;
    }
    return total;
  }
}

function copyEntry(entry: IndexEntry): IndexEntry {
  return { ...entry, vector: [...entry.vector], metadata: { ...entry.metadata } };
}
