/**
 * Postgres + pgvector index adapter.
 *
 * Entries live in `index_entries`; similarity is `1 - (embedding <=> query)`
 * (cosine distance). Every call is time-boxed and storage failures surface
 * as IndexUnavailable.
 *
 * Filtered queries enable HNSW iterative scans (pgvector 0.8.0 or later) so
 * a selective filter still fills `k` results instead of post-filtering the
 * index's first `ef_search` candidates.
 */

import { and, asc, count, eq, inArray, notInArray, sql, type SQL } from 'drizzle-orm';
import type { Database } from '@/db';
import { indexEntries, toVectorLiteral } from '@/db/schema';
import type { EmbeddingVector, IndexEntry, QueryFilter, ScoredEntry } from '@/types/rag';
import {
  IndexUnavailableError,
  InvalidRequestError,
  getErrorMessage,
  isRAGError,
} from '@/lib/errors';
import { loggers, logDbOperation, Timer } from '@/lib/logger';
import { withTimeout } from '@/lib/utils/timeout';
import { assertDimensions } from './similarity';
import type { DeleteOptions, VectorIndex } from './types';

const log = loggers.index.child({ service: 'PgVectorIndex' });

/** Transaction-scoped; needs pgvector 0.8.0+ */
export const ITERATIVE_SCAN_STATEMENT = sql`SET LOCAL hnsw.iterative_scan = strict_order`;

type QuerySource = Pick<Database, 'select'>;

export function needsIterativeScan(filter: QueryFilter): boolean {
  return (filter.documentIds !== undefined && filter.documentIds.length > 0) || filter.minSimilarity !== undefined;
}

export interface PgVectorIndexOptions {
  dimensions: number;
  /** Per-call limit; omit for none */
  timeoutMs?: number;
}

export class PgVectorIndex implements VectorIndex {
  readonly dimensions: number;
  private readonly timeoutMs?: number;

  constructor(
    private readonly db: Database,
    options: PgVectorIndexOptions
  ) {
    this.dimensions = options.dimensions;
    this.timeoutMs = options.timeoutMs;
  }

  async upsert(entries: IndexEntry[]): Promise<void> {
    assertDimensions(entries, this.dimensions);
    if (entries.length === 0) return;

    const rows = entries.map((entry) => ({
      chunkId: entry.chunkId,
      documentId: entry.documentId,
      ordinal: entry.ordinal,
      content: entry.content,
      embedding: entry.vector,
      metadata: entry.metadata,
      updatedAt: new Date(),
    }));

    await this.run('upsert', rows.length, () =>
      this.db.transaction(async (tx) => {
        await tx
          .insert(indexEntries)
          .values(rows)
          .onConflictDoUpdate({
            target: indexEntries.chunkId,
            set: {
              documentId: sql`excluded.document_id`,
              ordinal: sql`excluded.ordinal`,
              content: sql`excluded.content`,
              embedding: sql`excluded.embedding`,
              metadata: sql`excluded.metadata`,
              updatedAt: sql`excluded.updated_at`,
            },
          });
      })
    );
  }

  async query(vector: EmbeddingVector, k: number, filter: QueryFilter = {}): Promise<ScoredEntry[]> {
    if (vector.length !== this.dimensions) {
      throw new InvalidRequestError(
        `Query vector has ${vector.length} dimensions, index expects ${this.dimensions}`
      );
    }
    if (k <= 0) return [];
    if (filter.documentIds && filter.documentIds.length === 0) return [];

    const rows = await this.run('query', k, () =>
      needsIterativeScan(filter)
        ? this.db.transaction(async (tx) => {
            await tx.execute(ITERATIVE_SCAN_STATEMENT);
            return await this.buildQuery(vector, k, filter, tx);
          })
        : this.buildQuery(vector, k, filter)
    );

    return rows.map((row) => ({
      chunkId: row.chunkId,
      documentId: row.documentId,
      ordinal: row.ordinal,
      content: row.content,
      vector: row.vector,
      metadata: row.metadata,
      similarity: row.similarity,
    }));
  }

  /**
   * The similarity query, without executing it.
   */
  buildQuery(vector: EmbeddingVector, k: number, filter: QueryFilter = {}, source: QuerySource = this.db) {
    const distance = sql`${indexEntries.embedding} <=> ${toVectorLiteral(vector)}::vector`;
    const similarity = sql<number>`1 - (${distance})`.mapWith(Number);

    const conditions: SQL[] = [];
    if (filter.documentIds && filter.documentIds.length > 0) {
      conditions.push(inArray(indexEntries.documentId, filter.documentIds));
    }
    if (filter.minSimilarity !== undefined) {
      conditions.push(sql`1 - (${distance}) >= ${filter.minSimilarity}`);
    }

    return source
      .select({
        chunkId: indexEntries.chunkId,
        documentId: indexEntries.documentId,
        ordinal: indexEntries.ordinal,
        content: indexEntries.content,
        vector: indexEntries.embedding,
        metadata: indexEntries.metadata,
        similarity,
      })
      .from(indexEntries)
      .where(conditions.length > 0 ? and(...conditions) : undefined)
      .orderBy(distance, asc(indexEntries.chunkId))
      .limit(k);
  }

  async delete(documentId: string, options: DeleteOptions = {}): Promise<number> {
    const keep = options.exceptChunkIds ?? [];
    const condition =
      keep.length > 0
        ? and(eq(indexEntries.documentId, documentId), notInArray(indexEntries.chunkId, keep))
        : eq(indexEntries.documentId, documentId);

    const removed = await this.run('delete', undefined, () =>
      this.db.delete(indexEntries).where(condition).returning({ chunkId: indexEntries.chunkId })
    );
    return removed.length;
  }

  async count(documentId?: string): Promise<number> {
    const rows = await this.run('count', undefined, () =>
      this.db
        .select({ value: count() })
        .from(indexEntries)
        .where(documentId === undefined ? undefined : eq(indexEntries.documentId, documentId))
    );
    return rows[0]?.value ?? 0;
  }

  private async run<T>(operation: string, rows: number | undefined, fn: () => PromiseLike<T>): Promise<T> {
    const timer = new Timer();

    try {
      const result = await withTimeout(fn(), {
        timeoutMs: this.timeoutMs,
        operation: `index ${operation}`,
      });
      logDbOperation(log, operation, { table: 'index_entries', rows, duration_ms: timer.elapsed() });
      return result;
    } catch (error) {
      logDbOperation(log, operation, {
        table: 'index_entries',
        duration_ms: timer.elapsed(),
        error: getErrorMessage(error),
      });
      throw toIndexError(operation, error);
    }
  }
}

/**
 * Storage failures become IndexUnavailable; our own errors pass through.
 */
export function toIndexError(operation: string, error: unknown, store = 'Vector index'): Error {
  if (isRAGError(error)) return error;
  return new IndexUnavailableError(`${store} ${operation} failed: ${getErrorMessage(error)}`, {
    cause: error,
    context: { operation },
  });
}
