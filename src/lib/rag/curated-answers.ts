/**
 * Curated Answer Store
 *
 * Approved question/answer pairs checked before document retrieval. Only
 * the question is embedded; a close enough match is answered verbatim.
 */

import { desc, eq, sql } from 'drizzle-orm';
import type { Database } from '@/db';
import { curatedAnswers, toVectorLiteral, type CuratedAnswerRow } from '@/db/schema';
import type { CuratedAnswer, EmbeddingVector, ScoredCuratedAnswer } from '@/types/rag';
import { InvalidRequestError, getErrorMessage } from '@/lib/errors';
import { loggers, logDbOperation, Timer } from '@/lib/logger';
import { withTimeout } from '@/lib/utils/timeout';
import { cosineSimilarity, toIndexError } from './vector-index';

// =============================================================================
// Port
// =============================================================================

export interface CuratedAnswerStore {
  readonly dimensions: number;
  /** Insert or replace by id */
  upsert(answer: CuratedAnswer, vector: EmbeddingVector): Promise<void>;
  /** Best match scoring strictly above `minSimilarity`, or null */
  match(vector: EmbeddingVector, minSimilarity: number): Promise<ScoredCuratedAnswer | null>;
  /** Newest first */
  list(): Promise<CuratedAnswer[]>;
  /** Returns false when the id was unknown */
  delete(id: string): Promise<boolean>;
}

function assertVector(vector: EmbeddingVector, dimensions: number): void {
  if (vector.length !== dimensions) {
    throw new InvalidRequestError(
      `Curated answer vector has ${vector.length} dimensions, store expects ${dimensions}`
    );
  }
}

// =============================================================================
// In-Memory Implementation
// =============================================================================

const memoryLog = loggers.index.child({ service: 'InMemoryCuratedAnswerStore' });

export class InMemoryCuratedAnswerStore implements CuratedAnswerStore {
  private readonly answers = new Map<string, { answer: CuratedAnswer; vector: EmbeddingVector }>();

  constructor(readonly dimensions: number) {}

  async upsert(answer: CuratedAnswer, vector: EmbeddingVector): Promise<void> {
    assertVector(vector, this.dimensions);
    this.answers.set(answer.id, { answer: copyAnswer(answer), vector: [...vector] });
    memoryLog.debug({ event: 'curated_upsert', id: answer.id }, 'Stored curated answer');
  }

  async match(vector: EmbeddingVector, minSimilarity: number): Promise<ScoredCuratedAnswer | null> {
    assertVector(vector, this.dimensions);

    let best: ScoredCuratedAnswer | null = null;
    for (const stored of this.answers.values()) {
      const similarity = cosineSimilarity(vector, stored.vector);
      if (similarity <= minSimilarity) continue;
      if (!best || similarity > best.similarity || (similarity === best.similarity && stored.answer.id < best.id)) {
        best = { ...copyAnswer(stored.answer), similarity };
      }
    }
    return best;
  }

  async list(): Promise<CuratedAnswer[]> {
    return [...this.answers.values()]
      .map((stored) => copyAnswer(stored.answer))
      .sort((a, b) => b.createdAt.getTime() - a.createdAt.getTime());
  }

  async delete(id: string): Promise<boolean> {
    return this.answers.delete(id);
  }
}

function copyAnswer(answer: CuratedAnswer): CuratedAnswer {
  return { ...answer, metadata: { ...answer.metadata }, createdAt: new Date(answer.createdAt) };
}

// =============================================================================
// Postgres Implementation
// =============================================================================

const pgLog = loggers.db.child({ service: 'PgCuratedAnswerStore' });

export interface PgCuratedAnswerStoreOptions {
  dimensions: number;
  /** Per-call limit; omit for none */
  timeoutMs?: number;
}

export class PgCuratedAnswerStore implements CuratedAnswerStore {
  readonly dimensions: number;
  private readonly timeoutMs?: number;

  constructor(
    private readonly db: Database,
    options: PgCuratedAnswerStoreOptions
  ) {
    this.dimensions = options.dimensions;
    this.timeoutMs = options.timeoutMs;
  }

  async upsert(answer: CuratedAnswer, vector: EmbeddingVector): Promise<void> {
    assertVector(vector, this.dimensions);

    const values = {
      id: answer.id,
      question: answer.question,
      answer: answer.answer,
      embedding: vector,
      metadata: answer.metadata,
      createdAt: answer.createdAt,
      updatedAt: new Date(),
    };

    await this.run('upsert', () =>
      this.db
        .insert(curatedAnswers)
        .values(values)
        .onConflictDoUpdate({
          target: curatedAnswers.id,
          set: {
            question: values.question,
            answer: values.answer,
            embedding: values.embedding,
            metadata: values.metadata,
            updatedAt: values.updatedAt,
          },
        })
    );
  }

  async match(vector: EmbeddingVector, minSimilarity: number): Promise<ScoredCuratedAnswer | null> {
    assertVector(vector, this.dimensions);

    const rows = await this.run('match', () => this.buildMatchQuery(vector, minSimilarity));
    const row = rows[0];
    return row ? { ...rowToAnswer(row), similarity: row.similarity } : null;
  }

  /**
   * The nearest-question query, without executing it.
   */
  buildMatchQuery(vector: EmbeddingVector, minSimilarity: number) {
    const distance = sql`${curatedAnswers.embedding} <=> ${toVectorLiteral(vector)}::vector`;

    return this.db
      .select({
        id: curatedAnswers.id,
        question: curatedAnswers.question,
        answer: curatedAnswers.answer,
        metadata: curatedAnswers.metadata,
        createdAt: curatedAnswers.createdAt,
        similarity: sql<number>`1 - (${distance})`.mapWith(Number),
      })
      .from(curatedAnswers)
      .where(sql`1 - (${distance}) > ${minSimilarity}`)
      .orderBy(distance, curatedAnswers.id)
      .limit(1);
  }

  async list(): Promise<CuratedAnswer[]> {
    const rows = await this.run('list', () =>
      this.db
        .select({
          id: curatedAnswers.id,
          question: curatedAnswers.question,
          answer: curatedAnswers.answer,
          metadata: curatedAnswers.metadata,
          createdAt: curatedAnswers.createdAt,
        })
        .from(curatedAnswers)
        .orderBy(desc(curatedAnswers.createdAt))
    );
    return rows.map(rowToAnswer);
  }

  async delete(id: string): Promise<boolean> {
    const removed = await this.run('delete', () =>
      this.db.delete(curatedAnswers).where(eq(curatedAnswers.id, id)).returning({ id: curatedAnswers.id })
    );
    return removed.length > 0;
  }

  private async run<T>(operation: string, fn: () => PromiseLike<T>): Promise<T> {
    const timer = new Timer();

    try {
      const result = await withTimeout(fn(), { timeoutMs: this.timeoutMs, operation: `curated ${operation}` });
      logDbOperation(pgLog, operation, { table: 'curated_answers', duration_ms: timer.elapsed() });
      return result;
    } catch (error) {
      logDbOperation(pgLog, operation, {
        table: 'curated_answers',
        duration_ms: timer.elapsed(),
        error: getErrorMessage(error),
      });
      throw toIndexError(operation, error, 'Curated answer store');
    }
  }
}

function rowToAnswer(row: Pick<CuratedAnswerRow, 'id' | 'question' | 'answer' | 'metadata' | 'createdAt'>): CuratedAnswer {
  return {
    id: row.id,
    question: row.question,
    answer: row.answer,
    metadata: row.metadata,
    createdAt: row.createdAt,
  };
}
