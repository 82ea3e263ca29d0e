/**
 * Idempotent schema setup for the pgvector store.
 *
 * The vector column width depends on the configured embedding model, so the
 * DDL is issued here instead of through generated drizzle-kit migrations.
 */

import { sql, type SQL } from 'drizzle-orm';
import { loggers, logDbOperation, Timer } from '@/lib/logger';
import { ConfigurationError } from '@/lib/errors';

const log = loggers.db.child({ service: 'Migrations' });

/** Anything that can run a statement, such as a drizzle database or transaction */
export interface SqlExecutor {
  execute(query: SQL): PromiseLike<unknown>;
}

/**
 * Statements in execution order.
 */
export function buildMigrationStatements(dimensions: number): SQL[] {
  if (!Number.isInteger(dimensions) || dimensions <= 0) {
    throw new ConfigurationError(`Embedding dimensions must be a positive integer, got ${dimensions}`);
  }

  return [
    sql`CREATE EXTENSION IF NOT EXISTS vector`,
    sql`
      CREATE TABLE IF NOT EXISTS documents (
        id TEXT PRIMARY KEY,
        filename VARCHAR(500) NOT NULL,
        content_type VARCHAR(100) NOT NULL,
        content_hash VARCHAR(64) NOT NULL,
        metadata JSONB NOT NULL DEFAULT '{}'::jsonb,
        status VARCHAR(20) NOT NULL DEFAULT 'processing',
        chunk_count INTEGER NOT NULL DEFAULT 0,
        char_count INTEGER NOT NULL DEFAULT 0,
        error_message TEXT,
        uploaded_at TIMESTAMPTZ NOT NULL DEFAULT now(),
        updated_at TIMESTAMPTZ NOT NULL DEFAULT now()
      )
    `,
    sql`CREATE INDEX IF NOT EXISTS idx_documents_status ON documents (status)`,
    sql`CREATE INDEX IF NOT EXISTS idx_documents_uploaded_at ON documents (uploaded_at)`,
    sql`
      CREATE TABLE IF NOT EXISTS index_entries (
        chunk_id TEXT PRIMARY KEY,
        document_id TEXT NOT NULL,
        ordinal INTEGER NOT NULL,
        content TEXT NOT NULL,
        embedding ${sql.raw(`vector(${dimensions})`)} NOT NULL,
        metadata JSONB NOT NULL DEFAULT '{}'::jsonb,
        updated_at TIMESTAMPTZ NOT NULL DEFAULT now()
      )
    `,
    sql`CREATE INDEX IF NOT EXISTS idx_index_entries_document_id ON index_entries (document_id)`,
    sql`
      CREATE INDEX IF NOT EXISTS idx_index_entries_embedding_hnsw
      ON index_entries USING hnsw (embedding vector_cosine_ops)
    `,
    sql`
      CREATE TABLE IF NOT EXISTS curated_answers (
        id TEXT PRIMARY KEY,
        question TEXT NOT NULL,
        answer TEXT NOT NULL,
        embedding ${sql.raw(`vector(${dimensions})`)} NOT NULL,
        metadata JSONB NOT NULL DEFAULT '{}'::jsonb,
        created_at TIMESTAMPTZ NOT NULL DEFAULT now(),
        updated_at TIMESTAMPTZ NOT NULL DEFAULT now()
      )
    `,
    sql`
      CREATE INDEX IF NOT EXISTS idx_curated_answers_embedding_hnsw
      ON curated_answers USING hnsw (embedding vector_cosine_ops)
    `,
    sql`
      CREATE TABLE IF NOT EXISTS session_turns (
        id BIGSERIAL PRIMARY KEY,
        session_id TEXT NOT NULL,
        role VARCHAR(20) NOT NULL,
        content TEXT NOT NULL,
        created_at TIMESTAMPTZ NOT NULL DEFAULT now()
      )
    `,
    sql`CREATE INDEX IF NOT EXISTS idx_session_turns_session_id ON session_turns (session_id, id)`,
  ];
}

/**
 * Create the extension, tables and indexes if they do not exist yet.
 */
export async function runMigrations(db: SqlExecutor, dimensions: number): Promise<void> {
  const statements = buildMigrationStatements(dimensions);
  const timer = new Timer();

  for (const statement of statements) {
    await db.execute(statement);
  }

  logDbOperation(log, 'migrate', { rows: statements.length, duration_ms: timer.elapsed() });
  log.info({ event: 'migrations_complete', dimensions }, 'Database schema is up to date');
}
