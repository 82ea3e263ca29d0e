/**
 * Tests for schema migrations.
 */

import { describe, it, expect, vi } from 'vitest';
import { PgDialect } from 'drizzle-orm/pg-core';
import type { SQL } from 'drizzle-orm';
import { buildMigrationStatements, runMigrations } from '../migrations';
import { ConfigurationError } from '@/lib/errors';

const dialect = new PgDialect();
const render = (statement: SQL) => dialect.sqlToQuery(statement).sql.replace(/\s+/g, ' ').trim();

describe('buildMigrationStatements', () => {
  it('should enable the extension first', () => {
    const [first] = buildMigrationStatements(8);
    expect(render(first)).toBe('CREATE EXTENSION IF NOT EXISTS vector');
  });

  it('should size the vector column from the configured dimensions', () => {
    const rendered = buildMigrationStatements(8).map(render);
    const entries = rendered.find((s) => s.startsWith('CREATE TABLE IF NOT EXISTS index_entries'));

    expect(entries).toContain('embedding vector(8) NOT NULL');
  });

  it('should build HNSW cosine indexes for chunks and curated questions', () => {
    const rendered = buildMigrationStatements(1536).map(render);

    expect(rendered).toHaveLength(11);
    expect(rendered[6]).toBe(
      'CREATE INDEX IF NOT EXISTS idx_index_entries_embedding_hnsw ON index_entries USING hnsw (embedding vector_cosine_ops)'
    );
    expect(rendered[8]).toBe(
      'CREATE INDEX IF NOT EXISTS idx_curated_answers_embedding_hnsw ON curated_answers USING hnsw (embedding vector_cosine_ops)'
    );
  });

  it('should size the curated question vectors like the chunk vectors', () => {
    const rendered = buildMigrationStatements(8).map(render);
    const curated = rendered.find((s) => s.startsWith('CREATE TABLE IF NOT EXISTS curated_answers'));

    expect(curated).toContain('embedding vector(8) NOT NULL');
  });

  it('should finish with the session turns table and its lookup index', () => {
    const rendered = buildMigrationStatements(8).map(render);

    expect(rendered[9]).toBe(
      'CREATE TABLE IF NOT EXISTS session_turns ( id BIGSERIAL PRIMARY KEY, session_id TEXT NOT NULL, role VARCHAR(20) NOT NULL, content TEXT NOT NULL, created_at TIMESTAMPTZ NOT NULL DEFAULT now() )'
    );
    expect(rendered[10]).toBe(
      'CREATE INDEX IF NOT EXISTS idx_session_turns_session_id ON session_turns (session_id, id)'
    );
  });

  it('should reject dimensions that are not positive integers', () => {
    expect(() => buildMigrationStatements(0)).toThrow(ConfigurationError);
    expect(() => buildMigrationStatements(1.5)).toThrow(ConfigurationError);
  });
});

describe('runMigrations', () => {
  it('should execute every statement in order', async () => {
    const execute = vi.fn(async (_query: SQL) => []);

    await runMigrations({ execute }, 4);

    const expected = buildMigrationStatements(4).map(render);
    expect(execute.mock.calls.map(([query]) => render(query))).toEqual(expected);
  });

  it('should stop at the first failing statement', async () => {
    const execute = vi.fn(async (_query: SQL) => []);
    execute.mockResolvedValueOnce([]).mockRejectedValueOnce(new Error('permission denied'));

    await expect(runMigrations({ execute }, 4)).rejects.toThrow('permission denied');
    expect(execute).toHaveBeenCalledTimes(2);
  });
});
