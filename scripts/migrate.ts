/**
 * Database Migration Script
 *
 * Creates the pgvector extension, the documents and index_entries tables
 * and the HNSW cosine index. Safe to run repeatedly.
 *
 * Usage:
 *   npm run db:migrate
 *   npm run db:migrate -- --dry-run
 *
 * Environment:
 *   DATABASE_URL         - Postgres connection string
 *   EMBEDDING_DIMENSIONS - Vector column width (default 1536)
 */

import { PgDialect } from 'drizzle-orm/pg-core';
import { loadRAGConfig } from '../src/lib/rag/config';
import { buildMigrationStatements, createDb, runMigrations } from '../src/db';
import { getErrorMessage } from '../src/lib/errors';

interface Options {
  dryRun: boolean;
}

function parseArgs(): Options {
  const args = process.argv.slice(2);
  return { dryRun: args.includes('--dry-run') };
}

async function main() {
  const options = parseArgs();
  const config = loadRAGConfig();
  const dimensions = config.embedding.dimensions;

  if (options.dryRun) {
    console.log(`DRY RUN - statements for ${dimensions}-dimension vectors:\n`);
    const dialect = new PgDialect();
    for (const statement of buildMigrationStatements(dimensions)) {
      console.log(`${dialect.sqlToQuery(statement).sql};\n`);
    }
    return;
  }

  if (!config.databaseUrl) {
    console.error('✗ DATABASE_URL environment variable is required');
    process.exit(1);
  }

  const { db, close } = createDb(config.databaseUrl, { maxConnections: 1 });
  const startTime = Date.now();

  try {
    await runMigrations(db, dimensions);
    console.log(`✓ Migrations applied in ${Date.now() - startTime}ms (vector(${dimensions}))`);
  } finally {
    await close();
  }
}

main().catch((error) => {
  console.error('Migration failed:', getErrorMessage(error));
  process.exit(1);
});
