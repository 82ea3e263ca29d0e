/**
 * Database Schema (Drizzle ORM)
 *
 * Contains: documents, index_entries, curated_answers, session_turns
 */

import {
  pgTable,
  text,
  varchar,
  integer,
  timestamp,
  jsonb,
  index,
  bigserial,
  customType,
} from 'drizzle-orm/pg-core';
import type { ConversationTurn, DocumentMetadata, DocumentStatus } from '../../types/rag';

// Must match DEFAULT_EMBEDDING_DIMENSIONS in lib/rag/config.ts. Defined inline
// so drizzle-kit can load this file without the app's path aliases.
// runMigrations creates the column with the configured dimensions.
const SCHEMA_VECTOR_DIMENSIONS = 1536;

// =============================================================================
// Custom Type: pgvector
// =============================================================================

/**
 * pgvector column. Serializes number[] to the `[0.1,0.2,...]` text form.
 */
export const vector = customType<{
  data: number[];
  driverData: string;
  config: { dimensions: number };
}>({
  dataType(config) {
    return `vector(${config?.dimensions ?? SCHEMA_VECTOR_DIMENSIONS})`;
  },
  toDriver(value: number[]): string {
    return toVectorLiteral(value);
  },
  fromDriver(value: string): number[] {
    return parseVectorLiteral(value);
  },
});

export function toVectorLiteral(value: number[]): string {
  return `[${value.join(',')}]`;
}

export function parseVectorLiteral(value: string): number[] {
  const inner = value.trim().slice(1, -1);
  return inner ? inner.split(',').map(Number) : [];
}

// =============================================================================
// Documents Table
// =============================================================================

export const documents = pgTable('documents', {
  id: text('id').primaryKey(),
  filename: varchar('filename', { length: 500 }).notNull(),
  contentType: varchar('content_type', { length: 100 }).notNull(),
  contentHash: varchar('content_hash', { length: 64 }).notNull(),
  metadata: jsonb('metadata').$type<DocumentMetadata>().notNull().default({}),

  // Processing status
  status: varchar('status', { length: 20 }).notNull().default('processing').$type<DocumentStatus>(),
  chunkCount: integer('chunk_count').notNull().default(0),
  charCount: integer('char_count').notNull().default(0),
  errorMessage: text('error_message'),

  // Timestamps
  uploadedAt: timestamp('uploaded_at', { withTimezone: true }).notNull().defaultNow(),
  updatedAt: timestamp('updated_at', { withTimezone: true }).notNull().defaultNow(),
}, (table) => ({
  statusIdx: index('idx_documents_status').on(table.status),
  uploadedAtIdx: index('idx_documents_uploaded_at').on(table.uploadedAt),
}));

// =============================================================================
// Index Entries Table
// =============================================================================

export const indexEntries = pgTable('index_entries', {
  chunkId: text('chunk_id').primaryKey(),
  documentId: text('document_id').notNull(),
  ordinal: integer('ordinal').notNull(),
  content: text('content').notNull(),
  embedding: vector('embedding', { dimensions: SCHEMA_VECTOR_DIMENSIONS }).notNull(),
  metadata: jsonb('metadata').$type<DocumentMetadata>().notNull().default({}),
  updatedAt: timestamp('updated_at', { withTimezone: true }).notNull().defaultNow(),
}, (table) => ({
  documentIdIdx: index('idx_index_entries_document_id').on(table.documentId),
  // HNSW index for cosine search is created by runMigrations (raw SQL)
}));

// =============================================================================
// Curated Answers Table
// =============================================================================

export const curatedAnswers = pgTable('curated_answers', {
  id: text('id').primaryKey(),
  question: text('question').notNull(),
  answer: text('answer').notNull(),
  // Embedding of the question only
  embedding: vector('embedding', { dimensions: SCHEMA_VECTOR_DIMENSIONS }).notNull(),
  metadata: jsonb('metadata').$type<DocumentMetadata>().notNull().default({}),
  createdAt: timestamp('created_at', { withTimezone: true }).notNull().defaultNow(),
  updatedAt: timestamp('updated_at', { withTimezone: true }).notNull().defaultNow(),
});

// =============================================================================
// Session Turns Table
// =============================================================================

export const sessionTurns = pgTable('session_turns', {
  id: bigserial('id', { mode: 'number' }).primaryKey(),
  sessionId: text('session_id').notNull(),
  role: varchar('role', { length: 20 }).notNull().$type<ConversationTurn['role']>(),
  content: text('content').notNull(),
  createdAt: timestamp('created_at', { withTimezone: true }).notNull().defaultNow(),
}, (table) => ({
  sessionIdx: index('idx_session_turns_session_id').on(table.sessionId, table.id),
}));

// =============================================================================
// Type Exports
// =============================================================================

export type DocumentRow = typeof documents.$inferSelect;
export type NewDocumentRow = typeof documents.$inferInsert;
export type IndexEntryRow = typeof indexEntries.$inferSelect;
export type NewIndexEntryRow = typeof indexEntries.$inferInsert;
export type CuratedAnswerRow = typeof curatedAnswers.$inferSelect;
export type SessionTurnRow = typeof sessionTurns.$inferSelect;
