/**
 * Document Store
 *
 * Keeps document records (without vectors) and their processing status.
 */

import { desc, eq } from 'drizzle-orm';
import type { Database } from '@/db';
import { documents, type DocumentRow } from '@/db/schema';
import type { DocumentStatus, StoredDocument } from '@/types/rag';
import { getErrorMessage } from '@/lib/errors';
import { loggers, logDbOperation, Timer } from '@/lib/logger';
import { withTimeout } from '@/lib/utils/timeout';
import { toIndexError } from './vector-index';

const log = loggers.db.child({ service: 'DocumentStore' });

// =============================================================================
// Port
// =============================================================================

export interface StatusUpdate {
  chunkCount?: number;
  errorMessage?: string | null;
}

export interface DocumentStore {
  /** Insert or replace by id */
  save(document: StoredDocument): Promise<void>;
  get(id: string): Promise<StoredDocument | null>;
  /** Newest first */
  list(): Promise<StoredDocument[]>;
  setStatus(id: string, status: DocumentStatus, update?: StatusUpdate): Promise<void>;
  /** Returns false when the id was unknown */
  delete(id: string): Promise<boolean>;
}

// =============================================================================
// In-Memory Implementation
// =============================================================================

export class InMemoryDocumentStore implements DocumentStore {
  private readonly documents = new Map<string, StoredDocument>();

  async save(document: StoredDocument): Promise<void> {
    this.documents.set(document.id, copyDocument(document));
  }

  async get(id: string): Promise<StoredDocument | null> {
    const document = this.documents.get(id);
    return document ? copyDocument(document) : null;
  }

  async list(): Promise<StoredDocument[]> {
    return [...this.documents.values()]
      .sort((a, b) => b.uploadedAt.getTime() - a.uploadedAt.getTime())
      .map(copyDocument);
  }

  async setStatus(id: string, status: DocumentStatus, update: StatusUpdate = {}): Promise<void> {
    const document = this.documents.get(id);
    if (!document) return;

    this.documents.set(id, {
      ...document,
      status,
      chunkCount: update.chunkCount ?? document.chunkCount,
      errorMessage: update.errorMessage !== undefined ? update.errorMessage : document.errorMessage,
    });
  }

  async delete(id: string): Promise<boolean> {
    return this.documents.delete(id);
  }
}

function copyDocument(document: StoredDocument): StoredDocument {
  return { ...document, metadata: { ...document.metadata }, uploadedAt: new Date(document.uploadedAt) };
}

// =============================================================================
// Postgres Implementation
// =============================================================================

export class PgDocumentStore implements DocumentStore {
  constructor(
    private readonly db: Database,
    private readonly timeoutMs?: number
  ) {}

  async save(document: StoredDocument): Promise<void> {
    const values = {
      id: document.id,
      filename: document.filename,
      contentType: document.contentType,
      contentHash: document.contentHash,
      metadata: document.metadata,
      status: document.status,
      chunkCount: document.chunkCount,
      charCount: document.charCount,
      errorMessage: document.errorMessage,
      uploadedAt: document.uploadedAt,
      updatedAt: new Date(),
    };

    await this.run('save', () =>
      this.db.insert(documents).values(values).onConflictDoUpdate({ target: documents.id, set: values })
    );
  }

  async get(id: string): Promise<StoredDocument | null> {
    const rows = await this.run('get', () =>
      this.db.select().from(documents).where(eq(documents.id, id)).limit(1)
    );
    const row = rows[0];
    return row ? rowToDocument(row) : null;
  }

  async list(): Promise<StoredDocument[]> {
    const rows = await this.run('list', () =>
      this.db.select().from(documents).orderBy(desc(documents.uploadedAt))
    );
    return rows.map(rowToDocument);
  }

  async setStatus(id: string, status: DocumentStatus, update: StatusUpdate = {}): Promise<void> {
    await this.run('setStatus', () =>
      this.db
        .update(documents)
        .set({
          status,
          updatedAt: new Date(),
          ...(update.chunkCount !== undefined && { chunkCount: update.chunkCount }),
          ...(update.errorMessage !== undefined && { errorMessage: update.errorMessage }),
        })
        .where(eq(documents.id, id))
    );
  }

  async delete(id: string): Promise<boolean> {
    const removed = await this.run('delete', () =>
      this.db.delete(documents).where(eq(documents.id, id)).returning({ id: documents.id })
    );
    return removed.length > 0;
  }

  private async run<T>(operation: string, fn: () => PromiseLike<T>): Promise<T> {
    const timer = new Timer();

    try {
      const result = await withTimeout(fn(), { timeoutMs: this.timeoutMs, operation: `documents ${operation}` });
      logDbOperation(log, operation, { table: 'documents', duration_ms: timer.elapsed() });
      return result;
    } catch (error) {
      logDbOperation(log, operation, {
        table: 'documents',
        duration_ms: timer.elapsed(),
        error: getErrorMessage(error),
      });
      throw toIndexError(operation, error, 'Document store');
    }
  }
}

export function rowToDocument(row: DocumentRow): StoredDocument {
  return {
    id: row.id,
    filename: row.filename,
    contentType: row.contentType,
    contentHash: row.contentHash,
    metadata: row.metadata,
    uploadedAt: row.uploadedAt,
    status: row.status,
    chunkCount: row.chunkCount,
    charCount: row.charCount,
    errorMessage: row.errorMessage,
  };
}
