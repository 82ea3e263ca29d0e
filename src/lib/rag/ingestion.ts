/**
 * Ingestion Pipeline
 *
 * parse → normalize → chunk. Pure preparation: nothing is embedded or
 * stored here, so a failed preparation leaves no trace in the index.
 */

import { createHash, randomUUID } from 'node:crypto';
import type { Chunk, DocumentMetadata, SourceDocument } from '@/types/rag';
import { EmptyContentError, InvalidRequestError } from '@/lib/errors';
import { parseFile, MAX_FILE_SIZE } from '@/lib/parsers';
import { loggers, logIngestionStep, Timer } from '@/lib/logger';
import { buildChunks, normalizeText, type ChunkOptions } from './chunker';

const log = loggers.ingestion.child({ service: 'IngestionPipeline' });

// =============================================================================
// Types
// =============================================================================

export interface IngestInput {
  bytes: Buffer | Uint8Array;
  filename: string;
  contentType?: string;
  /** Defaults to a random UUID */
  documentId?: string;
  metadata?: DocumentMetadata;
}

export interface PreparedDocument {
  document: SourceDocument;
  chunks: Chunk[];
}

export interface IngestionPipelineOptions extends ChunkOptions {
  maxFileSize?: number;
}

// =============================================================================
// Pipeline
// =============================================================================

export class IngestionPipeline {
  private readonly chunkOptions: ChunkOptions;
  private readonly maxFileSize: number;

  constructor(options: IngestionPipelineOptions) {
    this.chunkOptions = { chunkSize: options.chunkSize, chunkOverlap: options.chunkOverlap };
    this.maxFileSize = options.maxFileSize ?? MAX_FILE_SIZE;
  }

  /**
   * Extract, normalize and chunk a file.
   *
   * @throws UnsupportedFormatError when the file type is not supported
   * @throws EmptyContentError when no text survives normalization
   * @throws InvalidRequestError when the file exceeds the size limit
   */
  async prepare(input: IngestInput): Promise<PreparedDocument> {
    const timer = new Timer();
    const documentId = input.documentId ?? randomUUID();

    if (!documentId.trim()) {
      throw new InvalidRequestError('documentId must not be blank');
    }
    if (input.bytes.byteLength > this.maxFileSize) {
      throw new InvalidRequestError(
        `File too large: ${input.bytes.byteLength} bytes (max ${this.maxFileSize})`,
        { context: { filename: input.filename } }
      );
    }

    timer.mark('parse');
    const parsed = await parseFile(Buffer.from(input.bytes), input.filename, input.contentType);
    logIngestionStep(log, 'parse', { duration_ms: timer.measure('parse'), chars: parsed.content.length });

    return this.prepareText(parsed.content, {
      documentId,
      filename: input.filename,
      contentType: input.contentType ?? parsed.format,
      metadata: input.metadata,
    });
  }

  /**
   * Chunk text that is already extracted.
   */
  prepareText(
    rawText: string,
    source: { documentId: string; filename: string; contentType: string; metadata?: DocumentMetadata }
  ): PreparedDocument {
    const timer = new Timer();
    const text = normalizeText(rawText);

    if (!text) {
      throw new EmptyContentError(`No text could be extracted from ${source.filename}`, {
        context: { documentId: source.documentId, filename: source.filename },
      });
    }

    timer.mark('chunk');
    const chunks = buildChunks(source.documentId, text, this.chunkOptions);
    logIngestionStep(log, 'chunk', { duration_ms: timer.measure('chunk'), chunks: chunks.length });

    const document: SourceDocument = {
      id: source.documentId,
      filename: source.filename,
      contentType: source.contentType,
      text,
      contentHash: hashContent(text),
      metadata: source.metadata ?? {},
      uploadedAt: new Date(),
    };

    log.info(
      { event: 'document_prepared', documentId: document.id, chunks: chunks.length, chars: text.length },
      `Prepared ${source.filename} into ${chunks.length} chunks`
    );

    return { document, chunks };
  }
}

export function hashContent(text: string): string {
  return createHash('sha256').update(text).digest('hex');
}
