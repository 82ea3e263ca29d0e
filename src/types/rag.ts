/**
 * RAG domain types.
 *
 * Shared by the ingestion pipeline, the vector index adapters and the
 * chat orchestrator.
 */

// =============================================================================
// Documents & Chunks
// =============================================================================

export type DocumentMetadata = Record<string, string | number | boolean | null>;

export type DocumentStatus = 'processing' | 'ready' | 'error';

/**
 * An uploaded file after text extraction and normalization.
 */
export interface SourceDocument {
  id: string;
  filename: string;
  contentType: string;
  text: string;
  /** sha256 of the normalized text */
  contentHash: string;
  metadata: DocumentMetadata;
  uploadedAt: Date;
}

export interface StoredDocument extends Omit<SourceDocument, 'text'> {
  status: DocumentStatus;
  chunkCount: number;
  charCount: number;
  errorMessage: string | null;
}

export interface Chunk {
  /** `${documentId}:${ordinal}` */
  id: string;
  documentId: string;
  ordinal: number;
  content: string;
  startOffset: number;
  endOffset: number;
  charCount: number;
  tokenEstimate: number;
}

// =============================================================================
// Index
// =============================================================================

export type EmbeddingVector = number[];

export interface IndexEntry {
  chunkId: string;
  documentId: string;
  ordinal: number;
  content: string;
  vector: EmbeddingVector;
  metadata: DocumentMetadata;
}

export interface ScoredEntry extends IndexEntry {
  /** Cosine similarity in [-1, 1] */
  similarity: number;
}

export interface QueryFilter {
  documentIds?: string[];
  minSimilarity?: number;
}

// =============================================================================
// Curated Answers
// =============================================================================

/**
 * An approved answer to a known question. Only the question is embedded.
 */
export interface CuratedAnswer {
  id: string;
  question: string;
  answer: string;
  metadata: DocumentMetadata;
  createdAt: Date;
}

export interface ScoredCuratedAnswer extends CuratedAnswer {
  /** Cosine similarity between the query and the curated question */
  similarity: number;
}

// =============================================================================
// Conversation
// =============================================================================

export interface ConversationTurn {
  role: 'user' | 'assistant';
  content: string;
}

export type ChatMode = 'rag' | 'simple' | 'auto';

export type OrchestratorState =
  | 'ReceivedQuery'
  | 'Embedding'
  | 'Retrieving'
  | 'PromptAssembly'
  | 'Generating'
  | 'Responded'
  | 'Failed';
