/**
 * Document Chunker
 *
 * Splits normalized document text into overlapping chunks for retrieval.
 * Cuts prefer paragraph breaks, then line breaks, then sentence ends, then
 * spaces, and fall back to a hard cut when no separator fits the window.
 *
 * Consecutive chunks share `chunkOverlap` characters, so the first chunk
 * followed by every later chunk minus its overlap rebuilds the input.
 * Neither a cut nor an overlap start splits a surrogate pair; the chunk or
 * the overlap gives up one code unit instead.
 */

import type { Chunk } from '@/types/rag';
import { ConfigurationError } from '@/lib/errors';
import { DEFAULT_CHUNK_OVERLAP, DEFAULT_CHUNK_SIZE } from './config';

// =============================================================================
// Types
// =============================================================================

export interface TextChunk {
  content: string;
  chunkIndex: number;
  startOffset: number;
  endOffset: number;
}

export interface ChunkOptions {
  chunkSize: number;
  chunkOverlap: number;
}

// =============================================================================
// Default Options
// =============================================================================

const DEFAULT_CHUNK_OPTIONS: ChunkOptions = {
  chunkSize: DEFAULT_CHUNK_SIZE,
  chunkOverlap: DEFAULT_CHUNK_OVERLAP,
};

/**
 * Separator groups in priority order. Within a group the latest
 * occurrence wins.
 */
const SEPARATOR_GROUPS: readonly (readonly string[])[] = [
  ['\n\n'],
  ['\n'],
  ['. ', '! ', '? '],
  [' '],
];

// =============================================================================
// Normalization
// =============================================================================

/**
 * Normalize extracted text before chunking.
 * Unifies line endings, strips control characters, collapses runs of
 * spaces, trims lines and limits blank lines to one.
 */
export function normalizeText(text: string): string {
  return text
    .replace(/\r\n?/g, '\n')
    .replace(/[\u0000-\u0008\u000B\u000C\u000E-\u001F\u007F]/g, '')
    .replace(/[ \t\u00A0]+/g, ' ')
    .split('\n')
    .map((line) => line.trim())
    .join('\n')
    .replace(/\n{3,}/g, '\n\n')
    .trim();
}

// =============================================================================
// Chunking Functions
// =============================================================================

function validateOptions({ chunkSize, chunkOverlap }: ChunkOptions): void {
  if (!Number.isInteger(chunkSize) || chunkSize <= 0) {
    throw new ConfigurationError(`chunkSize must be a positive integer, got ${chunkSize}`);
  }
  if (!Number.isInteger(chunkOverlap) || chunkOverlap < 0 || chunkOverlap >= chunkSize) {
    throw new ConfigurationError(
      `chunkOverlap must be an integer in [0, chunkSize), got ${chunkOverlap} for chunkSize ${chunkSize}`
    );
  }
}

/**
 * Find where to end the chunk that starts at `start`.
 * Separators ending before `minBreak` are ignored so chunks never shrink
 * below half the window or fail to advance past the overlap.
 */
function findBreak(text: string, start: number, limit: number, minBreak: number): number {
  for (const group of SEPARATOR_GROUPS) {
    let best = -1;

    for (const separator of group) {
      const index = text.lastIndexOf(separator, limit - separator.length);
      if (index < start) continue;

      const position = index + separator.length;
      if (position >= minBreak && position > best) {
        best = position;
      }
    }

    if (best !== -1) {
      return best;
    }
  }

  return limit;
}

function isHighSurrogate(code: number): boolean {
  return code >= 0xd800 && code <= 0xdbff;
}

function isLowSurrogate(code: number): boolean {
  return code >= 0xdc00 && code <= 0xdfff;
}

/**
 * True when `index` falls between the two halves of a surrogate pair.
 */
export function splitsSurrogatePair(text: string, index: number): boolean {
  return (
    index > 0 &&
    index < text.length &&
    isHighSurrogate(text.charCodeAt(index - 1)) &&
    isLowSurrogate(text.charCodeAt(index))
  );
}

/**
 * Split text into overlapping chunks.
 *
 * Chunk content is the raw slice of the input, so offsets are exact.
 *
 * @throws ConfigurationError for a non-positive size or an overlap not below the size
 */
export function chunkText(text: string, options: Partial<ChunkOptions> = {}): TextChunk[] {
  const opts = { ...DEFAULT_CHUNK_OPTIONS, ...options };
  validateOptions(opts);
  const { chunkSize, chunkOverlap } = opts;

  if (!text) {
    return [];
  }

  const minAdvance = Math.max(chunkOverlap + 1, Math.floor(chunkSize / 2));
  const chunks: TextChunk[] = [];
  let start = 0;

  for (;;) {
    let end =
      text.length - start <= chunkSize
        ? text.length
        : findBreak(text, start, start + chunkSize, start + minAdvance);

    if (splitsSurrogatePair(text, end)) {
      // Step back unless that would stall the next chunk's start.
      end = end - 1 - chunkOverlap > start ? end - 1 : end + 1;
    }

    chunks.push({
      content: text.slice(start, end),
      chunkIndex: chunks.length,
      startOffset: start,
      endOffset: end,
    });

    if (end >= text.length) break;
    start = end - chunkOverlap;
    if (splitsSurrogatePair(text, start)) {
      start += 1;
    }
  }

  return chunks;
}

/**
 * Chunk a document's normalized text into identified chunks.
 * Ids are `${documentId}:${ordinal}`, stable across re-ingestion.
 */
export function buildChunks(
  documentId: string,
  text: string,
  options: Partial<ChunkOptions> = {}
): Chunk[] {
  return chunkText(text, options).map((chunk) => ({
    id: chunkId(documentId, chunk.chunkIndex),
    documentId,
    ordinal: chunk.chunkIndex,
    content: chunk.content,
    startOffset: chunk.startOffset,
    endOffset: chunk.endOffset,
    charCount: chunk.content.length,
    tokenEstimate: estimateTokens(chunk.content),
  }));
}

export function chunkId(documentId: string, ordinal: number): string {
  return `${documentId}:${ordinal}`;
}

/**
 * Estimate token count (rough approximation: ~4 chars per token for English).
 */
export function estimateTokens(text: string): number {
  return Math.ceil(text.length / 4);
}
