/**
 * Citation Service
 *
 * Maps `[Citation N]` markers in an answer back to the chunks that were
 * numbered N in the prompt.
 */

import type { PromptContext } from '@/lib/llm/prompts';

// =============================================================================
// Types
// =============================================================================

export interface Citation {
  /** 1-based position of the chunk in the prompt */
  id: number;
  chunkId: string;
  documentId: string;
  documentTitle: string;
  similarity: number;
}

export interface CitationCheck {
  isValid: boolean;
  hasCitations: boolean;
  /** Numbers cited that match no chunk */
  invalidCitations: number[];
  /** Chunk positions the answer never cited */
  unusedChunks: number[];
}

// Both [Citation N] and bare [N]
const CITATION_PATTERN = /\[Citation\s*(\d+)\]|\[(\d+)\]/gi;

// =============================================================================
// Parsing
// =============================================================================

/**
 * All citation numbers in order of first appearance, without duplicates.
 */
export function extractCitationNumbers(answer: string): number[] {
  const seen = new Set<number>();
  for (const match of answer.matchAll(CITATION_PATTERN)) {
    seen.add(parseInt(match[1] ?? match[2], 10));
  }
  return [...seen];
}

/**
 * Citations the answer actually used, ordered by number.
 */
export function parseCitations(answer: string, contexts: PromptContext[]): Citation[] {
  const citations: Citation[] = [];

  for (const num of extractCitationNumbers(answer)) {
    const context = contexts[num - 1];
    if (num > 0 && context) {
      citations.push({
        id: num,
        chunkId: context.chunkId,
        documentId: context.documentId,
        documentTitle: context.title,
        similarity: context.similarity,
      });
    }
  }

  return citations.sort((a, b) => a.id - b.id);
}

/**
 * Check an answer's citation markers against the prompt's chunks.
 */
export function validateCitations(answer: string, contexts: PromptContext[]): CitationCheck {
  const used = new Set<number>();
  const invalidCitations: number[] = [];

  for (const num of extractCitationNumbers(answer)) {
    if (num > 0 && num <= contexts.length) {
      used.add(num);
    } else {
      invalidCitations.push(num);
    }
  }

  const unusedChunks: number[] = [];
  for (let i = 1; i <= contexts.length; i++) {
    if (!used.has(i)) unusedChunks.push(i);
  }

  return {
    isValid: invalidCitations.length === 0,
    hasCitations: used.size > 0,
    invalidCitations,
    unusedChunks,
  };
}

/**
 * Markdown list of the distinct documents behind the citations.
 */
export function formatSourcesSection(citations: Citation[]): string {
  if (citations.length === 0) {
    return '';
  }

  const titles = new Map<string, string>();
  for (const citation of citations) {
    if (!titles.has(citation.documentId)) {
      titles.set(citation.documentId, citation.documentTitle);
    }
  }

  return ['**Sources:**', ...[...titles.values()].map((title, i) => `${i + 1}. ${title}`)].join('\n');
}
