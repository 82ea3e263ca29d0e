/**
 * Tests for prompt assembly and budget truncation.
 */

import { describe, it, expect } from 'vitest';
import { assemblePrompt, toPromptContext, type AssemblePromptInput } from '../prompt-builder';
import { BOUNDARY, buildSimpleSystemPrompt } from '@/lib/llm/prompts';
import type { ConversationTurn, ScoredEntry } from '@/types/rag';

// =============================================================================
// Test Fixtures
// =============================================================================

const scored = (chunkId: string, similarity: number, content: string): ScoredEntry => ({
  chunkId,
  documentId: chunkId.split(':')[0],
  ordinal: Number(chunkId.split(':')[1]),
  content,
  vector: [],
  metadata: { filename: `${chunkId.split(':')[0]}.txt` },
  similarity,
});

const history: ConversationTurn[] = [
  { role: 'user', content: 'What is the refund window?' },
  { role: 'assistant', content: 'Refunds are accepted within 30 days of purchase.' },
  { role: 'user', content: 'Does that include sale items?' },
  { role: 'assistant', content: 'Sale items can be refunded for store credit only.' },
];

const chunks: ScoredEntry[] = [
  scored('policy:0', 0.91, 'Refunds are issued to the original payment method within 5 business days.'),
  scored('policy:1', 0.77, 'Store credit never expires and can be used online or in store.'),
  scored('faq:2', 0.52, 'Gift cards cannot be exchanged for cash except where required by law.'),
];

const input = (overrides: Partial<AssemblePromptInput> = {}): AssemblePromptInput => ({
  question: 'How long do refunds take?',
  history,
  chunks,
  budget: { maxPromptChars: 100_000, maxHistoryTurns: 10 },
  ...overrides,
});

const fullSize = assemblePrompt(input()).promptChars;
const sizeWithoutHistory = assemblePrompt(input({ history: [] })).promptChars;

// =============================================================================
// Tests
// =============================================================================

describe('assemblePrompt', () => {
  it('should keep everything when the prompt fits', () => {
    const result = assemblePrompt(input());

    expect(result.droppedTurns).toBe(0);
    expect(result.droppedChunks).toBe(0);
    expect(result.overBudget).toBe(false);
    expect(result.contexts.map((c) => c.chunkId)).toEqual(['policy:0', 'policy:1', 'faq:2']);
    expect(result.messages.map((m) => m.role)).toEqual(['system', 'user', 'assistant', 'user', 'assistant', 'user']);
    expect(result.messages[5].content).toContain('[Document 3]\nTitle: faq.txt');
  });

  it('should drop the oldest history turn first', () => {
    const result = assemblePrompt(input({ budget: { maxPromptChars: fullSize - 1, maxHistoryTurns: 10 } }));

    expect(result.droppedTurns).toBe(1);
    expect(result.droppedChunks).toBe(0);
    expect(result.includedTurns).toEqual(history.slice(1));
    expect(result.promptChars).toBeLessThanOrEqual(fullSize - 1);
  });

  it('should drop all history before any chunk', () => {
    const result = assemblePrompt(
      input({ budget: { maxPromptChars: sizeWithoutHistory, maxHistoryTurns: 10 } })
    );

    expect(result.droppedTurns).toBe(4);
    expect(result.droppedChunks).toBe(0);
    expect(result.promptChars).toBe(sizeWithoutHistory);
  });

  it('should drop the lowest-similarity chunk after history is gone', () => {
    const result = assemblePrompt(
      input({ budget: { maxPromptChars: sizeWithoutHistory - 1, maxHistoryTurns: 10 } })
    );

    expect(result.droppedTurns).toBe(4);
    expect(result.droppedChunks).toBe(1);
    expect(result.contexts.map((c) => c.chunkId)).toEqual(['policy:0', 'policy:1']);
  });

  it('should never drop the question', () => {
    const result = assemblePrompt(input({ budget: { maxPromptChars: 10, maxHistoryTurns: 10 } }));

    expect(result.overBudget).toBe(true);
    expect(result.includedTurns).toEqual([]);
    expect(result.contexts).toEqual([]);
    expect(result.messages[result.messages.length - 1].content).toContain('How long do refunds take?');
  });

  it('should keep only the most recent turns within the history window', () => {
    const result = assemblePrompt(input({ budget: { maxPromptChars: 100_000, maxHistoryTurns: 2 } }));

    expect(result.includedTurns).toEqual(history.slice(2));
    expect(result.droppedTurns).toBe(0);
  });

  it('should send no history when the window is zero', () => {
    const result = assemblePrompt(input({ budget: { maxPromptChars: 100_000, maxHistoryTurns: 0 } }));

    expect(result.includedTurns).toEqual([]);
    expect(result.messages).toHaveLength(2);
  });

  it('should order chunks by similarity regardless of input order', () => {
    const result = assemblePrompt(input({ chunks: [chunks[2], chunks[0], chunks[1]] }));

    expect(result.contexts.map((c) => c.chunkId)).toEqual(['policy:0', 'policy:1', 'faq:2']);
  });

  it('should build a question-only prompt without retrieval', () => {
    const result = assemblePrompt(input({ chunks: null, history: [] }));

    expect(result.messages[0].content).toBe(buildSimpleSystemPrompt());
    expect(result.messages[1].content).toBe(
      `${BOUNDARY.USER_QUESTION_START}\nHow long do refunds take?\n${BOUNDARY.USER_QUESTION_END}`
    );
    expect(result.contexts).toEqual([]);
  });
});

describe('toPromptContext', () => {
  it('should fall back to the document id when there is no filename', () => {
    const context = toPromptContext({ ...chunks[0], metadata: {} });

    expect(context).toEqual({
      chunkId: 'policy:0',
      documentId: 'policy',
      title: 'policy',
      content: chunks[0].content,
      similarity: 0.91,
    });
  });
});
