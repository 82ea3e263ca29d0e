/**
 * Prompt assembly under a character budget.
 *
 * The prompt is the system message, the recent history and one user
 * message holding the retrieved chunks and the question. When the total
 * exceeds the budget, the oldest turns go first, then the lowest-similarity
 * chunks. The question always stays.
 */

import type { ConversationTurn, ScoredEntry } from '@/types/rag';
import type { LLMMessage } from '@/types/llm';
import {
  buildRAGSystemPrompt,
  buildSimpleSystemPrompt,
  buildUserPrompt,
  formatHistoryMessages,
  type PromptContext,
} from '@/lib/llm/prompts';

// =============================================================================
// Types
// =============================================================================

export interface PromptBudget {
  maxPromptChars: number;
  maxHistoryTurns: number;
}

export interface AssemblePromptInput {
  question: string;
  history: ConversationTurn[];
  /** Retrieved entries in similarity order; null for chat without retrieval */
  chunks: ScoredEntry[] | null;
  budget: PromptBudget;
}

export interface AssembledPrompt {
  messages: LLMMessage[];
  /** Chunks in the prompt, numbered from 1 in this order */
  contexts: PromptContext[];
  includedTurns: ConversationTurn[];
  droppedTurns: number;
  droppedChunks: number;
  promptChars: number;
  /** True when even the bare question exceeds the budget */
  overBudget: boolean;
}

// =============================================================================
// Assembly
// =============================================================================

/**
 * Title shown for a chunk: its filename when known, else the document id.
 */
export function toPromptContext(entry: ScoredEntry): PromptContext {
  const filename = entry.metadata.filename;
  return {
    chunkId: entry.chunkId,
    documentId: entry.documentId,
    title: typeof filename === 'string' && filename ? filename : entry.documentId,
    content: entry.content,
    similarity: entry.similarity,
  };
}

export function countPromptChars(messages: LLMMessage[]): number {
  return messages.reduce((sum, message) => sum + message.content.length, 0);
}

export function assemblePrompt(input: AssemblePromptInput): AssembledPrompt {
  const { question, budget } = input;
  const systemPrompt = input.chunks === null ? buildSimpleSystemPrompt() : buildRAGSystemPrompt();

  const turns = budget.maxHistoryTurns > 0 ? input.history.slice(-budget.maxHistoryTurns) : [];
  const contexts =
    input.chunks === null
      ? null
      : [...input.chunks].sort((a, b) => b.similarity - a.similarity).map(toPromptContext);

  const render = (): LLMMessage[] => [
    { role: 'system', content: systemPrompt },
    ...formatHistoryMessages(turns),
    { role: 'user', content: buildUserPrompt(question, contexts) },
  ];

  let droppedTurns = 0;
  let droppedChunks = 0;
  let messages = render();
  let promptChars = countPromptChars(messages);

  while (promptChars > budget.maxPromptChars) {
    if (turns.length > 0) {
      turns.shift();
      droppedTurns++;
    } else if (contexts && contexts.length > 0) {
      contexts.pop();
      droppedChunks++;
    } else {
      break;
    }
    messages = render();
    promptChars = countPromptChars(messages);
  }

  return {
    messages,
    contexts: contexts ?? [],
    includedTurns: turns,
    droppedTurns,
    droppedChunks,
    promptChars,
    overBudget: promptChars > budget.maxPromptChars,
  };
}
