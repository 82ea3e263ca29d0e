/**
 * Query Rewriting
 *
 * Follow-up questions ("what about the second one?") retrieve poorly on
 * their own. Before retrieval the question is rewritten into a standalone
 * search query using the recent conversation. The prompt still carries the
 * user's original wording.
 */

import type { ConversationTurn } from '@/types/rag';
import type { LLMAdapter } from '@/types/llm';
import { getErrorMessage, isRAGError } from '@/lib/errors';
import { loggers } from '@/lib/logger';
import { buildQueryRewriteMessages } from '@/lib/llm/prompts';
import { withTimeout } from '@/lib/utils/timeout';
import {
  QUERY_REWRITE_HISTORY_TURNS,
  QUERY_REWRITE_MAX_TOKENS,
  QUERY_REWRITE_TEMPERATURE,
} from './config';

const log = loggers.rag.child({ service: 'QueryRewriter' });

export interface QueryRewriteOptions {
  model: string;
  /** Most recent turns shown to the model */
  historyTurns?: number;
  timeoutMs?: number;
  signal?: AbortSignal;
}

/**
 * Rewrite a question into a standalone search query.
 *
 * Returns the question unchanged when there is no history, or when the
 * model fails or answers with nothing.
 *
 * @throws CancelledError when the signal aborts
 */
export async function rewriteQuery(
  generator: Pick<LLMAdapter, 'complete'>,
  question: string,
  history: ConversationTurn[],
  options: QueryRewriteOptions
): Promise<string> {
  const turns = options.historyTurns ?? QUERY_REWRITE_HISTORY_TURNS;
  if (turns <= 0 || history.length === 0) {
    return question;
  }

  try {
    const completion = await withTimeout(
      generator.complete(buildQueryRewriteMessages(question, history.slice(-turns)), {
        model: options.model,
        maxTokens: QUERY_REWRITE_MAX_TOKENS,
        temperature: QUERY_REWRITE_TEMPERATURE,
        signal: options.signal,
      }),
      { timeoutMs: options.timeoutMs, operation: 'query rewrite', signal: options.signal }
    );

    const rewritten = firstLine(completion.content);
    if (rewritten) {
      log.debug(
        { event: 'query_rewritten', queryLength: question.length, rewrittenLength: rewritten.length },
        'Rewrote query from conversation'
      );
      return rewritten;
    }

    return question;
  } catch (error) {
    if (isRAGError(error, 'Cancelled')) throw error;

    log.warn(
      { event: 'query_rewrite_error', error: getErrorMessage(error) },
      'Failed to rewrite query, using original'
    );
    return question;
  }
}

function firstLine(text: string): string {
  return text.split('\n').map((line) => line.trim()).find(Boolean) ?? '';
}
