/**
 * LLM module exports.
 */

export { BaseLLMAdapter } from './adapter';
export type {
  LLMAdapter,
  LLMAdapterConfig,
  LLMMessage,
  LLMCompletionOptions,
  LLMCompletionResponse,
  LLMStreamChunk,
  LLMEmbeddingOptions,
  LLMEmbeddingResponse,
} from './adapter';

export { OpenAIAdapter } from './openai-adapter';

export { createLLMAdapter, createLLMAdapterFromConfig } from './factory';

export {
  buildRAGSystemPrompt,
  buildSimpleSystemPrompt,
  buildUserPrompt,
  formatContextBlock,
  formatHistoryMessages,
  buildQueryRewriteMessages,
  BOUNDARY,
  FALLBACK_ANSWER,
} from './prompts';

export type { PromptContext } from './prompts';

export {
  sanitize,
  sanitizeUserInput,
  sanitizeHistoryTurn,
  sanitizeDocumentContent,
  sanitizeDocumentTitle,
  detectInjectionPatterns,
  applyEscapePatterns,
  clampText,
  MAX_LENGTHS,
} from './sanitize';

export type { SanitizeResult, SanitizeOptions } from './sanitize';
