/**
 * Base LLM adapter class.
 *
 * Chat completion and embedding calls go through this contract so the
 * RAG pipeline never depends on a provider SDK directly.
 */

import type {
  LLMAdapter,
  LLMAdapterConfig,
  LLMMessage,
  LLMCompletionOptions,
  LLMCompletionResponse,
  LLMStreamChunk,
  LLMEmbeddingOptions,
  LLMEmbeddingResponse,
  FinishReason,
} from '@/types/llm';

/**
 * Abstract base class for LLM adapters.
 *
 * Subclasses must implement complete(), streamComplete() and embed().
 * embedBatch() falls back to one embed() call per text, in order.
 */
export abstract class BaseLLMAdapter implements LLMAdapter {
  abstract readonly provider: string;

  protected apiKey: string;
  protected defaultModel: string;
  protected defaultEmbeddingModel: string;
  protected baseUrl?: string;
  protected maxRetries: number;

  constructor(config: LLMAdapterConfig) {
    this.apiKey = config.apiKey;
    this.defaultModel = config.defaultModel ?? 'gpt-4o-mini';
    this.defaultEmbeddingModel = config.defaultEmbeddingModel ?? 'text-embedding-3-small';
    this.baseUrl = config.baseUrl;
    this.maxRetries = config.maxRetries ?? 0;
  }

  abstract complete(
    messages: LLMMessage[],
    options?: LLMCompletionOptions
  ): Promise<LLMCompletionResponse>;

  abstract streamComplete(
    messages: LLMMessage[],
    options?: LLMCompletionOptions
  ): AsyncGenerator<LLMStreamChunk, void, unknown>;

  abstract embed(
    text: string,
    options?: LLMEmbeddingOptions
  ): Promise<LLMEmbeddingResponse>;

  async embedBatch(
    texts: string[],
    options?: LLMEmbeddingOptions
  ): Promise<LLMEmbeddingResponse[]> {
    const results: LLMEmbeddingResponse[] = [];
    for (const text of texts) {
      results.push(await this.embed(text, options));
    }
    return results;
  }
}

export type {
  LLMAdapter,
  LLMAdapterConfig,
  LLMMessage,
  LLMCompletionOptions,
  LLMCompletionResponse,
  LLMStreamChunk,
  LLMEmbeddingOptions,
  LLMEmbeddingResponse,
  FinishReason,
};
