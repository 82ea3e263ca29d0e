/**
 * OpenAI adapter implementation.
 *
 * Supports:
 * - GPT-4o-mini (default) or any chat model for completions
 * - text-embedding-3-small (default) or text-embedding-3-large for embeddings
 * - Streaming responses
 * - Batch embeddings (native support)
 * - OpenAI-compatible servers through `baseUrl`
 */

import OpenAI from 'openai';
import {
  BaseLLMAdapter,
  type LLMAdapterConfig,
  type LLMMessage,
  type LLMCompletionOptions,
  type LLMCompletionResponse,
  type LLMStreamChunk,
  type LLMEmbeddingOptions,
  type LLMEmbeddingResponse,
  type FinishReason,
} from './adapter';

export class OpenAIAdapter extends BaseLLMAdapter {
  readonly provider = 'openai';
  private client: OpenAI;

  constructor(config: LLMAdapterConfig) {
    super(config);

    this.client = new OpenAI({
      apiKey: this.apiKey,
      baseURL: this.baseUrl,
      maxRetries: this.maxRetries,
    });
  }

  /**
   * Generate a text completion using OpenAI Chat API.
   */
  async complete(
    messages: LLMMessage[],
    options?: LLMCompletionOptions
  ): Promise<LLMCompletionResponse> {
    const response = await this.client.chat.completions.create(
      {
        model: options?.model ?? this.defaultModel,
        messages: messages.map((m) => ({
          role: m.role,
          content: m.content,
        })),
        temperature: options?.temperature ?? 0.3,
        max_tokens: options?.maxTokens ?? 1000,
        stop: options?.stopSequences,
      },
      { signal: options?.signal }
    );

    const choice = response.choices[0];

    return {
      content: choice?.message.content ?? '',
      finishReason: this.mapFinishReason(choice?.finish_reason),
      usage: {
        promptTokens: response.usage?.prompt_tokens ?? 0,
        completionTokens: response.usage?.completion_tokens ?? 0,
        totalTokens: response.usage?.total_tokens ?? 0,
      },
    };
  }

  /**
   * Generate a streaming text completion.
   * Yields chunks as they arrive from OpenAI; usage arrives on the last one.
   */
  async *streamComplete(
    messages: LLMMessage[],
    options?: LLMCompletionOptions
  ): AsyncGenerator<LLMStreamChunk, void, unknown> {
    const stream = await this.client.chat.completions.create(
      {
        model: options?.model ?? this.defaultModel,
        messages: messages.map((m) => ({
          role: m.role,
          content: m.content,
        })),
        temperature: options?.temperature ?? 0.3,
        max_tokens: options?.maxTokens ?? 1000,
        stop: options?.stopSequences,
        stream: true,
        stream_options: { include_usage: true },
      },
      { signal: options?.signal }
    );

    for await (const chunk of stream) {
      const choice = chunk.choices[0];

      yield {
        content: choice?.delta?.content ?? '',
        finishReason: this.mapFinishReason(choice?.finish_reason),
        ...(chunk.usage && {
          usage: {
            promptTokens: chunk.usage.prompt_tokens,
            completionTokens: chunk.usage.completion_tokens,
            totalTokens: chunk.usage.total_tokens,
          },
        }),
      };
    }
  }

  /**
   * Generate an embedding for a single text.
   */
  async embed(
    text: string,
    options?: LLMEmbeddingOptions
  ): Promise<LLMEmbeddingResponse> {
    const [result] = await this.embedBatch([text], options);
    if (!result) {
      throw new Error('Embedding response contained no data');
    }
    return result;
  }

  /**
   * Generate embeddings for multiple texts in one request.
   * Results are returned in input order.
   */
  async embedBatch(
    texts: string[],
    options?: LLMEmbeddingOptions
  ): Promise<LLMEmbeddingResponse[]> {
    if (texts.length === 0) {
      return [];
    }

    const response = await this.client.embeddings.create(
      {
        model: options?.model ?? this.defaultEmbeddingModel,
        input: texts,
        ...(options?.dimensions !== undefined && { dimensions: options.dimensions }),
      },
      { signal: options?.signal }
    );

    // Calculate per-text usage (approximation)
    const perTextPromptTokens = Math.floor(response.usage.prompt_tokens / texts.length);
    const perTextTotalTokens = Math.floor(response.usage.total_tokens / texts.length);

    return [...response.data]
      .sort((a, b) => a.index - b.index)
      .map((item) => ({
        embedding: item.embedding,
        usage: {
          promptTokens: perTextPromptTokens,
          totalTokens: perTextTotalTokens,
        },
      }));
  }

  /**
   * Map OpenAI finish reason to our standard type.
   */
  private mapFinishReason(reason: string | null | undefined): FinishReason {
    switch (reason) {
      case 'stop':
        return 'stop';
      case 'length':
        return 'length';
      case 'content_filter':
        return 'content_filter';
      default:
        return null;
    }
  }
}
