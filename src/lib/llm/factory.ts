/**
 * LLM Adapter Factory.
 *
 * Creates LLM adapters based on provider configuration.
 */

import type { LLMAdapter, LLMAdapterConfig, LLMProvider } from '@/types/llm';
import type { RAGConfig } from '@/lib/rag/config';
import { ConfigurationError } from '@/lib/errors';
import { OpenAIAdapter } from './openai-adapter';

/**
 * Create an LLM adapter for a specific provider.
 *
 * @example
 * const adapter = createLLMAdapter('openai', {
 *   apiKey: process.env.OPENAI_API_KEY ?? '',
 *   defaultModel: 'gpt-4o',
 * });
 */
export function createLLMAdapter(provider: LLMProvider, config: LLMAdapterConfig): LLMAdapter {
  switch (provider) {
    case 'openai':
      return new OpenAIAdapter(config);
  }
}

/**
 * Create the OpenAI adapter described by a RAG configuration.
 *
 * @throws ConfigurationError if OPENAI_API_KEY is not configured
 */
export function createLLMAdapterFromConfig(config: RAGConfig): LLMAdapter {
  const apiKey = config.openai.apiKey;

  if (!apiKey) {
    throw new ConfigurationError(
      'API key not found for provider: openai. Set OPENAI_API_KEY.'
    );
  }

  return createLLMAdapter('openai', {
    apiKey,
    baseUrl: config.openai.baseUrl,
    defaultModel: config.openai.model,
    defaultEmbeddingModel: config.embedding.model,
  });
}
