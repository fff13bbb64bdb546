/**
 * Base LLM adapter class.
 *
 * Provides the interface that all LLM provider adapters must implement.
 */

import {
  LLMAdapter,
  LLMAdapterConfig,
  LLMMessage,
  LLMCompletionOptions,
  LLMCompletionResponse,
  LLMEmbeddingOptions,
  LLMEmbeddingResponse,
  FinishReason,
} from '@/types/llm';

/**
 * Abstract base class for LLM adapters.
 *
 * Subclasses must implement:
 * - complete()
 * - embedBatch()
 */
export abstract class BaseLLMAdapter implements LLMAdapter {
  abstract readonly provider: string;

  protected apiKey: string;
  protected defaultModel: string;
  protected defaultEmbeddingModel: string;

  constructor(config: LLMAdapterConfig) {
    this.apiKey = config.apiKey;
    this.defaultModel = config.defaultModel ?? 'gpt-4o-mini';
    this.defaultEmbeddingModel = config.defaultEmbeddingModel ?? 'text-embedding-3-small';
  }

  abstract complete(
    messages: LLMMessage[],
    options?: LLMCompletionOptions
  ): Promise<LLMCompletionResponse>;

  abstract embedBatch(
    texts: string[],
    options?: LLMEmbeddingOptions
  ): Promise<LLMEmbeddingResponse>;
}

// Re-export types for convenience
export type {
  LLMAdapter,
  LLMAdapterConfig,
  LLMMessage,
  LLMCompletionOptions,
  LLMCompletionResponse,
  LLMEmbeddingOptions,
  LLMEmbeddingResponse,
  FinishReason,
};
