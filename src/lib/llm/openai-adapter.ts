/**
 * OpenAI adapter implementation.
 *
 * Supports:
 * - gpt-4o-mini (default) and other chat models for completions
 * - text-embedding-3-small (default), text-embedding-3-large for embeddings
 * - Batch embeddings (native support)
 *
 * The SDK's own retries are disabled: RetryPolicy owns retrying.
 */

import OpenAI from 'openai';
import {
  BaseLLMAdapter,
  LLMAdapterConfig,
  LLMMessage,
  LLMCompletionOptions,
  LLMCompletionResponse,
  LLMEmbeddingOptions,
  LLMEmbeddingResponse,
  FinishReason,
} from './adapter';

export class OpenAIAdapter extends BaseLLMAdapter {
  readonly provider = 'openai';
  private client: OpenAI;

  constructor(config: LLMAdapterConfig) {
    super({
      ...config,
      defaultModel: config.defaultModel ?? 'gpt-4o-mini',
      defaultEmbeddingModel: config.defaultEmbeddingModel ?? 'text-embedding-3-small',
    });

    this.client = new OpenAI({
      apiKey: this.apiKey,
      maxRetries: 0,
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
   * Generate embeddings for multiple texts (batch).
   * Uses OpenAI's native batch embedding support.
   */
  async embedBatch(
    texts: string[],
    options?: LLMEmbeddingOptions
  ): Promise<LLMEmbeddingResponse> {
    if (texts.length === 0) {
      return { embeddings: [], usage: { promptTokens: 0, totalTokens: 0 } };
    }

    const response = await this.client.embeddings.create(
      {
        model: options?.model ?? this.defaultEmbeddingModel,
        input: texts,
        dimensions: options?.dimensions,
      },
      { signal: options?.signal }
    );

    // Ensure embeddings are in the same order as input
    const sorted = [...response.data].sort((a, b) => a.index - b.index);

    return {
      embeddings: sorted.map((item) => item.embedding),
      usage: {
        promptTokens: response.usage.prompt_tokens,
        totalTokens: response.usage.total_tokens,
      },
    };
  }

  /**
   * Map OpenAI finish reason to our standard type.
   */
  private mapFinishReason(
    reason: string | null | undefined
  ): FinishReason {
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
