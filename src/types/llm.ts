/**
 * LLM adapter interface types.
 *
 * These types define the contract for LLM provider adapters,
 * enabling easy switching between providers.
 */

/**
 * Message in a chat conversation.
 */
export interface LLMMessage {
  role: 'system' | 'user' | 'assistant';
  content: string;
}

/**
 * Options for text completion.
 */
export interface LLMCompletionOptions {
  model?: string;           // Override default model
  temperature?: number;     // 0.0 - 1.0 (lower = more deterministic)
  maxTokens?: number;       // Max response tokens
  signal?: AbortSignal;     // Cancels the in-flight request
}

/**
 * Response from text completion.
 */
export interface LLMCompletionResponse {
  content: string;
  finishReason: FinishReason;
  usage: TokenUsage;
}

/**
 * Reason for completion stopping.
 */
export type FinishReason = 'stop' | 'length' | 'content_filter' | null;

/**
 * Token usage statistics.
 */
export interface TokenUsage {
  promptTokens: number;
  completionTokens: number;
  totalTokens: number;
}

/**
 * Options for embedding generation.
 */
export interface LLMEmbeddingOptions {
  model?: string;        // Override default embedding model
  dimensions?: number;   // Requested output width, where the model supports it
  signal?: AbortSignal;
}

/**
 * Response from a batch embedding call.
 */
export interface LLMEmbeddingResponse {
  embeddings: number[][];  // One vector per input, in input order
  usage: {
    promptTokens: number;
    totalTokens: number;
  };
}

/**
 * Core LLM adapter interface.
 *
 * All provider adapters must implement this interface.
 */
export interface LLMAdapter {
  /** Provider name (e.g., 'openai') */
  readonly provider: string;

  /**
   * Generate a text completion.
   */
  complete(
    messages: LLMMessage[],
    options?: LLMCompletionOptions
  ): Promise<LLMCompletionResponse>;

  /**
   * Generate embeddings for multiple texts in one request.
   * Vectors come back in the same order as `texts`.
   */
  embedBatch(
    texts: string[],
    options?: LLMEmbeddingOptions
  ): Promise<LLMEmbeddingResponse>;
}

/**
 * Configuration for creating an LLM adapter.
 */
export interface LLMAdapterConfig {
  apiKey: string;
  defaultModel?: string;
  defaultEmbeddingModel?: string;
}

export type LLMProvider = 'openai';
