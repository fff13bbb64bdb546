/**
 * Embedding Gateway
 *
 * Turns text into fixed-dimension vectors. The Embedder is the capability
 * that talks to a model service; the gateway batches inputs, retries
 * unavailable batches and checks every vector's width.
 */

import type { LLMAdapter } from '@/types/llm';
import { classifyProviderError, getErrorStatus } from '@/lib/llm/errors';
import {
  CancelledError,
  DimensionMismatchError,
  ModelUnavailableError,
  getErrorMessage,
} from '@/lib/errors';
import { RetryPolicy } from '@/lib/retry';
import { logger, logExternalCall, logRagStep, Timer, type Logger } from '@/lib/logger';

const log = logger.child({ layer: 'rag', service: 'EmbeddingGateway' });

// =============================================================================
// Types
// =============================================================================

export interface EmbedOptions {
  signal?: AbortSignal;
}

/**
 * One call to an embedding model service.
 * Returns one vector per input, in input order.
 */
export interface Embedder {
  readonly model: string;
  readonly dimensions: number;
  embed(texts: string[], options?: EmbedOptions): Promise<number[][]>;
}

export interface EmbeddingGatewayOptions {
  batchSize: number;
  retry: RetryPolicy;
  log?: Logger;
}

// =============================================================================
// OpenAI Embedder
// =============================================================================

export class OpenAIEmbedder implements Embedder {
  readonly model: string;
  readonly dimensions: number;
  private adapter: LLMAdapter;

  constructor(adapter: LLMAdapter, config: { model: string; dimensions: number }) {
    this.adapter = adapter;
    this.model = config.model;
    this.dimensions = config.dimensions;
  }

  async embed(texts: string[], options: EmbedOptions = {}): Promise<number[][]> {
    const timer = new Timer();

    try {
      const response = await this.adapter.embedBatch(texts, {
        model: this.model,
        dimensions: this.dimensions,
        signal: options.signal,
      });

      logExternalCall(log, 'openai', 'embeddings', {
        duration_ms: timer.elapsed(),
        tokens: response.usage.totalTokens,
        model: this.model,
      });

      return response.embeddings;
    } catch (error) {
      const failure = classifyProviderError(error, options.signal);
      if (failure === 'aborted') {
        throw new CancelledError('Embedding request cancelled', error);
      }

      const status = getErrorStatus(error);
      logExternalCall(log, 'openai', 'embeddings', {
        duration_ms: timer.elapsed(),
        status,
        error: getErrorMessage(error),
        model: this.model,
      });

      if (failure === 'unavailable') {
        throw new ModelUnavailableError(`Embedding service unavailable: ${getErrorMessage(error)}`, {
          status,
          cause: error,
        });
      }
      throw error;
    }
  }
}

// =============================================================================
// Gateway
// =============================================================================

export class EmbeddingGateway {
  private embedder: Embedder;
  private batchSize: number;
  private retry: RetryPolicy;
  private log: Logger;

  constructor(embedder: Embedder, options: EmbeddingGatewayOptions) {
    this.embedder = embedder;
    this.batchSize = options.batchSize;
    this.retry = options.retry;
    this.log = options.log ?? log;
  }

  get dimensions(): number {
    return this.embedder.dimensions;
  }

  get model(): string {
    return this.embedder.model;
  }

  /**
   * Embed texts in batches of at most `batchSize`, preserving order.
   */
  async embed(texts: string[], options: EmbedOptions = {}): Promise<number[][]> {
    if (texts.length === 0) {
      return [];
    }

    const timer = new Timer();
    const vectors: number[][] = [];

    for (let start = 0; start < texts.length; start += this.batchSize) {
      const batch = texts.slice(start, start + this.batchSize);

      const batchVectors = await this.retry.execute(
        () => this.embedder.embed(batch, { signal: options.signal }),
        {
          signal: options.signal,
          isRetryable: (error) => error instanceof ModelUnavailableError,
          label: 'embedding batch',
        }
      );

      this.checkBatch(batch.length, batchVectors);
      vectors.push(...batchVectors);
    }

    logRagStep(this.log, 'embedding', {
      duration_ms: timer.elapsed(),
      chunks: texts.length,
      model: this.embedder.model,
    });

    return vectors;
  }

  async embedQuery(text: string, options: EmbedOptions = {}): Promise<number[]> {
    const [vector] = await this.embed([text], options);
    return vector;
  }

  private checkBatch(expectedCount: number, vectors: number[][]): void {
    if (vectors.length !== expectedCount) {
      throw new DimensionMismatchError(expectedCount, vectors.length, 'Embedding service', 'count');
    }
    for (const vector of vectors) {
      if (vector.length !== this.embedder.dimensions) {
        throw new DimensionMismatchError(this.embedder.dimensions, vector.length, 'Embedding service');
      }
    }
  }
}
