/**
 * Tests for the Embedding Gateway and OpenAI embedder
 */

import { describe, it, expect, vi } from 'vitest';
import { EmbeddingGateway, OpenAIEmbedder, type Embedder } from '../embeddings';
import { RetryPolicy } from '@/lib/retry';
import {
  CancelledError,
  DimensionMismatchError,
  ModelUnavailableError,
  RetryExhaustedError,
} from '@/lib/errors';
import { KeywordEmbedder, COLOR_VOCABULARY, fakeAdapter } from './helpers';

function createRetry(maxAttempts = 3) {
  const sleep = vi.fn(async () => undefined);
  return {
    retry: new RetryPolicy({ maxAttempts, baseDelayMs: 10, maxDelayMs: 100, jitter: 0 }, { sleep }),
    sleep,
  };
}

function statusError(status: number, message: string): Error {
  return Object.assign(new Error(message), { status });
}

// =============================================================================
// EmbeddingGateway Tests
// =============================================================================

describe('EmbeddingGateway', () => {
  it('should expose the embedder model and dimensions', () => {
    const gateway = new EmbeddingGateway(new KeywordEmbedder(COLOR_VOCABULARY), {
      batchSize: 8,
      retry: createRetry().retry,
    });

    expect(gateway.model).toBe('keyword-test');
    expect(gateway.dimensions).toBe(5);
  });

  it('should batch inputs and keep their order', async () => {
    const embedder = new KeywordEmbedder(COLOR_VOCABULARY);
    const gateway = new EmbeddingGateway(embedder, { batchSize: 2, retry: createRetry().retry });

    const vectors = await gateway.embed(['sky', 'blue blue', 'grass', 'green', 'color']);

    expect(embedder.calls).toEqual([['sky', 'blue blue'], ['grass', 'green'], ['color']]);
    expect(vectors).toEqual([
      [1, 0, 0, 0, 0],
      [0, 2, 0, 0, 0],
      [0, 0, 1, 0, 0],
      [0, 0, 0, 1, 0],
      [0, 0, 0, 0, 1],
    ]);
  });

  it('should not call the embedder for no input', async () => {
    const embedder = new KeywordEmbedder(COLOR_VOCABULARY);
    const gateway = new EmbeddingGateway(embedder, { batchSize: 2, retry: createRetry().retry });

    await expect(gateway.embed([])).resolves.toEqual([]);
    expect(embedder.calls).toEqual([]);
  });

  it('should embed a single query', async () => {
    const gateway = new EmbeddingGateway(new KeywordEmbedder(COLOR_VOCABULARY), {
      batchSize: 2,
      retry: createRetry().retry,
    });

    await expect(gateway.embedQuery('What color is the sky?')).resolves.toEqual([1, 0, 0, 0, 1]);
  });

  it('should retry a batch while the model is unavailable', async () => {
    const embed = vi
      .fn<Embedder['embed']>()
      .mockRejectedValueOnce(new ModelUnavailableError('busy'))
      .mockResolvedValueOnce([[1, 2]]);
    const { retry, sleep } = createRetry();
    const gateway = new EmbeddingGateway({ model: 'm', dimensions: 2, embed }, { batchSize: 4, retry });

    await expect(gateway.embed(['text'])).resolves.toEqual([[1, 2]]);
    expect(embed).toHaveBeenCalledTimes(2);
    expect(sleep).toHaveBeenCalledTimes(1);
  });

  it('should give up after the retry budget', async () => {
    const embed = vi.fn<Embedder['embed']>().mockRejectedValue(new ModelUnavailableError('down'));
    const gateway = new EmbeddingGateway(
      { model: 'm', dimensions: 2, embed },
      { batchSize: 4, retry: createRetry(2).retry }
    );

    await expect(gateway.embed(['text'])).rejects.toBeInstanceOf(RetryExhaustedError);
    expect(embed).toHaveBeenCalledTimes(2);
  });

  it('should reject vectors of the wrong width', async () => {
    const embed = vi.fn<Embedder['embed']>().mockResolvedValue([[1, 2, 3]]);
    const gateway = new EmbeddingGateway(
      { model: 'm', dimensions: 2, embed },
      { batchSize: 4, retry: createRetry().retry }
    );

    await expect(gateway.embed(['text'])).rejects.toThrow(
      new DimensionMismatchError(2, 3, 'Embedding service')
    );
  });

  it('should reject a batch with the wrong number of vectors', async () => {
    const embed = vi.fn<Embedder['embed']>().mockResolvedValue([[1, 2]]);
    const gateway = new EmbeddingGateway(
      { model: 'm', dimensions: 2, embed },
      { batchSize: 4, retry: createRetry().retry }
    );

    await expect(gateway.embed(['a', 'b'])).rejects.toThrow('Embedding service: expected 2 vectors, got 1');
  });

  it('should stop when cancelled', async () => {
    const embedder = new KeywordEmbedder(COLOR_VOCABULARY);
    const gateway = new EmbeddingGateway(embedder, { batchSize: 2, retry: createRetry().retry });
    const controller = new AbortController();
    controller.abort();

    await expect(gateway.embed(['sky'], { signal: controller.signal })).rejects.toBeInstanceOf(
      CancelledError
    );
    expect(embedder.calls).toEqual([]);
  });
});

// =============================================================================
// OpenAIEmbedder Tests
// =============================================================================

describe('OpenAIEmbedder', () => {
  it('should request the configured model and dimensions', async () => {
    const embedBatch = vi.fn(async () => ({
      embeddings: [[0.1, 0.2]],
      usage: { promptTokens: 3, totalTokens: 3 },
    }));
    const embedder = new OpenAIEmbedder(fakeAdapter({ embedBatch }), { model: 'embed-small', dimensions: 2 });

    await expect(embedder.embed(['hello'])).resolves.toEqual([[0.1, 0.2]]);
    expect(embedBatch).toHaveBeenCalledWith(['hello'], {
      model: 'embed-small',
      dimensions: 2,
      signal: undefined,
    });
  });

  it('should map retryable failures to ModelUnavailableError', async () => {
    const embedder = new OpenAIEmbedder(
      fakeAdapter({ embedBatch: async () => Promise.reject(statusError(429, 'rate limited')) }),
      { model: 'm', dimensions: 2 }
    );

    const error = await embedder.embed(['x']).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(ModelUnavailableError);
    if (error instanceof ModelUnavailableError) {
      expect(error.status).toBe(429);
      expect(error.message).toBe('Embedding service unavailable: rate limited');
    }
  });

  it('should treat connection errors as unavailable', async () => {
    const embedder = new OpenAIEmbedder(
      fakeAdapter({ embedBatch: async () => Promise.reject(new Error('ECONNRESET')) }),
      { model: 'm', dimensions: 2 }
    );

    await expect(embedder.embed(['x'])).rejects.toBeInstanceOf(ModelUnavailableError);
  });

  it('should pass client errors through', async () => {
    const failure = statusError(400, 'bad input');
    const embedder = new OpenAIEmbedder(
      fakeAdapter({ embedBatch: async () => Promise.reject(failure) }),
      { model: 'm', dimensions: 2 }
    );

    await expect(embedder.embed(['x'])).rejects.toBe(failure);
  });

  it('should report aborts as cancellation', async () => {
    const controller = new AbortController();
    const embedder = new OpenAIEmbedder(
      fakeAdapter({
        embedBatch: async () => {
          controller.abort();
          throw new Error('Request was aborted.');
        },
      }),
      { model: 'm', dimensions: 2 }
    );

    await expect(embedder.embed(['x'], { signal: controller.signal })).rejects.toBeInstanceOf(
      CancelledError
    );
  });
});
