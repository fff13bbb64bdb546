/**
 * Tests for the OpenAI answer generator
 */

import { describe, it, expect, vi } from 'vitest';
import { OpenAIGenerator, type OpenAIGeneratorConfig } from '../generator';
import { RetryPolicy } from '@/lib/retry';
import { CancelledError, GenerationFailedError } from '@/lib/errors';
import type { LLMAdapter } from '@/types/llm';
import { completion, fakeAdapter } from './helpers';

const CONFIG: OpenAIGeneratorConfig = {
  model: 'chat-test',
  maxTokens: 256,
  temperature: 0.3,
  timeoutMs: 1000,
};

const PROMPT = { system: 'system text', user: 'user text' };

async function failureOf(promise: Promise<unknown>): Promise<unknown> {
  return promise.then(
    () => undefined,
    (error: unknown) => error
  );
}

/**
 * Adapter call that only settles when its signal aborts.
 */
const hangUntilAborted: LLMAdapter['complete'] = (_messages, options) =>
  new Promise((_resolve, reject) => {
    options?.signal?.addEventListener('abort', () => reject(new Error('Request was aborted.')));
  });

describe('OpenAIGenerator', () => {
  it('should send system and user messages with the configured options', async () => {
    const complete = vi.fn<LLMAdapter['complete']>().mockResolvedValue(completion('The sky is blue [1].'));
    const generator = new OpenAIGenerator(fakeAdapter({ complete }), CONFIG);

    await expect(generator.generate(PROMPT)).resolves.toBe('The sky is blue [1].');

    const [messages, options] = complete.mock.calls[0];
    expect(messages).toEqual([
      { role: 'system', content: 'system text' },
      { role: 'user', content: 'user text' },
    ]);
    expect(options).toMatchObject({ model: 'chat-test', maxTokens: 256, temperature: 0.3 });
    expect(options?.signal).toBeInstanceOf(AbortSignal);
  });

  it('should fail as unavailable when the service errors', async () => {
    const complete = vi.fn<LLMAdapter['complete']>().mockRejectedValue(new Error('503 Service Unavailable'));
    const generator = new OpenAIGenerator(fakeAdapter({ complete }), CONFIG);

    const error = await failureOf(generator.generate(PROMPT));

    expect(error).toBeInstanceOf(GenerationFailedError);
    if (error instanceof GenerationFailedError) {
      expect(error.reason).toBe('Unavailable');
    }
    expect(complete).toHaveBeenCalledTimes(1);
  });

  it('should fail with a timeout when the deadline passes', async () => {
    const generator = new OpenAIGenerator(fakeAdapter({ complete: hangUntilAborted }), {
      ...CONFIG,
      timeoutMs: 20,
    });

    const error = await failureOf(generator.generate(PROMPT));

    expect(error).toBeInstanceOf(GenerationFailedError);
    if (error instanceof GenerationFailedError) {
      expect(error.reason).toBe('Timeout');
    }
  });

  it('should report a caller abort as cancellation', async () => {
    const controller = new AbortController();
    const generator = new OpenAIGenerator(fakeAdapter({ complete: hangUntilAborted }), CONFIG);

    const pending = failureOf(generator.generate(PROMPT, { signal: controller.signal }));
    controller.abort();

    expect(await pending).toBeInstanceOf(CancelledError);
  });

  it('should retry unavailable attempts when given a retry policy', async () => {
    const complete = vi
      .fn<LLMAdapter['complete']>()
      .mockRejectedValueOnce(new Error('reset'))
      .mockResolvedValueOnce(completion('second try'));
    const retry = new RetryPolicy(
      { maxAttempts: 2, baseDelayMs: 1, maxDelayMs: 1, jitter: 0 },
      { sleep: async () => undefined }
    );
    const generator = new OpenAIGenerator(fakeAdapter({ complete }), CONFIG, retry);

    await expect(generator.generate(PROMPT)).resolves.toBe('second try');
    expect(complete).toHaveBeenCalledTimes(2);
  });

  it('should convert an exhausted retry budget to an unavailable failure', async () => {
    const complete = vi.fn<LLMAdapter['complete']>().mockRejectedValue(new Error('reset'));
    const retry = new RetryPolicy(
      { maxAttempts: 2, baseDelayMs: 1, maxDelayMs: 1, jitter: 0 },
      { sleep: async () => undefined }
    );
    const generator = new OpenAIGenerator(fakeAdapter({ complete }), CONFIG, retry);

    const error = await failureOf(generator.generate(PROMPT));

    expect(error).toBeInstanceOf(GenerationFailedError);
    if (error instanceof GenerationFailedError) {
      expect(error.reason).toBe('Unavailable');
    }
  });
});
