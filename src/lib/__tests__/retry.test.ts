/**
 * Tests for RetryPolicy
 */

import { describe, it, expect, vi } from 'vitest';
import { RetryPolicy, type RetryOptions } from '../retry';
import { CancelledError, ModelUnavailableError, RetryExhaustedError } from '../errors';

const OPTIONS: RetryOptions = { maxAttempts: 3, baseDelayMs: 100, maxDelayMs: 250, jitter: 0.5 };

const isUnavailable = (error: unknown) => error instanceof ModelUnavailableError;

function createPolicy(options: RetryOptions = OPTIONS, random = () => 0) {
  const sleep = vi.fn(async (_ms: number, _signal?: AbortSignal) => undefined);
  const policy = new RetryPolicy(options, { sleep, random });
  return { policy, sleep };
}

// =============================================================================
// delayFor Tests
// =============================================================================

describe('RetryPolicy.delayFor', () => {
  it('should double the delay per attempt up to the cap', () => {
    const { policy } = createPolicy();

    expect(policy.delayFor(1)).toBe(100);
    expect(policy.delayFor(2)).toBe(200);
    expect(policy.delayFor(3)).toBe(250);
  });

  it('should add jitter proportional to the delay', () => {
    const { policy } = createPolicy(OPTIONS, () => 1);

    expect(policy.delayFor(1)).toBe(150);
    expect(policy.delayFor(3)).toBe(375);
  });
});

// =============================================================================
// execute Tests
// =============================================================================

describe('RetryPolicy.execute', () => {
  it('should return the first successful result', async () => {
    const { policy, sleep } = createPolicy();
    const op = vi.fn(async () => 'ok');

    await expect(policy.execute(op, { isRetryable: isUnavailable })).resolves.toBe('ok');
    expect(op).toHaveBeenCalledTimes(1);
    expect(sleep).not.toHaveBeenCalled();
  });

  it('should retry retryable errors with backoff', async () => {
    const { policy, sleep } = createPolicy();
    const op = vi
      .fn<(attempt: number) => Promise<string>>()
      .mockRejectedValueOnce(new ModelUnavailableError('busy', { status: 503 }))
      .mockRejectedValueOnce(new ModelUnavailableError('busy', { status: 503 }))
      .mockResolvedValueOnce('done');

    await expect(policy.execute(op, { isRetryable: isUnavailable })).resolves.toBe('done');
    expect(op.mock.calls.map(([attempt]) => attempt)).toEqual([1, 2, 3]);
    expect(sleep.mock.calls.map(([ms]) => ms)).toEqual([100, 200]);
  });

  it('should rethrow non-retryable errors immediately', async () => {
    const { policy, sleep } = createPolicy();
    const failure = new Error('bad request');
    const op = vi.fn(async () => {
      throw failure;
    });

    await expect(policy.execute(op, { isRetryable: isUnavailable })).rejects.toBe(failure);
    expect(op).toHaveBeenCalledTimes(1);
    expect(sleep).not.toHaveBeenCalled();
  });

  it('should give up after the configured attempts', async () => {
    const { policy } = createPolicy();
    const op = vi.fn(async () => {
      throw new ModelUnavailableError('down');
    });

    const error = await policy.execute(op, { isRetryable: isUnavailable }).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(RetryExhaustedError);
    if (error instanceof RetryExhaustedError) {
      expect(error.attempts).toBe(3);
      expect(error.cause).toBeInstanceOf(ModelUnavailableError);
      expect(error.message).toBe('Gave up after 3 attempts: down');
    }
    expect(op).toHaveBeenCalledTimes(3);
  });

  it('should rethrow the original error for a single-attempt policy', async () => {
    const policy = RetryPolicy.once();
    const failure = new ModelUnavailableError('down');

    await expect(
      policy.execute(async () => Promise.reject(failure), { isRetryable: isUnavailable })
    ).rejects.toBe(failure);
  });

  it('should not start an attempt once cancelled', async () => {
    const { policy } = createPolicy();
    const controller = new AbortController();
    controller.abort();
    const op = vi.fn(async () => 'never');

    await expect(
      policy.execute(op, { isRetryable: isUnavailable, signal: controller.signal, label: 'embed' })
    ).rejects.toThrow(new CancelledError('embed cancelled'));
    expect(op).not.toHaveBeenCalled();
  });

  it('should stop retrying when cancelled between attempts', async () => {
    const controller = new AbortController();
    const sleep = vi.fn(async () => {
      controller.abort();
    });
    const policy = new RetryPolicy(OPTIONS, { sleep, random: () => 0 });
    const op = vi.fn(async () => {
      throw new ModelUnavailableError('down');
    });

    await expect(
      policy.execute(op, { isRetryable: isUnavailable, signal: controller.signal })
    ).rejects.toBeInstanceOf(CancelledError);
    expect(op).toHaveBeenCalledTimes(1);
  });

  it('should stop waiting when the default sleep is aborted', async () => {
    const policy = new RetryPolicy({ maxAttempts: 2, baseDelayMs: 60_000, maxDelayMs: 60_000, jitter: 0 });
    const controller = new AbortController();
    const op = vi.fn(async () => {
      setTimeout(() => controller.abort(), 0);
      throw new ModelUnavailableError('down');
    });

    await expect(
      policy.execute(op, { isRetryable: isUnavailable, signal: controller.signal })
    ).rejects.toThrow('Cancelled while waiting to retry');
  });
});
