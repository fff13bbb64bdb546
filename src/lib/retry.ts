/**
 * Retry Policy
 *
 * Exponential backoff with jitter for calls to external model services.
 * A policy never loops forever: after `maxAttempts` the last error is
 * wrapped in RetryExhaustedError.
 */

import { setTimeout as delay } from 'timers/promises';
import { CancelledError, RetryExhaustedError, getErrorMessage } from '@/lib/errors';
import { logger, type Logger } from '@/lib/logger';

export interface RetryOptions {
  /** Total attempts including the first call. */
  maxAttempts: number;
  baseDelayMs: number;
  maxDelayMs: number;
  /** Fraction of the computed delay added at random, 0 to 1. */
  jitter: number;
}

export type Sleep = (ms: number, signal?: AbortSignal) => Promise<void>;

export interface RetryDeps {
  sleep?: Sleep;
  random?: () => number;
  log?: Logger;
}

export interface ExecuteOptions {
  isRetryable: (error: unknown) => boolean;
  signal?: AbortSignal;
  label?: string;
}

const defaultSleep: Sleep = async (ms, signal) => {
  try {
    await delay(ms, undefined, { signal });
  } catch (error) {
    throw new CancelledError('Cancelled while waiting to retry', error);
  }
};

export class RetryPolicy {
  readonly options: RetryOptions;
  private sleep: Sleep;
  private random: () => number;
  private log: Logger;

  constructor(options: RetryOptions, deps: RetryDeps = {}) {
    this.options = options;
    this.sleep = deps.sleep ?? defaultSleep;
    this.random = deps.random ?? Math.random;
    this.log = deps.log ?? logger.child({ layer: 'external', service: 'RetryPolicy' });
  }

  /**
   * A policy that calls once and never retries.
   */
  static once(): RetryPolicy {
    return new RetryPolicy({ maxAttempts: 1, baseDelayMs: 0, maxDelayMs: 0, jitter: 0 });
  }

  /**
   * Delay before attempt `attempt + 1`, given that `attempt` (1-based) failed.
   */
  delayFor(attempt: number): number {
    const { baseDelayMs, maxDelayMs, jitter } = this.options;
    const exponential = Math.min(baseDelayMs * 2 ** (attempt - 1), maxDelayMs);
    return Math.round(exponential + exponential * jitter * this.random());
  }

  async execute<T>(operation: (attempt: number) => Promise<T>, options: ExecuteOptions): Promise<T> {
    const { maxAttempts } = this.options;
    const label = options.label ?? 'operation';

    for (let attempt = 1; ; attempt++) {
      if (options.signal?.aborted) {
        throw new CancelledError(`${label} cancelled`);
      }

      try {
        return await operation(attempt);
      } catch (error) {
        if (!options.isRetryable(error)) {
          throw error;
        }

        if (attempt >= maxAttempts) {
          if (maxAttempts === 1) {
            throw error;
          }
          this.log.warn(
            { event: 'retry_exhausted', label, attempts: attempt, error: getErrorMessage(error) },
            `${label} failed after ${attempt} attempts`
          );
          throw new RetryExhaustedError(attempt, error);
        }

        const wait = this.delayFor(attempt);
        this.log.debug(
          { event: 'retry_scheduled', label, attempt, delay_ms: wait, error: getErrorMessage(error) },
          `Retrying ${label} in ${wait}ms`
        );
        await this.sleep(wait, options.signal);
      }
    }
  }
}
