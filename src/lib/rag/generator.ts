/**
 * Answer Generator
 *
 * Calls the answer-generation model with a deadline. Every failure that is
 * not a caller abort becomes GenerationFailedError, so the orchestrator can
 * record it on the conversation.
 */

import type { LLMAdapter, LLMMessage } from '@/types/llm';
import type { AnswerPrompt } from '@/lib/llm/prompts';
import { getErrorStatus } from '@/lib/llm/errors';
import {
  CancelledError,
  GenerationFailedError,
  RetryExhaustedError,
  getErrorMessage,
} from '@/lib/errors';
import { RetryPolicy } from '@/lib/retry';
import { logger, logExternalCall, Timer } from '@/lib/logger';

const log = logger.child({ layer: 'rag', service: 'Generator' });

export interface GenerateOptions {
  signal?: AbortSignal;
}

export interface Generator {
  readonly model: string;
  generate(prompt: AnswerPrompt, options?: GenerateOptions): Promise<string>;
}

export interface OpenAIGeneratorConfig {
  model: string;
  maxTokens: number;
  temperature: number;
  timeoutMs: number;
}

export class OpenAIGenerator implements Generator {
  readonly model: string;
  private adapter: LLMAdapter;
  private config: OpenAIGeneratorConfig;
  private retry: RetryPolicy;

  constructor(adapter: LLMAdapter, config: OpenAIGeneratorConfig, retry: RetryPolicy = RetryPolicy.once()) {
    this.adapter = adapter;
    this.config = config;
    this.model = config.model;
    this.retry = retry;
  }

  async generate(prompt: AnswerPrompt, options: GenerateOptions = {}): Promise<string> {
    const messages: LLMMessage[] = [
      { role: 'system', content: prompt.system },
      { role: 'user', content: prompt.user },
    ];

    try {
      return await this.retry.execute((attempt) => this.attempt(messages, attempt, options.signal), {
        signal: options.signal,
        isRetryable: (error) => error instanceof GenerationFailedError && error.reason === 'Unavailable',
        label: 'generation',
      });
    } catch (error) {
      if (error instanceof RetryExhaustedError) {
        throw new GenerationFailedError('Unavailable', error);
      }
      throw error;
    }
  }

  private async attempt(messages: LLMMessage[], attempt: number, signal?: AbortSignal): Promise<string> {
    const timeout = AbortSignal.timeout(this.config.timeoutMs);
    const combined = signal ? AbortSignal.any([signal, timeout]) : timeout;
    const timer = new Timer();

    try {
      const response = await this.adapter.complete(messages, {
        model: this.config.model,
        maxTokens: this.config.maxTokens,
        temperature: this.config.temperature,
        signal: combined,
      });

      logExternalCall(log, 'openai', 'chat.completions', {
        duration_ms: timer.elapsed(),
        tokens: response.usage.totalTokens,
        model: this.config.model,
        attempt,
      });

      return response.content;
    } catch (error) {
      if (signal?.aborted) {
        throw new CancelledError('Answer generation cancelled', error);
      }

      logExternalCall(log, 'openai', 'chat.completions', {
        duration_ms: timer.elapsed(),
        status: getErrorStatus(error),
        error: getErrorMessage(error),
        model: this.config.model,
        attempt,
      });

      if (timeout.aborted) {
        throw new GenerationFailedError('Timeout', error);
      }
      throw new GenerationFailedError('Unavailable', error);
    }
  }
}
