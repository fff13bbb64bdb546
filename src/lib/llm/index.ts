/**
 * LLM module exports.
 */

export { BaseLLMAdapter } from './adapter';
export type {
  LLMAdapter,
  LLMAdapterConfig,
  LLMMessage,
  LLMCompletionOptions,
  LLMCompletionResponse,
  LLMEmbeddingOptions,
  LLMEmbeddingResponse,
} from './adapter';

export { OpenAIAdapter } from './openai-adapter';

export {
  createLLMAdapter,
  getApiKeyForProvider,
  getSupportedProviders,
} from './factory';

export {
  buildRAGSystemPrompt,
  buildRAGUserPrompt,
  buildAnswerPrompt,
  FALLBACK_ANSWER,
} from './prompts';

export type { AnswerPrompt } from './prompts';

export {
  sanitizeQuestion,
  escapePromptText,
  detectInjectionPatterns,
  truncateText,
  MAX_LENGTHS,
} from './sanitize';

export { classifyProviderError, getErrorStatus, isRetryableStatus } from './errors';
export type { ProviderFailure } from './errors';
