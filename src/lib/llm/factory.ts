/**
 * LLM Adapter Factory.
 *
 * Creates LLM adapters based on provider configuration.
 */

import { LLMAdapter, LLMAdapterConfig } from './adapter';
import { OpenAIAdapter } from './openai-adapter';
import { LLMProvider } from '@/types/llm';

// =============================================================================
// Adapter Registry
// =============================================================================

type AdapterConstructor = new (config: LLMAdapterConfig) => LLMAdapter;

const adapterRegistry = new Map<LLMProvider, AdapterConstructor>([
  ['openai', OpenAIAdapter],
]);

// =============================================================================
// Factory Functions
// =============================================================================

/**
 * Create an LLM adapter for a specific provider.
 *
 * @throws Error if provider is not supported
 *
 * @example
 * const adapter = createLLMAdapter('openai', {
 *   apiKey: process.env.OPENAI_API_KEY ?? '',
 *   defaultModel: 'gpt-4o-mini',
 * });
 */
export function createLLMAdapter(
  provider: LLMProvider,
  config: LLMAdapterConfig
): LLMAdapter {
  const AdapterClass = adapterRegistry.get(provider);

  if (!AdapterClass) {
    throw new Error(
      `Unsupported LLM provider: ${provider}. ` +
      `Supported providers: ${getSupportedProviders().join(', ')}`
    );
  }

  return new AdapterClass(config);
}

/**
 * Get API key from environment for a provider.
 *
 * @throws Error if API key is not configured
 */
export function getApiKeyForProvider(
  provider: LLMProvider,
  env: NodeJS.ProcessEnv = process.env
): string {
  const keyMap: Record<LLMProvider, string | undefined> = {
    openai: env.OPENAI_API_KEY,
  };

  const key = keyMap[provider];

  if (!key) {
    throw new Error(
      `API key not found for provider: ${provider}. ` +
      `Set the appropriate environment variable.`
    );
  }

  return key;
}

// =============================================================================
// Registry Management
// =============================================================================

export function getSupportedProviders(): LLMProvider[] {
  return Array.from(adapterRegistry.keys());
}
