/**
 * Provider-Agnostic LLM Module
 *
 * Backs the Generator capability with one of several hosted models.
 *
 * Supported providers:
 * - google: Google AI (Gemini)
 * - anthropic: Anthropic (Claude)
 * - openai: OpenAI (GPT)
 * - openai_compat: OpenAI-compatible endpoints (Azure, Ollama, vLLM, LM Studio)
 *
 * Provider-specific env vars are read as fallbacks when no key is configured:
 * - GOOGLE_AI_API_KEY / GOOGLE_API_KEY
 * - ANTHROPIC_API_KEY
 * - OPENAI_API_KEY, OPENAI_BASE_URL
 */

export type {
  LLMProviderType,
  LLMProviderConfig,
  LLMMessage,
  LLMJsonCompletionRequest,
  LLMJsonCompletionResponse,
  LLMTextCompletionRequest,
  LLMTextCompletionResponse,
  LLMUsage,
  LLMProvider,
  LLMProviderFactory,
} from './types.js';

export {
  GoogleLLMProvider,
  createGoogleProvider,
  AnthropicLLMProvider,
  createAnthropicProvider,
  OpenAICompatLLMProvider,
  createOpenAIProvider,
  createOpenAICompatProvider,
} from './providers/index.js';

export { extractJson, withJsonInstruction } from './json.js';
export { LLMGenerator, describeSchema, type LLMGeneratorOptions } from './generator.js';

import type { LLMProvider, LLMProviderConfig, LLMProviderType, LLMProviderFactory } from './types.js';
import { ConfigurationError } from '../errors.js';
import { createGoogleProvider } from './providers/google.js';
import { createAnthropicProvider } from './providers/anthropic.js';
import { createOpenAIProvider, createOpenAICompatProvider } from './providers/openai-compat.js';

// =============================================================================
// Provider Registry
// =============================================================================

const factories = new Map<LLMProviderType, LLMProviderFactory>([
  ['google', createGoogleProvider],
  ['anthropic', createAnthropicProvider],
  ['openai', createOpenAIProvider],
  ['openai_compat', createOpenAICompatProvider],
]);

/**
 * Default model per provider type
 */
export const DEFAULT_MODELS: Record<LLMProviderType, string> = {
  google: 'gemini-2.5-flash-lite',
  anthropic: 'claude-sonnet-4-20250514',
  openai: 'gpt-4o-mini',
  openai_compat: 'gpt-4o-mini',
};

/**
 * List registered provider types
 */
export function listProviderTypes(): LLMProviderType[] {
  return Array.from(factories.keys());
}

// =============================================================================
// Provider Factory
// =============================================================================

/**
 * Create an LLM provider from configuration
 *
 * @throws {ConfigurationError} if the provider is unknown or has no credentials
 */
export function createLLMProvider(
  config: Pick<LLMProviderConfig, 'provider'> & Partial<LLMProviderConfig>
): LLMProvider {
  const factory = factories.get(config.provider);
  if (!factory) {
    throw new ConfigurationError(
      `Unknown LLM provider type: ${config.provider}. Available: ${listProviderTypes().join(', ')}`,
      { provider: config.provider }
    );
  }

  const provider = factory({
    ...config,
    model: config.model || DEFAULT_MODELS[config.provider],
  });

  if (config.provider === 'openai_compat' && !config.baseUrl) {
    throw new ConfigurationError('openai_compat provider requires a base URL', {
      provider: config.provider,
    });
  }

  if (!provider.isAvailable()) {
    throw new ConfigurationError(
      `LLM provider ${provider.name} is not available. Check API key and configuration.`,
      { provider: config.provider }
    );
  }

  return provider;
}
