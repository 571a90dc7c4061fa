/**
 * LLM Provider Exports
 *
 * All built-in provider implementations.
 */

export { GoogleLLMProvider, createGoogleProvider } from './google.js';
export { AnthropicLLMProvider, createAnthropicProvider } from './anthropic.js';
export {
  OpenAICompatLLMProvider,
  createOpenAIProvider,
  createOpenAICompatProvider,
} from './openai-compat.js';
