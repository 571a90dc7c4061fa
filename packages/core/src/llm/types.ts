/**
 * Provider-Agnostic LLM Types
 *
 * Generic LLM interface behind the Generator capability.
 * Supports Gemini, Claude, OpenAI, and OpenAI-compatible endpoints.
 */

import type { ChatMessage } from '../types.js';

/**
 * Known LLM provider types
 */
export type LLMProviderType =
  | 'google' // Google AI (Gemini)
  | 'anthropic' // Anthropic (Claude)
  | 'openai' // OpenAI (GPT)
  | 'openai_compat'; // OpenAI-compatible (Azure, Ollama, vLLM, LM Studio, etc.)

export interface LLMProviderConfig {
  provider: LLMProviderType;
  model: string;
  /** API key (or use environment variable) */
  apiKey?: string;
  /** Base URL for API (openai and openai_compat only) */
  baseUrl?: string;
}

export type LLMMessage = ChatMessage;

/**
 * Request for text completion
 */
export interface LLMTextCompletionRequest {
  system?: string;
  /** Conversation turns; system-role entries are ignored */
  messages: LLMMessage[];
  temperature?: number;
  maxTokens?: number;
}

/**
 * Request for JSON completion
 */
export interface LLMJsonCompletionRequest extends LLMTextCompletionRequest {
  /** Shape hint for structured output, appended to the system prompt */
  schemaHint?: {
    description?: string;
  };
}

export interface LLMUsage {
  promptTokens: number;
  completionTokens: number;
  totalTokens: number;
}

interface LLMCompletionMetadata {
  provider: LLMProviderType;
  /** Model that served the request */
  model: string;
  latencyMs: number;
  /** Token usage (if the provider reports it) */
  usage?: LLMUsage;
  finishReason?: string;
}

export interface LLMTextCompletionResponse extends LLMCompletionMetadata {
  text: string;
}

export interface LLMJsonCompletionResponse extends LLMCompletionMetadata {
  /** Parsed JSON response */
  json: unknown;
  /** Raw text response */
  raw: string;
}

/**
 * LLM Provider Interface
 *
 * All LLM providers must implement this interface.
 */
export interface LLMProvider {
  readonly type: LLMProviderType;

  /** Provider name for display */
  readonly name: string;

  /** Check if provider is available/configured */
  isAvailable(): boolean;

  getModel(): string;

  /**
   * Complete a request expecting JSON output
   *
   * @throws {StructuredOutputError} when the reply holds no parseable JSON
   */
  completeJson(request: LLMJsonCompletionRequest): Promise<LLMJsonCompletionResponse>;

  completeText(request: LLMTextCompletionRequest): Promise<LLMTextCompletionResponse>;
}

export type LLMProviderFactory = (config: LLMProviderConfig) => LLMProvider;
