/**
 * OpenAI-Compatible LLM Provider
 *
 * Adapter for OpenAI and OpenAI-compatible APIs:
 * - OpenAI
 * - Azure OpenAI
 * - Local gateways (Ollama, vLLM, LM Studio)
 * - Other vendors with OpenAI-compatible endpoints
 */

import { z } from 'zod';
import type {
  LLMProvider,
  LLMProviderConfig,
  LLMProviderType,
  LLMJsonCompletionRequest,
  LLMJsonCompletionResponse,
  LLMTextCompletionRequest,
  LLMTextCompletionResponse,
  LLMUsage,
} from '../types.js';
import { extractJson, withJsonInstruction } from '../json.js';

/**
 * OpenAI Chat Completion response structure
 */
const ChatCompletionResponse = z.object({
  model: z.string(),
  choices: z.array(
    z.object({
      message: z.object({
        role: z.string(),
        content: z.string().nullable(),
      }),
      finish_reason: z.string().nullable(),
    })
  ),
  usage: z
    .object({
      prompt_tokens: z.number(),
      completion_tokens: z.number(),
      total_tokens: z.number(),
    })
    .optional(),
});

type ChatCompletionResponse = z.infer<typeof ChatCompletionResponse>;

/**
 * OpenAI-Compatible Provider
 */
export class OpenAICompatLLMProvider implements LLMProvider {
  readonly type: LLMProviderType;
  readonly name: string;

  private config: LLMProviderConfig;
  private apiKey: string | undefined;
  private baseUrl: string;

  constructor(config: LLMProviderConfig) {
    this.config = config;
    this.type = config.provider;
    this.name = this.getProviderName(config);

    // API key from config or environment
    this.apiKey =
      config.apiKey ||
      process.env.DOCQA_LLM_API_KEY ||
      process.env.OPENAI_API_KEY;

    // Base URL from config or environment
    this.baseUrl =
      config.baseUrl ||
      process.env.DOCQA_LLM_BASE_URL ||
      process.env.OPENAI_BASE_URL ||
      'https://api.openai.com/v1';
  }

  private getProviderName(config: LLMProviderConfig): string {
    if (config.provider === 'openai') {
      return 'OpenAI';
    }
    if (config.baseUrl?.includes('azure')) {
      return 'Azure OpenAI';
    }
    if (config.baseUrl?.includes('localhost') || config.baseUrl?.includes('127.0.0.1')) {
      return 'Local LLM';
    }
    return 'OpenAI-Compatible';
  }

  isAvailable(): boolean {
    // Local endpoints may not require API key
    if (this.isLocalEndpoint()) {
      return true;
    }
    return !!this.apiKey;
  }

  private isLocalEndpoint(): boolean {
    return (
      this.baseUrl.includes('localhost') ||
      this.baseUrl.includes('127.0.0.1') ||
      this.baseUrl.includes('0.0.0.0')
    );
  }

  getModel(): string {
    return this.config.model || 'gpt-4o-mini';
  }

  async completeJson(request: LLMJsonCompletionRequest): Promise<LLMJsonCompletionResponse> {
    const startTime = Date.now();
    const body: Record<string, unknown> = {
      model: this.getModel(),
      messages: this.buildMessages(request, withJsonInstruction(request.system, request.schemaHint)),
      temperature: request.temperature ?? 0.2,
      max_tokens: request.maxTokens,
    };

    // Local gateways frequently reject response_format
    if (!this.isLocalEndpoint()) {
      body.response_format = { type: 'json_object' };
    }

    const data = await this.post(body);
    const raw = data.choices[0]?.message.content ?? '';

    return {
      json: extractJson(raw),
      raw,
      provider: this.type,
      model: data.model,
      latencyMs: Date.now() - startTime,
      usage: toUsage(data),
      finishReason: data.choices[0]?.finish_reason ?? undefined,
    };
  }

  async completeText(request: LLMTextCompletionRequest): Promise<LLMTextCompletionResponse> {
    const startTime = Date.now();
    const data = await this.post({
      model: this.getModel(),
      messages: this.buildMessages(request, request.system),
      temperature: request.temperature ?? 0.7,
      max_tokens: request.maxTokens,
    });

    return {
      text: data.choices[0]?.message.content ?? '',
      provider: this.type,
      model: data.model,
      latencyMs: Date.now() - startTime,
      usage: toUsage(data),
      finishReason: data.choices[0]?.finish_reason ?? undefined,
    };
  }

  private buildMessages(
    request: LLMTextCompletionRequest,
    system: string | undefined
  ): Array<{ role: string; content: string }> {
    const messages: Array<{ role: string; content: string }> = [];
    if (system) {
      messages.push({ role: 'system', content: system });
    }
    for (const msg of request.messages) {
      if (msg.role !== 'system') {
        messages.push({ role: msg.role, content: msg.content });
      }
    }
    return messages;
  }

  private async post(body: Record<string, unknown>): Promise<ChatCompletionResponse> {
    if (!this.isAvailable()) {
      throw new Error('OpenAI-compatible provider not available: API key not set');
    }

    const response = await fetch(`${this.baseUrl}/chat/completions`, {
      method: 'POST',
      headers: {
        'Content-Type': 'application/json',
        ...(this.apiKey ? { Authorization: `Bearer ${this.apiKey}` } : {}),
      },
      body: JSON.stringify(body),
    });

    if (!response.ok) {
      const error = await response.text();
      throw new Error(`OpenAI API error: ${response.status} ${error}`);
    }

    const parsed = ChatCompletionResponse.safeParse(await response.json());
    if (!parsed.success) {
      throw new Error(`Unexpected OpenAI API response: ${parsed.error.message}`);
    }
    return parsed.data;
  }
}

function toUsage(data: ChatCompletionResponse): LLMUsage | undefined {
  return data.usage
    ? {
        promptTokens: data.usage.prompt_tokens,
        completionTokens: data.usage.completion_tokens,
        totalTokens: data.usage.total_tokens,
      }
    : undefined;
}

/**
 * Create OpenAI provider
 */
export function createOpenAIProvider(config: LLMProviderConfig): LLMProvider {
  return new OpenAICompatLLMProvider({ ...config, provider: 'openai' });
}

/**
 * Create OpenAI-compatible provider
 */
export function createOpenAICompatProvider(config: LLMProviderConfig): LLMProvider {
  return new OpenAICompatLLMProvider(config);
}
