/**
 * Anthropic (Claude) LLM Provider
 *
 * Adapter for Anthropic's Claude SDK. The SDK is loaded lazily so the
 * package can be installed without pulling it into every code path.
 */

import type {
  LLMProvider,
  LLMProviderConfig,
  LLMJsonCompletionRequest,
  LLMJsonCompletionResponse,
  LLMTextCompletionRequest,
  LLMTextCompletionResponse,
  LLMUsage,
} from '../types.js';
import { extractJson, withJsonInstruction } from '../json.js';

interface ClaudeReply {
  text: string;
  model: string;
  latencyMs: number;
  usage: LLMUsage;
  finishReason?: string;
}

/**
 * Anthropic Provider (Claude)
 */
export class AnthropicLLMProvider implements LLMProvider {
  readonly type = 'anthropic' as const;
  readonly name = 'Anthropic (Claude)';

  private config: LLMProviderConfig;
  private apiKey: string | undefined;

  constructor(config: LLMProviderConfig) {
    this.config = config;
    this.apiKey = config.apiKey || process.env.ANTHROPIC_API_KEY;
  }

  isAvailable(): boolean {
    return !!this.apiKey;
  }

  getModel(): string {
    return this.config.model || 'claude-sonnet-4-20250514';
  }

  async completeJson(request: LLMJsonCompletionRequest): Promise<LLMJsonCompletionResponse> {
    const reply = await this.send(
      request,
      withJsonInstruction(request.system, request.schemaHint),
      request.temperature ?? 0.2
    );

    return {
      json: extractJson(reply.text),
      raw: reply.text,
      provider: this.type,
      model: reply.model,
      latencyMs: reply.latencyMs,
      usage: reply.usage,
      finishReason: reply.finishReason,
    };
  }

  async completeText(request: LLMTextCompletionRequest): Promise<LLMTextCompletionResponse> {
    const reply = await this.send(request, request.system, request.temperature ?? 0.7);

    return {
      text: reply.text,
      provider: this.type,
      model: reply.model,
      latencyMs: reply.latencyMs,
      usage: reply.usage,
      finishReason: reply.finishReason,
    };
  }

  private async send(
    request: LLMTextCompletionRequest,
    system: string | undefined,
    temperature: number
  ): Promise<ClaudeReply> {
    const apiKey = this.apiKey;
    if (!apiKey) {
      throw new Error('Anthropic provider not available: ANTHROPIC_API_KEY not set');
    }

    const startTime = Date.now();
    const Anthropic = (await import('@anthropic-ai/sdk')).default;
    const client = new Anthropic({ apiKey });

    // Claude takes the system prompt separately; only user/assistant turns go in messages
    const messages = request.messages
      .filter((m) => m.role !== 'system')
      .map((m) => ({
        role: m.role === 'assistant' ? ('assistant' as const) : ('user' as const),
        content: m.content,
      }));

    const message = await client.messages.create({
      model: this.getModel(),
      max_tokens: request.maxTokens || 8192,
      system,
      messages,
      temperature,
    });

    const textContent = message.content.find((c) => c.type === 'text');
    if (!textContent || textContent.type !== 'text') {
      throw new Error('No text response from Claude');
    }

    return {
      text: textContent.text,
      model: message.model,
      latencyMs: Date.now() - startTime,
      usage: {
        promptTokens: message.usage.input_tokens,
        completionTokens: message.usage.output_tokens,
        totalTokens: message.usage.input_tokens + message.usage.output_tokens,
      },
      finishReason: message.stop_reason || undefined,
    };
  }
}

/**
 * Create Anthropic provider
 */
export function createAnthropicProvider(config: LLMProviderConfig): LLMProvider {
  return new AnthropicLLMProvider(config);
}
