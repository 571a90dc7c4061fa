/**
 * Google AI (Gemini) LLM Provider
 *
 * Adapter for Google's Generative AI SDK.
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

interface GeminiReply {
  text: string;
  latencyMs: number;
  usage?: LLMUsage;
  finishReason?: string;
}

/**
 * Google AI Provider (Gemini)
 */
export class GoogleLLMProvider implements LLMProvider {
  readonly type = 'google' as const;
  readonly name = 'Google AI (Gemini)';

  private config: LLMProviderConfig;
  private apiKey: string | undefined;

  constructor(config: LLMProviderConfig) {
    this.config = config;
    this.apiKey = config.apiKey || process.env.GOOGLE_AI_API_KEY || process.env.GOOGLE_API_KEY;
  }

  isAvailable(): boolean {
    return !!this.apiKey;
  }

  getModel(): string {
    return this.config.model || 'gemini-2.5-flash-lite';
  }

  async completeJson(request: LLMJsonCompletionRequest): Promise<LLMJsonCompletionResponse> {
    const reply = await this.generate(
      request,
      withJsonInstruction(request.system, request.schemaHint),
      request.temperature ?? 0.2,
      'application/json'
    );

    return {
      json: extractJson(reply.text),
      raw: reply.text,
      provider: this.type,
      model: this.getModel(),
      latencyMs: reply.latencyMs,
      usage: reply.usage,
      finishReason: reply.finishReason,
    };
  }

  async completeText(request: LLMTextCompletionRequest): Promise<LLMTextCompletionResponse> {
    const reply = await this.generate(request, request.system, request.temperature ?? 0.7);

    return {
      text: reply.text,
      provider: this.type,
      model: this.getModel(),
      latencyMs: reply.latencyMs,
      usage: reply.usage,
      finishReason: reply.finishReason,
    };
  }

  private async generate(
    request: LLMTextCompletionRequest,
    system: string | undefined,
    temperature: number,
    responseMimeType?: string
  ): Promise<GeminiReply> {
    const apiKey = this.apiKey;
    if (!apiKey) {
      throw new Error('Google AI provider not available: GOOGLE_AI_API_KEY not set');
    }

    const startTime = Date.now();
    const { GoogleGenerativeAI } = await import('@google/generative-ai');

    const genAI = new GoogleGenerativeAI(apiKey);
    const model = genAI.getGenerativeModel({
      model: this.getModel(),
      systemInstruction: system,
      generationConfig: {
        temperature,
        maxOutputTokens: request.maxTokens,
        responseMimeType,
      },
    });

    const result = await model.generateContent(this.buildParts(request));
    const response = result.response;

    return {
      text: response.text(),
      latencyMs: Date.now() - startTime,
      usage: response.usageMetadata
        ? {
            promptTokens: response.usageMetadata.promptTokenCount || 0,
            completionTokens: response.usageMetadata.candidatesTokenCount || 0,
            totalTokens: response.usageMetadata.totalTokenCount || 0,
          }
        : undefined,
      finishReason: response.candidates?.[0]?.finishReason,
    };
  }

  private buildParts(request: LLMTextCompletionRequest): Array<{ text: string }> {
    return request.messages
      .filter((m) => m.role !== 'system')
      .map((m) => ({ text: `${m.role}: ${m.content}` }));
  }
}

/**
 * Create Google AI provider
 */
export function createGoogleProvider(config: LLMProviderConfig): LLMProvider {
  return new GoogleLLMProvider(config);
}
