/**
 * Generator adapter over an LLM provider.
 *
 * System-role messages become the provider's system prompt; the rest
 * are sent as conversation turns. Structured calls decode the provider's
 * JSON against a zod schema.
 */

import { z } from 'zod';
import type { ChatMessage, Generator } from '../types.js';
import type { LLMMessage, LLMProvider, LLMTextCompletionResponse } from './types.js';
import { StructuredOutputError, wrapCapabilityError } from '../errors.js';
import { getLogger, type Logger } from '../telemetry/logger.js';

export interface LLMGeneratorOptions {
  /** Sampling temperature for every call (default 0) */
  temperature?: number;
  maxTokens?: number;
  logger?: Logger;
}

/**
 * Describe the fields of an object schema for the JSON instruction
 */
export function describeSchema(schema: z.ZodTypeAny): string | undefined {
  if (!(schema instanceof z.ZodObject)) {
    return schema.description;
  }

  const lines: string[] = [];
  for (const [key, field] of Object.entries(schema.shape)) {
    const description = field instanceof z.ZodType ? field.description : undefined;
    lines.push(description ? `- ${key}: ${description}` : `- ${key}`);
  }
  return lines.join('\n');
}

function splitMessages(messages: readonly ChatMessage[]): {
  system: string | undefined;
  turns: LLMMessage[];
} {
  const system = messages
    .filter((m) => m.role === 'system')
    .map((m) => m.content)
    .join('\n\n');
  const turns = messages
    .filter((m) => m.role !== 'system')
    .map((m) => ({ role: m.role, content: m.content }));
  return { system: system || undefined, turns };
}

function describeCompletion(
  response: Omit<LLMTextCompletionResponse, 'text'>
): Record<string, unknown> {
  return {
    provider: response.provider,
    model: response.model,
    latencyMs: response.latencyMs,
    promptTokens: response.usage?.promptTokens,
    completionTokens: response.usage?.completionTokens,
    finishReason: response.finishReason,
  };
}

export class LLMGenerator implements Generator {
  private readonly temperature: number;
  private readonly maxTokens: number | undefined;
  private readonly logger: Logger;

  constructor(
    private readonly provider: LLMProvider,
    options: LLMGeneratorOptions = {}
  ) {
    this.temperature = options.temperature ?? 0;
    this.maxTokens = options.maxTokens;
    this.logger = options.logger ?? getLogger();
  }

  async invoke(messages: readonly ChatMessage[]): Promise<string> {
    const { system, turns } = splitMessages(messages);
    try {
      const response = await this.provider.completeText({
        system,
        messages: turns,
        temperature: this.temperature,
        maxTokens: this.maxTokens,
      });
      this.logger.debug('Generator text completion', describeCompletion(response));
      return response.text;
    } catch (error) {
      throw wrapCapabilityError('generator', error, { provider: this.provider.type });
    }
  }

  async invokeStructured<T extends z.ZodTypeAny>(
    messages: readonly ChatMessage[],
    schema: T
  ): Promise<z.infer<T>> {
    const { system, turns } = splitMessages(messages);

    let json: unknown;
    let raw: string;
    try {
      const response = await this.provider.completeJson({
        system,
        messages: turns,
        schemaHint: { description: describeSchema(schema) },
        temperature: this.temperature,
        maxTokens: this.maxTokens,
      });
      this.logger.debug('Generator JSON completion', describeCompletion(response));
      json = response.json;
      raw = response.raw;
    } catch (error) {
      throw wrapCapabilityError('generator', error, { provider: this.provider.type });
    }

    const parsed = schema.safeParse(json);
    if (!parsed.success) {
      const issues = parsed.error.issues.map(
        (issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`
      );
      throw new StructuredOutputError(`Generator response did not match schema: ${issues.join('; ')}`, {
        issues,
        raw,
        context: { provider: this.provider.type },
      });
    }
    return parsed.data;
  }
}
