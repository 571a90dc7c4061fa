import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { createAnthropicProvider } from '../providers/anthropic.js';
import { withJsonInstruction } from '../json.js';

const sdk = vi.hoisted(() => ({
  create: vi.fn(),
  clientOptions: [] as Array<{ apiKey: string }>,
}));

vi.mock('@anthropic-ai/sdk', () => ({
  default: class {
    messages = { create: sdk.create };

    constructor(options: { apiKey: string }) {
      sdk.clientOptions.push(options);
    }
  },
}));

function message(content: Array<{ type: string; text?: string }>) {
  return {
    id: 'msg_test',
    model: 'claude-test-20250101',
    content,
    usage: { input_tokens: 30, output_tokens: 5 },
    stop_reason: 'end_turn',
  };
}

describe('AnthropicLLMProvider', () => {
  beforeEach(() => {
    sdk.clientOptions.length = 0;
    sdk.create.mockResolvedValue(message([{ type: 'text', text: 'Paris.' }]));
  });

  afterEach(() => {
    vi.unstubAllEnvs();
  });

  it('should pass the system prompt separately and map usage', async () => {
    const provider = createAnthropicProvider({
      provider: 'anthropic',
      model: 'claude-test',
      apiKey: 'test-secret',
    });

    const response = await provider.completeText({
      system: 'Be brief.',
      messages: [
        { role: 'system', content: 'ignored' },
        { role: 'user', content: 'Capital of France?' },
        { role: 'assistant', content: 'Paris.' },
        { role: 'user', content: 'Sure?' },
      ],
      maxTokens: 256,
    });

    expect(sdk.clientOptions).toEqual([{ apiKey: 'test-secret' }]);
    expect(sdk.create).toHaveBeenCalledWith({
      model: 'claude-test',
      max_tokens: 256,
      system: 'Be brief.',
      messages: [
        { role: 'user', content: 'Capital of France?' },
        { role: 'assistant', content: 'Paris.' },
        { role: 'user', content: 'Sure?' },
      ],
      temperature: 0.7,
    });
    expect(response).toEqual({
      text: 'Paris.',
      provider: 'anthropic',
      model: 'claude-test-20250101',
      latencyMs: expect.any(Number),
      usage: { promptTokens: 30, completionTokens: 5, totalTokens: 35 },
      finishReason: 'end_turn',
    });
  });

  it('should add the JSON instruction and parse the reply', async () => {
    sdk.create.mockResolvedValue(message([{ type: 'text', text: '{"confidence":0.8}' }]));
    const provider = createAnthropicProvider({
      provider: 'anthropic',
      model: 'claude-test',
      apiKey: 'test-secret',
    });

    const response = await provider.completeJson({
      system: 'Score the answer.',
      messages: [{ role: 'user', content: 'Answer: Paris.' }],
      schemaHint: { description: '- confidence' },
    });

    expect(response.json).toEqual({ confidence: 0.8 });
    expect(response.raw).toBe('{"confidence":0.8}');
    expect(sdk.create).toHaveBeenCalledWith({
      model: 'claude-test',
      max_tokens: 8192,
      system: withJsonInstruction('Score the answer.', { description: '- confidence' }),
      messages: [{ role: 'user', content: 'Answer: Paris.' }],
      temperature: 0.2,
    });
  });

  it('should fail when the reply has no text block', async () => {
    sdk.create.mockResolvedValue(message([{ type: 'tool_use' }]));
    const provider = createAnthropicProvider({
      provider: 'anthropic',
      model: 'claude-test',
      apiKey: 'test-secret',
    });

    await expect(
      provider.completeText({ messages: [{ role: 'user', content: 'hi' }] })
    ).rejects.toThrow('No text response from Claude');
  });

  it('should not create a client without an API key', async () => {
    vi.stubEnv('ANTHROPIC_API_KEY', '');
    const provider = createAnthropicProvider({ provider: 'anthropic', model: 'claude-test' });

    expect(provider.isAvailable()).toBe(false);
    await expect(
      provider.completeText({ messages: [{ role: 'user', content: 'hi' }] })
    ).rejects.toThrow('Anthropic provider not available: ANTHROPIC_API_KEY not set');
    expect(sdk.clientOptions).toEqual([]);
    expect(sdk.create).not.toHaveBeenCalled();
  });
});
