import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { createGoogleProvider } from '../providers/google.js';
import { withJsonInstruction } from '../json.js';

const sdk = vi.hoisted(() => ({
  getGenerativeModel: vi.fn(),
  generateContent: vi.fn(),
  apiKeys: [] as string[],
}));

vi.mock('@google/generative-ai', () => ({
  GoogleGenerativeAI: class {
    getGenerativeModel = sdk.getGenerativeModel;

    constructor(apiKey: string) {
      sdk.apiKeys.push(apiKey);
    }
  },
}));

function reply(text: string, withUsage = true) {
  return {
    response: {
      text: () => text,
      usageMetadata: withUsage
        ? { promptTokenCount: 18, candidatesTokenCount: 6, totalTokenCount: 24 }
        : undefined,
      candidates: [{ finishReason: 'STOP' }],
    },
  };
}

describe('GoogleLLMProvider', () => {
  beforeEach(() => {
    sdk.apiKeys.length = 0;
    sdk.getGenerativeModel.mockReturnValue({ generateContent: sdk.generateContent });
    sdk.generateContent.mockResolvedValue(reply('Paris.'));
  });

  afterEach(() => {
    vi.unstubAllEnvs();
  });

  it('should pass the system prompt as the system instruction and map usage', async () => {
    const provider = createGoogleProvider({
      provider: 'google',
      model: 'gemini-test',
      apiKey: 'test-secret',
    });

    const response = await provider.completeText({
      system: 'Be brief.',
      messages: [
        { role: 'system', content: 'ignored' },
        { role: 'user', content: 'Capital of France?' },
        { role: 'assistant', content: 'Paris.' },
      ],
      maxTokens: 128,
    });

    expect(sdk.apiKeys).toEqual(['test-secret']);
    expect(sdk.getGenerativeModel).toHaveBeenCalledWith({
      model: 'gemini-test',
      systemInstruction: 'Be brief.',
      generationConfig: {
        temperature: 0.7,
        maxOutputTokens: 128,
        responseMimeType: undefined,
      },
    });
    expect(sdk.generateContent).toHaveBeenCalledWith([
      { text: 'user: Capital of France?' },
      { text: 'assistant: Paris.' },
    ]);
    expect(response).toEqual({
      text: 'Paris.',
      provider: 'google',
      model: 'gemini-test',
      latencyMs: expect.any(Number),
      usage: { promptTokens: 18, completionTokens: 6, totalTokens: 24 },
      finishReason: 'STOP',
    });
  });

  it('should request JSON output and parse the reply', async () => {
    sdk.generateContent.mockResolvedValue(reply('{"binary_score":"no"}', false));
    const provider = createGoogleProvider({
      provider: 'google',
      model: 'gemini-test',
      apiKey: 'test-secret',
    });

    const response = await provider.completeJson({
      system: 'You grade documents.',
      messages: [{ role: 'user', content: 'grade this' }],
      schemaHint: { description: '- binary_score' },
    });

    expect(response.json).toEqual({ binary_score: 'no' });
    expect(response.usage).toBeUndefined();
    expect(sdk.getGenerativeModel).toHaveBeenCalledWith({
      model: 'gemini-test',
      systemInstruction: withJsonInstruction('You grade documents.', {
        description: '- binary_score',
      }),
      generationConfig: {
        temperature: 0.2,
        maxOutputTokens: undefined,
        responseMimeType: 'application/json',
      },
    });
  });

  it('should read the key from the environment', () => {
    vi.stubEnv('GOOGLE_AI_API_KEY', '');
    vi.stubEnv('GOOGLE_API_KEY', 'test-secret');

    expect(createGoogleProvider({ provider: 'google', model: '' }).isAvailable()).toBe(true);
    expect(createGoogleProvider({ provider: 'google', model: '' }).getModel()).toBe(
      'gemini-2.5-flash-lite'
    );
  });

  it('should not call the SDK without an API key', async () => {
    vi.stubEnv('GOOGLE_AI_API_KEY', '');
    vi.stubEnv('GOOGLE_API_KEY', '');
    const provider = createGoogleProvider({ provider: 'google', model: 'gemini-test' });

    await expect(
      provider.completeText({ messages: [{ role: 'user', content: 'hi' }] })
    ).rejects.toThrow('Google AI provider not available: GOOGLE_AI_API_KEY not set');
    expect(sdk.apiKeys).toEqual([]);
  });
});
