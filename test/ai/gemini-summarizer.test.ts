import { describe, it, expect, vi, beforeEach } from 'vitest';
import { GeminiSummarizer } from '../../src/ai/gemini-summarizer.js';

const sdk = vi.hoisted(() => ({
  apiKeys: [] as string[],
  modelParams: [] as unknown[],
  requestOptions: [] as unknown[],
  requests: [] as unknown[],
  reply: '<p>summary</p>',
}));

vi.mock('@google/generative-ai', () => ({
  GoogleGenerativeAI: class {
    constructor(apiKey: string) {
      sdk.apiKeys.push(apiKey);
    }

    getGenerativeModel(params: unknown, requestOptions?: unknown) {
      sdk.modelParams.push(params);
      sdk.requestOptions.push(requestOptions);
      return {
        generateContent: async (request: unknown) => {
          sdk.requests.push(request);
          return { response: { text: () => sdk.reply } };
        },
      };
    }
  },
}));

describe('GeminiSummarizer', () => {
  beforeEach(() => {
    sdk.apiKeys.length = 0;
    sdk.modelParams.length = 0;
    sdk.requestOptions.length = 0;
    sdk.requests.length = 0;
    sdk.reply = '<p>summary</p>';
  });

  it('configures a low-temperature model with a request timeout', () => {
    new GeminiSummarizer({ apiKey: 'test-key' });

    expect(sdk.apiKeys).toEqual(['test-key']);
    expect(sdk.modelParams).toEqual([
      { model: 'gemini-2.5-flash', generationConfig: { temperature: 0.2, topP: 0.8 } },
    ]);
    expect(sdk.requestOptions).toEqual([{ timeout: 120000 }]);
  });

  it('honours model and timeout overrides', () => {
    new GeminiSummarizer({ apiKey: 'test-key', model: 'gemini-test', timeoutMs: 5000 });

    expect(sdk.modelParams).toEqual([
      { model: 'gemini-test', generationConfig: { temperature: 0.2, topP: 0.8 } },
    ]);
    expect(sdk.requestOptions).toEqual([{ timeout: 5000 }]);
  });

  it('attaches the document as base64 inline data before the prompt', async () => {
    const summarizer = new GeminiSummarizer({ apiKey: 'test-key' });

    const text = await summarizer.summarizeDocument({
      document: Buffer.from('%PDF-1.4 test'),
      mimeType: 'application/pdf',
      prompt: 'Summarize this paper',
    });

    expect(text).toBe('<p>summary</p>');
    expect(sdk.requests).toEqual([
      [
        { inlineData: { mimeType: 'application/pdf', data: 'JVBERi0xLjQgdGVzdA==' } },
        { text: 'Summarize this paper' },
      ],
    ]);
  });

  it('sends plain prompts as text', async () => {
    sdk.reply = 'excerpt';
    const summarizer = new GeminiSummarizer({ apiKey: 'test-key' });

    expect(await summarizer.generateText('Write an excerpt')).toBe('excerpt');
    expect(sdk.requests).toEqual(['Write an excerpt']);
  });
});
