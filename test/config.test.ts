import { describe, it, expect } from 'vitest';
import { loadConfig } from '../src/config/index.js';

describe('loadConfig', () => {
  it('applies defaults for optional settings', () => {
    const config = loadConfig({ PERPLEXITY_API_KEY: 'test-perplexity', GEMINI_API_KEY: 'test-gemini' });

    expect(config).toEqual({
      perplexityApiKey: 'test-perplexity',
      geminiApiKey: 'test-gemini',
      searchModel: 'sonar',
      generationModel: 'gemini-2.5-flash',
      outputDir: './summaries',
      runHistoryPath: './data/runs.json',
      maxWorkers: 3,
      fetchTimeoutMs: 30000,
      fetchConnectTimeoutMs: 10000,
      generationTimeoutMs: 120000,
      rateLimits: { search: 1 },
    });
  });

  it('reads overrides from the environment', () => {
    const config = loadConfig({
      PERPLEXITY_API_KEY: 'test-perplexity',
      GEMINI_API_KEY: 'test-gemini',
      SUMMARY_MAX_WORKERS: '5',
      SUMMARY_OUTPUT_DIR: '/tmp/out',
      SEARCH_RATE_LIMIT: '2',
    });

    expect(config.maxWorkers).toBe(5);
    expect(config.outputDir).toBe('/tmp/out');
    expect(config.rateLimits.search).toBe(2);
  });

  it('requires both API keys', () => {
    expect(() => loadConfig({ GEMINI_API_KEY: 'test-gemini' })).toThrow();
    expect(() => loadConfig({ PERPLEXITY_API_KEY: '', GEMINI_API_KEY: 'test-gemini' })).toThrow(
      'PERPLEXITY_API_KEY is required'
    );
  });

  it('rejects a non-numeric worker count', () => {
    expect(() =>
      loadConfig({ PERPLEXITY_API_KEY: 'test-perplexity', GEMINI_API_KEY: 'test-gemini', SUMMARY_MAX_WORKERS: 'many' })
    ).toThrow();
  });
});
