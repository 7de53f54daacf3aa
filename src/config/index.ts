import { z } from 'zod';

const configSchema = z.object({
  // API Keys
  perplexityApiKey: z.string().min(1, 'PERPLEXITY_API_KEY is required'),
  geminiApiKey: z.string().min(1, 'GEMINI_API_KEY is required'),

  // Models
  searchModel: z.string().default('sonar'),
  generationModel: z.string().default('gemini-2.5-flash'),

  // Output
  outputDir: z.string().default('./summaries'),
  runHistoryPath: z.string().default('./data/runs.json'),

  // Summarization
  maxWorkers: z.number().int().positive().default(3),

  // Timeouts (ms)
  fetchTimeoutMs: z.number().int().positive().default(30000),
  fetchConnectTimeoutMs: z.number().int().positive().default(10000),
  generationTimeoutMs: z.number().int().positive().default(120000),

  // Rate Limiting (requests per second)
  rateLimits: z.object({
    search: z.number().positive().default(1),
  }),
});

export type Config = z.infer<typeof configSchema>;

function parseInteger(value: string | undefined): number | undefined {
  if (value === undefined || value.trim() === '') return undefined;
  return parseInt(value, 10);
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  return configSchema.parse({
    perplexityApiKey: env.PERPLEXITY_API_KEY,
    geminiApiKey: env.GEMINI_API_KEY,
    searchModel: env.SEARCH_MODEL || undefined,
    generationModel: env.GENERATION_MODEL || undefined,
    outputDir: env.SUMMARY_OUTPUT_DIR || undefined,
    runHistoryPath: env.RUN_HISTORY_PATH || undefined,
    maxWorkers: parseInteger(env.SUMMARY_MAX_WORKERS),
    fetchTimeoutMs: parseInteger(env.FETCH_TIMEOUT_MS),
    fetchConnectTimeoutMs: parseInteger(env.FETCH_CONNECT_TIMEOUT_MS),
    generationTimeoutMs: parseInteger(env.GENERATION_TIMEOUT_MS),
    rateLimits: {
      search: parseInteger(env.SEARCH_RATE_LIMIT),
    },
  });
}
