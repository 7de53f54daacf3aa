export { GeminiSummarizer } from './gemini-summarizer.js';
export type { GeminiSummarizerOptions } from './gemini-summarizer.js';
export { buildSearchPrompt, buildSearchUserMessage, buildSummaryPrompt, buildNewsletterPrompt } from './prompts.js';
