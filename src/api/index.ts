export { BaseApiClient } from './base-client.js';
export type { RateLimiterOptions } from './base-client.js';
export { PerplexityClient, PAPERS_LIST_SCHEMA } from './perplexity-client.js';
export type { PerplexityClientOptions } from './perplexity-client.js';
export { HttpDocumentFetcher } from './document-fetcher.js';
export type { HttpDocumentFetcherOptions } from './document-fetcher.js';
