import { BaseApiClient } from './base-client.js';
import { buildSearchUserMessage } from '../ai/prompts.js';
import { SearchResponseError } from '../errors.js';
import type { SearchRequest, SearchService } from '../types/services.js';

interface PerplexityChatCompletion {
  id?: string;
  model?: string;
  choices?: {
    index: number;
    finish_reason?: string;
    message: {
      role: string;
      content: string | null;
    };
  }[];
  citations?: string[];
}

// JSON schema handed to the backend as the response-format constraint
export const PAPERS_LIST_SCHEMA = {
  type: 'object',
  properties: {
    papers: {
      type: 'array',
      items: {
        type: 'object',
        properties: {
          url: { type: 'string', description: 'Direct link to the PDF, not to the abstract' },
          title: { type: 'string' },
          publication_date: { type: 'string' },
          citation_number: { type: 'integer' },
          social_mentions: { type: 'integer' },
          github_stars: { type: 'integer' },
          author_hindex: { type: 'integer' },
        },
        required: ['url', 'title', 'publication_date', 'citation_number'],
      },
    },
  },
  required: ['papers'],
} as const;

export interface PerplexityClientOptions {
  apiKey: string;
  baseURL?: string;
  model?: string;
  requestsPerSecond?: number;
  timeoutMs?: number;
}

export class PerplexityClient extends BaseApiClient implements SearchService {
  private model: string;

  constructor(options: PerplexityClientOptions) {
    super(
      options.baseURL ?? 'https://api.perplexity.ai',
      { requestsPerSecond: options.requestsPerSecond ?? 1, timeoutMs: options.timeoutMs ?? 60000 },
      {
        'Authorization': `Bearer ${options.apiKey}`,
        'Content-Type': 'application/json',
      }
    );
    this.model = options.model ?? 'sonar';
  }

  async search(request: SearchRequest): Promise<string> {
    const completion = await this.request<PerplexityChatCompletion>({
      method: 'POST',
      url: '/chat/completions',
      data: {
        model: this.model,
        messages: [
          { role: 'system', content: request.systemPrompt },
          {
            role: 'user',
            content: buildSearchUserMessage(request.topic, request.pubFrom, request.pubTo, request.maxResults),
          },
        ],
        search_domain_filter: request.domains,
        response_format: {
          type: 'json_schema',
          json_schema: { name: 'papers_list', schema: PAPERS_LIST_SCHEMA, strict: true },
        },
        temperature: 0.3,
      },
    });

    if (!completion.choices || completion.choices.length === 0) {
      throw new SearchResponseError('No response from search API');
    }

    const content = completion.choices[0].message.content;
    if (!content) {
      throw new SearchResponseError('Empty response content');
    }

    return content;
  }
}
