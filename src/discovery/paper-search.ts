import { z } from 'zod';
import { buildSearchPrompt } from '../ai/prompts.js';
import { PaperUrlError, SearchResponseError, errorMessage } from '../errors.js';
import type { DiscoveryOutcome, SearchedPaper } from '../types/paper.js';
import type { SearchService } from '../types/services.js';
import { canonicalizeArxivUrl } from './arxiv-url.js';
import { calculateCompositeScore } from './composite-score.js';

export const DEFAULT_SEARCH_DOMAINS = ['arxiv.org', 'scholar.google.com', 'semanticscholar.org'];
export const DEFAULT_MAX_RESULTS = 15;
export const MAX_SEARCH_ATTEMPTS = 5;

const papersListSchema = z.object({
  papers: z.array(z.unknown()),
});

// An unusable signal counts as absent rather than rejecting the candidate
const optionalCount = z.number().nonnegative().nullish().catch(undefined);

const candidateSchema = z.object({
  url: z.string(),
  title: z.string(),
  publication_date: z.string(),
  citation_number: optionalCount,
  social_mentions: optionalCount,
  github_stars: optionalCount,
  author_hindex: optionalCount,
});

type Candidate = z.infer<typeof candidateSchema>;

export interface PaperSearchOptions {
  maxAttempts?: number;
  candidateDelayMs?: number; // pause after each validated candidate
  now?: () => Date;
}

export interface SearchPapersOptions {
  maxResults?: number;
  domains?: string[];
}

export class PaperSearch {
  private maxAttempts: number;
  private candidateDelayMs: number;
  private now: () => Date;

  constructor(private readonly searchService: SearchService, options: PaperSearchOptions = {}) {
    this.maxAttempts = options.maxAttempts ?? MAX_SEARCH_ATTEMPTS;
    this.candidateDelayMs = options.candidateDelayMs ?? 500;
    this.now = options.now ?? (() => new Date());
  }

  /**
   * Searches repeatedly until `maxResults` unique papers are collected or the
   * attempt budget runs out. A short list is not an error; the stop reason
   * tells the two apart.
   *
   * @throws SearchResponseError when a reply is not a papers list
   */
  async searchPapers(
    topic: string,
    pubFrom: string,
    pubTo: string,
    options: SearchPapersOptions = {}
  ): Promise<DiscoveryOutcome> {
    const maxResults = options.maxResults ?? DEFAULT_MAX_RESULTS;
    const domains = options.domains ?? DEFAULT_SEARCH_DOMAINS;

    const finalPapers: SearchedPaper[] = [];
    const seenUrls = new Set<string>();
    let remainingAttempts = this.maxAttempts;
    let attempts = 0;

    while (finalPapers.length < maxResults && remainingAttempts > 0) {
      console.log(`[search] Searching for papers on '${topic}' from ${pubFrom} to ${pubTo} (attempt ${attempts + 1})`);

      const rawResponse = await this.searchService.search({
        topic,
        pubFrom,
        pubTo,
        systemPrompt: buildSearchPrompt(topic, pubFrom, pubTo, Array.from(seenUrls)),
        excludedUrls: Array.from(seenUrls),
        domains,
        maxResults,
      });

      const candidates = this.parseResponse(rawResponse);
      const validated = await this.validateCandidates(candidates);
      const ranked = this.rankPapers(validated);

      for (const paper of ranked) {
        if (finalPapers.length >= maxResults) break;
        if (seenUrls.has(paper.url)) continue;

        seenUrls.add(paper.url);
        finalPapers.push(paper);
      }

      remainingAttempts--;
      attempts++;
      console.log(`[search] Retrieved ${finalPapers.length}/${maxResults} papers`);
    }

    const stopReason = finalPapers.length >= maxResults ? 'satisfied' : 'exhausted';
    if (stopReason === 'exhausted') {
      console.warn(`[search] Gave up after ${attempts} attempts with ${finalPapers.length}/${maxResults} papers`);
    }

    return { papers: finalPapers, stopReason, attempts };
  }

  private parseResponse(rawResponse: string): unknown[] {
    let parsed: unknown;
    try {
      parsed = JSON.parse(rawResponse);
    } catch (error) {
      console.error(`[search] JSON parsing error: ${errorMessage(error)}`);
      throw new SearchResponseError('Failed to parse search response', { cause: error });
    }

    const result = papersListSchema.safeParse(parsed);
    if (!result.success) {
      throw new SearchResponseError("Invalid response format: missing 'papers' key");
    }

    return result.data.papers;
  }

  private async validateCandidates(candidates: unknown[]): Promise<SearchedPaper[]> {
    const validated: SearchedPaper[] = [];

    for (const raw of candidates) {
      const parsed = candidateSchema.safeParse(raw);
      if (!parsed.success) {
        console.warn(`[search] Excluding malformed candidate: ${parsed.error.issues[0]?.message ?? 'invalid shape'}`);
        continue;
      }

      let url: string;
      try {
        url = canonicalizeArxivUrl(parsed.data.url);
      } catch (error) {
        if (error instanceof PaperUrlError) {
          console.warn(`[search] Excluding invalid paper URL: ${error.message}`);
          continue;
        }
        throw error;
      }

      validated.push(this.toSearchedPaper(parsed.data, url));

      if (this.candidateDelayMs > 0) {
        await this.delay(this.candidateDelayMs);
      }
    }

    return validated;
  }

  private toSearchedPaper(candidate: Candidate, url: string): SearchedPaper {
    const citationNumber = candidate.citation_number ?? 0;

    return {
      url,
      title: candidate.title,
      publicationDate: candidate.publication_date,
      citationNumber,
      compositeScore: calculateCompositeScore(
        {
          citations: citationNumber,
          socialMentions: candidate.social_mentions ?? 0,
          repoStars: candidate.github_stars ?? 0,
          authorHIndex: candidate.author_hindex ?? 0,
          publicationDate: candidate.publication_date,
        },
        this.now()
      ),
    };
  }

  // Array.prototype.sort is stable: equal scores keep backend order
  private rankPapers(papers: SearchedPaper[]): SearchedPaper[] {
    return [...papers].sort((a, b) => (b.compositeScore ?? 0) - (a.compositeScore ?? 0));
  }

  private delay(ms: number): Promise<void> {
    return new Promise((resolve) => setTimeout(resolve, ms));
  }
}
