import { performance } from 'perf_hooks';
import { buildNewsletterPrompt, buildSummaryPrompt } from '../ai/prompts.js';
import { DocumentFetchError, errorMessage } from '../errors.js';
import type {
  SearchedPaper,
  SummarizationReport,
  SummaryRecord,
  SummaryResult,
} from '../types/paper.js';
import type { DocumentFetcher, GenerationService } from '../types/services.js';
import { validateSummaryResponse } from './response-validator.js';
import { SummaryWriter } from './summary-writer.js';
import { WorkerPool } from './worker-pool.js';

export type PaperToSummarize = Pick<SearchedPaper, 'url' | 'title'>;

export interface PaperSummarizerOptions {
  maxWorkers?: number;
  pacingMs?: number; // delay between papers in sequential mode
}

export class PaperSummarizer {
  private maxWorkers: number;
  private pacingMs: number;

  constructor(
    private readonly generator: GenerationService,
    private readonly fetcher: DocumentFetcher,
    private readonly writer: SummaryWriter,
    options: PaperSummarizerOptions = {}
  ) {
    this.maxWorkers = options.maxWorkers ?? 3;
    this.pacingMs = options.pacingMs ?? 500;
  }

  /**
   * Summarizes one paper. Never rejects: fetch failures come back as
   * `fetch_error`, everything else as `error`.
   */
  async summarizeOne(paper: PaperToSummarize, level: string, language: string): Promise<SummaryResult> {
    const startTime = performance.now();
    const title = paper.title || 'Unknown';
    const elapsed = () => (performance.now() - startTime) / 1000;

    try {
      let document: Buffer;
      try {
        document = await this.fetcher.fetchDocument(paper.url);
      } catch (error) {
        if (!(error instanceof DocumentFetchError)) throw error;

        console.error(`[summarize] HTTP error for ${paper.url}: ${error.message}`);
        return {
          paperUrl: paper.url,
          title,
          htmlSummary: '',
          status: 'fetch_error',
          processingTimeSeconds: elapsed(),
          error: `HTTP error: ${error.message}`,
        };
      }

      const response = await this.generator.summarizeDocument({
        document,
        mimeType: 'application/pdf',
        prompt: buildSummaryPrompt(level, language),
      });
      const validated = validateSummaryResponse(response);
      const outputPath = await this.persist(validated.html, title, language, level);

      return {
        paperUrl: paper.url,
        title,
        htmlSummary: validated.html,
        status: 'success',
        processingTimeSeconds: elapsed(),
        metadata: validated.metadata,
        ...(outputPath ? { outputPath } : {}),
      };
    } catch (error) {
      console.error(`[summarize] Summarization failed for ${paper.url}: ${errorMessage(error)}`);
      return {
        paperUrl: paper.url,
        title,
        htmlSummary: '',
        status: 'error',
        processingTimeSeconds: elapsed(),
        error: `Processing error: ${errorMessage(error)}`,
      };
    }
  }

  /**
   * Summarizes every paper, in parallel through a bounded pool or one at a
   * time with pacing. Results keep the order of `papers`.
   */
  async summarizeAll(
    papers: PaperToSummarize[],
    level: string,
    language: string = 'en',
    parallel: boolean = true
  ): Promise<SummarizationReport> {
    console.log(`[summarize] Starting summarization of ${papers.length} papers for ${level} audience`);
    this.warnOnFilenameCollisions(papers, level, language);

    let results: SummaryResult[];

    if (parallel && papers.length > 1) {
      results = await WorkerPool.scoped(this.maxWorkers, (pool) =>
        pool.runAll(papers.map((paper) => () => this.summarizeOne(paper, level, language)))
      );
    } else {
      results = [];
      for (let i = 0; i < papers.length; i++) {
        results.push(await this.summarizeOne(papers[i], level, language));

        if (i < papers.length - 1 && this.pacingMs > 0) {
          await this.delay(this.pacingMs);
        }
      }
    }

    const records: SummaryRecord[] = [];
    let successCount = 0;

    for (const result of results) {
      records.push(toSummaryRecord(result, level, language));

      if (result.status === 'success') {
        successCount++;
        console.log(`[summarize] ✓ Summarized: ${result.title} (${result.processingTimeSeconds.toFixed(1)}s)`);
      } else {
        console.warn(`[summarize] ✗ Failed: ${result.title} - ${result.error}`);
      }
    }

    console.log(`[summarize] Summarization complete: ${successCount}/${papers.length} successful`);

    return {
      results: records,
      successCount,
      total: papers.length,
      language,
      audienceLevel: level,
    };
  }

  /** Shortens a finished summary to a newsletter teaser. */
  async createNewsletterExcerpt(htmlSummary: string): Promise<string> {
    const response = await this.generator.generateText(buildNewsletterPrompt(htmlSummary));
    return validateSummaryResponse(response).html;
  }

  private async persist(html: string, title: string, language: string, level: string): Promise<string | null> {
    try {
      const filePath = await this.writer.save(html, title, language, level);
      console.log(`[summarize] ✓ Saved HTML summary: ${filePath}`);
      return filePath;
    } catch (error) {
      console.error(`[summarize] Failed to save HTML summary for ${title}: ${errorMessage(error)}`);
      return null;
    }
  }

  private warnOnFilenameCollisions(papers: PaperToSummarize[], level: string, language: string): void {
    const owners = new Map<string, string>();

    for (const paper of papers) {
      const filePath = this.writer.pathFor(paper.title || 'Unknown', language, level);
      const owner = owners.get(filePath);

      if (owner !== undefined && owner !== paper.url) {
        console.warn(`[summarize] ${paper.url} and ${owner} share ${filePath}; one summary will overwrite the other`);
      } else {
        owners.set(filePath, paper.url);
      }
    }
  }

  private delay(ms: number): Promise<void> {
    return new Promise((resolve) => setTimeout(resolve, ms));
  }
}

export function toSummaryRecord(result: SummaryResult, level: string, language: string): SummaryRecord {
  const record: SummaryRecord = {
    paperUrl: result.paperUrl,
    title: result.title,
    htmlSummary: result.htmlSummary,
    status: result.status,
    processingTime: Math.round(result.processingTimeSeconds * 100) / 100,
    language,
    audienceLevel: level,
  };

  if (result.error) {
    record.error = result.error;
  }
  if (result.metadata) {
    record.metadata = result.metadata;
  }
  if (result.outputPath) {
    record.outputPath = result.outputPath;
  }

  return record;
}
