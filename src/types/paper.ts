export interface SearchedPaper {
  url: string; // Canonical arXiv PDF URL, unique per discovery run
  title: string;
  publicationDate: string;
  citationNumber: number;
  compositeScore?: number;
}

export interface ScoreSignals {
  citations?: number;
  socialMentions?: number;
  repoStars?: number;
  authorHIndex?: number;
  publicationDate?: string;
}

export type StopReason = 'satisfied' | 'exhausted';

export interface DiscoveryOutcome {
  papers: SearchedPaper[];
  stopReason: StopReason;
  attempts: number;
}

export type SummaryStatus = 'success' | 'fetch_error' | 'error';

export type SummaryMetadata = Record<string, unknown>;

export interface SummaryResult {
  paperUrl: string;
  title: string;
  htmlSummary: string;
  status: SummaryStatus;
  processingTimeSeconds: number;
  error?: string;
  metadata?: SummaryMetadata;
  outputPath?: string;
}

export interface SummaryRecord {
  paperUrl: string;
  title: string;
  htmlSummary: string;
  status: SummaryStatus;
  processingTime: number; // seconds, 2 decimals
  language: string;
  audienceLevel: string;
  error?: string;
  metadata?: SummaryMetadata;
  outputPath?: string;
}

export interface SummarizationReport {
  results: SummaryRecord[];
  successCount: number;
  total: number;
  language: string;
  audienceLevel: string;
}

export interface DiscoveryRun {
  id: string;
  topic: string;
  pubFrom: string;
  pubTo: string;
  maxResults: number;
  domains: string[];
  stopReason: StopReason;
  attempts: number;
  paperUrls: string[];
  startedAt: string;
  completedAt: string;
}

export interface SummarizationRun {
  id: string;
  discoveryRunId?: string;
  audienceLevel: string;
  language: string;
  parallel: boolean;
  total: number;
  successCount: number;
  failures: { paperUrl: string; status: SummaryStatus; error?: string }[];
  startedAt: string;
  completedAt: string;
}
