#!/usr/bin/env node

import { config as dotenvConfig } from 'dotenv';
import { v4 as uuidv4 } from 'uuid';
import { loadConfig } from './config/index.js';
import { PerplexityClient, HttpDocumentFetcher } from './api/index.js';
import { GeminiSummarizer } from './ai/index.js';
import { PaperSearch } from './discovery/paper-search.js';
import { PaperSummarizer } from './summarization/paper-summarizer.js';
import { SummaryWriter } from './summarization/summary-writer.js';
import { writeDigest } from './summarization/digest.js';
import { RunHistory } from './database/run-history.js';
import { parseRunArgs, USAGE, UsageError } from './cli/args.js';

async function main(): Promise<void> {
  dotenvConfig();

  const argv = process.argv.slice(2);
  if (argv.length === 0 || argv.includes('--help')) {
    console.log(USAGE);
    return;
  }

  const args = parseRunArgs(argv);
  const config = loadConfig();

  console.log('=== arXiv Digest ===\n');
  console.log('Run Configuration:');
  console.log(`  Topic: ${args.topic}`);
  console.log(`  Date Range: ${args.pubFrom} to ${args.pubTo}`);
  console.log(`  Max Papers: ${args.maxResults}`);
  console.log(`  Audience: ${args.level} (${args.language})`);
  console.log(`  Mode: ${args.parallel ? `parallel (${config.maxWorkers} workers)` : 'sequential'}`);
  console.log('');

  // Clients are built once here and passed down
  const search = new PaperSearch(
    new PerplexityClient({
      apiKey: config.perplexityApiKey,
      model: config.searchModel,
      requestsPerSecond: config.rateLimits.search,
    })
  );
  const summarizer = new PaperSummarizer(
    new GeminiSummarizer({
      apiKey: config.geminiApiKey,
      model: config.generationModel,
      timeoutMs: config.generationTimeoutMs,
    }),
    new HttpDocumentFetcher({
      totalTimeoutMs: config.fetchTimeoutMs,
      connectTimeoutMs: config.fetchConnectTimeoutMs,
    }),
    new SummaryWriter(config.outputDir),
    { maxWorkers: config.maxWorkers }
  );
  const history = RunHistory.atPath(config.runHistoryPath);

  const discoveryStartedAt = new Date().toISOString();
  const outcome = await search.searchPapers(args.topic, args.pubFrom, args.pubTo, {
    maxResults: args.maxResults,
    domains: args.domains,
  });

  const discoveryId = uuidv4();
  await history.recordDiscovery({
    id: discoveryId,
    topic: args.topic,
    pubFrom: args.pubFrom,
    pubTo: args.pubTo,
    maxResults: args.maxResults,
    domains: args.domains,
    stopReason: outcome.stopReason,
    attempts: outcome.attempts,
    paperUrls: outcome.papers.map((p) => p.url),
    startedAt: discoveryStartedAt,
    completedAt: new Date().toISOString(),
  });

  console.log(`\n=== Discovery ${outcome.stopReason === 'satisfied' ? 'Complete' : 'Exhausted'} ===`);
  console.log(`Papers Found: ${outcome.papers.length} in ${outcome.attempts} searches`);
  for (const paper of outcome.papers) {
    console.log(`  [${(paper.compositeScore ?? 0).toFixed(3)}] ${paper.title}`);
    console.log(`          ${paper.url}`);
  }

  if (outcome.papers.length === 0) {
    console.log('\nNothing to summarize.');
    return;
  }

  const summarizationStartedAt = new Date().toISOString();
  const report = await summarizer.summarizeAll(outcome.papers, args.level, args.language, args.parallel);

  await history.recordSummarization({
    id: uuidv4(),
    discoveryRunId: discoveryId,
    audienceLevel: report.audienceLevel,
    language: report.language,
    parallel: args.parallel,
    total: report.total,
    successCount: report.successCount,
    failures: report.results
      .filter((r) => r.status !== 'success')
      .map((r) => ({ paperUrl: r.paperUrl, status: r.status, error: r.error })),
    startedAt: summarizationStartedAt,
    completedAt: new Date().toISOString(),
  });

  const digestPath = await writeDigest(report, config.outputDir);

  console.log('\n=== Summarization Complete ===');
  console.log(`Summarized: ${report.successCount}/${report.total}`);
  console.log(`Digest: ${digestPath}`);
}

main().catch((error: unknown) => {
  if (error instanceof UsageError) {
    console.error(`Error: ${error.message}\n`);
    console.error(USAGE);
  } else {
    console.error('Run failed:', error);
  }
  process.exit(1);
});
