import { mkdir, writeFile } from 'fs/promises';
import * as path from 'path';
import type { SummarizationReport, SummaryRecord } from '../types/paper.js';
import { sanitizeFilename } from './summary-writer.js';

// Keys of a structured summary rendered as sections, in this order
const STRUCTURED_SECTIONS = [
  'objective',
  'methodology',
  'findings',
  'visual_content',
  'limitations',
  'implications',
  'significance',
];

function sectionTitle(key: string): string {
  return key
    .split('_')
    .map((word) => word.charAt(0).toUpperCase() + word.slice(1))
    .join(' ');
}

function renderValue(value: unknown): string {
  if (typeof value === 'string') return value;
  if (Array.isArray(value)) return value.map((item) => `- ${renderValue(item)}`).join('\n');
  return JSON.stringify(value, null, 2);
}

export function formatSummaryMarkdown(record: SummaryRecord): string {
  if (record.status !== 'success') {
    return `## ${record.title}\n\n**Status:** ${record.status}\n\nFailed to summarize: ${record.error ?? 'Unknown error'}\n`;
  }

  let md = `## ${record.title}\n\n`;
  md += `**Source:** ${record.paperUrl}\n\n`;
  md += `**Processing time:** ${record.processingTime}s\n\n`;

  const metadata = record.metadata ?? {};
  if (metadata.authors !== undefined) {
    md += `**Authors:** ${renderValue(metadata.authors)}\n\n`;
  }

  for (const key of STRUCTURED_SECTIONS) {
    const content = metadata[key];
    if (content !== undefined && content !== null && content !== '') {
      md += `### ${sectionTitle(key)}\n${renderValue(content)}\n\n`;
    }
  }

  if (record.outputPath) {
    md += `HTML summary: \`${record.outputPath}\`\n`;
  }

  return md;
}

export function formatDigestMarkdown(report: SummarizationReport, generatedAt: Date = new Date()): string {
  const header = [
    '# Paper Digest',
    '',
    `- Audience: ${report.audienceLevel}`,
    `- Language: ${report.language}`,
    `- Summarized: ${report.successCount}/${report.total}`,
    `- Generated: ${generatedAt.toISOString()}`,
    '',
  ].join('\n');

  return [header, ...report.results.map(formatSummaryMarkdown)].join('\n');
}

export async function writeDigest(report: SummarizationReport, outputDir: string): Promise<string> {
  const filename = `digest-${sanitizeFilename(report.language)}-${sanitizeFilename(report.audienceLevel)}.md`;
  const filePath = path.join(outputDir, filename);

  await mkdir(outputDir, { recursive: true });
  await writeFile(filePath, formatDigestMarkdown(report), 'utf-8');
  return filePath;
}
