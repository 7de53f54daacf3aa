import { mkdir, writeFile } from 'fs/promises';
import * as path from 'path';

const MAX_FILENAME_PART_LENGTH = 150;
// Leaves room for the language, level and extension under the 255-byte limit
const MAX_FILENAME_PART_BYTES = 200;

/**
 * Strips characters that are unsafe in file names and collapses whitespace.
 * The result is cut at whole characters: at most 150 of them and 200 UTF-8
 * bytes.
 */
export function sanitizeFilename(filename: string): string {
  const sanitized = filename.replace(/[<>:"/\\|?*]/g, '').replace(/\s+/g, '_');

  let result = '';
  let bytes = 0;
  for (const char of Array.from(sanitized).slice(0, MAX_FILENAME_PART_LENGTH)) {
    bytes += Buffer.byteLength(char, 'utf8');
    if (bytes > MAX_FILENAME_PART_BYTES) break;
    result += char;
  }
  return result;
}

export function summaryFilename(title: string, language: string, level: string): string {
  const safeTitle = sanitizeFilename(title) || 'Unknown_Title';
  return `${safeTitle}-${sanitizeFilename(language)}-${sanitizeFilename(level)}.html`;
}

export class SummaryWriter {
  constructor(readonly outputDir: string) {}

  pathFor(title: string, language: string, level: string): string {
    return path.join(this.outputDir, summaryFilename(title, language, level));
  }

  /** Writes the summary and returns its path. Existing files are overwritten. */
  async save(html: string, title: string, language: string, level: string): Promise<string> {
    const filePath = this.pathFor(title, language, level);
    await mkdir(this.outputDir, { recursive: true });
    await writeFile(filePath, html, 'utf-8');
    return filePath;
  }
}
