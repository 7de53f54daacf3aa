import { describe, it, expect, afterEach } from 'vitest';
import { mkdtemp, readFile, rm } from 'fs/promises';
import { tmpdir } from 'os';
import * as path from 'path';
import { sanitizeFilename, summaryFilename, SummaryWriter } from '../../src/summarization/summary-writer.js';

describe('sanitizeFilename', () => {
  it('strips unsafe characters and collapses whitespace', () => {
    expect(sanitizeFilename('What? A "Study": of <LLMs>/Agents|Now*')).toBe('What_A_Study_of_LLMsAgentsNow');
    expect(sanitizeFilename('a \t\n b')).toBe('a_b');
  });

  it('caps the length at 150 characters', () => {
    expect(sanitizeFilename('x'.repeat(400))).toHaveLength(150);
  });

  it('keeps multi-byte titles within the byte budget', () => {
    const name = sanitizeFilename('文'.repeat(150));

    expect(name).toBe('文'.repeat(66));
    expect(Buffer.byteLength(name, 'utf8')).toBe(198);
  });

  it('never splits a surrogate pair', () => {
    expect(sanitizeFilename('😀'.repeat(100))).toBe('😀'.repeat(50));
    expect(sanitizeFilename(`${'a'.repeat(149)}😀😀`)).toBe(`${'a'.repeat(149)}😀`);
  });
});

describe('summaryFilename', () => {
  it('joins title, language and level', () => {
    expect(summaryFilename('Attention Is All You Need', 'en', 'general')).toBe(
      'Attention_Is_All_You_Need-en-general.html'
    );
  });

  it('falls back to a placeholder when nothing of the title survives', () => {
    expect(summaryFilename('???', 'fr', 'expert')).toBe('Unknown_Title-fr-expert.html');
  });
});

describe('SummaryWriter', () => {
  let dir: string | undefined;

  afterEach(async () => {
    if (dir) await rm(dir, { recursive: true, force: true });
    dir = undefined;
  });

  it('creates the output directory and writes UTF-8 HTML', async () => {
    dir = await mkdtemp(path.join(tmpdir(), 'summary-writer-'));
    const writer = new SummaryWriter(path.join(dir, 'nested'));

    const filePath = await writer.save('<p>Résumé</p>', 'A Paper', 'fr', 'general');

    expect(filePath).toBe(path.join(dir, 'nested', 'A_Paper-fr-general.html'));
    expect(await readFile(filePath, 'utf-8')).toBe('<p>Résumé</p>');
  });

  it('overwrites an existing summary for the same tuple', async () => {
    dir = await mkdtemp(path.join(tmpdir(), 'summary-writer-'));
    const writer = new SummaryWriter(dir);

    await writer.save('<p>first</p>', 'Same', 'en', 'expert');
    const filePath = await writer.save('<p>second</p>', 'Same', 'en', 'expert');

    expect(await readFile(filePath, 'utf-8')).toBe('<p>second</p>');
  });
});
