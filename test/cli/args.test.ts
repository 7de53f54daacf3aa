import { describe, it, expect } from 'vitest';
import { parseRunArgs, UsageError } from '../../src/cli/args.js';

const TODAY = new Date('2025-10-15T12:00:00Z');

describe('parseRunArgs', () => {
  it('parses every option', () => {
    const args = parseRunArgs(
      [
        'retrieval',
        'augmented',
        'generation',
        '--from',
        '2025-09-01',
        '--to',
        '2025-09-30',
        '--max',
        '4',
        '--level',
        'undergraduate',
        '--language',
        'fr',
        '--domains',
        'arxiv.org, semanticscholar.org',
        '--sequential',
      ],
      TODAY
    );

    expect(args).toEqual({
      topic: 'retrieval augmented generation',
      pubFrom: '2025-09-01',
      pubTo: '2025-09-30',
      maxResults: 4,
      level: 'undergraduate',
      language: 'fr',
      parallel: false,
      domains: ['arxiv.org', 'semanticscholar.org'],
    });
  });

  it('defaults to the last 30 days, parallel mode and the default domains', () => {
    expect(parseRunArgs(['robotics'], TODAY)).toEqual({
      topic: 'robotics',
      pubFrom: '2025-09-15',
      pubTo: '2025-10-15',
      maxResults: 15,
      level: 'general',
      language: 'en',
      parallel: true,
      domains: ['arxiv.org', 'scholar.google.com', 'semanticscholar.org'],
    });
  });

  it('falls back to the default domains when the filter list is blank', () => {
    expect(parseRunArgs(['robotics', '--domains', ' , '], TODAY).domains).toEqual([
      'arxiv.org',
      'scholar.google.com',
      'semanticscholar.org',
    ]);
  });

  it('requires a topic', () => {
    expect(() => parseRunArgs(['--max', '3'], TODAY)).toThrow(new UsageError('A topic is required'));
  });

  it('rejects a missing option value', () => {
    expect(() => parseRunArgs(['robotics', '--from'], TODAY)).toThrow(new UsageError('--from requires a value'));
    expect(() => parseRunArgs(['robotics', '--level', '--sequential'], TODAY)).toThrow(
      new UsageError('--level requires a value')
    );
  });

  it('rejects an invalid paper count', () => {
    expect(() => parseRunArgs(['robotics', '--max', 'zero'], TODAY)).toThrow(
      new UsageError('--max must be a positive integer')
    );
    expect(() => parseRunArgs(['robotics', '--max', '0'], TODAY)).toThrow(UsageError);
  });

  it('rejects unknown options', () => {
    expect(() => parseRunArgs(['robotics', '--verbose'], TODAY)).toThrow(new UsageError('Unknown option: --verbose'));
  });
});
