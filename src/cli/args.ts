import { DEFAULT_MAX_RESULTS, DEFAULT_SEARCH_DOMAINS } from '../discovery/paper-search.js';

export interface RunArgs {
  topic: string;
  pubFrom: string;
  pubTo: string;
  maxResults: number;
  level: string;
  language: string;
  parallel: boolean;
  domains: string[];
}

export const USAGE = [
  'Usage: npm run digest -- "topic words" --from YYYY-MM-DD --to YYYY-MM-DD [options]',
  '',
  'Options:',
  '  --max N                 Number of papers to find (default: 15)',
  '  --level LEVEL           Audience level, e.g. general, undergraduate, expert (default: general)',
  '  --language CODE         Summary language (default: en)',
  '  --domains a.org,b.org   Search domain filter (replaces the default list)',
  '  --sequential            Summarize one paper at a time',
  '',
  'Example:',
  '  npm run digest -- "large language model reasoning" --from 2025-09-01 --to 2025-09-30 --max 5 --level undergraduate',
].join('\n');

export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UsageError';
  }
}

function isoDate(value: Date): string {
  return value.toISOString().slice(0, 10);
}

/**
 * Parses caller parameters from argv. The date window defaults to the last 30
 * days ending on `today`; the domain filter to the default search domains.
 */
export function parseRunArgs(args: string[], today: Date = new Date()): RunArgs {
  const topicWords: string[] = [];
  let pubFrom: string | undefined;
  let pubTo: string | undefined;
  let maxResults = DEFAULT_MAX_RESULTS;
  let level = 'general';
  let language = 'en';
  let parallel = true;
  let domains: string[] | undefined;

  const valueAfter = (index: number, flag: string): string => {
    const value = args[index + 1];
    if (value === undefined || value.startsWith('--')) {
      throw new UsageError(`${flag} requires a value`);
    }
    return value;
  };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];

    if (arg === '--from') {
      pubFrom = valueAfter(i++, arg);
    } else if (arg === '--to') {
      pubTo = valueAfter(i++, arg);
    } else if (arg === '--max') {
      maxResults = parseInt(valueAfter(i++, arg), 10);
      if (!Number.isInteger(maxResults) || maxResults < 1) {
        throw new UsageError('--max must be a positive integer');
      }
    } else if (arg === '--level') {
      level = valueAfter(i++, arg);
    } else if (arg === '--language') {
      language = valueAfter(i++, arg);
    } else if (arg === '--domains') {
      domains = valueAfter(i++, arg)
        .split(',')
        .map((d) => d.trim())
        .filter((d) => d);
    } else if (arg === '--sequential') {
      parallel = false;
    } else if (arg.startsWith('--')) {
      throw new UsageError(`Unknown option: ${arg}`);
    } else {
      topicWords.push(arg);
    }
  }

  const topic = topicWords.join(' ').trim();
  if (!topic) {
    throw new UsageError('A topic is required');
  }

  const defaultFrom = new Date(today.getTime() - 30 * 24 * 60 * 60 * 1000);

  return {
    topic,
    pubFrom: pubFrom ?? isoDate(defaultFrom),
    pubTo: pubTo ?? isoDate(today),
    maxResults,
    level,
    language,
    parallel,
    domains: domains && domains.length > 0 ? domains : [...DEFAULT_SEARCH_DOMAINS],
  };
}
