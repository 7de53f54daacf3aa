import type { ScoreSignals } from '../types/paper.js';

export const SCORE_WEIGHTS = {
  citations: 0.4,
  engagement: 0.3,
  authority: 0.2,
  recency: 0.1,
} as const;

// Flat recency credit for a non-empty date without a leading year
export const DEFAULT_RECENCY_CONTRIBUTION = 0.05;

const RECENCY_HORIZON_YEARS = 10;

function clamp01(value: number): number {
  return Math.min(1, Math.max(0, value));
}

function signal(value: number | undefined): number {
  return value !== undefined && Number.isFinite(value) ? value : 0;
}

export type RecencyCredit =
  | { kind: 'dated'; year: number; score: number }
  | { kind: 'malformed_date' }
  | { kind: 'no_date' };

export function assessRecency(publicationDate: string | undefined, currentYear: number): RecencyCredit {
  if (!publicationDate) {
    return { kind: 'no_date' };
  }

  const yearText = publicationDate.slice(0, 4);
  if (!/^\d{4}$/.test(yearText)) {
    return { kind: 'malformed_date' };
  }

  const year = parseInt(yearText, 10);
  return {
    kind: 'dated',
    year,
    score: clamp01(1 - (currentYear - year) / RECENCY_HORIZON_YEARS),
  };
}

function recencyContribution(credit: RecencyCredit): number {
  switch (credit.kind) {
    case 'dated':
      return credit.score * SCORE_WEIGHTS.recency;
    case 'malformed_date':
      return DEFAULT_RECENCY_CONTRIBUTION;
    case 'no_date':
      return 0;
  }
}

/**
 * Composite relevance score in [0, 1], rounded to 3 decimals.
 *
 * Citation impact 40%, community engagement 30% (social mentions plus
 * repository stars / 100), author authority 20%, recency 10%. Missing signals
 * count as zero.
 */
export function calculateCompositeScore(signals: ScoreSignals, now: Date = new Date()): number {
  const citationScore = clamp01(signal(signals.citations) / 100);
  const engagementScore = clamp01((signal(signals.socialMentions) + signal(signals.repoStars) / 100) / 50);
  const authorityScore = clamp01(signal(signals.authorHIndex) / 50);

  const score =
    citationScore * SCORE_WEIGHTS.citations +
    engagementScore * SCORE_WEIGHTS.engagement +
    authorityScore * SCORE_WEIGHTS.authority +
    recencyContribution(assessRecency(signals.publicationDate, now.getFullYear()));

  return Math.round(score * 1000) / 1000;
}
