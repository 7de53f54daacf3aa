import type { SummaryMetadata } from '../types/paper.js';

export type ValidatedSummary =
  | { kind: 'structured'; html: string; metadata: SummaryMetadata }
  | { kind: 'html'; html: string; metadata: SummaryMetadata }
  | { kind: 'wrapped_text'; html: string; metadata: SummaryMetadata };

const FENCED_BLOCK = /^```[a-zA-Z]*\s*\n([\s\S]*?)\n?```$/;

export function wrapAsHtml(text: string): string {
  return `<div class="paper-summary">${text}</div>`;
}

function unfence(text: string): string {
  const match = text.match(FENCED_BLOCK);
  return match ? match[1].trim() : text;
}

function parseObject(text: string): Record<string, unknown> | null {
  if (!text.startsWith('{')) return null;

  let value: unknown;
  try {
    value = JSON.parse(text);
  } catch {
    return null;
  }

  if (typeof value === 'object' && value !== null && !Array.isArray(value)) {
    return { ...value };
  }
  return null;
}

/**
 * Normalizes a model reply into an HTML payload.
 *
 * A JSON object yields its `summary` field and keeps the whole object as
 * metadata. Anything else is markup; text that does not start with a tag is
 * wrapped in a `paper-summary` container, an empty reply included.
 */
export function validateSummaryResponse(text: string): ValidatedSummary {
  const cleaned = unfence(text.trim());

  const structured = parseObject(cleaned);
  if (structured) {
    const summary = structured.summary;
    return {
      kind: 'structured',
      html: typeof summary === 'string' && summary.trim() ? summary : wrapAsHtml(cleaned),
      metadata: structured,
    };
  }

  if (cleaned.startsWith('<')) {
    return { kind: 'html', html: cleaned, metadata: { format: 'html' } };
  }

  return { kind: 'wrapped_text', html: wrapAsHtml(cleaned), metadata: { format: 'html' } };
}
