import { InvalidSourceError, UnresolvableIdentifierError } from '../errors.js';

export const ACCEPTED_SOURCE_DOMAIN = 'arxiv.org';
const PDF_BASE_URL = 'https://arxiv.org/pdf/';

// New-style (2401.12345) and old-style (hep-th/9901001, math.GT/0309136) identifiers
const ARXIV_ID = String.raw`(?:\d{4}\.\d{4,5}|[a-z-]+(?:\.[A-Z]{2})?/\d{7})`;

interface UrlShape {
  name: 'abstract' | 'pdf' | 'bare' | 'versioned';
  pattern: RegExp;
}

// Checked in order; first match wins. Each shape must end where the
// identifier does, so a longer number never resolves to a shorter one.
const URL_SHAPES: UrlShape[] = [
  { name: 'abstract', pattern: new RegExp(String.raw`arxiv\.org/abs/(${ARXIV_ID}(?:v\d+)?)/?$`) },
  { name: 'pdf', pattern: new RegExp(String.raw`arxiv\.org/pdf/(${ARXIV_ID}(?:v\d+)?)(?:\.pdf)?/?$`) },
  { name: 'bare', pattern: new RegExp(String.raw`/(${ARXIV_ID})(?:\.pdf)?$`) },
  { name: 'versioned', pattern: new RegExp(String.raw`/(${ARXIV_ID}v\d+)(?:\.pdf)?$`) },
];

function parseUrl(url: string): URL | null {
  const withScheme = /^[a-z][a-z0-9+.-]*:\/\//i.test(url) ? url : `https://${url}`;
  try {
    return new URL(withScheme);
  } catch {
    return null;
  }
}

function isAcceptedHost(hostname: string): boolean {
  const host = hostname.toLowerCase();
  return host === ACCEPTED_SOURCE_DOMAIN || host.endsWith(`.${ACCEPTED_SOURCE_DOMAIN}`);
}

/**
 * Extracts the arXiv identifier (version suffix included) from any of the
 * recognised URL shapes.
 */
export function extractArxivId(url: string): string {
  const trimmed = url.trim();
  const parsed = trimmed ? parseUrl(trimmed) : null;

  if (!parsed || !isAcceptedHost(parsed.hostname)) {
    throw new InvalidSourceError(url);
  }

  // Query string and fragment never carry the identifier
  const location = `${parsed.hostname.toLowerCase()}${parsed.pathname}`;

  for (const shape of URL_SHAPES) {
    const match = location.match(shape.pattern);
    if (match) {
      return match[1];
    }
  }

  throw new UnresolvableIdentifierError(url);
}

/**
 * Validates that a URL points at arXiv and rewrites it to the direct PDF form,
 * e.g. `https://arxiv.org/abs/2401.12345v2` becomes
 * `https://arxiv.org/pdf/2401.12345v2`. No `.pdf` extension is appended.
 */
export function canonicalizeArxivUrl(url: string): string {
  return `${PDF_BASE_URL}${extractArxivId(url)}`;
}
