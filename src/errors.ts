export class PaperUrlError extends Error {
  constructor(message: string, readonly url: string) {
    super(message);
    this.name = 'PaperUrlError';
  }
}

/** The URL is not hosted on an accepted source domain. */
export class InvalidSourceError extends PaperUrlError {
  constructor(url: string) {
    super(`Non-arXiv domain: ${url || '(empty)'}`, url);
    this.name = 'InvalidSourceError';
  }
}

/** The URL is on arXiv but no paper identifier could be extracted from it. */
export class UnresolvableIdentifierError extends PaperUrlError {
  constructor(url: string) {
    super(`Could not extract arXiv ID from: ${url}`, url);
    this.name = 'UnresolvableIdentifierError';
  }
}

/** The search backend answered with something that is not a papers list. */
export class SearchResponseError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'SearchResponseError';
  }
}

export class DocumentFetchError extends Error {
  constructor(
    message: string,
    readonly url: string,
    readonly statusCode?: number,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'DocumentFetchError';
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
