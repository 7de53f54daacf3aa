export interface SearchRequest {
  topic: string;
  pubFrom: string;
  pubTo: string;
  systemPrompt: string;
  excludedUrls: string[];
  domains: string[];
  maxResults: number;
}

/** Web-grounded search backend. Resolves with the raw reply content. */
export interface SearchService {
  search(request: SearchRequest): Promise<string>;
}

export interface DocumentPrompt {
  document: Buffer;
  mimeType: string;
  prompt: string;
}

export interface GenerationService {
  summarizeDocument(input: DocumentPrompt): Promise<string>;
  generateText(prompt: string): Promise<string>;
}

export interface DocumentFetcher {
  fetchDocument(url: string): Promise<Buffer>;
}
