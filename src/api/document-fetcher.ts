import axios, { AxiosInstance } from 'axios';
import { DocumentFetchError, errorMessage } from '../errors.js';
import type { DocumentFetcher } from '../types/services.js';

export interface HttpDocumentFetcherOptions {
  totalTimeoutMs?: number;
  connectTimeoutMs?: number;
  userAgent?: string;
}

export class HttpDocumentFetcher implements DocumentFetcher {
  private client: AxiosInstance;
  private totalTimeoutMs: number;

  constructor(options: HttpDocumentFetcherOptions = {}) {
    this.totalTimeoutMs = options.totalTimeoutMs ?? 30000;

    this.client = axios.create({
      // Socket inactivity bound; the abort signal below bounds the whole transfer
      timeout: options.connectTimeoutMs ?? 10000,
      responseType: 'arraybuffer',
      maxRedirects: 5,
      headers: {
        'Accept': 'application/pdf',
        'User-Agent': options.userAgent ?? 'arxiv-digest/1.0 (research summarizer)',
      },
    });
  }

  async fetchDocument(url: string): Promise<Buffer> {
    try {
      console.log(`  [PDF] Downloading: ${url}`);
      const response = await this.client.get<ArrayBuffer>(url, {
        signal: AbortSignal.timeout(this.totalTimeoutMs),
      });
      return Buffer.from(response.data);
    } catch (error) {
      if (axios.isAxiosError(error)) {
        throw new DocumentFetchError(error.message, url, error.response?.status, { cause: error });
      }
      throw new DocumentFetchError(errorMessage(error), url, undefined, { cause: error });
    }
  }
}
