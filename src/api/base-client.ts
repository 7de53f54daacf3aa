import axios, { AxiosInstance, AxiosRequestConfig } from 'axios';
import pLimit from 'p-limit';

export interface RateLimiterOptions {
  requestsPerSecond: number;
  maxConcurrent?: number;
  timeoutMs?: number;
}

/**
 * axios client with request pacing. Request starts are spaced at least
 * `1 / requestsPerSecond` apart and at most `maxConcurrent` (default 1) are
 * in flight. Failures are not retried: callers decide what a backend error
 * means.
 */
export abstract class BaseApiClient {
  protected client: AxiosInstance;
  protected limiter: ReturnType<typeof pLimit>;
  private minIntervalMs: number;
  private nextSlotAt = 0;

  constructor(baseURL: string, options: RateLimiterOptions, headers?: Record<string, string>) {
    if (!(options.requestsPerSecond > 0)) {
      throw new RangeError(`requestsPerSecond must be positive, got ${options.requestsPerSecond}`);
    }
    this.minIntervalMs = 1000 / options.requestsPerSecond;
    this.limiter = pLimit(options.maxConcurrent ?? 1);

    this.client = axios.create({
      baseURL,
      timeout: options.timeoutMs ?? 30000,
      headers: {
        'Accept': 'application/json',
        ...headers,
      },
    });

    this.client.interceptors.request.use(async (config) => {
      await this.waitForSlot();
      return config;
    });
  }

  // Slots are reserved synchronously so concurrent callers never share one
  private async waitForSlot(): Promise<void> {
    const now = Date.now();
    const startAt = Math.max(now, this.nextSlotAt);
    this.nextSlotAt = startAt + this.minIntervalMs;
    if (startAt > now) {
      await this.delay(startAt - now);
    }
  }

  protected async delay(ms: number): Promise<void> {
    return new Promise((resolve) => setTimeout(resolve, ms));
  }

  protected async request<T>(config: AxiosRequestConfig): Promise<T> {
    return this.limiter(async () => {
      const response = await this.client.request<T>(config);
      return response.data;
    });
  }
}
