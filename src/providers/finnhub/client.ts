/**
 * Finnhub API Client
 * Rate-limited with exponential backoff
 */

import { createChildLogger } from '@/utils/logger';
import { ProviderError } from '@/providers/types';
import { RateLimiter, sleep } from './rate_limiter';
import type {
  FinnhubCandle,
  FinnhubMetric,
  FinnhubNewsItem,
  FinnhubProfile,
  FinnhubQuote,
} from './types';

const logger = createChildLogger('finnhub');

const BASE_URL = 'https://finnhub.io/api/v1';

export interface FetchOptions {
  maxRetries?: number;
  initialBackoffMs?: number;
  signal?: AbortSignal;
}

export interface FinnhubClientOptions {
  baseUrl?: string;
  rateLimiter?: RateLimiter;
  fetchFn?: typeof fetch;
  maxRetries?: number;
  initialBackoffMs?: number;
}

export class FinnhubClient {
  private readonly apiKey: string;
  private readonly baseUrl: string;
  private readonly rateLimiter: RateLimiter;
  private readonly fetchFn: typeof fetch;
  private readonly maxRetries: number;
  private readonly initialBackoffMs: number;
  private requestCount = 0;

  constructor(apiKey: string, options: FinnhubClientOptions = {}) {
    this.apiKey = apiKey;
    this.baseUrl = options.baseUrl ?? BASE_URL;
    this.rateLimiter = options.rateLimiter ?? new RateLimiter();
    this.fetchFn = options.fetchFn ?? fetch;
    this.maxRetries = options.maxRetries ?? 3;
    this.initialBackoffMs = options.initialBackoffMs ?? 1000;
  }

  getRequestCount(): number {
    return this.requestCount;
  }

  private async fetchWithRetry<T>(
    endpoint: string,
    symbol: string,
    params: Record<string, string | number> = {},
    options: FetchOptions = {}
  ): Promise<T> {
    const {
      maxRetries = this.maxRetries,
      initialBackoffMs = this.initialBackoffMs,
      signal,
    } = options;

    const url = new URL(`${this.baseUrl}${endpoint}`);
    url.searchParams.set('token', this.apiKey);
    for (const [key, value] of Object.entries(params)) {
      url.searchParams.set(key, String(value));
    }

    let lastError: Error | null = null;

    for (let attempt = 0; attempt <= maxRetries; attempt++) {
      if (signal?.aborted) {
        throw new ProviderError('Request aborted', 'finnhub', symbol, endpoint, 'timeout');
      }

      await this.rateLimiter.acquire();
      let response: Response;
      try {
        response = await this.fetchFn(url.toString(), { signal });
        this.requestCount++;
      } catch (error) {
        this.rateLimiter.release();
        if (signal?.aborted) {
          throw new ProviderError('Request aborted', 'finnhub', symbol, endpoint, 'timeout');
        }
        lastError = error instanceof Error ? error : new Error(String(error));
        if (attempt < maxRetries) {
          const backoffMs = initialBackoffMs * Math.pow(2, attempt);
          logger.warn(
            { attempt, backoffMs, endpoint, error: lastError.message },
            'Finnhub request failed, retrying'
          );
          await this.backoff(backoffMs, symbol, endpoint, signal);
        }
        continue;
      }

      this.rateLimiter.release();

      if (response.status === 429) {
        const backoffMs = initialBackoffMs * Math.pow(2, attempt);
        logger.warn({ attempt, backoffMs }, 'Rate limited by Finnhub, backing off');
        lastError = new Error('Finnhub API error: 429 Too Many Requests');
        if (attempt < maxRetries) {
          await this.backoff(backoffMs, symbol, endpoint, signal);
        }
        continue;
      }

      if (!response.ok) {
        throw new ProviderError(
          `Finnhub API error: ${response.status} ${response.statusText}`,
          'finnhub',
          symbol,
          endpoint
        );
      }

      try {
        return (await response.json()) as T;
      } catch (error) {
        throw new ProviderError(
          'Finnhub returned a non-JSON body',
          'finnhub',
          symbol,
          endpoint,
          'invalid_response',
          error instanceof Error ? error : undefined
        );
      }
    }

    throw new ProviderError(
      lastError?.message ?? 'Finnhub request failed after retries',
      'finnhub',
      symbol,
      endpoint,
      'unavailable',
      lastError ?? undefined
    );
  }

  private async backoff(
    ms: number,
    symbol: string,
    endpoint: string,
    signal?: AbortSignal
  ): Promise<void> {
    try {
      await sleep(ms, signal);
    } catch {
      throw new ProviderError('Request aborted', 'finnhub', symbol, endpoint, 'timeout');
    }
  }

  async fetchQuote(symbol: string, signal?: AbortSignal): Promise<FinnhubQuote> {
    return this.fetchWithRetry<FinnhubQuote>('/quote', symbol, { symbol }, { signal });
  }

  async fetchProfile(symbol: string, signal?: AbortSignal): Promise<FinnhubProfile> {
    return this.fetchWithRetry<FinnhubProfile>('/stock/profile2', symbol, { symbol }, { signal });
  }

  async fetchMetrics(symbol: string, signal?: AbortSignal): Promise<FinnhubMetric> {
    return this.fetchWithRetry<FinnhubMetric>(
      '/stock/metric',
      symbol,
      { symbol, metric: 'all' },
      { signal }
    );
  }

  async fetchCandles(
    symbol: string,
    from: number,
    to: number,
    signal?: AbortSignal,
    resolution: string = 'D'
  ): Promise<FinnhubCandle> {
    return this.fetchWithRetry<FinnhubCandle>(
      '/stock/candle',
      symbol,
      { symbol, resolution, from, to },
      { signal }
    );
  }

  async fetchCompanyNews(
    symbol: string,
    from: string,
    to: string,
    signal?: AbortSignal
  ): Promise<FinnhubNewsItem[]> {
    return this.fetchWithRetry<FinnhubNewsItem[]>(
      '/company-news',
      symbol,
      { symbol, from, to },
      { signal }
    );
  }
}
