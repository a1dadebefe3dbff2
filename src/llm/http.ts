/**
 * JSON POST with retry for vendor insight APIs
 */

import { sleep } from '@/providers/finnhub/rate_limiter';
import { createChildLogger } from '@/utils/logger';
import { InsightError } from './types';

const logger = createChildLogger('llm_http');

export type FetchFn = typeof fetch;

export interface PostJsonOptions {
  provider: string;
  headers: Record<string, string>;
  fetchFn?: FetchFn;
  signal?: AbortSignal;
  maxRetries?: number;
  initialBackoffMs?: number;
}

function isRetryable(status: number): boolean {
  return status === 429 || status >= 500;
}

export async function postJson(url: string, body: unknown, options: PostJsonOptions): Promise<unknown> {
  const {
    provider,
    headers,
    fetchFn = fetch,
    signal,
    maxRetries = 2,
    initialBackoffMs = 1000,
  } = options;

  let lastError: Error | null = null;

  for (let attempt = 0; attempt <= maxRetries; attempt++) {
    if (attempt > 0) {
      const backoffMs = initialBackoffMs * Math.pow(2, attempt - 1);
      logger.warn({ provider, attempt, backoffMs }, 'Retrying insight request');
      try {
        await sleep(backoffMs, signal);
      } catch {
        throw new InsightError('Request aborted', provider);
      }
    }

    let response: Response;
    try {
      response = await fetchFn(url, {
        method: 'POST',
        headers: { 'content-type': 'application/json', ...headers },
        body: JSON.stringify(body),
        signal,
      });
    } catch (error) {
      if (signal?.aborted) {
        throw new InsightError('Request aborted', provider);
      }
      lastError = error instanceof Error ? error : new Error(String(error));
      continue;
    }

    if (!response.ok) {
      lastError = new Error(`${provider} API error: ${response.status} ${response.statusText}`);
      if (isRetryable(response.status)) continue;
      throw new InsightError(lastError.message, provider);
    }

    try {
      return await response.json();
    } catch (error) {
      throw new InsightError(
        `${provider} returned a non-JSON body`,
        provider,
        error instanceof Error ? error : undefined
      );
    }
  }

  throw new InsightError(
    lastError?.message ?? `${provider} request failed after retries`,
    provider,
    lastError ?? undefined
  );
}
