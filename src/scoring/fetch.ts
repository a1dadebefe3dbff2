/**
 * Cache-wrapped market data retrieval for one symbol
 */

import { AnalysisCache, buildFingerprint } from '@/data/cache';
import {
  ProviderError,
  isHeadlineList,
  isPriceSeries,
  isQuote,
  type Headline,
  type MarketDataGateway,
  type NewsSource,
  type PriceSeries,
  type Quote,
} from '@/providers/types';
import { DeadlineExceededError, withDeadline } from '@/utils/deadline';
import { createChildLogger } from '@/utils/logger';

const logger = createChildLogger('fetch');

export interface RequestStats {
  cacheHits: number;
  cacheMisses: number;
  gatewayCalls: number;
}

export interface GatewayCallContext {
  cache: AnalysisCache;
  gatewayTimeoutMs: number;
  stats: RequestStats;
  signal?: AbortSignal;
}

export interface FetchDependencies extends GatewayCallContext {
  marketData: MarketDataGateway;
  historyDays: number;
}

export interface SymbolMarketData {
  quote: Quote;
  series: PriceSeries;
  /** true when both quote and series came from the cache */
  fromCache: boolean;
}

/** `"<kind>: <message>"` for provider errors, the bare message otherwise. */
export function describeFailure(error: unknown): string {
  if (error instanceof ProviderError) {
    return `${error.kind}: ${error.message}`;
  }
  return error instanceof Error ? error.message : String(error);
}

export function createRequestStats(): RequestStats {
  return { cacheHits: 0, cacheMisses: 0, gatewayCalls: 0 };
}

async function callGateway<T>(
  provider: string,
  symbol: string,
  method: string,
  deps: GatewayCallContext,
  call: (signal: AbortSignal) => Promise<T>
): Promise<T> {
  deps.stats.gatewayCalls += 1;
  try {
    return await withDeadline(call, deps.gatewayTimeoutMs, deps.signal);
  } catch (error) {
    if (error instanceof DeadlineExceededError) {
      throw new ProviderError(error.message, provider, symbol, method, 'timeout', error);
    }
    throw error;
  }
}

async function cachedOrFetch<T>(
  provider: string,
  symbol: string,
  fingerprint: string,
  guard: (value: unknown) => value is T,
  method: string,
  deps: GatewayCallContext,
  call: (signal: AbortSignal) => Promise<T>
): Promise<{ value: T; fromCache: boolean }> {
  const cached = deps.cache.get(fingerprint, guard);
  if (cached !== null) {
    deps.stats.cacheHits += 1;
    return { value: cached, fromCache: true };
  }
  deps.stats.cacheMisses += 1;

  const value = await callGateway(provider, symbol, method, deps, call);

  // A cancelled run leaves the cache as it found it
  if (!deps.signal?.aborted) {
    deps.cache.put(fingerprint, value);
  }
  return { value, fromCache: false };
}

export async function fetchSymbolDataWithCache(
  symbol: string,
  deps: FetchDependencies
): Promise<SymbolMarketData> {
  const { marketData, historyDays } = deps;

  const [quote, series] = await Promise.all([
    cachedOrFetch(
      marketData.name,
      symbol,
      buildFingerprint({ symbol, kind: 'quote', period: null }),
      isQuote,
      'getQuote',
      deps,
      (signal) => marketData.getQuote(symbol, { signal })
    ),
    cachedOrFetch(
      marketData.name,
      symbol,
      buildFingerprint({ symbol, kind: 'history', period: historyDays }),
      isPriceSeries,
      'getHistory',
      deps,
      (signal) => marketData.getHistory(symbol, historyDays, { signal })
    ),
  ]);

  logger.debug(
    { symbol, quoteFromCache: quote.fromCache, historyFromCache: series.fromCache },
    'Market data ready'
  );

  return {
    quote: quote.value,
    series: series.value,
    fromCache: quote.fromCache && series.fromCache,
  };
}

export async function fetchHeadlinesWithCache(
  symbol: string,
  limit: number,
  news: NewsSource,
  deps: GatewayCallContext
): Promise<Headline[]> {
  const { value } = await cachedOrFetch(
    news.name,
    symbol,
    buildFingerprint({ symbol, kind: 'news', period: limit }),
    isHeadlineList,
    'getHeadlines',
    deps,
    (signal) => news.getHeadlines(symbol, limit, { signal })
  );
  return value;
}
