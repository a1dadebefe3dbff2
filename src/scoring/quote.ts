/**
 * Single-symbol lookup: quote plus indicators, through the same cache as a
 * portfolio run.
 */

import type { AnalysisConfig } from '@/core/config';
import type { AnalysisCache } from '@/data/cache';
import type { MarketDataGateway } from '@/providers/types';
import type { IndicatorSet, Quote } from '@/types/analysis';
import { createRequestStats, fetchSymbolDataWithCache, type RequestStats } from './fetch';
import { computeIndicators } from './indicators';

export interface SymbolLookup {
  quote: Quote;
  indicators: IndicatorSet;
  fromCache: boolean;
  stats: RequestStats;
}

export interface LookupDependencies {
  marketData: MarketDataGateway;
  cache: AnalysisCache;
  config: AnalysisConfig;
}

/** Throws the gateway's ProviderError when the symbol cannot be priced. */
export async function lookupSymbol(
  rawSymbol: string,
  deps: LookupDependencies,
  signal?: AbortSignal
): Promise<SymbolLookup> {
  const symbol = rawSymbol.trim().toUpperCase();
  if (!symbol) {
    throw new RangeError('symbol must be non-empty');
  }

  const stats = createRequestStats();
  const data = await fetchSymbolDataWithCache(symbol, {
    marketData: deps.marketData,
    cache: deps.cache,
    historyDays: deps.config.fetch.historyDays,
    gatewayTimeoutMs: deps.config.fetch.gatewayTimeoutMs,
    stats,
    signal,
  });

  return {
    quote: data.quote,
    indicators: computeIndicators(data.series, deps.config.indicators),
    fromCache: data.fromCache,
    stats,
  };
}
