import { formatDate, historyRange, unixToDate } from '@/core/time';
import { subDays } from 'date-fns';
import { createChildLogger } from '@/utils/logger';
import {
  normalizePriceSeries,
  ProviderError,
  type GatewayCallOptions,
  type Headline,
  type MarketDataGateway,
  type NewsSource,
  type PriceSeries,
  type Quote,
} from '../types';
import type { FinnhubClient } from './client';
import type { FinnhubMetric } from './types';

const logger = createChildLogger('finnhub_gateway');

function finiteOrNull(value: number | undefined): number | null {
  return value !== undefined && Number.isFinite(value) ? value : null;
}

/** Finnhub reports zero for ratios it cannot compute. */
function positiveOrNull(value: number | undefined): number | null {
  const n = finiteOrNull(value);
  return n !== null && n > 0 ? n : null;
}

export class FinnhubMarketDataGateway implements MarketDataGateway, NewsSource {
  readonly name = 'finnhub';
  private client: FinnhubClient;

  constructor(client: FinnhubClient) {
    this.client = client;
  }

  async getQuote(symbol: string, options: GatewayCallOptions = {}): Promise<Quote> {
    const [quote, profile, metrics] = await Promise.all([
      this.client.fetchQuote(symbol, options.signal),
      // Profile and metrics are descriptive; failing either must not fail the quote.
      this.client.fetchProfile(symbol, options.signal).catch((error: unknown) => {
        logger.debug({ symbol, error }, 'Profile lookup failed, continuing without name');
        return null;
      }),
      this.client.fetchMetrics(symbol, options.signal).catch((error: unknown): FinnhubMetric => {
        logger.debug({ symbol, error }, 'Metric lookup failed, continuing without fundamentals');
        return {};
      }),
    ]);

    // Finnhub answers unknown symbols with an all-zero quote.
    if (!Number.isFinite(quote.c) || quote.c <= 0) {
      throw new ProviderError('No current price returned', this.name, symbol, 'getQuote', 'no_data');
    }

    const m = metrics.metric ?? {};
    const marketCapMillions = positiveOrNull(profile?.marketCapitalization);

    return {
      symbol,
      price: quote.c,
      name: profile?.name || null,
      // finnhubIndustry is the only classification Finnhub exposes; it serves as both.
      sector: profile?.finnhubIndustry || null,
      industry: profile?.finnhubIndustry || null,
      marketCap: marketCapMillions === null ? null : marketCapMillions * 1_000_000,
      peRatio: positiveOrNull(m.peExclExtraTTM ?? m.peBasicExclExtraTTM),
      dividendYield: finiteOrNull(m.dividendYieldIndicatedAnnual),
      week52High: positiveOrNull(m['52WeekHigh']),
      week52Low: positiveOrNull(m['52WeekLow']),
      asOf: new Date((quote.t || Date.now() / 1000) * 1000).toISOString(),
    };
  }

  async getHistory(
    symbol: string,
    days: number,
    options: GatewayCallOptions = {}
  ): Promise<PriceSeries> {
    const { from, to } = historyRange(days);
    const candles = await this.client.fetchCandles(symbol, from, to, options.signal);

    if (candles.s !== 'ok' || !candles.c || !candles.t) {
      throw new ProviderError(
        `Candle status ${candles.s}`,
        this.name,
        symbol,
        'getHistory',
        'no_data'
      );
    }

    const timestamps = candles.t;
    const series = normalizePriceSeries(
      candles.c.map((close, i) => ({ date: unixToDate(timestamps[i] ?? 0), close }))
    );

    if (series.length === 0) {
      throw new ProviderError('Empty price history', this.name, symbol, 'getHistory', 'no_data');
    }

    return series;
  }

  async getHeadlines(
    symbol: string,
    limit: number,
    options: GatewayCallOptions = {}
  ): Promise<Headline[]> {
    if (limit <= 0) return [];
    const now = new Date();
    const items = await this.client.fetchCompanyNews(
      symbol,
      formatDate(subDays(now, 7)),
      formatDate(now),
      options.signal
    );

    return items
      .filter((item) => item.headline)
      .sort((a, b) => b.datetime - a.datetime)
      .slice(0, limit)
      .map((item) => ({
        symbol,
        title: item.headline,
        summary: item.summary || null,
        source: item.source || 'Unknown',
        url: item.url,
        publishedAt: new Date(item.datetime * 1000).toISOString(),
      }));
  }

  getRequestCount(): number {
    return this.client.getRequestCount();
  }

  close(): void {
    // Finnhub client has no persistent resources to dispose
  }
}
