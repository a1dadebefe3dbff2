import { addDays } from 'date-fns';
import { formatDate } from '@/core/time';
import { sleep } from '@/providers/finnhub/rate_limiter';
import type {
  GatewayCallOptions,
  Headline,
  MarketDataGateway,
  NewsSource,
  PriceSeries,
  Quote,
} from '@/providers/types';
import type { HoldingAnalysis, IndicatorValue } from '@/types/analysis';

export function makeSeries(closes: number[], start: string = '2024-01-01'): PriceSeries {
  const base = new Date(`${start}T12:00:00Z`);
  return closes.map((close, i) => ({ date: formatDate(addDays(base, i)), close }));
}

export function makeQuote(symbol: string, price: number, sector: string | null = 'Technology'): Quote {
  return {
    symbol,
    price,
    name: `${symbol} Inc`,
    sector,
    industry: sector,
    marketCap: null,
    peRatio: null,
    dividendYield: null,
    week52High: null,
    week52Low: null,
    asOf: '2024-06-03T20:00:00.000Z',
  };
}

export function makeHeadline(symbol: string, title: string, publishedAt = '2024-06-03T12:00:00.000Z'): Headline {
  return {
    symbol,
    title,
    summary: null,
    source: 'Wire',
    url: `https://news.test/${symbol.toLowerCase()}`,
    publishedAt,
  };
}

export interface FakeSymbol {
  price: number;
  closes?: number[];
  sector?: string | null;
  delayMs?: number;
  error?: Error;
  /** never settles unless the call's signal aborts */
  hang?: boolean;
  newsError?: Error;
}

/** In-process market data gateway that records every call. */
export class FakeMarketDataGateway implements MarketDataGateway, NewsSource {
  readonly name = 'fake';
  quoteCalls: string[] = [];
  historyCalls: string[] = [];
  headlineCalls: string[] = [];
  closed = false;

  constructor(
    private symbols: Record<string, FakeSymbol>,
    private headlines: Record<string, Headline[]> = {}
  ) {}

  private async settle(symbol: string, options: GatewayCallOptions): Promise<FakeSymbol> {
    const entry = this.symbols[symbol];
    if (!entry) throw new Error(`Unknown symbol ${symbol}`);
    if (entry.hang) {
      await new Promise<never>((_, reject) => {
        options.signal?.addEventListener('abort', () => reject(new Error('aborted')), { once: true });
      });
    }
    if (entry.delayMs) await sleep(entry.delayMs, options.signal);
    if (entry.error) throw entry.error;
    return entry;
  }

  async getQuote(symbol: string, options: GatewayCallOptions = {}): Promise<Quote> {
    this.quoteCalls.push(symbol);
    const entry = await this.settle(symbol, options);
    return makeQuote(symbol, entry.price, entry.sector === undefined ? 'Technology' : entry.sector);
  }

  async getHistory(symbol: string, _days: number, options: GatewayCallOptions = {}): Promise<PriceSeries> {
    this.historyCalls.push(symbol);
    const entry = await this.settle(symbol, options);
    return makeSeries(entry.closes ?? [entry.price * 0.9, entry.price * 0.95, entry.price]);
  }

  async getHeadlines(symbol: string, limit: number): Promise<Headline[]> {
    this.headlineCalls.push(symbol);
    const error = this.symbols[symbol]?.newsError;
    if (error) throw error;
    return (this.headlines[symbol] ?? []).slice(0, limit);
  }

  getRequestCount(): number {
    return this.quoteCalls.length + this.historyCalls.length;
  }

  close(): void {
    this.closed = true;
  }
}

const ok = (value: number): IndicatorValue => ({ status: 'ok', value });
const missing: IndicatorValue = { status: 'insufficient_data', required: 31, available: 3 };

export interface HoldingFixture {
  symbol: string;
  valuation: number | null;
  weight?: number | null;
  momentum?: number | null;
  volatility?: number | null;
  costTotal?: number | null;
  sector?: string | null;
  status?: 'ok' | 'degraded';
  risk?: HoldingAnalysis['risk'];
}

/** Minimal HoldingAnalysis for scoring tests; price is fixed at 100. */
export function makeHoldingAnalysis(f: HoldingFixture): HoldingAnalysis {
  const status = f.status ?? 'ok';
  if (status === 'degraded') {
    return {
      holding: { symbol: f.symbol, shares: 1, costBasis: null },
      status,
      quote: null,
      indicators: null,
      valuation: null,
      costTotal: null,
      gainLoss: null,
      gainLossPercent: null,
      weight: null,
      risk: null,
      news: null,
      degradedReason: 'unavailable: test',
      fromCache: false,
    };
  }

  const valuation = f.valuation;
  const costTotal = f.costTotal ?? null;
  const gainLoss = valuation !== null && costTotal !== null ? valuation - costTotal : null;
  return {
    holding: { symbol: f.symbol, shares: (valuation ?? 0) / 100, costBasis: null },
    status,
    quote: makeQuote(f.symbol, 100, f.sector === undefined ? 'Technology' : f.sector),
    indicators: {
      lastClose: 100,
      observations: 3,
      movingAverages: [],
      priceChanges: [],
      momentum: f.momentum == null ? missing : ok(f.momentum),
      volatility: f.volatility == null ? missing : ok(f.volatility),
      rsi: missing,
    },
    valuation,
    costTotal,
    gainLoss,
    gainLossPercent: gainLoss !== null && costTotal ? (gainLoss / costTotal) * 100 : null,
    weight: f.weight ?? null,
    risk: f.risk ?? { level: 'low', factors: [] },
    news: null,
    degradedReason: null,
    fromCache: false,
  };
}
