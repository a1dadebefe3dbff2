/**
 * Shared types and interfaces for market data providers.
 *
 * Gateways supply the analysis engine with quotes, daily closes and
 * headlines while hiding the underlying source.
 */

export interface PricePoint {
  /** yyyy-MM-dd */
  date: string;
  close: number;
}

/** Ascending by date, no duplicate dates, at least one point. */
export type PriceSeries = PricePoint[];

export interface Quote {
  symbol: string;
  price: number;
  name: string | null;
  sector: string | null;
  industry: string | null;
  /** USD. */
  marketCap: number | null;
  peRatio: number | null;
  /** Indicated annual dividend yield, percent. */
  dividendYield: number | null;
  week52High: number | null;
  week52Low: number | null;
  /** ISO timestamp of the quote. */
  asOf: string;
}

export interface Headline {
  symbol: string;
  title: string;
  summary: string | null;
  source: string;
  url: string;
  publishedAt: string;
}

export interface GatewayCallOptions {
  signal?: AbortSignal;
}

export interface MarketDataGateway {
  readonly name: string;
  getQuote(symbol: string, options?: GatewayCallOptions): Promise<Quote>;
  getHistory(symbol: string, days: number, options?: GatewayCallOptions): Promise<PriceSeries>;
  getRequestCount(): number;
  close(): void;
}

export interface NewsSource {
  readonly name: string;
  /** Most recent first, at most `limit`. */
  getHeadlines(symbol: string, limit: number, options?: GatewayCallOptions): Promise<Headline[]>;
}

export type ProviderType = 'finnhub';

export type ProviderErrorKind = 'unavailable' | 'timeout' | 'no_data' | 'invalid_response';

export class ProviderError extends Error {
  constructor(
    message: string,
    public provider: string,
    public symbol: string,
    public method: string,
    public kind: ProviderErrorKind = 'unavailable',
    public cause?: Error
  ) {
    super(message);
    this.name = 'ProviderError';
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isNullableNumber(value: unknown): boolean {
  return value === null || (typeof value === 'number' && Number.isFinite(value));
}

function isNullableString(value: unknown): boolean {
  return value === null || typeof value === 'string';
}

export function isQuote(value: unknown): value is Quote {
  if (!isRecord(value)) return false;
  const q = value;
  return (
    typeof q.symbol === 'string' &&
    typeof q.price === 'number' &&
    Number.isFinite(q.price) &&
    isNullableString(q.name) &&
    isNullableString(q.sector) &&
    isNullableString(q.industry) &&
    isNullableNumber(q.marketCap) &&
    isNullableNumber(q.peRatio) &&
    isNullableNumber(q.dividendYield) &&
    isNullableNumber(q.week52High) &&
    isNullableNumber(q.week52Low) &&
    typeof q.asOf === 'string'
  );
}

export function isHeadline(value: unknown): value is Headline {
  if (!isRecord(value)) return false;
  return (
    typeof value.symbol === 'string' &&
    typeof value.title === 'string' &&
    isNullableString(value.summary) &&
    typeof value.source === 'string' &&
    typeof value.url === 'string' &&
    typeof value.publishedAt === 'string'
  );
}

export function isHeadlineList(value: unknown): value is Headline[] {
  return Array.isArray(value) && value.every(isHeadline);
}

export function isPriceSeries(value: unknown): value is PriceSeries {
  if (!Array.isArray(value) || value.length === 0) return false;
  let previous = '';
  for (const p of value) {
    if (!isRecord(p)) return false;
    if (typeof p.date !== 'string' || typeof p.close !== 'number' || !Number.isFinite(p.close)) {
      return false;
    }
    if (p.date <= previous) return false;
    previous = p.date;
  }
  return true;
}

/**
 * Sort ascending, keep the last close seen for a date and drop unusable
 * closes. Returns an empty array when nothing is left.
 */
export function normalizePriceSeries(points: PricePoint[]): PriceSeries {
  const byDate = new Map<string, number>();
  for (const point of points) {
    if (!Number.isFinite(point.close) || point.close <= 0) continue;
    byDate.set(point.date, point.close);
  }
  return [...byDate.entries()]
    .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
    .map(([date, close]) => ({ date, close }));
}
