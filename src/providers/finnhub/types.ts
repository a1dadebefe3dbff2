/**
 * Finnhub API response types
 */

export interface FinnhubCandle {
  c?: number[]; // Close prices
  t?: number[]; // Unix timestamps
  s: string; // Status: ok, no_data
}

export interface FinnhubMetric {
  metric?: {
    '52WeekHigh'?: number;
    '52WeekLow'?: number;
    dividendYieldIndicatedAnnual?: number;
    peBasicExclExtraTTM?: number;
    peExclExtraTTM?: number;
  };
}

export interface FinnhubProfile {
  country?: string;
  currency?: string;
  exchange?: string;
  finnhubIndustry?: string;
  marketCapitalization?: number; // Millions
  name?: string;
  ticker?: string;
}

export interface FinnhubQuote {
  c: number; // Current price
  d: number | null; // Change
  dp: number | null; // Percent change
  pc: number; // Previous close
  t: number; // Timestamp
}

export interface FinnhubNewsItem {
  category: string;
  datetime: number; // Unix seconds
  headline: string;
  id: number;
  source: string;
  summary: string;
  url: string;
}
