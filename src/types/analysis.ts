/**
 * Data model for a single analysis run.
 *
 * Everything in here is plain data so the Analysis aggregate can be
 * serialized as-is (see schemas/analysis.v1.schema.json).
 */

import type { Headline, Quote } from '@/providers/types';

export type { Headline, PricePoint, PriceSeries, Quote } from '@/providers/types';

export interface Holding {
  symbol: string;
  shares: number;
  /** Average purchase price per share; null when unknown. */
  costBasis: number | null;
}

export type IndicatorValue =
  | { status: 'ok'; value: number }
  | { status: 'insufficient_data'; required: number; available: number };

export interface MovingAverageIndicator {
  window: number;
  value: IndicatorValue;
  /** Whether the last close sits above the average; null when the average is unknown. */
  priceAbove: boolean | null;
}

export interface PriceChangeIndicator {
  /** Sessions back from the last close. */
  window: number;
  value: IndicatorValue;
}

export interface IndicatorSet {
  lastClose: number;
  observations: number;
  movingAverages: MovingAverageIndicator[];
  priceChanges: PriceChangeIndicator[];
  momentum: IndicatorValue;
  volatility: IndicatorValue;
  rsi: IndicatorValue;
}

export type RiskLevel = 'low' | 'medium' | 'high' | 'very_high';

export interface HoldingRisk {
  level: RiskLevel;
  factors: string[];
}

export type HoldingStatus = 'ok' | 'degraded';

export type SentimentLabel = 'bearish' | 'neutral' | 'bullish';

export interface NewsArticle extends Headline {
  /** null when no model rated the article. */
  sentiment: SentimentLabel | null;
  reasoning: string | null;
  keyPoints: string[];
}

export interface HoldingNews {
  articles: NewsArticle[];
  sentiment: SentimentLabel | null;
  summary: string | null;
}

export interface HoldingAnalysis {
  holding: Holding;
  status: HoldingStatus;
  quote: Quote | null;
  indicators: IndicatorSet | null;
  valuation: number | null;
  costTotal: number | null;
  gainLoss: number | null;
  gainLossPercent: number | null;
  weight: number | null;
  risk: HoldingRisk | null;
  /** Recent headlines for the symbol; null when news was not requested or could not be fetched. */
  news: HoldingNews | null;
  degradedReason: string | null;
  fromCache: boolean;
}

export interface PortfolioScores {
  diversification: number;
  risk: number | null;
  sentiment: SentimentLabel;
  sentimentSource: 'insight' | 'heuristic';
}

export interface PortfolioSummary {
  totalValue: number;
  totalCost: number;
  /** null when no valued holding has a cost basis. */
  totalGainLoss: number | null;
  totalGainLossPercent: number | null;
  holdingCount: number;
  degradedCount: number;
  sectorAllocation: Record<string, number>;
}

export interface InsightSummary {
  provider: string;
  model: string;
  commentary: string;
  sentimentLabel: SentimentLabel;
  strengths: string[];
  weaknesses: string[];
  recommendations: string[];
}

export type InsightStatus = 'included' | 'skipped' | 'unavailable';

export interface RunStats {
  cacheHits: number;
  cacheMisses: number;
  gatewayCalls: number;
  failedSymbols: string[];
}

export interface Analysis {
  runId: string;
  generatedAt: string;
  holdings: HoldingAnalysis[];
  summary: PortfolioSummary;
  scores: PortfolioScores;
  insight: InsightSummary | null;
  insightStatus: InsightStatus;
  stats: RunStats;
}

export type RunPhase =
  | 'initialized'
  | 'fetching_market_data'
  | 'computing_indicators'
  | 'computing_scores'
  | 'fetching_insights'
  | 'assembled'
  | 'cancelled';

export type AnalysisOutcome =
  | { status: 'assembled'; analysis: Analysis }
  | { status: 'cancelled'; phase: RunPhase };
