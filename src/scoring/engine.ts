/**
 * Analysis orchestrator
 *
 * Phases: initialized → fetching_market_data → computing_indicators →
 * computing_scores → fetching_insights → assembled, or cancelled when the
 * run signal aborts. Only invalid input aborts a run; gateway failures
 * degrade a single holding and insight failures drop the commentary.
 * Per-holding headlines are gathered at the start of the insight phase.
 */

import type { AnalysisConfig } from '@/core/config';
import { getRunId } from '@/core/time';
import type { AnalysisCache } from '@/data/cache';
import { validateHoldings, type HoldingInput } from '@/data/portfolio';
import type { InsightGateway } from '@/llm/types';
import type { MarketDataGateway, NewsSource } from '@/providers/types';
import type {
  Analysis,
  AnalysisOutcome,
  Holding,
  HoldingAnalysis,
  InsightStatus,
  InsightSummary,
  PortfolioScores,
  RunPhase,
} from '@/types/analysis';
import { runWithConcurrency } from '@/utils/concurrency';
import { withDeadline } from '@/utils/deadline';
import { contentHash } from '@/utils/hash';
import { createChildLogger } from '@/utils/logger';
import {
  createRequestStats,
  describeFailure,
  fetchSymbolDataWithCache,
  type SymbolMarketData,
} from './fetch';
import { assessHoldingRisk } from './holding_risk';
import { computeIndicators } from './indicators';
import { collectHoldingNews } from './news';
import { computePortfolioScores, computeWeights, summarizePortfolio } from './portfolio_scores';

const logger = createChildLogger('engine');

export interface AnalysisDependencies {
  marketData: MarketDataGateway;
  /** null or absent skips per-holding headlines */
  news?: NewsSource | null;
  /** null disables the insight phase */
  insights: InsightGateway | null;
  cache: AnalysisCache;
  config: AnalysisConfig;
  now?: () => Date;
}

export interface AnalyzeOptions {
  noAi?: boolean;
  signal?: AbortSignal;
  onPhase?: (phase: RunPhase) => void;
}

type FetchOutcome =
  | { ok: true; data: SymbolMarketData }
  | { ok: false; reason: string };

function degradedHolding(holding: Holding, reason: string): HoldingAnalysis {
  return {
    holding,
    status: 'degraded',
    quote: null,
    indicators: null,
    valuation: null,
    costTotal: null,
    gainLoss: null,
    gainLossPercent: null,
    weight: null,
    risk: null,
    news: null,
    degradedReason: reason,
    fromCache: false,
  };
}

export function analyzeHolding(
  holding: Holding,
  data: SymbolMarketData,
  config: AnalysisConfig
): HoldingAnalysis {
  const indicators = computeIndicators(data.series, config.indicators);
  const valuation = holding.shares * data.quote.price;
  const costTotal = holding.costBasis === null ? null : holding.shares * holding.costBasis;
  const gainLoss = costTotal === null ? null : valuation - costTotal;
  const gainLossPercent =
    gainLoss === null || costTotal === null || costTotal === 0 ? null : (gainLoss / costTotal) * 100;

  return {
    holding,
    status: 'ok',
    quote: data.quote,
    indicators,
    valuation,
    costTotal,
    gainLoss,
    gainLossPercent,
    weight: null,
    risk: assessHoldingRisk(indicators),
    news: null,
    degradedReason: null,
    fromCache: data.fromCache,
  };
}

export async function analyzePortfolio(
  input: ReadonlyArray<HoldingInput>,
  deps: AnalysisDependencies,
  options: AnalyzeOptions = {}
): Promise<AnalysisOutcome> {
  const holdings = validateHoldings(input);
  const { config, cache, marketData } = deps;
  const { signal } = options;
  const now = deps.now ?? (() => new Date());

  let phase: RunPhase = 'initialized';
  const enter = (next: RunPhase) => {
    phase = next;
    logger.info({ phase, holdings: holdings.length }, 'Analysis phase');
    options.onPhase?.(next);
  };
  const cancelled = (): AnalysisOutcome => {
    const at = phase;
    logger.warn({ phase: at }, 'Analysis cancelled');
    options.onPhase?.('cancelled');
    return { status: 'cancelled', phase: at };
  };

  enter('initialized');
  if (signal?.aborted) return cancelled();

  // Fetching market data
  enter('fetching_market_data');
  const stats = createRequestStats();
  const inFlight = new Map<string, Promise<FetchOutcome>>();

  const fetchOnce = (symbol: string): Promise<FetchOutcome> => {
    let pending = inFlight.get(symbol);
    if (!pending) {
      pending = fetchSymbolDataWithCache(symbol, {
        marketData,
        cache,
        historyDays: config.fetch.historyDays,
        gatewayTimeoutMs: config.fetch.gatewayTimeoutMs,
        stats,
        signal,
      }).then(
        (data): FetchOutcome => ({ ok: true, data }),
        (error: unknown): FetchOutcome => {
          const reason = describeFailure(error);
          if (!signal?.aborted) {
            logger.warn({ symbol, error: reason }, 'Market data unavailable, holding degraded');
          }
          return { ok: false, reason };
        }
      );
      inFlight.set(symbol, pending);
    }
    return pending;
  };

  const fetched = await runWithConcurrency(
    holdings,
    (holding) => fetchOnce(holding.symbol),
    config.fetch.maxConcurrency
  );
  if (signal?.aborted) return cancelled();

  // Computing indicators
  enter('computing_indicators');
  const analyses = holdings.map((holding, i) => {
    const outcome = fetched[i];
    if (!outcome.ok) return degradedHolding(holding, outcome.reason);
    try {
      return analyzeHolding(holding, outcome.data, config);
    } catch (error) {
      logger.warn({ symbol: holding.symbol, error: describeFailure(error) }, 'Indicator computation failed');
      return degradedHolding(holding, describeFailure(error));
    }
  });
  if (signal?.aborted) return cancelled();

  // Computing scores
  enter('computing_scores');
  const weights = computeWeights(analyses);
  const weighted = analyses.map((a, i) => ({ ...a, weight: weights[i] }));
  const summary = summarizePortfolio(weighted);
  let scores: PortfolioScores = computePortfolioScores(weighted, config.scoring);
  if (signal?.aborted) return cancelled();

  // Fetching insights
  enter('fetching_insights');
  const gateway = options.noAi ? null : deps.insights;
  let analyzed = weighted;

  if (deps.news && config.insight.newsCount > 0) {
    const news = await collectHoldingNews(
      weighted.filter((a) => a.status === 'ok').map((a) => a.holding.symbol),
      {
        news: deps.news,
        rater: gateway,
        limit: config.insight.newsCount,
        maxConcurrency: config.fetch.maxConcurrency,
        ratingTimeoutMs: config.insight.timeoutMs,
        cache,
        gatewayTimeoutMs: config.fetch.gatewayTimeoutMs,
        stats,
        signal,
      }
    );
    if (signal?.aborted) return cancelled();
    analyzed = weighted.map((a) => ({ ...a, news: news.get(a.holding.symbol) ?? null }));
  }

  let insight: InsightSummary | null = null;
  let insightStatus: InsightStatus = 'skipped';

  if (gateway) {
    try {
      insight = await withDeadline(
        (insightSignal) => gateway.summarize(analyzed, { signal: insightSignal }),
        config.insight.timeoutMs,
        signal
      );
      insightStatus = 'included';
      if (gateway.modelBacked) {
        scores = { ...scores, sentiment: insight.sentimentLabel, sentimentSource: 'insight' };
      }
    } catch (error) {
      if (signal?.aborted) return cancelled();
      logger.warn({ provider: gateway.name, error: describeFailure(error) }, 'Insight unavailable');
      insightStatus = 'unavailable';
    }
  }
  if (signal?.aborted) return cancelled();

  const generatedAt = now();
  const analysis: Analysis = {
    runId: getRunId(generatedAt, contentHash({ holdings, generatedAt: generatedAt.toISOString() })),
    generatedAt: generatedAt.toISOString(),
    holdings: analyzed,
    summary,
    scores,
    insight,
    insightStatus,
    stats: {
      ...stats,
      failedSymbols: [...new Set(analyzed.filter((a) => a.status === 'degraded').map((a) => a.holding.symbol))],
    },
  };

  enter('assembled');
  return { status: 'assembled', analysis };
}
