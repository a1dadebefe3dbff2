/**
 * Portfolio-level scores and summary
 *
 * Diversification: 100 × (0.6 × (1 − largest weight) + 0.4 × (1 − HHI))
 * over valued holdings grouped by symbol. The largest position dominates
 * the penalty; the Herfindahl term rewards breadth and evenness.
 *
 * Risk: valuation-weighted mean volatility, scaled so that the configured
 * ceiling maps to 100.
 */

import type { ScoringConfig } from '@/core/config';
import { valueOrNull } from './indicators';
import { clamp, linearScale, roundScore, weightedMean } from './normalize';
import type {
  HoldingAnalysis,
  PortfolioScores,
  PortfolioSummary,
  SentimentLabel,
} from '@/types/analysis';

const MAX_WEIGHT_SHARE = 0.6;
const HHI_SHARE = 0.4;

function valuedHoldings(holdings: HoldingAnalysis[]): Array<HoldingAnalysis & { valuation: number }> {
  return holdings.filter(
    (h): h is HoldingAnalysis & { valuation: number } =>
      h.status === 'ok' && h.valuation !== null && h.valuation > 0
  );
}

export function totalValuation(holdings: HoldingAnalysis[]): number {
  return valuedHoldings(holdings).reduce((sum, h) => sum + h.valuation, 0);
}

/** Share of total known valuation per holding, null for holdings without one. */
export function computeWeights(holdings: HoldingAnalysis[]): Array<number | null> {
  const total = totalValuation(holdings);
  return holdings.map((h) =>
    total > 0 && h.status === 'ok' && h.valuation !== null && h.valuation > 0
      ? h.valuation / total
      : null
  );
}

export function diversificationScore(holdings: HoldingAnalysis[]): number {
  const bySymbol = new Map<string, number>();
  for (const h of valuedHoldings(holdings)) {
    bySymbol.set(h.holding.symbol, (bySymbol.get(h.holding.symbol) ?? 0) + h.valuation);
  }

  const total = [...bySymbol.values()].reduce((sum, v) => sum + v, 0);
  if (total <= 0) return 0;

  let maxWeight = 0;
  let hhi = 0;
  for (const value of bySymbol.values()) {
    const weight = value / total;
    maxWeight = Math.max(maxWeight, weight);
    hhi += weight * weight;
  }

  const raw = 100 * (MAX_WEIGHT_SHARE * (1 - maxWeight) + HHI_SHARE * (1 - hhi));
  return roundScore(clamp(raw));
}

/** Holdings without a volatility are left out rather than counted as riskless. */
export function riskScore(holdings: HoldingAnalysis[], config: ScoringConfig): number | null {
  const entries = valuedHoldings(holdings).flatMap((h) => {
    const vol = h.indicators ? valueOrNull(h.indicators.volatility) : null;
    return vol === null ? [] : [{ value: vol, weight: h.valuation }];
  });

  const mean = weightedMean(entries);
  if (mean === null) return null;
  return roundScore(linearScale(mean, 0, config.riskVolatilityCeiling));
}

/**
 * Majority vote on momentum direction. Holdings without momentum do not
 * vote; with no votes the label is neutral.
 */
export function heuristicSentiment(holdings: HoldingAnalysis[]): SentimentLabel {
  let positive = 0;
  let negative = 0;
  let voters = 0;

  for (const h of holdings) {
    if (h.status !== 'ok' || !h.indicators) continue;
    const change = valueOrNull(h.indicators.momentum);
    if (change === null) continue;
    voters++;
    if (change > 0) positive++;
    else if (change < 0) negative++;
  }

  if (voters === 0) return 'neutral';
  if (positive > voters / 2) return 'bullish';
  if (negative > voters / 2) return 'bearish';
  return 'neutral';
}

export function computePortfolioScores(
  holdings: HoldingAnalysis[],
  config: ScoringConfig,
  insightSentiment: SentimentLabel | null = null
): PortfolioScores {
  return {
    diversification: diversificationScore(holdings),
    risk: riskScore(holdings, config),
    sentiment: insightSentiment ?? heuristicSentiment(holdings),
    sentimentSource: insightSentiment ? 'insight' : 'heuristic',
  };
}

export function summarizePortfolio(holdings: HoldingAnalysis[]): PortfolioSummary {
  const totalValue = totalValuation(holdings);
  let totalCost = 0;
  let costedValue = 0;
  let costedCount = 0;
  const sectorValues = new Map<string, number>();

  for (const h of valuedHoldings(holdings)) {
    if (h.costTotal !== null) {
      totalCost += h.costTotal;
      costedValue += h.valuation;
      costedCount += 1;
    }
    const sector = h.quote?.sector ?? 'Unknown';
    sectorValues.set(sector, (sectorValues.get(sector) ?? 0) + h.valuation);
  }

  const sectorAllocation: Record<string, number> = {};
  if (totalValue > 0) {
    for (const [sector, value] of sectorValues) {
      sectorAllocation[sector] = roundScore((value / totalValue) * 100, 2);
    }
  }

  // Only holdings with a known cost contribute to gain/loss.
  const totalGainLoss = costedCount > 0 ? costedValue - totalCost : null;

  return {
    totalValue,
    totalCost,
    totalGainLoss,
    totalGainLossPercent:
      totalGainLoss !== null && totalCost > 0 ? (totalGainLoss / totalCost) * 100 : null,
    holdingCount: holdings.length,
    degradedCount: holdings.filter((h) => h.status === 'degraded').length,
    sectorAllocation,
  };
}
