/**
 * Deterministic insight text built from the computed figures.
 * Used when INSIGHT_PROVIDER=template; never calls out of process.
 */

import { valueOrNull } from '@/scoring/indicators';
import { diversificationScore, heuristicSentiment, totalValuation } from '@/scoring/portfolio_scores';
import type { HoldingAnalysis, InsightSummary } from '@/types/analysis';
import { MAX_LIST_ITEMS } from './guardrails';
import { InsightError, type InsightCallOptions, type InsightGateway } from './types';

const CONCENTRATION_THRESHOLD = 0.4;
const BROAD_DIVERSIFICATION = 60;

function pct(value: number): string {
  return `${value.toFixed(1)}%`;
}

function largestPosition(holdings: HoldingAnalysis[]): HoldingAnalysis | null {
  return holdings.reduce<HoldingAnalysis | null>(
    (best, h) => (h.weight !== null && (best === null || h.weight > (best.weight ?? 0)) ? h : best),
    null
  );
}

export class TemplateInsightGateway implements InsightGateway {
  readonly name = 'template';
  readonly model = 'template-v1';
  readonly modelBacked = false;

  async summarize(holdings: HoldingAnalysis[], options: InsightCallOptions = {}): Promise<InsightSummary> {
    if (options.signal?.aborted) {
      throw new InsightError('Request aborted', this.name);
    }

    const priced = holdings.filter((h) => h.status === 'ok');
    const degraded = holdings.length - priced.length;
    const sentiment = heuristicSentiment(holdings);
    const diversification = diversificationScore(holdings);
    const largest = largestPosition(priced);

    const commentary = [
      `${holdings.length} holdings valued at ${totalValuation(holdings).toFixed(2)}.`,
      largest?.weight != null
        ? `Largest position is ${largest.holding.symbol} at ${pct(largest.weight * 100)} of value.`
        : null,
      `Diversification score ${diversification.toFixed(1)}/100; momentum reads ${sentiment}.`,
      degraded > 0 ? `${degraded} holding(s) could not be priced.` : null,
    ]
      .filter((line): line is string => line !== null)
      .join(' ');

    const strengths: string[] = [];
    const weaknesses: string[] = [];
    const recommendations: string[] = [];

    const byMomentum = priced
      .map((h) => ({ h, change: h.indicators ? valueOrNull(h.indicators.momentum) : null }))
      .filter((e): e is { h: HoldingAnalysis; change: number } => e.change !== null)
      .sort((a, b) => b.change - a.change || a.h.holding.symbol.localeCompare(b.h.holding.symbol));

    for (const { h, change } of byMomentum) {
      if (change > 0) strengths.push(`${h.holding.symbol} up ${pct(change)} over the lookback`);
    }
    if (diversification >= BROAD_DIVERSIFICATION) {
      strengths.push(`Broad diversification (score ${diversification.toFixed(1)})`);
    }

    for (const h of priced) {
      if (h.risk && (h.risk.level === 'high' || h.risk.level === 'very_high')) {
        const reason = h.risk.factors[0] ? ` (${h.risk.factors[0]})` : '';
        weaknesses.push(`${h.holding.symbol}: ${h.risk.level.replace('_', ' ')} risk${reason}`);
        recommendations.push(`Review position sizing in ${h.holding.symbol}`);
      }
    }
    if (largest?.weight != null && largest.weight > CONCENTRATION_THRESHOLD) {
      weaknesses.push(`Concentrated in ${largest.holding.symbol} (${pct(largest.weight * 100)})`);
      recommendations.push(`Consider trimming ${largest.holding.symbol} to reduce concentration`);
    }
    if (degraded > 0) {
      weaknesses.push(`Market data unavailable for ${degraded} holding(s)`);
    }
    if (recommendations.length === 0) {
      recommendations.push('Maintain current allocation and review periodically');
    }

    return {
      provider: this.name,
      model: this.model,
      commentary,
      sentimentLabel: sentiment,
      strengths: strengths.slice(0, MAX_LIST_ITEMS),
      weaknesses: weaknesses.slice(0, MAX_LIST_ITEMS),
      recommendations: recommendations.slice(0, MAX_LIST_ITEMS),
    };
  }
}
