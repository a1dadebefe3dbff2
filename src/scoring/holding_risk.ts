/**
 * Per-holding risk classification from technical indicators
 * Based on: volatility, RSI extremes, trend vs. longest moving average, momentum drawdown
 */

import { valueOrNull } from './indicators';
import type { HoldingRisk, IndicatorSet, RiskLevel } from '@/types/analysis';

export function assessHoldingRisk(indicators: IndicatorSet): HoldingRisk {
  const factors: string[] = [];
  let points = 0;

  const vol = valueOrNull(indicators.volatility);
  if (vol !== null) {
    if (vol > 50) {
      factors.push(`High volatility (${vol.toFixed(1)}%)`);
      points += 2;
    } else if (vol > 30) {
      factors.push(`Moderate volatility (${vol.toFixed(1)}%)`);
      points += 1;
    }
  }

  const rsi = valueOrNull(indicators.rsi);
  if (rsi !== null) {
    if (rsi > 70) {
      factors.push(`Overbought (RSI: ${rsi.toFixed(1)})`);
      points += 1;
    } else if (rsi < 30) {
      factors.push(`Oversold (RSI: ${rsi.toFixed(1)})`);
      points += 1;
    }
  }

  // Trend: compare against the longest configured average
  const longest = indicators.movingAverages.reduce<IndicatorSet['movingAverages'][number] | null>(
    (acc, ma) => (acc === null || ma.window > acc.window ? ma : acc),
    null
  );
  if (longest && longest.priceAbove === false) {
    factors.push(`Below ${longest.window}-day moving average`);
    points += 1;
  }

  const change = valueOrNull(indicators.momentum);
  if (change !== null && change < -10) {
    factors.push(`Significant decline over lookback (${change.toFixed(1)}%)`);
    points += 1;
  }

  return { level: riskLevelFromPoints(points), factors };
}

export function riskLevelFromPoints(points: number): RiskLevel {
  if (points >= 4) return 'very_high';
  if (points >= 3) return 'high';
  if (points >= 2) return 'medium';
  return 'low';
}
