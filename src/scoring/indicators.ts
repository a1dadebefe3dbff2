/**
 * Technical indicators over a daily close series.
 *
 * Every function is pure. When the series is shorter than a window
 * requires, the result is an explicit insufficient_data value rather than
 * an average over fewer points.
 */

import type { IndicatorConfig } from '@/core/config';
import type {
  IndicatorSet,
  IndicatorValue,
  MovingAverageIndicator,
  PriceSeries,
} from '@/types/analysis';

export function ok(value: number): IndicatorValue {
  return { status: 'ok', value };
}

export function insufficient(required: number, available: number): IndicatorValue {
  return { status: 'insufficient_data', required, available };
}

export function valueOrNull(indicator: IndicatorValue): number | null {
  return indicator.status === 'ok' ? indicator.value : null;
}

function closes(series: PriceSeries): number[] {
  return series.map((p) => p.close);
}

function assertWindow(window: number, name: string): void {
  if (!Number.isInteger(window) || window <= 0) {
    throw new RangeError(`${name} must be a positive integer, got ${window}`);
  }
}

export function movingAverage(series: PriceSeries, window: number): IndicatorValue {
  assertWindow(window, 'window');
  if (series.length < window) {
    return insufficient(window, series.length);
  }
  const tail = closes(series).slice(-window);
  return ok(tail.reduce((sum, c) => sum + c, 0) / window);
}

/** Percent change from the close `lookback` periods ago to the last close. */
export function momentum(series: PriceSeries, lookback: number): IndicatorValue {
  assertWindow(lookback, 'lookback');
  const required = lookback + 1;
  if (series.length < required) {
    return insufficient(required, series.length);
  }
  const values = closes(series);
  const last = values[values.length - 1];
  const base = values[values.length - 1 - lookback];
  return ok(((last - base) / base) * 100);
}

export interface VolatilityOptions {
  annualize: boolean;
  tradingDaysPerYear: number;
}

/**
 * Sample standard deviation of the trailing `lookback` period returns, in
 * percent. Needs lookback + 2 closes and a lookback of at least 2.
 */
export function volatility(
  series: PriceSeries,
  lookback: number,
  options: VolatilityOptions = { annualize: true, tradingDaysPerYear: 252 }
): IndicatorValue {
  assertWindow(lookback, 'lookback');
  if (lookback < 2) {
    throw new RangeError(`lookback must be at least 2, got ${lookback}`);
  }
  const required = lookback + 2;
  if (series.length < required) {
    return insufficient(required, series.length);
  }

  const values = closes(series).slice(-(lookback + 1));
  const returns: number[] = [];
  for (let i = 1; i < values.length; i++) {
    returns.push((values[i] - values[i - 1]) / values[i - 1]);
  }

  const mean = returns.reduce((sum, r) => sum + r, 0) / returns.length;
  const variance = returns.reduce((sum, r) => sum + (r - mean) ** 2, 0) / (returns.length - 1);
  const std = Math.sqrt(variance);
  const scale = options.annualize ? Math.sqrt(options.tradingDaysPerYear) : 1;

  return ok(std * scale * 100);
}

/**
 * Relative strength index using simple averages of gains and losses over
 * the last `period` deltas.
 */
export function rsi(series: PriceSeries, period: number): IndicatorValue {
  assertWindow(period, 'period');
  const required = period + 1;
  if (series.length < required) {
    return insufficient(required, series.length);
  }

  const values = closes(series).slice(-required);
  let gains = 0;
  let losses = 0;
  for (let i = 1; i < values.length; i++) {
    const delta = values[i] - values[i - 1];
    if (delta > 0) gains += delta;
    else losses -= delta;
  }

  if (losses === 0) return ok(100);
  if (gains === 0) return ok(0);

  const rs = gains / period / (losses / period);
  const value = 100 - 100 / (1 + rs);
  return ok(Math.min(100, Math.max(0, value)));
}

export function computeIndicators(series: PriceSeries, config: IndicatorConfig): IndicatorSet {
  if (series.length === 0) {
    throw new RangeError('Cannot compute indicators for an empty series');
  }

  const lastClose = series[series.length - 1].close;
  const movingAverages: MovingAverageIndicator[] = config.movingAverageWindows.map((window) => {
    const value = movingAverage(series, window);
    return {
      window,
      value,
      priceAbove: value.status === 'ok' ? lastClose > value.value : null,
    };
  });

  return {
    lastClose,
    observations: series.length,
    movingAverages,
    priceChanges: config.priceChangeWindows.map((window) => ({
      window,
      value: momentum(series, window),
    })),
    momentum: momentum(series, config.momentumLookback),
    volatility: volatility(series, config.volatilityLookback, {
      annualize: config.annualizeVolatility,
      tradingDaysPerYear: config.tradingDaysPerYear,
    }),
    rsi: rsi(series, config.rsiPeriod),
  };
}
