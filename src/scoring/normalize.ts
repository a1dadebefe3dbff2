/**
 * Score normalization utilities
 * All scores are normalized to 0-100 scale
 */

export function clamp(value: number, min: number = 0, max: number = 100): number {
  if (Number.isNaN(value)) return min;
  return Math.min(Math.max(value, min), max);
}

export function linearScale(
  value: number,
  inputMin: number,
  inputMax: number,
  outputMin: number = 0,
  outputMax: number = 100
): number {
  if (inputMax === inputMin) return (outputMin + outputMax) / 2;

  const normalized = (value - inputMin) / (inputMax - inputMin);
  return clamp(outputMin + normalized * (outputMax - outputMin), outputMin, outputMax);
}

export function roundScore(score: number, decimals: number = 1): number {
  const factor = Math.pow(10, decimals);
  return Math.round(score * factor) / factor;
}

export function weightedMean(entries: Array<{ value: number; weight: number }>): number | null {
  let weightSum = 0;
  let total = 0;
  for (const { value, weight } of entries) {
    if (!Number.isFinite(value) || !Number.isFinite(weight) || weight <= 0) continue;
    weightSum += weight;
    total += value * weight;
  }
  return weightSum > 0 ? total / weightSum : null;
}
