/**
 * Analysis configuration loaded from config/analysis.json with ENV overrides
 */

import { existsSync, readFileSync } from 'fs';
import { isAbsolute, join } from 'path';

export interface CacheConfig {
  enabled: boolean;
  ttlSeconds: number;
}

export interface FetchConfig {
  /** Calendar days of history requested per symbol. */
  historyDays: number;
  maxConcurrency: number;
  gatewayTimeoutMs: number;
}

export interface IndicatorConfig {
  movingAverageWindows: number[];
  /** Lookbacks (in trading sessions) reported as plain percent price changes. */
  priceChangeWindows: number[];
  momentumLookback: number;
  /** At least 2: a sample deviation needs two returns. */
  volatilityLookback: number;
  rsiPeriod: number;
  annualizeVolatility: boolean;
  tradingDaysPerYear: number;
}

export interface InsightConfig {
  newsCount: number;
  timeoutMs: number;
}

export interface ScoringConfig {
  /** Weighted volatility (same unit as the volatility indicator) that maps to a risk score of 100. */
  riskVolatilityCeiling: number;
}

export interface AnalysisConfig {
  cache: CacheConfig;
  fetch: FetchConfig;
  indicators: IndicatorConfig;
  insight: InsightConfig;
  scoring: ScoringConfig;
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

export const DEFAULT_ANALYSIS_CONFIG: AnalysisConfig = {
  cache: { enabled: true, ttlSeconds: 3600 },
  fetch: { historyDays: 365, maxConcurrency: 4, gatewayTimeoutMs: 15_000 },
  indicators: {
    movingAverageWindows: [50, 200],
    priceChangeWindows: [1, 7, 30],
    momentumLookback: 30,
    volatilityLookback: 30,
    rsiPeriod: 14,
    annualizeVolatility: true,
    tradingDaysPerYear: 252,
  },
  insight: { newsCount: 5, timeoutMs: 30_000 },
  scoring: { riskVolatilityCeiling: 60 },
};

type RawSection = Record<string, unknown>;

function isRecord(value: unknown): value is RawSection {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function section(raw: unknown, key: string): RawSection {
  if (!isRecord(raw)) return {};
  const value = raw[key];
  return isRecord(value) ? value : {};
}

function positiveInt(value: unknown, fallback: number, path: string): number {
  if (value === undefined) return fallback;
  if (typeof value !== 'number' || !Number.isInteger(value) || value <= 0) {
    throw new ConfigError(`${path} must be a positive integer`);
  }
  return value;
}

function intAtLeast(value: unknown, fallback: number, min: number, path: string): number {
  const result = positiveInt(value, fallback, path);
  if (result < min) {
    throw new ConfigError(`${path} must be at least ${min}`);
  }
  return result;
}

function nonNegativeInt(value: unknown, fallback: number, path: string): number {
  if (value === undefined) return fallback;
  if (typeof value !== 'number' || !Number.isInteger(value) || value < 0) {
    throw new ConfigError(`${path} must be a non-negative integer`);
  }
  return value;
}

function positiveNumber(value: unknown, fallback: number, path: string): number {
  if (value === undefined) return fallback;
  if (typeof value !== 'number' || !Number.isFinite(value) || value <= 0) {
    throw new ConfigError(`${path} must be a positive number`);
  }
  return value;
}

function bool(value: unknown, fallback: boolean, path: string): boolean {
  if (value === undefined) return fallback;
  if (typeof value !== 'boolean') {
    throw new ConfigError(`${path} must be a boolean`);
  }
  return value;
}

function windows(value: unknown, fallback: number[], path: string): number[] {
  if (value === undefined) return [...fallback];
  if (!Array.isArray(value) || value.length === 0) {
    throw new ConfigError(`${path} must be a non-empty array`);
  }
  const result = value.map((w, i) => positiveInt(w, 0, `${path}[${i}]`));
  return [...new Set(result)].sort((a, b) => a - b);
}

export function normalizeConfig(raw: unknown): AnalysisConfig {
  const defaults = DEFAULT_ANALYSIS_CONFIG;
  const cache = section(raw, 'cache');
  const fetch = section(raw, 'fetch');
  const indicators = section(raw, 'indicators');
  const insight = section(raw, 'insight');
  const scoring = section(raw, 'scoring');

  return {
    cache: {
      enabled: bool(cache.enabled, defaults.cache.enabled, 'cache.enabled'),
      ttlSeconds: nonNegativeInt(cache.ttlSeconds, defaults.cache.ttlSeconds, 'cache.ttlSeconds'),
    },
    fetch: {
      historyDays: positiveInt(fetch.historyDays, defaults.fetch.historyDays, 'fetch.historyDays'),
      maxConcurrency: positiveInt(
        fetch.maxConcurrency,
        defaults.fetch.maxConcurrency,
        'fetch.maxConcurrency'
      ),
      gatewayTimeoutMs: positiveInt(
        fetch.gatewayTimeoutMs,
        defaults.fetch.gatewayTimeoutMs,
        'fetch.gatewayTimeoutMs'
      ),
    },
    indicators: {
      movingAverageWindows: windows(
        indicators.movingAverageWindows,
        defaults.indicators.movingAverageWindows,
        'indicators.movingAverageWindows'
      ),
      priceChangeWindows: windows(
        indicators.priceChangeWindows,
        defaults.indicators.priceChangeWindows,
        'indicators.priceChangeWindows'
      ),
      momentumLookback: positiveInt(
        indicators.momentumLookback,
        defaults.indicators.momentumLookback,
        'indicators.momentumLookback'
      ),
      volatilityLookback: intAtLeast(
        indicators.volatilityLookback,
        defaults.indicators.volatilityLookback,
        2,
        'indicators.volatilityLookback'
      ),
      rsiPeriod: positiveInt(indicators.rsiPeriod, defaults.indicators.rsiPeriod, 'indicators.rsiPeriod'),
      annualizeVolatility: bool(
        indicators.annualizeVolatility,
        defaults.indicators.annualizeVolatility,
        'indicators.annualizeVolatility'
      ),
      tradingDaysPerYear: positiveInt(
        indicators.tradingDaysPerYear,
        defaults.indicators.tradingDaysPerYear,
        'indicators.tradingDaysPerYear'
      ),
    },
    insight: {
      newsCount: nonNegativeInt(insight.newsCount, defaults.insight.newsCount, 'insight.newsCount'),
      timeoutMs: positiveInt(insight.timeoutMs, defaults.insight.timeoutMs, 'insight.timeoutMs'),
    },
    scoring: {
      riskVolatilityCeiling: positiveNumber(
        scoring.riskVolatilityCeiling,
        defaults.scoring.riskVolatilityCeiling,
        'scoring.riskVolatilityCeiling'
      ),
    },
  };
}

function parseBooleanLike(value: string): boolean | null {
  const normalized = value.trim().toLowerCase();
  if (['1', 'true', 'yes', 'y', 'on'].includes(normalized)) return true;
  if (['0', 'false', 'no', 'n', 'off'].includes(normalized)) return false;
  return null;
}

function envInt(name: string, env: NodeJS.ProcessEnv): number | undefined {
  const raw = env[name]?.trim();
  if (!raw) return undefined;
  const parsed = Number(raw);
  if (!Number.isInteger(parsed)) {
    throw new ConfigError(`${name} must be an integer, got "${raw}"`);
  }
  return parsed;
}

/**
 * ENV overrides:
 * - CACHE_ENABLED, CACHE_TTL_SECONDS
 * - HISTORY_DAYS, FETCH_CONCURRENCY, GATEWAY_TIMEOUT_MS
 * - NEWS_COUNT
 */
export function applyEnvOverrides(
  config: AnalysisConfig,
  env: NodeJS.ProcessEnv = process.env
): AnalysisConfig {
  const cacheEnabledRaw = env.CACHE_ENABLED;
  const cacheEnabled = cacheEnabledRaw ? parseBooleanLike(cacheEnabledRaw) : null;

  return normalizeConfig({
    cache: {
      enabled: cacheEnabled ?? config.cache.enabled,
      ttlSeconds: envInt('CACHE_TTL_SECONDS', env) ?? config.cache.ttlSeconds,
    },
    fetch: {
      historyDays: envInt('HISTORY_DAYS', env) ?? config.fetch.historyDays,
      maxConcurrency: envInt('FETCH_CONCURRENCY', env) ?? config.fetch.maxConcurrency,
      gatewayTimeoutMs: envInt('GATEWAY_TIMEOUT_MS', env) ?? config.fetch.gatewayTimeoutMs,
    },
    indicators: config.indicators,
    insight: {
      newsCount: envInt('NEWS_COUNT', env) ?? config.insight.newsCount,
      timeoutMs: config.insight.timeoutMs,
    },
    scoring: config.scoring,
  });
}

function resolveConfigPath(projectRoot: string): string {
  const envPath = process.env.ANALYSIS_CONFIG;
  if (envPath) {
    return isAbsolute(envPath) ? envPath : join(projectRoot, envPath);
  }
  return join(projectRoot, 'config', 'analysis.json');
}

export function loadConfig(projectRoot: string = process.cwd()): AnalysisConfig {
  const configPath = resolveConfigPath(projectRoot);
  let raw: unknown = {};
  if (existsSync(configPath)) {
    try {
      raw = JSON.parse(readFileSync(configPath, 'utf-8'));
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      throw new ConfigError(`Could not parse ${configPath}: ${message}`);
    }
  }

  return applyEnvOverrides(normalizeConfig(raw));
}

let cachedConfig: AnalysisConfig | null = null;

export function getConfig(): AnalysisConfig {
  if (!cachedConfig) {
    cachedConfig = loadConfig();
  }
  return cachedConfig;
}
