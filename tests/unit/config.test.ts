import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { mkdirSync, mkdtempSync, rmSync, writeFileSync } from 'fs';
import { join } from 'path';
import { tmpdir } from 'os';
import {
  ConfigError,
  DEFAULT_ANALYSIS_CONFIG,
  applyEnvOverrides,
  loadConfig,
  normalizeConfig,
} from '@/core/config';

describe('normalizeConfig', () => {
  it('fills every section from defaults', () => {
    expect(normalizeConfig({})).toEqual(DEFAULT_ANALYSIS_CONFIG);
    expect(normalizeConfig(null)).toEqual(DEFAULT_ANALYSIS_CONFIG);
  });

  it('keeps provided values and defaults the rest of a section', () => {
    const config = normalizeConfig({ fetch: { maxConcurrency: 8 }, scoring: { riskVolatilityCeiling: 45.5 } });
    expect(config.fetch).toEqual({ historyDays: 365, maxConcurrency: 8, gatewayTimeoutMs: 15_000 });
    expect(config.scoring.riskVolatilityCeiling).toBe(45.5);
  });

  it('dedupes and sorts moving average windows', () => {
    const config = normalizeConfig({ indicators: { movingAverageWindows: [200, 20, 50, 20] } });
    expect(config.indicators.movingAverageWindows).toEqual([20, 50, 200]);
  });

  it('dedupes and sorts price change windows', () => {
    const config = normalizeConfig({ indicators: { priceChangeWindows: [30, 1, 7, 1] } });
    expect(config.indicators.priceChangeWindows).toEqual([1, 7, 30]);
  });

  it('accepts the smallest volatility lookback that yields a sample deviation', () => {
    expect(normalizeConfig({ indicators: { volatilityLookback: 2 } }).indicators.volatilityLookback).toBe(2);
  });

  it('allows a zero TTL and zero news count', () => {
    const config = normalizeConfig({ cache: { ttlSeconds: 0 }, insight: { newsCount: 0 } });
    expect(config.cache.ttlSeconds).toBe(0);
    expect(config.insight.newsCount).toBe(0);
  });

  it.each([
    [{ fetch: { maxConcurrency: 0 } }, 'fetch.maxConcurrency must be a positive integer'],
    [{ fetch: { historyDays: 2.5 } }, 'fetch.historyDays must be a positive integer'],
    [{ cache: { enabled: 'yes' } }, 'cache.enabled must be a boolean'],
    [{ cache: { ttlSeconds: -1 } }, 'cache.ttlSeconds must be a non-negative integer'],
    [{ indicators: { movingAverageWindows: [] } }, 'indicators.movingAverageWindows must be a non-empty array'],
    [{ indicators: { movingAverageWindows: [50, 0] } }, 'indicators.movingAverageWindows[1] must be a positive integer'],
    [{ scoring: { riskVolatilityCeiling: 0 } }, 'scoring.riskVolatilityCeiling must be a positive number'],
    [{ indicators: { volatilityLookback: 1 } }, 'indicators.volatilityLookback must be at least 2'],
    [{ indicators: { volatilityLookback: 0 } }, 'indicators.volatilityLookback must be a positive integer'],
    [{ indicators: { priceChangeWindows: [1, -7] } }, 'indicators.priceChangeWindows[1] must be a positive integer'],
  ])('rejects %j', (raw, message) => {
    expect(() => normalizeConfig(raw)).toThrow(new ConfigError(message));
  });
});

describe('applyEnvOverrides', () => {
  it('overrides cache, fetch and news settings from the environment', () => {
    const config = applyEnvOverrides(DEFAULT_ANALYSIS_CONFIG, {
      CACHE_ENABLED: 'off',
      CACHE_TTL_SECONDS: '60',
      FETCH_CONCURRENCY: '2',
      GATEWAY_TIMEOUT_MS: '5000',
      HISTORY_DAYS: '90',
      NEWS_COUNT: '0',
    });

    expect(config.cache).toEqual({ enabled: false, ttlSeconds: 60 });
    expect(config.fetch).toEqual({ historyDays: 90, maxConcurrency: 2, gatewayTimeoutMs: 5000 });
    expect(config.insight.newsCount).toBe(0);
    expect(config.indicators).toEqual(DEFAULT_ANALYSIS_CONFIG.indicators);
  });

  it('ignores an unrecognized CACHE_ENABLED value', () => {
    expect(applyEnvOverrides(DEFAULT_ANALYSIS_CONFIG, { CACHE_ENABLED: 'maybe' }).cache.enabled).toBe(true);
  });

  it('rejects a non-integer override', () => {
    expect(() => applyEnvOverrides(DEFAULT_ANALYSIS_CONFIG, { FETCH_CONCURRENCY: 'many' })).toThrow(
      'FETCH_CONCURRENCY must be an integer, got "many"'
    );
  });

  it('validates overridden values', () => {
    expect(() => applyEnvOverrides(DEFAULT_ANALYSIS_CONFIG, { FETCH_CONCURRENCY: '0' })).toThrow(ConfigError);
  });
});

describe('loadConfig', () => {
  let tempDir: string;

  beforeEach(() => {
    tempDir = mkdtempSync(join(tmpdir(), 'analysis-config-'));
    for (const name of [
      'ANALYSIS_CONFIG',
      'CACHE_ENABLED',
      'CACHE_TTL_SECONDS',
      'FETCH_CONCURRENCY',
      'GATEWAY_TIMEOUT_MS',
      'HISTORY_DAYS',
      'NEWS_COUNT',
    ]) {
      vi.stubEnv(name, '');
    }
  });

  afterEach(() => {
    vi.unstubAllEnvs();
    rmSync(tempDir, { recursive: true, force: true });
  });

  it('reads config/analysis.json under the project root', () => {
    mkdirSync(join(tempDir, 'config'));
    writeFileSync(join(tempDir, 'config', 'analysis.json'), JSON.stringify({ insight: { timeoutMs: 1000 } }));

    expect(loadConfig(tempDir).insight).toEqual({ newsCount: 5, timeoutMs: 1000 });
  });

  it('falls back to defaults when the file is missing', () => {
    expect(loadConfig(tempDir)).toEqual(DEFAULT_ANALYSIS_CONFIG);
  });

  it('follows ANALYSIS_CONFIG relative to the project root', () => {
    writeFileSync(join(tempDir, 'custom.json'), JSON.stringify({ cache: { ttlSeconds: 30 } }));
    vi.stubEnv('ANALYSIS_CONFIG', 'custom.json');

    expect(loadConfig(tempDir).cache.ttlSeconds).toBe(30);
  });

  it('applies environment overrides on top of the file', () => {
    mkdirSync(join(tempDir, 'config'));
    writeFileSync(join(tempDir, 'config', 'analysis.json'), JSON.stringify({ fetch: { maxConcurrency: 8 } }));
    vi.stubEnv('FETCH_CONCURRENCY', '3');

    expect(loadConfig(tempDir).fetch.maxConcurrency).toBe(3);
  });

  it('reports unparsable JSON as a ConfigError', () => {
    mkdirSync(join(tempDir, 'config'));
    writeFileSync(join(tempDir, 'config', 'analysis.json'), '{ not json');

    expect(() => loadConfig(tempDir)).toThrow(ConfigError);
  });
});
