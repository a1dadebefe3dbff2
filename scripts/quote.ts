/**
 * Quote Script
 * Prints fundamentals and technicals for a single symbol
 *
 * Usage:
 *   npx tsx scripts/quote.ts AAPL
 *   npx tsx scripts/quote.ts MSFT --fresh
 */

import dotenv from 'dotenv';
import { resolve } from 'path';

// Load .env.local first, then fall back to .env
dotenv.config({ path: resolve(process.cwd(), '.env.local') });
dotenv.config();
import { getConfig } from '../src/core/config';
import { getEnvConfig } from '../src/core/env';
import { AnalysisCache, SqliteCacheStore } from '../src/data/cache';
import { createMarketDataGateway } from '../src/providers/registry';
import { valueOrNull } from '../src/scoring/indicators';
import { lookupSymbol, type SymbolLookup } from '../src/scoring/quote';
import type { IndicatorValue } from '../src/types/analysis';
import { createChildLogger } from '../src/utils/logger';

const logger = createChildLogger('quote');

function num(value: number | null, digits = 2, suffix = ''): string {
  return value === null ? 'n/a' : `${value.toFixed(digits)}${suffix}`;
}

function indicator(value: IndicatorValue, suffix = ''): string {
  return num(valueOrNull(value), 2, suffix);
}

function marketCap(value: number | null): string {
  if (value === null) return 'n/a';
  if (value >= 1e12) return `${(value / 1e12).toFixed(2)}T`;
  if (value >= 1e9) return `${(value / 1e9).toFixed(2)}B`;
  return `${(value / 1e6).toFixed(2)}M`;
}

function printLookup({ quote, indicators, fromCache }: SymbolLookup): void {
  console.log('\n' + '='.repeat(50));
  console.log(`${quote.name ?? quote.symbol} (${quote.symbol})${fromCache ? ' [cached]' : ''}`);
  console.log('='.repeat(50));
  console.log(`Price:           ${num(quote.price)}`);
  console.log(`Sector:          ${quote.sector ?? 'n/a'}`);
  console.log(`Industry:        ${quote.industry ?? 'n/a'}`);
  console.log(`Market Cap:      ${marketCap(quote.marketCap)}`);
  console.log(`P/E Ratio:       ${num(quote.peRatio)}`);
  console.log(`Dividend Yield:  ${num(quote.dividendYield, 2, '%')}`);
  console.log(`52W Range:       ${num(quote.week52Low)} - ${num(quote.week52High)}`);

  console.log('\nTechnicals:');
  for (const ma of indicators.movingAverages) {
    console.log(`  MA${ma.window}:`.padEnd(18) + indicator(ma.value));
  }
  console.log(`  RSI:            ${indicator(indicators.rsi)}`);
  console.log(`  Volatility:     ${indicator(indicators.volatility, '%')}`);
  console.log(`  Momentum:       ${indicator(indicators.momentum, '%')}`);
  for (const change of indicators.priceChanges) {
    console.log(`  ${change.window}D change:`.padEnd(18) + indicator(change.value, '%'));
  }
  console.log('='.repeat(50) + '\n');
}

async function main() {
  const argv = process.argv.slice(2);
  const symbol = argv.find((arg) => !arg.startsWith('--'));
  if (!symbol) {
    console.error('Usage: quote <SYMBOL> [--fresh]');
    process.exitCode = 1;
    return;
  }

  const env = getEnvConfig();
  const base = getConfig();
  const config = { ...base, cache: { ...base.cache, enabled: base.cache.enabled && !argv.includes('--fresh') } };
  const cache = new AnalysisCache(SqliteCacheStore.open(env.cacheDbPath), config.cache);
  const marketData = createMarketDataGateway('finnhub', env.finnhubApiKey);

  try {
    printLookup(await lookupSymbol(symbol, { marketData, cache, config }));
  } catch (error) {
    logger.error({ symbol, error }, 'Quote lookup failed');
    console.error(`Quote lookup failed for ${symbol}:`, error instanceof Error ? error.message : error);
    process.exitCode = 1;
  } finally {
    marketData.close();
    cache.close();
  }
}

main().catch(console.error);
