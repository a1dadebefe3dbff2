/**
 * Portfolio Analysis Script
 * Loads holdings, runs the analysis pipeline and writes data/runs/<runId>.json
 *
 * Usage:
 *   npx tsx scripts/analyze.ts portfolio.csv
 *   npx tsx scripts/analyze.ts --symbols=AAPL,MSFT --shares=10,5 --cost-basis=150,
 *   npx tsx scripts/analyze.ts portfolio.csv --no-ai --fresh --output=out/runs
 *   npx tsx scripts/analyze.ts --clear-cache
 */

import dotenv from 'dotenv';
import { readFileSync } from 'fs';
import { resolve } from 'path';

// Load .env.local first, then fall back to .env
dotenv.config({ path: resolve(process.cwd(), '.env.local') });
dotenv.config();
import { getConfig, type AnalysisConfig } from '../src/core/config';
import { getEnvConfig } from '../src/core/env';
import { AnalysisCache, SqliteCacheStore } from '../src/data/cache';
import { holdingsFromSymbols, parseHoldingsCsv } from '../src/data/portfolio';
import { createInsightGateway } from '../src/llm/registry';
import { createMarketDataGateway } from '../src/providers/registry';
import { writeAnalysis } from '../src/run/writer';
import { analyzePortfolio } from '../src/scoring/engine';
import type { Analysis, Holding } from '../src/types/analysis';
import { createChildLogger } from '../src/utils/logger';

const logger = createChildLogger('analyze');

interface AnalyzeCliArgs {
  csvPath: string | null;
  symbols: string[];
  shares: number[];
  costBasis: Array<number | null>;
  noAi: boolean;
  noNews: boolean;
  fresh: boolean;
  clearCache: boolean;
  cleanupCache: boolean;
  outputDir: string | undefined;
}

function flagValue(argv: string[], name: string): string | undefined {
  const eqArg = argv.find((arg) => arg.startsWith(`${name}=`));
  return eqArg?.slice(name.length + 1);
}

function splitList(raw: string | undefined): string[] {
  return raw ? raw.split(',').map((part) => part.trim()) : [];
}

function parseNumberList(raw: string | undefined, name: string): Array<number | null> {
  return splitList(raw).map((part) => {
    if (part === '') return null;
    const value = Number(part);
    if (!Number.isFinite(value)) {
      throw new Error(`${name} contains a non-numeric value: "${part}"`);
    }
    return value;
  });
}

function parseCliArgs(argv: string[] = process.argv.slice(2)): AnalyzeCliArgs {
  const positional = argv.find((arg) => !arg.startsWith('--'));
  const shares = parseNumberList(flagValue(argv, '--shares'), '--shares').map((v) => v ?? 1);

  return {
    csvPath: flagValue(argv, '--csv') ?? positional ?? null,
    symbols: splitList(flagValue(argv, '--symbols')).filter(Boolean),
    shares,
    costBasis: parseNumberList(flagValue(argv, '--cost-basis'), '--cost-basis'),
    noAi: argv.includes('--no-ai'),
    noNews: argv.includes('--no-news'),
    fresh: argv.includes('--fresh'),
    clearCache: argv.includes('--clear-cache'),
    cleanupCache: argv.includes('--cleanup-cache'),
    outputDir: flagValue(argv, '--output'),
  };
}

function loadHoldings(args: AnalyzeCliArgs): Holding[] | null {
  if (args.csvPath) {
    logger.info({ csvPath: args.csvPath }, 'Loading portfolio from CSV');
    return parseHoldingsCsv(readFileSync(resolve(process.cwd(), args.csvPath), 'utf-8'));
  }
  if (args.symbols.length > 0) {
    return holdingsFromSymbols(args.symbols, args.shares, args.costBasis);
  }
  return null;
}

function runConfig(base: AnalysisConfig, args: AnalyzeCliArgs): AnalysisConfig {
  return {
    ...base,
    cache: { ...base.cache, enabled: base.cache.enabled && !args.fresh },
    insight: { ...base.insight, newsCount: args.noNews ? 0 : base.insight.newsCount },
  };
}

function money(value: number | null): string {
  return value === null ? 'n/a' : value.toFixed(2);
}

function printSummary(analysis: Analysis, filePath: string, durationMs: number): void {
  const { summary, scores, stats } = analysis;
  console.log('\n' + '='.repeat(50));
  console.log('PORTFOLIO ANALYSIS COMPLETE');
  console.log('='.repeat(50));
  console.log(`Run ID:          ${analysis.runId}`);
  console.log(`Holdings:        ${summary.holdingCount} (${summary.degradedCount} degraded)`);
  console.log(`Total Value:     ${money(summary.totalValue)}`);
  console.log(
    `Gain/Loss:       ${money(summary.totalGainLoss)}` +
      (summary.totalGainLossPercent === null ? '' : ` (${summary.totalGainLossPercent.toFixed(2)}%)`)
  );
  console.log(`Diversification: ${scores.diversification.toFixed(1)}/100`);
  console.log(`Risk:            ${scores.risk === null ? 'n/a' : `${scores.risk.toFixed(1)}/100`}`);
  console.log(`Sentiment:       ${scores.sentiment} (${scores.sentimentSource})`);
  console.log(`Cache:           ${stats.cacheHits} hits / ${stats.cacheMisses} misses`);
  console.log(`Duration:        ${(durationMs / 1000).toFixed(1)}s`);

  console.log('\nHoldings:');
  for (const h of analysis.holdings) {
    if (h.status === 'degraded') {
      console.log(`  - ${h.holding.symbol}: unavailable (${h.degradedReason ?? 'unknown'})`);
      continue;
    }
    const pct = h.gainLossPercent === null ? '' : ` ${h.gainLossPercent.toFixed(2)}%`;
    const news = h.news ? `, news ${h.news.sentiment ?? 'unrated'} (${h.news.articles.length})` : '';
    console.log(
      `  - ${h.holding.symbol}: ${money(h.valuation)}${pct}, risk ${h.risk?.level ?? 'n/a'}${news}`
    );
  }

  if (analysis.insight) {
    console.log(`\nInsight (${analysis.insight.provider}):`);
    console.log(`  ${analysis.insight.commentary}`);
  } else {
    console.log(`\nInsight: ${analysis.insightStatus}`);
  }

  console.log('\nOutput File:');
  console.log(`  - ${filePath}`);
  console.log('='.repeat(50) + '\n');
}

async function main() {
  const startTime = Date.now();
  const args = parseCliArgs();
  const env = getEnvConfig();
  const config = runConfig(getConfig(), args);
  const cache = new AnalysisCache(SqliteCacheStore.open(env.cacheDbPath), config.cache);

  const controller = new AbortController();
  process.once('SIGINT', () => {
    logger.warn('Interrupted, cancelling analysis');
    controller.abort(new Error('Interrupted'));
  });

  try {
    if (args.clearCache) {
      console.log(`Cleared ${cache.clear()} cache entries`);
    }
    if (args.cleanupCache) {
      console.log(`Removed ${cache.cleanupExpired()} expired cache entries`);
    }

    const holdings = loadHoldings(args);
    if (!holdings) {
      if (args.clearCache || args.cleanupCache) return;
      console.error('Provide a portfolio CSV file or --symbols');
      process.exitCode = 1;
      return;
    }

    const marketData = createMarketDataGateway('finnhub', env.finnhubApiKey);
    const insights = createInsightGateway(env);

    try {
      const outcome = await analyzePortfolio(
        holdings,
        { marketData, news: marketData, insights, cache, config },
        { noAi: args.noAi, signal: controller.signal }
      );

      if (outcome.status === 'cancelled') {
        console.error(`Analysis cancelled during ${outcome.phase}`);
        process.exitCode = 130;
        return;
      }

      const written = writeAnalysis(outcome.analysis, args.outputDir);
      printSummary(outcome.analysis, written.filePath, Date.now() - startTime);
    } finally {
      marketData.close();
    }
  } catch (error) {
    logger.error({ error }, 'Analysis failed');
    console.error('Analysis failed:', error instanceof Error ? error.message : error);
    process.exitCode = 1;
  } finally {
    cache.close();
  }
}

main().catch(console.error);
