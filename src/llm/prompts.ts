/**
 * Prompt construction for vendor insight gateways
 */

import { valueOrNull } from '@/scoring/indicators';
import type { Headline } from '@/providers/types';
import type { HoldingAnalysis, IndicatorValue } from '@/types/analysis';

export const SYSTEM_PROMPT =
  'You are a senior portfolio manager reviewing a portfolio held by an individual investor. ' +
  'Use only the figures and headlines provided. Respond only with valid JSON.';

const RESPONSE_FORMAT = `{
  "portfolio_summary": "2-3 sentence overall portfolio assessment",
  "overall_sentiment": "very_bearish | bearish | neutral | bullish | very_bullish",
  "strengths": ["strength 1", "strength 2"],
  "weaknesses": ["weakness 1", "weakness 2"],
  "recommendations": ["recommendation 1", "recommendation 2"],
  "market_outlook": "1-2 sentence outlook relevant to this portfolio"
}`;

const HEADLINE_FORMAT = `{
  "articles": [
    {
      "index": 0,
      "sentiment": "very_bearish | bearish | neutral | bullish | very_bullish",
      "reasoning": "one sentence",
      "key_points": ["point 1", "point 2"]
    }
  ],
  "overall_sentiment": "very_bearish | bearish | neutral | bullish | very_bullish",
  "summary": "1-2 sentence summary of the news for this stock"
}`;

function fmt(value: IndicatorValue, suffix: string = ''): string {
  const v = valueOrNull(value);
  return v === null ? 'n/a' : `${v.toFixed(1)}${suffix}`;
}

export function describeHolding(h: HoldingAnalysis): string {
  const { symbol, shares } = h.holding;
  if (h.status === 'degraded' || !h.quote || !h.indicators) {
    return `${symbol}: ${shares} shares, market data unavailable`;
  }

  const lines = [
    `${symbol} (${h.quote.name ?? 'unknown name'}, ${h.quote.sector ?? 'unknown sector'}):`,
    `  - Shares: ${shares}, price ${h.quote.price.toFixed(2)}, value ${h.valuation?.toFixed(2) ?? 'n/a'}`,
    `  - Weight: ${h.weight === null ? 'n/a' : `${(h.weight * 100).toFixed(1)}%`}`,
    `  - Momentum: ${fmt(h.indicators.momentum, '%')}`,
    `  - Volatility: ${fmt(h.indicators.volatility, '%')}`,
    `  - RSI: ${fmt(h.indicators.rsi)}`,
  ];
  if (h.gainLossPercent !== null) {
    lines.push(`  - Gain/loss: ${h.gainLossPercent.toFixed(1)}%`);
  }
  if (h.risk) {
    lines.push(`  - Risk: ${h.risk.level}${h.risk.factors.length ? ` (${h.risk.factors.join('; ')})` : ''}`);
  }
  if (h.news?.sentiment) {
    lines.push(`  - News sentiment: ${h.news.sentiment}`);
  }
  return lines.join('\n');
}

function renderHeadlines(items: Headline[]): string {
  return items
    .map((item, i) => `  [${i}] ${item.publishedAt.slice(0, 10)} ${item.source}: ${item.title}`)
    .join('\n');
}

function describeHeadlines(holdings: HoldingAnalysis[]): string {
  const sections: string[] = [];
  const seen = new Set<string>();
  for (const h of holdings) {
    const symbol = h.holding.symbol;
    if (seen.has(symbol) || !h.news || h.news.articles.length === 0) continue;
    seen.add(symbol);
    sections.push(`${symbol}:\n${renderHeadlines(h.news.articles)}`);
  }
  return sections.length ? sections.join('\n\n') : 'No recent headlines.';
}

export function buildPortfolioPrompt(holdings: HoldingAnalysis[]): string {
  return [
    'Holdings:',
    holdings.map(describeHolding).join('\n'),
    '',
    'Recent headlines:',
    describeHeadlines(holdings),
    '',
    'Provide a portfolio analysis in this exact JSON format:',
    RESPONSE_FORMAT,
  ].join('\n');
}

export function buildHeadlinePrompt(symbol: string, headlines: Headline[]): string {
  const rendered = headlines
    .map((item, i) => {
      const summary = item.summary ? `\n      ${item.summary}` : '';
      return `  [${i}] ${item.publishedAt.slice(0, 10)} ${item.source}: ${item.title}${summary}`;
    })
    .join('\n');

  return [
    `Recent headlines for ${symbol}:`,
    rendered,
    '',
    'Rate the sentiment of each headline for holders of this stock, referring to each by its index,',
    'then give an overall sentiment and summary in this exact JSON format:',
    HEADLINE_FORMAT,
  ].join('\n');
}
