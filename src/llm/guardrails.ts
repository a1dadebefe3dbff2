/**
 * Insight guardrails
 * Vendor output is parsed, schema-validated and trimmed before it reaches the analysis
 */

import {
  validateHeadlineSentiment,
  validateInsightResponse,
  type ValidationResult,
  type VendorSentiment,
} from '@/validation/ajv_instance';
import { createChildLogger } from '@/utils/logger';
import { InsightError, type ArticleRating, type HeadlineRating } from './types';
import type { InsightSummary, SentimentLabel } from '@/types/analysis';

const logger = createChildLogger('llm_guardrails');

export const MAX_LIST_ITEMS = 5;
export const MAX_COMMENTARY_LENGTH = 1200;
export const MAX_REASONING_LENGTH = 400;

export function normalizeSentimentLabel(raw: VendorSentiment): SentimentLabel {
  switch (raw) {
    case 'very_bullish':
    case 'bullish':
      return 'bullish';
    case 'very_bearish':
    case 'bearish':
      return 'bearish';
    default:
      return 'neutral';
  }
}

/** Models sometimes wrap JSON in a markdown fence. */
export function extractJson(text: string): string {
  const fenced = text.match(/```(?:json)?\s*([\s\S]*?)```/);
  if (fenced) return fenced[1].trim();
  const start = text.indexOf('{');
  const end = text.lastIndexOf('}');
  return start !== -1 && end > start ? text.slice(start, end + 1) : text.trim();
}

function cleanList(items: string[]): string[] {
  return items
    .map((item) => item.trim())
    .filter(Boolean)
    .slice(0, MAX_LIST_ITEMS);
}

function parseValidated<T>(
  text: string,
  provider: string,
  label: string,
  validate: (data: unknown) => ValidationResult<T>
): T {
  let parsed: unknown;
  try {
    parsed = JSON.parse(extractJson(text));
  } catch (error) {
    throw new InsightError(
      `${label} is not valid JSON`,
      provider,
      error instanceof Error ? error : undefined
    );
  }

  const result = validate(parsed);
  if (!result.valid || !result.data) {
    logger.warn({ provider, errors: result.errors }, `${label} validation failed`);
    throw new InsightError(`${label} failed validation: ${(result.errors ?? []).join('; ')}`, provider);
  }
  return result.data;
}

export function parseInsightResponse(
  text: string,
  provider: string,
  model: string
): InsightSummary {
  const data = parseValidated(text, provider, 'Insight response', validateInsightResponse);
  const commentary = [data.portfolio_summary.trim(), data.market_outlook?.trim()]
    .filter(Boolean)
    .join(' ')
    .slice(0, MAX_COMMENTARY_LENGTH);

  return {
    provider,
    model,
    commentary,
    sentimentLabel: normalizeSentimentLabel(data.overall_sentiment),
    strengths: cleanList(data.strengths),
    weaknesses: cleanList(data.weaknesses),
    recommendations: cleanList(data.recommendations),
  };
}

/**
 * Ratings are matched to headlines by index; out-of-range or repeated
 * indices are ignored, and headlines without a rating stay null.
 */
export function parseHeadlineRating(text: string, provider: string, headlineCount: number): HeadlineRating {
  const data = parseValidated(text, provider, 'Headline rating', validateHeadlineSentiment);

  const articles: Array<ArticleRating | null> = Array.from({ length: headlineCount }, () => null);
  for (const entry of data.articles) {
    if (entry.index >= headlineCount || articles[entry.index] !== null) continue;
    const reasoning = entry.reasoning?.trim().slice(0, MAX_REASONING_LENGTH);
    articles[entry.index] = {
      sentiment: normalizeSentimentLabel(entry.sentiment),
      reasoning: reasoning || null,
      keyPoints: cleanList(entry.key_points ?? []),
    };
  }

  return {
    articles,
    sentiment: normalizeSentimentLabel(data.overall_sentiment),
    summary: data.summary.trim().slice(0, MAX_COMMENTARY_LENGTH),
  };
}
