/**
 * Per-holding headlines, rated by the insight gateway when it can judge them.
 *
 * A symbol whose headlines cannot be fetched gets no news; a rating that
 * fails leaves the headlines unrated.
 */

import type { HeadlineRating, InsightGateway } from '@/llm/types';
import type { Headline, NewsSource } from '@/providers/types';
import type { HoldingNews, NewsArticle } from '@/types/analysis';
import { runWithConcurrency } from '@/utils/concurrency';
import { withDeadline } from '@/utils/deadline';
import { createChildLogger } from '@/utils/logger';
import { describeFailure, fetchHeadlinesWithCache, type GatewayCallContext } from './fetch';

const logger = createChildLogger('news');

export interface NewsDependencies extends GatewayCallContext {
  news: NewsSource;
  /** null leaves every article unrated */
  rater: InsightGateway | null;
  limit: number;
  maxConcurrency: number;
  ratingTimeoutMs: number;
}

export function toHoldingNews(headlines: Headline[], rating: HeadlineRating | null): HoldingNews {
  const articles: NewsArticle[] = headlines.map((headline, i) => {
    const rated = rating?.articles[i] ?? null;
    return {
      ...headline,
      sentiment: rated?.sentiment ?? null,
      reasoning: rated?.reasoning ?? null,
      keyPoints: rated?.keyPoints ?? [],
    };
  });

  return {
    articles,
    sentiment: rating?.sentiment ?? null,
    summary: rating?.summary ?? null,
  };
}

async function rate(
  symbol: string,
  headlines: Headline[],
  deps: NewsDependencies
): Promise<HeadlineRating | null> {
  const rater = deps.rater;
  if (!rater?.rateHeadlines || headlines.length === 0) return null;
  const rateHeadlines = rater.rateHeadlines.bind(rater);

  try {
    return await withDeadline(
      (signal) => rateHeadlines(symbol, headlines, { signal }),
      deps.ratingTimeoutMs,
      deps.signal
    );
  } catch (error) {
    if (!deps.signal?.aborted) {
      logger.warn({ symbol, provider: rater.name, error: describeFailure(error) }, 'Headline rating unavailable');
    }
    return null;
  }
}

/** Keyed by symbol; symbols whose headlines failed are absent. */
export async function collectHoldingNews(
  symbols: string[],
  deps: NewsDependencies
): Promise<Map<string, HoldingNews>> {
  const result = new Map<string, HoldingNews>();
  if (deps.limit <= 0) return result;

  const distinct = [...new Set(symbols)];
  await runWithConcurrency(
    distinct,
    async (symbol) => {
      let headlines: Headline[];
      try {
        headlines = await fetchHeadlinesWithCache(symbol, deps.limit, deps.news, deps);
      } catch (error) {
        if (!deps.signal?.aborted) {
          logger.warn({ symbol, error: describeFailure(error) }, 'Headlines unavailable');
        }
        return;
      }
      result.set(symbol, toHoldingNews(headlines, await rate(symbol, headlines, deps)));
    },
    deps.maxConcurrency
  );

  return result;
}
