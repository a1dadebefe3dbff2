/**
 * Insight gateway contract
 */

import type { Headline } from '@/providers/types';
import type { HoldingAnalysis, InsightSummary, SentimentLabel } from '@/types/analysis';

export interface InsightCallOptions {
  signal?: AbortSignal;
}

export interface ArticleRating {
  sentiment: SentimentLabel;
  reasoning: string | null;
  keyPoints: string[];
}

export interface HeadlineRating {
  /** Aligned with the rated headlines; null where the model skipped one. */
  articles: Array<ArticleRating | null>;
  sentiment: SentimentLabel;
  summary: string;
}

export interface InsightGateway {
  readonly name: string;
  readonly model: string;
  /**
   * false when the summary is derived from the computed scores, so its
   * sentiment label is the heuristic one.
   */
  readonly modelBacked: boolean;
  summarize(holdings: HoldingAnalysis[], options?: InsightCallOptions): Promise<InsightSummary>;
  /** Absent when the gateway cannot judge headlines. */
  rateHeadlines?(
    symbol: string,
    headlines: Headline[],
    options?: InsightCallOptions
  ): Promise<HeadlineRating>;
}

export class InsightError extends Error {
  constructor(
    message: string,
    public provider: string,
    public cause?: Error
  ) {
    super(message);
    this.name = 'InsightError';
  }
}
