/**
 * Shared flow for chat-completion insight vendors:
 * build the prompt, call the model, validate the reply.
 */

import type { Headline } from '@/providers/types';
import type { HoldingAnalysis, InsightSummary } from '@/types/analysis';
import { createChildLogger } from '@/utils/logger';
import { parseHeadlineRating, parseInsightResponse } from './guardrails';
import type { FetchFn } from './http';
import { SYSTEM_PROMPT, buildHeadlinePrompt, buildPortfolioPrompt } from './prompts';
import type { HeadlineRating, InsightCallOptions, InsightGateway } from './types';

const logger = createChildLogger('llm_gateway');

export interface ChatGatewayOptions {
  apiKey: string;
  model: string;
  fetchFn?: FetchFn;
  baseUrl?: string;
}

export abstract class ChatInsightGateway implements InsightGateway {
  abstract readonly name: string;
  readonly model: string;
  readonly modelBacked = true;
  protected readonly apiKey: string;
  protected readonly fetchFn: FetchFn;
  protected readonly baseUrl: string | undefined;

  constructor(options: ChatGatewayOptions) {
    this.apiKey = options.apiKey;
    this.model = options.model;
    this.fetchFn = options.fetchFn ?? fetch;
    this.baseUrl = options.baseUrl;
  }

  protected abstract complete(system: string, user: string, signal?: AbortSignal): Promise<string>;

  async summarize(holdings: HoldingAnalysis[], options: InsightCallOptions = {}): Promise<InsightSummary> {
    const prompt = buildPortfolioPrompt(holdings);

    logger.info({ provider: this.name, model: this.model, holdings: holdings.length }, 'Requesting insight');
    const text = await this.complete(SYSTEM_PROMPT, prompt, options.signal);
    return parseInsightResponse(text, this.name, this.model);
  }

  async rateHeadlines(
    symbol: string,
    headlines: Headline[],
    options: InsightCallOptions = {}
  ): Promise<HeadlineRating> {
    logger.debug({ provider: this.name, symbol, headlines: headlines.length }, 'Rating headlines');
    const text = await this.complete(SYSTEM_PROMPT, buildHeadlinePrompt(symbol, headlines), options.signal);
    return parseHeadlineRating(text, this.name, headlines.length);
  }
}
