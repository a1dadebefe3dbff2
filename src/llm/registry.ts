/**
 * Insight gateway selection from environment configuration
 */

import type { EnvConfig } from '@/core/env';
import { AnthropicInsightGateway } from './anthropic';
import type { FetchFn } from './http';
import { OpenAiInsightGateway } from './openai';
import { TemplateInsightGateway } from './template';
import type { InsightGateway } from './types';

/** Returns null when no insight provider is configured. */
export function createInsightGateway(env: EnvConfig, fetchFn?: FetchFn): InsightGateway | null {
  switch (env.insightProvider) {
    case 'openai':
      if (!env.openaiApiKey) throw new Error('OPENAI_API_KEY is required for the openai insight provider');
      return new OpenAiInsightGateway({ apiKey: env.openaiApiKey, model: env.openaiModel, fetchFn });
    case 'anthropic':
      if (!env.anthropicApiKey) {
        throw new Error('ANTHROPIC_API_KEY is required for the anthropic insight provider');
      }
      return new AnthropicInsightGateway({
        apiKey: env.anthropicApiKey,
        model: env.anthropicModel,
        fetchFn,
      });
    case 'template':
      return new TemplateInsightGateway();
    default:
      return null;
  }
}
