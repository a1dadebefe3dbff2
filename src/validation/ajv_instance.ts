/**
 * Ajv validation instance with schema validators
 * Every written Analysis and every vendor insight or headline rating is validated
 */

import Ajv2020, { type ValidateFunction } from 'ajv/dist/2020';
import addFormats from 'ajv-formats';
import { loadSchema } from './schema_loader';
import type { Analysis } from '@/types/analysis';

// Create Ajv instance with Draft 2020-12 support
const ajv = new Ajv2020({
  allErrors: true,
  strict: true,
  strictTypes: true,
  strictTuples: true,
  allowUnionTypes: true,
});

// Add format validators (date-time, uri, ...)
addFormats(ajv);

export type VendorSentiment = 'very_bearish' | 'bearish' | 'neutral' | 'bullish' | 'very_bullish';

/** Raw insight payload as returned by a vendor, before label normalization. */
export interface InsightResponseV1 {
  portfolio_summary: string;
  overall_sentiment: VendorSentiment;
  strengths: string[];
  weaknesses: string[];
  recommendations: string[];
  market_outlook?: string;
}

/** Raw per-symbol headline rating. */
export interface HeadlineSentimentV1 {
  articles: Array<{
    index: number;
    sentiment: VendorSentiment;
    reasoning?: string;
    key_points?: string[];
  }>;
  overall_sentiment: VendorSentiment;
  summary: string;
}

// Lazy-loaded validators
let analysisValidator: ValidateFunction<Analysis> | null = null;
let insightResponseValidator: ValidateFunction<InsightResponseV1> | null = null;
let headlineSentimentValidator: ValidateFunction<HeadlineSentimentV1> | null = null;

export function getAnalysisValidator(): ValidateFunction<Analysis> {
  if (!analysisValidator) {
    analysisValidator = ajv.compile<Analysis>(loadSchema('analysis.v1'));
  }
  return analysisValidator;
}

export function getInsightResponseValidator(): ValidateFunction<InsightResponseV1> {
  if (!insightResponseValidator) {
    insightResponseValidator = ajv.compile<InsightResponseV1>(loadSchema('insight_response.v1'));
  }
  return insightResponseValidator;
}

export function getHeadlineSentimentValidator(): ValidateFunction<HeadlineSentimentV1> {
  if (!headlineSentimentValidator) {
    headlineSentimentValidator = ajv.compile<HeadlineSentimentV1>(loadSchema('headline_sentiment.v1'));
  }
  return headlineSentimentValidator;
}

export interface ValidationResult<T> {
  valid: boolean;
  data: T | null;
  errors: string[] | null;
}

function runValidator<T>(validate: ValidateFunction<T>, data: unknown): ValidationResult<T> {
  if (validate(data)) {
    return { valid: true, data, errors: null };
  }

  const errors = validate.errors?.map(
    (e) => `${e.instancePath || 'root'}: ${e.message}`
  ) ?? ['Unknown validation error'];

  return { valid: false, data: null, errors };
}

export function validateAnalysis(data: unknown): ValidationResult<Analysis> {
  return runValidator(getAnalysisValidator(), data);
}

export function validateInsightResponse(data: unknown): ValidationResult<InsightResponseV1> {
  return runValidator(getInsightResponseValidator(), data);
}

export function validateHeadlineSentiment(data: unknown): ValidationResult<HeadlineSentimentV1> {
  return runValidator(getHeadlineSentimentValidator(), data);
}
