import { describe, expect, it } from 'vitest';
import {
  MAX_LIST_ITEMS,
  extractJson,
  normalizeSentimentLabel,
  parseHeadlineRating,
  parseInsightResponse,
} from '@/llm/guardrails';
import { InsightError } from '@/llm/types';

const validResponse = {
  portfolio_summary: ' Tech-heavy portfolio with strong gains. ',
  overall_sentiment: 'very_bullish',
  strengths: ['  Strong momentum ', '', 'Low cost basis'],
  weaknesses: ['Concentration'],
  recommendations: ['a', 'b', 'c', 'd', 'e', 'f', 'g'],
  market_outlook: 'Rates may weigh on growth names.',
};

describe('extractJson', () => {
  it('unwraps a fenced code block', () => {
    expect(extractJson('Here you go:\n```json\n{"a": 1}\n```\nThanks')).toBe('{"a": 1}');
  });

  it('cuts from the first to the last brace', () => {
    expect(extractJson('Sure! {"a": {"b": 2}} hope that helps')).toBe('{"a": {"b": 2}}');
  });
});

describe('normalizeSentimentLabel', () => {
  it('folds the extreme labels into the three-way label', () => {
    expect(normalizeSentimentLabel('very_bullish')).toBe('bullish');
    expect(normalizeSentimentLabel('very_bearish')).toBe('bearish');
    expect(normalizeSentimentLabel('neutral')).toBe('neutral');
  });
});

describe('parseInsightResponse', () => {
  it('builds an insight summary from a valid response', () => {
    const summary = parseInsightResponse(JSON.stringify(validResponse), 'openai', 'gpt-test');

    expect(summary).toEqual({
      provider: 'openai',
      model: 'gpt-test',
      commentary: 'Tech-heavy portfolio with strong gains. Rates may weigh on growth names.',
      sentimentLabel: 'bullish',
      strengths: ['Strong momentum', 'Low cost basis'],
      weaknesses: ['Concentration'],
      recommendations: ['a', 'b', 'c', 'd', 'e'],
    });
    expect(summary.recommendations).toHaveLength(MAX_LIST_ITEMS);
  });

  it('accepts a response wrapped in a markdown fence', () => {
    const text = '```json\n' + JSON.stringify({ ...validResponse, market_outlook: undefined }) + '\n```';
    expect(parseInsightResponse(text, 'anthropic', 'm').commentary).toBe(
      'Tech-heavy portfolio with strong gains.'
    );
  });

  it('rejects text that is not JSON', () => {
    expect(() => parseInsightResponse('I cannot help with that.', 'openai', 'm')).toThrow(
      new InsightError('Insight response is not valid JSON', 'openai')
    );
  });

  it('rejects a response missing required fields', () => {
    const { strengths: _omitted, ...rest } = validResponse;
    expect(() => parseInsightResponse(JSON.stringify(rest), 'openai', 'm')).toThrow(
      "Insight response failed validation: root: must have required property 'strengths'"
    );
  });

  it('rejects an unknown sentiment label', () => {
    const text = JSON.stringify({ ...validResponse, overall_sentiment: 'euphoric' });
    expect(() => parseInsightResponse(text, 'openai', 'm')).toThrow(InsightError);
  });
});

describe('parseHeadlineRating', () => {
  it('aligns ratings with headlines and keeps the first rating for an index', () => {
    const text = JSON.stringify({
      articles: [
        { index: 0, sentiment: 'very_bullish', reasoning: '   ' },
        { index: 0, sentiment: 'bearish' },
      ],
      overall_sentiment: 'bullish',
      summary: ' Upbeat coverage. ',
    });

    expect(parseHeadlineRating(text, 'openai', 2)).toEqual({
      articles: [{ sentiment: 'bullish', reasoning: null, keyPoints: [] }, null],
      sentiment: 'bullish',
      summary: 'Upbeat coverage.',
    });
  });

  it('rejects a rating without an overall sentiment', () => {
    const text = JSON.stringify({ articles: [], summary: 'x' });
    expect(() => parseHeadlineRating(text, 'openai', 1)).toThrow(
      "Headline rating failed validation: root: must have required property 'overall_sentiment'"
    );
  });

  it('rejects a negative index', () => {
    const text = JSON.stringify({
      articles: [{ index: -1, sentiment: 'neutral' }],
      overall_sentiment: 'neutral',
      summary: 'x',
    });
    expect(() => parseHeadlineRating(text, 'anthropic', 1)).toThrow(InsightError);
  });
});
