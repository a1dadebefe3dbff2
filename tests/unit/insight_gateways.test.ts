import { describe, expect, it } from 'vitest';
import type { EnvConfig } from '@/core/env';
import { AnthropicInsightGateway } from '@/llm/anthropic';
import { postJson } from '@/llm/http';
import { OpenAiInsightGateway } from '@/llm/openai';
import { createInsightGateway } from '@/llm/registry';
import { TemplateInsightGateway } from '@/llm/template';
import { InsightError } from '@/llm/types';
import { createFakeFetch } from '../helpers/fetch';
import { makeHeadline, makeHoldingAnalysis } from '../helpers/fakes';

const replyJson = JSON.stringify({
  portfolio_summary: 'Balanced portfolio.',
  overall_sentiment: 'bearish',
  strengths: ['Diversified'],
  weaknesses: [],
  recommendations: ['Hold'],
});

const chipHeadline = makeHeadline('AAPL', 'Apple unveils new chip', '2024-06-02T14:00:00.000Z');

const holdings = [
  {
    ...makeHoldingAnalysis({ symbol: 'AAPL', valuation: 500, weight: 0.5, momentum: 4 }),
    news: {
      articles: [{ ...chipHeadline, sentiment: 'bullish' as const, reasoning: null, keyPoints: [] }],
      sentiment: 'bullish' as const,
      summary: 'Product launch well received.',
    },
  },
  makeHoldingAnalysis({ symbol: 'MSFT', valuation: 500, weight: 0.5, momentum: -1 }),
  makeHoldingAnalysis({ symbol: 'DEAD', valuation: null, status: 'degraded' }),
];

const ratingJson = JSON.stringify({
  articles: [
    { index: 1, sentiment: 'very_bearish', reasoning: ' Guidance cut. ', key_points: ['lower revenue', ' '] },
    { index: 0, sentiment: 'bullish' },
    { index: 7, sentiment: 'bearish' },
  ],
  overall_sentiment: 'neutral',
  summary: 'Mixed week.',
});

describe('OpenAiInsightGateway', () => {
  it('sends the prompt and parses the reply', async () => {
    const { fetchFn, requests } = createFakeFetch(() => [
      { body: { choices: [{ message: { role: 'assistant', content: replyJson } }] } },
    ]);
    const gateway = new OpenAiInsightGateway({ apiKey: 'test-secret', model: 'gpt-test', fetchFn });

    const insight = await gateway.summarize(holdings);

    expect(insight).toEqual({
      provider: 'openai',
      model: 'gpt-test',
      commentary: 'Balanced portfolio.',
      sentimentLabel: 'bearish',
      strengths: ['Diversified'],
      weaknesses: [],
      recommendations: ['Hold'],
    });
    expect(gateway.modelBacked).toBe(true);

    expect(requests).toHaveLength(1);
    const [request] = requests;
    expect(request.url).toBe('https://api.openai.com/v1/chat/completions');
    expect(request.method).toBe('POST');
    expect(request.headers.get('authorization')).toBe('Bearer test-secret');
    expect(request.body).toMatchObject({ model: 'gpt-test', response_format: { type: 'json_object' } });
    expect(JSON.stringify(request.body)).toContain('2024-06-02 Wire: Apple unveils new chip');
    expect(JSON.stringify(request.body)).toContain('  - News sentiment: bullish');
    expect(JSON.stringify(request.body)).toContain('DEAD: 1 shares, market data unavailable');
  });

  it('rates headlines by index', async () => {
    const { fetchFn, requests } = createFakeFetch(() => [
      { body: { choices: [{ message: { content: ratingJson } }] } },
    ]);
    const gateway = new OpenAiInsightGateway({ apiKey: 'test-secret', model: 'm', fetchFn });
    const headlines = [
      makeHeadline('MSFT', 'Microsoft ships update'),
      makeHeadline('MSFT', 'Microsoft trims outlook'),
      makeHeadline('MSFT', 'Microsoft hosts event'),
    ];

    const rating = await gateway.rateHeadlines('MSFT', headlines);

    expect(rating).toEqual({
      articles: [
        { sentiment: 'bullish', reasoning: null, keyPoints: [] },
        { sentiment: 'bearish', reasoning: 'Guidance cut.', keyPoints: ['lower revenue'] },
        null,
      ],
      sentiment: 'neutral',
      summary: 'Mixed week.',
    });
    expect(JSON.stringify(requests[0].body)).toContain('Recent headlines for MSFT:');
    expect(JSON.stringify(requests[0].body)).toContain('[1] 2024-06-03 Wire: Microsoft trims outlook');
  });

  it('uses a custom base URL', async () => {
    const { fetchFn, requests } = createFakeFetch(() => [
      { body: { choices: [{ message: { content: replyJson } }] } },
    ]);
    const gateway = new OpenAiInsightGateway({
      apiKey: 'test-secret',
      model: 'm',
      fetchFn,
      baseUrl: 'http://localhost:8080/v1',
    });

    await gateway.summarize(holdings);
    expect(requests[0].url).toBe('http://localhost:8080/v1/chat/completions');
  });

  it('fails on a client error without retrying', async () => {
    const { fetchFn, requests } = createFakeFetch(() => [{ status: 401, statusText: 'Unauthorized' }]);
    const gateway = new OpenAiInsightGateway({ apiKey: 'test-secret', model: 'm', fetchFn });

    await expect(gateway.summarize(holdings)).rejects.toThrow('openai API error: 401 Unauthorized');
    expect(requests).toHaveLength(1);
  });

  it('fails when the reply has no content', async () => {
    const { fetchFn } = createFakeFetch(() => [{ body: { choices: [] } }]);
    const gateway = new OpenAiInsightGateway({ apiKey: 'test-secret', model: 'm', fetchFn });

    await expect(gateway.summarize(holdings)).rejects.toThrow('OpenAI response has no message content');
  });
});

describe('AnthropicInsightGateway', () => {
  it('sends vendor headers and reads the first text block', async () => {
    const { fetchFn, requests } = createFakeFetch(() => [
      { body: { content: [{ type: 'tool_use', id: 'x' }, { type: 'text', text: replyJson }] } },
    ]);
    const gateway = new AnthropicInsightGateway({ apiKey: 'test-secret', model: 'claude-test', fetchFn });

    const insight = await gateway.summarize(holdings);

    expect(insight.provider).toBe('anthropic');
    expect(insight.sentimentLabel).toBe('bearish');
    expect(requests[0].url).toBe('https://api.anthropic.com/v1/messages');
    expect(requests[0].headers.get('x-api-key')).toBe('test-secret');
    expect(requests[0].headers.get('anthropic-version')).toBe('2023-06-01');
    expect(requests[0].body).toMatchObject({ model: 'claude-test', max_tokens: 2048 });
  });

  it('rejects a reply that fails validation', async () => {
    const { fetchFn } = createFakeFetch(() => [
      { body: { content: [{ type: 'text', text: '{"portfolio_summary": "x"}' }] } },
    ]);
    const gateway = new AnthropicInsightGateway({ apiKey: 'test-secret', model: 'm', fetchFn });

    await expect(gateway.summarize(holdings)).rejects.toBeInstanceOf(InsightError);
  });
});

describe('postJson', () => {
  const options = { provider: 'vendor', headers: {}, initialBackoffMs: 1 };

  it('retries server errors and rate limits', async () => {
    const { fetchFn, requests } = createFakeFetch(() => [
      { status: 503, statusText: 'Service Unavailable' },
      { status: 429, statusText: 'Too Many Requests' },
      { body: { ok: true } },
    ]);

    await expect(postJson('https://vendor.example/v1/run', { q: 1 }, { ...options, fetchFn })).resolves.toEqual({
      ok: true,
    });
    expect(requests).toHaveLength(3);
    expect(requests[0].headers.get('content-type')).toBe('application/json');
    expect(requests[0].body).toEqual({ q: 1 });
  });

  it('gives up after the retry budget', async () => {
    const { fetchFn, requests } = createFakeFetch(() => [new Error('socket hang up')]);

    await expect(
      postJson('https://vendor.example/v1/run', {}, { ...options, fetchFn, maxRetries: 2 })
    ).rejects.toThrow(new InsightError('socket hang up', 'vendor'));
    expect(requests).toHaveLength(3);
  });

  it('rejects a non-JSON body', async () => {
    const { fetchFn } = createFakeFetch(() => [{ raw: '<html>oops</html>' }]);

    await expect(postJson('https://vendor.example/v1/run', {}, { ...options, fetchFn })).rejects.toThrow(
      'vendor returned a non-JSON body'
    );
  });
});

describe('createInsightGateway', () => {
  const baseEnv: EnvConfig = {
    finnhubApiKey: null,
    insightProvider: null,
    openaiApiKey: null,
    openaiModel: 'gpt-4o-mini',
    anthropicApiKey: null,
    anthropicModel: 'claude-3-haiku-20240307',
    cacheDbPath: ':memory:',
    logLevel: 'silent',
    nodeEnv: 'test',
  };

  it('returns null when no provider is configured', () => {
    expect(createInsightGateway(baseEnv)).toBeNull();
  });

  it('builds the configured vendor gateway', () => {
    const gateway = createInsightGateway({ ...baseEnv, insightProvider: 'openai', openaiApiKey: 'test-secret' });
    expect(gateway).toBeInstanceOf(OpenAiInsightGateway);
    expect(gateway?.model).toBe('gpt-4o-mini');
  });

  it('builds the template gateway without a key', () => {
    expect(createInsightGateway({ ...baseEnv, insightProvider: 'template' })).toBeInstanceOf(
      TemplateInsightGateway
    );
  });

  it('requires the vendor key', () => {
    expect(() => createInsightGateway({ ...baseEnv, insightProvider: 'anthropic' })).toThrow(
      'ANTHROPIC_API_KEY is required for the anthropic insight provider'
    );
  });
});
