/**
 * Environment variable handling with validation
 * API keys are never logged or exposed
 */

export type InsightProviderName = 'openai' | 'anthropic' | 'template';

export interface EnvConfig {
  finnhubApiKey: string | null;
  insightProvider: InsightProviderName | null;
  openaiApiKey: string | null;
  openaiModel: string;
  anthropicApiKey: string | null;
  anthropicModel: string;
  cacheDbPath: string;
  logLevel: 'debug' | 'info' | 'warn' | 'error' | 'silent';
  nodeEnv: 'development' | 'production' | 'test';
}

function getEnvVar(name: string, required: boolean = false): string | undefined {
  const value = process.env[name]?.trim();
  if (required && !value) {
    throw new Error(`Missing required environment variable: ${name}`);
  }
  return value || undefined;
}

const LOG_LEVELS: ReadonlyArray<EnvConfig['logLevel']> = ['debug', 'info', 'warn', 'error', 'silent'];
const NODE_ENVS: ReadonlyArray<EnvConfig['nodeEnv']> = ['development', 'production', 'test'];

function pickOne<T extends string>(raw: string | undefined, allowed: ReadonlyArray<T>, fallback: T): T {
  return allowed.find((candidate) => candidate === raw) ?? fallback;
}

function parseInsightProvider(raw: string | undefined): InsightProviderName | null {
  switch (raw?.toLowerCase()) {
    case 'openai':
      return 'openai';
    case 'anthropic':
      return 'anthropic';
    case 'template':
      return 'template';
    default:
      return null;
  }
}

export function loadEnvConfig(): EnvConfig {
  const insightProvider = parseInsightProvider(getEnvVar('INSIGHT_PROVIDER'));

  return {
    finnhubApiKey: getEnvVar('FINNHUB_API_KEY') ?? null,
    insightProvider,
    openaiApiKey:
      insightProvider === 'openai'
        ? getEnvVar('OPENAI_API_KEY', true) ?? null
        : getEnvVar('OPENAI_API_KEY') ?? null,
    openaiModel: getEnvVar('OPENAI_MODEL') ?? 'gpt-4o-mini',
    anthropicApiKey:
      insightProvider === 'anthropic'
        ? getEnvVar('ANTHROPIC_API_KEY', true) ?? null
        : getEnvVar('ANTHROPIC_API_KEY') ?? null,
    anthropicModel: getEnvVar('ANTHROPIC_MODEL') ?? 'claude-3-haiku-20240307',
    cacheDbPath: getEnvVar('CACHE_DB_PATH') ?? 'data/cache.db',
    logLevel: pickOne(getEnvVar('LOG_LEVEL'), LOG_LEVELS, 'info'),
    nodeEnv: pickOne(process.env.NODE_ENV, NODE_ENVS, 'development'),
  };
}

let cachedConfig: EnvConfig | null = null;

export function getEnvConfig(): EnvConfig {
  if (!cachedConfig) {
    cachedConfig = loadEnvConfig();
  }
  return cachedConfig;
}
