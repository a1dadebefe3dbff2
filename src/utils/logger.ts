/**
 * Logging with Pino - API keys are redacted
 */

import pino from 'pino';

const redactPaths = [
  'apiKey',
  'api_key',
  'finnhubApiKey',
  'openaiApiKey',
  'anthropicApiKey',
  'authorization',
  'Authorization',
  'x-api-key',
  'token',
  '*.apiKey',
  '*.api_key',
  '*.token',
  'headers.authorization',
  'headers.Authorization',
  'headers["x-api-key"]',
];

const nodeEnv = process.env.NODE_ENV;
const usePretty = nodeEnv !== 'production' && nodeEnv !== 'test';

export const logger = pino({
  level: process.env.LOG_LEVEL || (nodeEnv === 'test' ? 'silent' : 'info'),
  redact: {
    paths: redactPaths,
    censor: '[REDACTED]',
  },
  transport: usePretty
    ? {
        target: 'pino-pretty',
        options: {
          colorize: true,
          ignore: 'pid,hostname',
        },
      }
    : undefined,
});

export type Logger = pino.Logger;

export function createChildLogger(name: string): Logger {
  return logger.child({ module: name });
}
