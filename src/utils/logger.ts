/**
 * Logging with Pino - API keys are redacted, output goes to stderr
 */

import pino from 'pino';
import { getEnvConfig, type EnvConfig } from '@/core/env';

const redactPaths = [
  'apiKey',
  'apikey',
  'api_key',
  'alphaVantageApiKey',
  'token',
  'url',
  '*.apiKey',
  '*.apikey',
  '*.url',
];

/**
 * Logs always go to stderr so stdout stays clean for tables and --json output.
 */
export function createLogger(env: Pick<EnvConfig, 'logLevel' | 'nodeEnv'>): pino.Logger {
  const options: pino.LoggerOptions = {
    level: env.logLevel,
    redact: {
      paths: redactPaths,
      censor: '[REDACTED]',
    },
  };

  if (env.nodeEnv === 'development') {
    return pino({
      ...options,
      transport: {
        target: 'pino-pretty',
        options: {
          colorize: true,
          ignore: 'pid,hostname',
          destination: 2,
        },
      },
    });
  }

  return pino(options, pino.destination(2));
}

export const logger = createLogger(getEnvConfig());

export function createChildLogger(name: string) {
  return logger.child({ module: name });
}
