/**
 * Environment variable handling with validation
 * API keys are never logged or exposed
 */

import type { ProviderType } from '@/providers/types';

export interface EnvConfig {
  alphaVantageApiKey: string | null;
  provider: ProviderType;
  dbPath: string | null;
  logLevel: 'debug' | 'info' | 'warn' | 'error' | 'silent';
  nodeEnv: 'development' | 'production' | 'test';
}

const PROVIDER_TYPES: readonly ProviderType[] = ['alphavantage', 'file'];
const LOG_LEVELS: readonly EnvConfig['logLevel'][] = ['debug', 'info', 'warn', 'error', 'silent'];
const NODE_ENVS: readonly EnvConfig['nodeEnv'][] = ['development', 'production', 'test'];

function getEnvVar(name: string): string | undefined {
  const value = process.env[name]?.trim();
  return value ? value : undefined;
}

function pick<T extends string>(raw: string | undefined, allowed: readonly T[], fallback: T): T {
  return allowed.find((candidate) => candidate === raw) ?? fallback;
}

export function loadEnvConfig(): EnvConfig {
  return {
    alphaVantageApiKey: getEnvVar('ALPHA_VANTAGE_API_KEY') ?? null,
    provider: pick(getEnvVar('MARKET_DATA_PROVIDER'), PROVIDER_TYPES, 'alphavantage'),
    dbPath: getEnvVar('DB_PATH') ?? null,
    logLevel: pick(getEnvVar('LOG_LEVEL'), LOG_LEVELS, 'info'),
    nodeEnv: pick(process.env.NODE_ENV, NODE_ENVS, 'development'),
  };
}

export function requireAlphaVantageApiKey(): string {
  const key = getEnvVar('ALPHA_VANTAGE_API_KEY');
  if (!key) {
    throw new Error('Missing required environment variable: ALPHA_VANTAGE_API_KEY');
  }
  return key;
}

let cachedConfig: EnvConfig | null = null;

export function getEnvConfig(): EnvConfig {
  if (!cachedConfig) {
    cachedConfig = loadEnvConfig();
  }
  return cachedConfig;
}

export function resetEnvConfig(): void {
  cachedConfig = null;
}
