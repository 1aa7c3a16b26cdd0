import { afterEach, describe, expect, it, vi } from 'vitest';
import {
  getEnvConfig,
  loadEnvConfig,
  requireAlphaVantageApiKey,
  resetEnvConfig,
} from '@/core/env';
import { createProvider } from '@/providers/registry';

afterEach(() => {
  vi.unstubAllEnvs();
  resetEnvConfig();
});

describe('loadEnvConfig', () => {
  it('reads known values and ignores unknown ones', () => {
    vi.stubEnv('MARKET_DATA_PROVIDER', 'file');
    vi.stubEnv('LOG_LEVEL', 'verbose');
    vi.stubEnv('ALPHA_VANTAGE_API_KEY', '  test-secret  ');

    const env = loadEnvConfig();

    expect(env.provider).toBe('file');
    expect(env.logLevel).toBe('info');
    expect(env.alphaVantageApiKey).toBe('test-secret');
  });

  it('defaults to the Alpha Vantage provider', () => {
    vi.stubEnv('MARKET_DATA_PROVIDER', '');

    expect(loadEnvConfig().provider).toBe('alphavantage');
  });
});

describe('requireAlphaVantageApiKey', () => {
  it('throws when the key is blank', () => {
    vi.stubEnv('ALPHA_VANTAGE_API_KEY', '   ');

    expect(() => requireAlphaVantageApiKey()).toThrow(
      'Missing required environment variable: ALPHA_VANTAGE_API_KEY'
    );
  });
});

describe('createProvider', () => {
  it('creates the file provider without an API key', () => {
    vi.stubEnv('ALPHA_VANTAGE_API_KEY', '');

    expect(createProvider('file', { dataDir: 'data/bundles' }).name).toBe('file');
  });

  it('creates the Alpha Vantage provider when a key is set', () => {
    vi.stubEnv('ALPHA_VANTAGE_API_KEY', 'test-secret');

    expect(createProvider('alphavantage').name).toBe('alphavantage');
  });

  it('falls back to MARKET_DATA_PROVIDER once the cached env is reset', () => {
    vi.stubEnv('MARKET_DATA_PROVIDER', 'file');
    resetEnvConfig();

    expect(getEnvConfig().provider).toBe('file');
    expect(createProvider().name).toBe('file');
  });

  it('refuses the Alpha Vantage provider without a key', () => {
    vi.stubEnv('ALPHA_VANTAGE_API_KEY', '');

    expect(() => createProvider('alphavantage')).toThrow('ALPHA_VANTAGE_API_KEY');
  });
});
