import { getEnvConfig, requireAlphaVantageApiKey } from '@/core/env';
import { AlphaVantageClient } from './alphavantage/client';
import { AlphaVantageProvider } from './alphavantage/provider';
import { LocalFileProvider } from './file_provider';
import type { DataProvider, ProviderType } from './types';

export interface CreateProviderOptions {
  /** Directory of `<SYMBOL>.json` bundles for the file provider. */
  dataDir?: string;
}

/**
 * Create the data provider based on ENV configuration.
 *
 * ENV:
 * - MARKET_DATA_PROVIDER: 'alphavantage' | 'file'
 * - ALPHA_VANTAGE_API_KEY: required for 'alphavantage'
 *
 * Default: 'alphavantage'
 */
export function createProvider(
  providerType?: ProviderType,
  options: CreateProviderOptions = {}
): DataProvider {
  const type = providerType ?? getEnvConfig().provider;

  switch (type) {
    case 'file':
      return new LocalFileProvider(options.dataDir);
    case 'alphavantage':
      return new AlphaVantageProvider(new AlphaVantageClient(requireAlphaVantageApiKey()));
  }
}
