/**
 * Shared types and interfaces for market data providers.
 *
 * Providers hand the valuation engine a normalized input bundle (overview +
 * annual statements) while hiding the underlying source (Alpha Vantage HTTP
 * API vs. local JSON files).
 */
import type { CompanyOverview, FinancialStatements, ValuationInput } from '@/valuation/types';

export type ProviderType = 'alphavantage' | 'file';

export interface FetchBundleOptions {
  /** When false, cached payloads are ignored (fresh data is still written). */
  useCache?: boolean;
}

export interface DataProvider {
  readonly name: ProviderType;
  getOverview(symbol: string, options?: FetchBundleOptions): Promise<CompanyOverview>;
  getFinancials(symbol: string, options?: FetchBundleOptions): Promise<FinancialStatements>;
  getBundle(symbol: string, options?: FetchBundleOptions): Promise<ValuationInput>;
  getRequestCount(): number;
  close(): void;
}

export class ProviderError extends Error {
  constructor(
    message: string,
    public provider: string,
    public symbol: string,
    public method: string,
    public retryable: boolean = false,
    public cause?: Error
  ) {
    super(message);
    this.name = 'ProviderError';
  }
}
