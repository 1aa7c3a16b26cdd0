/**
 * Local JSON bundle provider
 *
 * Reads `<dataDir>/<SYMBOL>.json` files shaped like
 * `{ overview: {...}, financials: { cash_flow: [...], ... } }` and validates
 * them against schemas/valuation_input.v1.schema.json.
 */

import { existsSync, readFileSync } from 'fs';
import { join } from 'path';
import { createChildLogger } from '@/utils/logger';
import { validateInput } from '@/validation/ajv_instance';
import type { CompanyOverview, FinancialStatements, ValuationInput } from '@/valuation/types';
import { enrichOverview } from './enrich';
import { ProviderError, type DataProvider } from './types';

const logger = createChildLogger('file_provider');

export class LocalFileProvider implements DataProvider {
  readonly name = 'file' as const;
  private requestCount = 0;
  private readonly bundles = new Map<string, ValuationInput>();

  constructor(private readonly dataDir: string = join(process.cwd(), 'data', 'bundles')) {}

  getRequestCount(): number {
    return this.requestCount;
  }

  close(): void {
    this.bundles.clear();
  }

  private load(symbol: string, method: string): ValuationInput {
    const key = symbol.trim().toUpperCase();
    const cached = this.bundles.get(key);
    if (cached) return cached;

    const path = join(this.dataDir, `${key}.json`);
    if (!existsSync(path)) {
      throw new ProviderError(`No bundle file at ${path}`, 'file', key, method);
    }

    this.requestCount++;
    let parsed: unknown;
    try {
      parsed = JSON.parse(readFileSync(path, 'utf-8'));
    } catch (error) {
      const cause = error instanceof Error ? error : new Error(String(error));
      throw new ProviderError(`Unreadable bundle file ${path}`, 'file', key, method, false, cause);
    }

    const result = validateInput(parsed);
    if (!result.valid) {
      throw new ProviderError(
        `Invalid bundle file ${path}: ${result.errors.join('; ')}`,
        'file',
        key,
        method
      );
    }

    const bundle: ValuationInput = {
      overview: result.data.overview,
      financials: {
        cash_flow: result.data.financials.cash_flow,
        balance_sheet: result.data.financials.balance_sheet ?? [],
        income_stmt: result.data.financials.income_stmt ?? [],
      },
    };
    logger.debug({ symbol: key, path }, 'Loaded bundle from disk');
    this.bundles.set(key, bundle);
    return bundle;
  }

  async getOverview(symbol: string): Promise<CompanyOverview> {
    return this.load(symbol, 'getOverview').overview;
  }

  async getFinancials(symbol: string): Promise<FinancialStatements> {
    return this.load(symbol, 'getFinancials').financials;
  }

  async getBundle(symbol: string): Promise<ValuationInput> {
    const bundle = this.load(symbol, 'getBundle');
    return { ...bundle, overview: enrichOverview(bundle.overview, bundle.financials).overview };
  }
}
