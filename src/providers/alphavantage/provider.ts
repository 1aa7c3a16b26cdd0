/**
 * Alpha Vantage data provider
 *
 * Overview = OVERVIEW + GLOBAL_QUOTE price (as MarketPrice).
 * Financials = annual CASH_FLOW, BALANCE_SHEET, INCOME_STATEMENT.
 * Both payloads are cached per symbol with the TTLs from config/cache_ttl.json.
 */

import { getConfig } from '@/core/config';
import { formatTimestamp, hoursToSeconds } from '@/core/time';
import { createChildLogger } from '@/utils/logger';
import type { CompanyOverview, FinancialStatements, ValuationInput } from '@/valuation/types';
import { sqlitePayloadCache, type PayloadCache } from '../cache';
import { enrichOverview } from '../enrich';
import {
  ProviderError,
  type DataProvider,
  type FetchBundleOptions,
} from '../types';
import { AlphaVantageClient } from './client';

const logger = createChildLogger('alphavantage_provider');

const SOURCE = 'alphavantage';

export interface AlphaVantageProviderOptions {
  cache?: PayloadCache;
  overviewTtlHours?: number;
  statementsTtlHours?: number;
}

export class AlphaVantageProvider implements DataProvider {
  readonly name = 'alphavantage' as const;
  private readonly cache: PayloadCache;
  private readonly overviewTtlSeconds: number;
  private readonly statementsTtlSeconds: number;

  constructor(
    private readonly client: AlphaVantageClient,
    options: AlphaVantageProviderOptions = {}
  ) {
    this.cache = options.cache ?? sqlitePayloadCache;
    const overviewHours =
      options.overviewTtlHours ?? getConfig().cacheTtl.overview_ttl_hours;
    const statementsHours =
      options.statementsTtlHours ?? getConfig().cacheTtl.statements_ttl_hours;
    this.overviewTtlSeconds = hoursToSeconds(overviewHours);
    this.statementsTtlSeconds = hoursToSeconds(statementsHours);
  }

  getRequestCount(): number {
    return this.client.getRequestCount();
  }

  close(): void {
    // HTTP client holds no persistent resources
  }

  async getOverview(
    symbol: string,
    options: FetchBundleOptions = {}
  ): Promise<CompanyOverview> {
    const { useCache = true } = options;
    if (useCache) {
      const cached = this.cache.get<CompanyOverview>(symbol, 'overview', SOURCE);
      if (cached) {
        logger.debug(
          { symbol, fetchedAt: formatTimestamp(cached.fetchedAt) },
          'Using cached overview'
        );
        return cached.data;
      }
    }

    logger.info({ symbol }, 'Fetching overview and quote from Alpha Vantage');
    const overview: CompanyOverview = { ...(await this.client.fetchOverview(symbol)) };
    if (Object.keys(overview).length === 0) {
      throw new ProviderError(
        `No overview data returned for ${symbol}`,
        SOURCE,
        symbol,
        'getOverview'
      );
    }

    const price = await this.client.fetchQuotePrice(symbol);
    if (price !== null) {
      overview.MarketPrice = price;
    } else {
      logger.warn({ symbol }, 'Quote returned no price');
    }

    this.cache.save(symbol, 'overview', SOURCE, overview, this.overviewTtlSeconds);
    return overview;
  }

  async getFinancials(
    symbol: string,
    options: FetchBundleOptions = {}
  ): Promise<FinancialStatements> {
    const { useCache = true } = options;
    if (useCache) {
      const cached = this.cache.get<FinancialStatements>(symbol, 'financials', SOURCE);
      if (cached) {
        logger.debug(
          { symbol, fetchedAt: formatTimestamp(cached.fetchedAt) },
          'Using cached financial statements'
        );
        return cached.data;
      }
    }

    logger.info({ symbol }, 'Fetching annual statements from Alpha Vantage');

    // Sequential on purpose: the shared rate limiter spaces these out anyway
    const cashFlow = await this.client.fetchCashFlow(symbol);
    if (cashFlow.length === 0) {
      throw new ProviderError(
        `Cash flow statement is empty for ${symbol}`,
        SOURCE,
        symbol,
        'getFinancials'
      );
    }
    const balanceSheet = await this.client.fetchBalanceSheet(symbol);
    const incomeStatement = await this.client.fetchIncomeStatement(symbol);

    const financials: FinancialStatements = {
      cash_flow: cashFlow,
      balance_sheet: balanceSheet,
      income_stmt: incomeStatement,
    };

    this.cache.save(symbol, 'financials', SOURCE, financials, this.statementsTtlSeconds);
    return financials;
  }

  async getBundle(symbol: string, options: FetchBundleOptions = {}): Promise<ValuationInput> {
    const rawOverview = await this.getOverview(symbol, options);
    const financials = await this.getFinancials(symbol, options);
    const { overview, derived } = enrichOverview(rawOverview, financials);
    if (derived.length > 0) {
      logger.debug({ symbol, derived }, 'Derived overview fields from statements');
    }
    return { overview, financials };
  }
}
