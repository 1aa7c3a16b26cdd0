/**
 * Alpha Vantage API Client
 * Rate-limited with exponential backoff and a per-request timeout
 */

import { createChildLogger } from '@/utils/logger';
import { ProviderError } from '@/providers/types';
import { getRateLimiter, type RateLimiter } from '../rate_limiter';
import type {
  AlphaVantageFunction,
  AlphaVantageNotice,
  AlphaVantageReport,
} from './types';

const logger = createChildLogger('alphavantage');

const BASE_URL = 'https://www.alphavantage.co/query';

export interface AlphaVantageClientOptions {
  baseUrl?: string;
  maxRetries?: number;
  initialBackoffMs?: number;
  timeoutMs?: number;
  rateLimiter?: RateLimiter;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function toReport(record: Record<string, unknown>): AlphaVantageReport {
  const report: AlphaVantageReport = {};
  for (const [key, value] of Object.entries(record)) {
    if (typeof value === 'string') report[key] = value;
  }
  return report;
}

function readNotice(payload: Record<string, unknown>): AlphaVantageNotice {
  const text = (key: keyof AlphaVantageNotice) =>
    typeof payload[key] === 'string' ? String(payload[key]) : undefined;
  return {
    Note: text('Note'),
    Information: text('Information'),
    'Error Message': text('Error Message'),
  };
}

export class AlphaVantageClient {
  private readonly apiKey: string;
  private readonly baseUrl: string;
  private readonly maxRetries: number;
  private readonly initialBackoffMs: number;
  private readonly timeoutMs: number;
  private readonly rateLimiter: RateLimiter;
  private requestCount = 0;

  constructor(apiKey: string, options: AlphaVantageClientOptions = {}) {
    this.apiKey = apiKey;
    this.baseUrl = options.baseUrl ?? BASE_URL;
    this.maxRetries = options.maxRetries ?? 3;
    this.initialBackoffMs = options.initialBackoffMs ?? 1000;
    this.timeoutMs = options.timeoutMs ?? 15_000;
    this.rateLimiter = options.rateLimiter ?? getRateLimiter();
  }

  getRequestCount(): number {
    return this.requestCount;
  }

  private async request(fn: AlphaVantageFunction, symbol: string): Promise<Record<string, unknown>> {
    const url = new URL(this.baseUrl);
    url.searchParams.set('function', fn);
    url.searchParams.set('symbol', symbol);
    url.searchParams.set('apikey', this.apiKey);

    await this.rateLimiter.acquire();
    try {
      const response = await fetch(url.toString(), {
        signal: AbortSignal.timeout(this.timeoutMs),
      });
      this.requestCount++;

      if (response.status === 429 || response.status >= 500) {
        throw new ProviderError(
          `Alpha Vantage API error: ${response.status} ${response.statusText}`,
          'alphavantage',
          symbol,
          fn,
          true
        );
      }

      if (!response.ok) {
        throw new ProviderError(
          `Alpha Vantage API error: ${response.status} ${response.statusText}`,
          'alphavantage',
          symbol,
          fn
        );
      }

      const payload: unknown = await response.json();
      if (!isRecord(payload)) {
        throw new ProviderError('Unexpected Alpha Vantage payload', 'alphavantage', symbol, fn);
      }

      const notice = readNotice(payload);
      if (notice['Error Message']) {
        throw new ProviderError(notice['Error Message'], 'alphavantage', symbol, fn);
      }
      const throttle = notice.Note ?? notice.Information;
      if (throttle) {
        throw new ProviderError(throttle, 'alphavantage', symbol, fn, true);
      }

      return payload;
    } finally {
      this.rateLimiter.release();
    }
  }

  private async fetchWithRetry(
    fn: AlphaVantageFunction,
    symbol: string
  ): Promise<Record<string, unknown>> {
    let lastError: Error | null = null;

    for (let attempt = 0; attempt <= this.maxRetries; attempt++) {
      try {
        return await this.request(fn, symbol);
      } catch (error) {
        lastError = error instanceof Error ? error : new Error(String(error));
        // Timeouts and network failures surface as plain errors and are retried
        const retryable = !(lastError instanceof ProviderError) || lastError.retryable;
        if (!retryable || attempt === this.maxRetries) break;

        const backoffMs = this.initialBackoffMs * Math.pow(2, attempt);
        logger.warn(
          { fn, symbol, attempt, backoffMs, error: lastError.message },
          'Alpha Vantage request failed, retrying'
        );
        await this.sleep(backoffMs);
      }
    }

    if (lastError instanceof ProviderError) throw lastError;
    throw new ProviderError(
      lastError?.message ?? 'Alpha Vantage request failed after retries',
      'alphavantage',
      symbol,
      fn,
      false,
      lastError ?? undefined
    );
  }

  private sleep(ms: number): Promise<void> {
    return new Promise((resolve) => setTimeout(resolve, ms));
  }

  async fetchOverview(symbol: string): Promise<AlphaVantageReport> {
    const payload = await this.fetchWithRetry('OVERVIEW', symbol);
    return toReport(payload);
  }

  /** Latest traded price, or null when the quote is empty. */
  async fetchQuotePrice(symbol: string): Promise<number | null> {
    const payload = await this.fetchWithRetry('GLOBAL_QUOTE', symbol);
    const quote = payload['Global Quote'];
    const raw = isRecord(quote) ? quote['05. price'] : undefined;
    const price = typeof raw === 'string' ? Number(raw) : NaN;
    return Number.isFinite(price) && price > 0 ? price : null;
  }

  private async fetchAnnualReports(
    fn: Extract<AlphaVantageFunction, 'CASH_FLOW' | 'BALANCE_SHEET' | 'INCOME_STATEMENT'>,
    symbol: string
  ): Promise<AlphaVantageReport[]> {
    const payload = await this.fetchWithRetry(fn, symbol);
    const reports = Array.isArray(payload.annualReports)
      ? payload.annualReports.filter(isRecord).map(toReport)
      : [];
    // Alpha Vantage already orders by fiscal year descending; enforce it anyway
    return [...reports].sort((a, b) =>
      (b.fiscalDateEnding ?? '').localeCompare(a.fiscalDateEnding ?? '')
    );
  }

  fetchCashFlow(symbol: string): Promise<AlphaVantageReport[]> {
    return this.fetchAnnualReports('CASH_FLOW', symbol);
  }

  fetchBalanceSheet(symbol: string): Promise<AlphaVantageReport[]> {
    return this.fetchAnnualReports('BALANCE_SHEET', symbol);
  }

  fetchIncomeStatement(symbol: string): Promise<AlphaVantageReport[]> {
    return this.fetchAnnualReports('INCOME_STATEMENT', symbol);
  }
}
