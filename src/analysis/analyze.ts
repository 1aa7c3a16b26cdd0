/**
 * Per-ticker analysis: fetch the bundle, run every scenario, collect outcomes.
 * Tickers run one after another; a failing ticker is recorded and skipped.
 */

import { createChildLogger } from '@/utils/logger';
import { ProviderError, type DataProvider } from '@/providers/types';
import {
  DEFAULT_POLICY,
  classify,
  normalizeOverview,
  valuateAll,
  type IndustryKey,
  type ScenarioOutcomes,
  type ValuationPolicy,
} from '@/valuation';

const logger = createChildLogger('analyze');

export interface CompanySummary {
  name: string | null;
  sector: string;
  industry: string;
  industryProfile: IndustryKey;
  marketCap: number;
}

export type TickerAnalysis =
  | {
      ticker: string;
      status: 'ok';
      company: CompanySummary;
      outcomes: ScenarioOutcomes;
    }
  | {
      ticker: string;
      status: 'failed';
      error: { kind: 'ProviderError' | 'UnexpectedError'; message: string };
    };

export interface AnalyzeOptions {
  useCache?: boolean;
  policy?: ValuationPolicy;
}

export async function analyzeTicker(
  ticker: string,
  provider: DataProvider,
  options: AnalyzeOptions = {}
): Promise<TickerAnalysis> {
  const symbol = ticker.trim().toUpperCase();
  const policy = options.policy ?? DEFAULT_POLICY;

  try {
    const bundle = await provider.getBundle(symbol, { useCache: options.useCache ?? true });
    const overview = normalizeOverview(bundle.overview);
    const profile = classify(overview.sector, overview.industry, overview.beta);
    const outcomes = valuateAll(symbol, bundle, policy);

    const failed = Object.values(outcomes).filter((o) => !o.ok).length;
    logger.info({ symbol, industry: profile.key, failedScenarios: failed }, 'Valuation complete');

    return {
      ticker: symbol,
      status: 'ok',
      company: {
        name: overview.name,
        sector: overview.sector,
        industry: overview.industry,
        industryProfile: profile.key,
        marketCap: overview.marketCap,
      },
      outcomes,
    };
  } catch (error) {
    const kind = error instanceof ProviderError ? 'ProviderError' : 'UnexpectedError';
    const message = error instanceof Error ? error.message : String(error);
    logger.error({ symbol, kind, error: message }, 'Analysis failed');
    return { ticker: symbol, status: 'failed', error: { kind, message } };
  }
}

export async function analyzeTickers(
  tickers: string[],
  provider: DataProvider,
  options: AnalyzeOptions = {},
  onResult?: (analysis: TickerAnalysis) => void
): Promise<TickerAnalysis[]> {
  const results: TickerAnalysis[] = [];
  for (const ticker of tickers) {
    const analysis = await analyzeTicker(ticker, provider, options);
    onResult?.(analysis);
    results.push(analysis);
  }
  return results;
}
