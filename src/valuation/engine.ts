/**
 * DCF Valuation Engine
 *
 * Pure and synchronous. Each call derives its own profile, WACC and growth
 * rates from the input bundle, so scenarios (and tickers) can be evaluated in
 * any order or in parallel by the caller.
 *
 * Steps per scenario:
 * 1. Historical FCF (most recent first); fail with InsufficientData when empty
 *    or when the latest year is not positive
 * 2. WACC from the overview and industry profile
 * 3. Growth triple, pick the scenario's rate
 * 4. Project N years, Gordon terminal value, discount both
 * 5. Bridge EV → equity → per share → upside; fail with NonFiniteResult if
 *    any of those overflows
 */

import { classify } from './industry';
import { normalizeOverview } from './normalize';
import { DEFAULT_POLICY, type ValuationPolicy } from './policy';
import { computeWACCBreakdown } from './formulas/wacc';
import { deriveGrowthRates } from './formulas/growth';
import {
  discountFactor,
  extractFCF,
  presentValue,
  project,
  terminalValue,
} from './formulas/cash_flow';
import {
  SCENARIOS,
  ValuationError,
  type GrowthRates,
  type IndustryProfile,
  type NormalizedOverview,
  type Scenario,
  type ScenarioOutcome,
  type ScenarioOutcomes,
  type ScenarioResult,
  type ValuationInput,
  type ValuationWarning,
} from './types';

export interface EquityBridge {
  enterpriseValue: number;
  equityValue: number;
  pricePerShare: number;
  upside: number;
  warnings: ValuationWarning[];
}

/**
 * Enterprise value → per-share price and upside. Shares ≤ 0 fall back to
 * `policy.fallbackShares`; a missing current price leaves upside at 0.
 */
export function bridgeToEquity(
  enterpriseValue: number,
  overview: Pick<NormalizedOverview, 'totalDebt' | 'totalCash' | 'sharesOutstanding' | 'currentPrice'>,
  policy: ValuationPolicy = DEFAULT_POLICY
): EquityBridge {
  const warnings: ValuationWarning[] = [];
  const equityValue = enterpriseValue - (overview.totalDebt - overview.totalCash);

  let shares = overview.sharesOutstanding;
  if (!(shares > 0)) {
    shares = policy.fallbackShares;
    warnings.push({
      kind: 'ConfigurationDefault',
      field: 'SharesOutstanding',
      fallback: policy.fallbackShares,
    });
  }
  const pricePerShare = equityValue / shares;

  let upside = 0;
  if (overview.currentPrice > 0) {
    upside = (pricePerShare / overview.currentPrice - 1) * 100;
  } else {
    warnings.push({ kind: 'UpsideUndetermined', reason: 'No positive MarketPrice or Price' });
  }

  return { enterpriseValue, equityValue, pricePerShare, upside, warnings };
}

function overviewWarnings(
  overview: NormalizedOverview,
  profile: Pick<IndustryProfile, 'beta' | 'betaSource'>
): ValuationWarning[] {
  return overview.defaulted
    // shares are reported by bridgeToEquity with the fallback actually applied
    .filter((field) => field !== 'SharesOutstanding')
    // a profile-fixed beta never reads the overview
    .filter((field) => field !== 'Beta' || profile.betaSource !== 'profile')
    .map((field) => ({
      kind: 'ConfigurationDefault' as const,
      field,
      fallback: field === 'Beta' ? profile.beta : 0,
    }));
}

function assertFinite(bridge: EquityBridge): void {
  const fields = ['enterpriseValue', 'equityValue', 'pricePerShare', 'upside'] as const;
  const bad = fields.find((field) => !Number.isFinite(bridge[field]));
  if (bad) {
    throw new ValuationError('NonFiniteResult', `${bad} is not a finite number (${bridge[bad]})`);
  }
}

function selectRate(rates: GrowthRates, scenario: Scenario): number {
  switch (scenario) {
    case 'optimistic':
      return rates.optimistic;
    case 'pessimistic':
      return rates.pessimistic;
    case 'base':
      return rates.base;
  }
}

function computeScenario(
  ticker: string,
  input: ValuationInput,
  scenario: Scenario,
  policy: ValuationPolicy
): ScenarioResult {
  const history = extractFCF(input.financials.cash_flow ?? []);
  if (history.length === 0) {
    throw new ValuationError('InsufficientData', 'No historical free cash flow available');
  }
  const currentFCF = history[0];
  if (currentFCF <= 0) {
    throw new ValuationError(
      'InsufficientData',
      `Most recent free cash flow is not positive (${currentFCF})`
    );
  }

  const overview = normalizeOverview(input.overview);
  const profile = classify(overview.sector, overview.industry, overview.beta);
  const waccBreakdown = computeWACCBreakdown(overview, profile, policy);
  const wacc = waccBreakdown.wacc;

  const rates = deriveGrowthRates(history, profile, policy);
  const growthRate = selectRate(rates, scenario);

  const projected = project(currentFCF, growthRate, policy.projectionYears);
  const finalYear = projected[projected.length - 1] ?? currentFCF;
  const terminal = terminalValue(finalYear, growthRate, wacc, policy);

  const enterpriseValue =
    presentValue(projected, wacc) + terminal.value / discountFactor(wacc, policy.projectionYears);

  const bridge = bridgeToEquity(enterpriseValue, overview, policy);
  assertFinite(bridge);
  const warnings: ValuationWarning[] = [
    ...overviewWarnings(overview, profile),
    ...bridge.warnings,
  ];
  if (waccBreakdown.usedFallback) {
    warnings.push({ kind: 'WaccFallback', fallback: policy.fallbackWacc });
  }

  return {
    ticker,
    scenario,
    industry: profile.key,
    enterpriseValue: bridge.enterpriseValue,
    equityValue: bridge.equityValue,
    pricePerShare: bridge.pricePerShare,
    currentPrice: overview.currentPrice,
    upside: bridge.upside,
    wacc,
    growthRate,
    growthSource: rates.source,
    terminalGrowth: terminal.terminalGrowth,
    terminalValue: terminal.value,
    projectedCashFlows: projected,
    warnings,
    lowConfidence: warnings.some((w) => w.kind !== 'UpsideUndetermined'),
  };
}

export function valuate(
  ticker: string,
  input: ValuationInput,
  scenario: Scenario = 'base',
  policy: ValuationPolicy = DEFAULT_POLICY
): ScenarioOutcome {
  try {
    return { ok: true, result: computeScenario(ticker, input, scenario, policy) };
  } catch (error) {
    if (error instanceof ValuationError) {
      return { ok: false, scenario, error };
    }
    throw error;
  }
}

export function valuateAll(
  ticker: string,
  input: ValuationInput,
  policy: ValuationPolicy = DEFAULT_POLICY
): ScenarioOutcomes {
  const [base, optimistic, pessimistic] = SCENARIOS.map((scenario) =>
    valuate(ticker, input, scenario, policy)
  );
  return { base, optimistic, pessimistic };
}
