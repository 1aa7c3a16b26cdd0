import { DEFAULT_POLICY, type ValuationPolicy } from '../policy';
import type { IndustryProfile, NormalizedOverview, WaccBreakdown } from '../types';

type WaccInputs = Pick<
  NormalizedOverview,
  'totalDebt' | 'interestExpense' | 'marketCap'
>;

/**
 * WACC with every intermediate exposed. Never throws: a non-finite result is
 * replaced by `policy.fallbackWacc` and flagged with `usedFallback`.
 */
export function computeWACCBreakdown(
  overview: WaccInputs,
  profile: Pick<IndustryProfile, 'beta' | 'targetDebtRatio'>,
  policy: ValuationPolicy = DEFAULT_POLICY
): WaccBreakdown {
  const costOfEquity = policy.riskFreeRate + profile.beta * policy.marketRiskPremium;

  const { totalDebt, interestExpense, marketCap } = overview;
  const costOfDebt =
    totalDebt > 0 && interestExpense > 0
      ? Math.min(interestExpense / totalDebt, policy.costOfDebtCap)
      : policy.fallbackCostOfDebt;

  const debt = Math.max(totalDebt, 0);
  const totalCapital = marketCap + debt > 0 ? marketCap + debt : policy.nominalMarketCap + debt;
  const debtRatio = Math.min(debt / totalCapital, profile.targetDebtRatio);
  const equityRatio = 1 - debtRatio;

  const unclamped =
    equityRatio * costOfEquity + debtRatio * costOfDebt * (1 - policy.taxRate);

  if (!Number.isFinite(unclamped)) {
    return {
      wacc: policy.fallbackWacc,
      costOfEquity,
      costOfDebt,
      debtRatio,
      equityRatio,
      unclamped,
      clamped: false,
      usedFallback: true,
    };
  }

  const wacc = Math.min(Math.max(unclamped, policy.waccFloor), policy.waccCeiling);
  return {
    wacc,
    costOfEquity,
    costOfDebt,
    debtRatio,
    equityRatio,
    unclamped,
    clamped: wacc !== unclamped,
    usedFallback: false,
  };
}

export function computeWACC(
  overview: WaccInputs,
  profile: Pick<IndustryProfile, 'beta' | 'targetDebtRatio'>,
  policy: ValuationPolicy = DEFAULT_POLICY
): number {
  return computeWACCBreakdown(overview, profile, policy).wacc;
}
