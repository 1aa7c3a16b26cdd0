/**
 * Valuation Policy
 *
 * Single source of the numeric constants the engine applies:
 *
 * - market risk premium 0.06
 * - cost of debt capped at 10%, 4% when it cannot be derived
 * - debt ratio capped at the industry target debt ratio
 * - WACC clamped to [6%, 15%]
 * - terminal growth = min(growth × 0.3, 2%)
 */

export interface ValuationPolicy {
  riskFreeRate: number;
  marketRiskPremium: number;
  taxRate: number;
  costOfDebtCap: number;
  fallbackCostOfDebt: number;
  /** Denominator used when market cap and debt are both zero. */
  nominalMarketCap: number;
  waccFloor: number;
  waccCeiling: number;
  /** Returned when the WACC computation yields a non-finite value. */
  fallbackWacc: number;
  terminalGrowthFactor: number;
  terminalGrowthCeiling: number;
  projectionYears: number;
  optimisticMultiplier: number;
  pessimisticMultiplier: number;
  fallbackShares: number;
}

export const DEFAULT_POLICY: ValuationPolicy = Object.freeze({
  riskFreeRate: 0.04,
  marketRiskPremium: 0.06,
  taxRate: 0.21,
  costOfDebtCap: 0.1,
  fallbackCostOfDebt: 0.04,
  nominalMarketCap: 1e9,
  waccFloor: 0.06,
  waccCeiling: 0.15,
  fallbackWacc: 0.1,
  terminalGrowthFactor: 0.3,
  terminalGrowthCeiling: 0.02,
  projectionYears: 5,
  optimisticMultiplier: 1.5,
  pessimisticMultiplier: 0.5,
  fallbackShares: 1,
});

export function resolvePolicy(overrides?: Partial<ValuationPolicy>): ValuationPolicy {
  if (!overrides) return DEFAULT_POLICY;
  return { ...DEFAULT_POLICY, ...overrides };
}
