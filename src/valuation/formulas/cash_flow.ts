/**
 * Free cash flow extraction, projection and discounting.
 */

import { DEFAULT_POLICY, type ValuationPolicy } from '../policy';
import { statementNumber } from '../normalize';
import { ValuationError, type StatementRecord } from '../types';

/**
 * FCF = operating cash flow − |capex|, same order as the input. Records without
 * a usable `operatingCashflow` are skipped rather than zero-filled; a missing
 * capex counts as zero.
 */
export function extractFCF(cashFlowRecords: readonly StatementRecord[]): number[] {
  const fcf: number[] = [];
  for (const record of cashFlowRecords) {
    const operating = statementNumber(record.operatingCashflow);
    if (operating === null) continue;
    const capex = statementNumber(record.capitalExpenditures) ?? 0;
    fcf.push(operating - Math.abs(capex));
  }
  return fcf;
}

export function project(currentFCF: number, growthRate: number, years = 5): number[] {
  return Array.from({ length: years }, (_, i) => currentFCF * (1 + growthRate) ** (i + 1));
}

export function cappedTerminalGrowth(
  growthRate: number,
  policy: ValuationPolicy = DEFAULT_POLICY
): number {
  return Math.min(growthRate * policy.terminalGrowthFactor, policy.terminalGrowthCeiling);
}

function assertDiscountable(waccRate: number): void {
  if (!Number.isFinite(waccRate) || 1 + waccRate <= 0) {
    throw new ValuationError('InvalidDiscountRate', `Discount rate ${waccRate} cannot be applied`);
  }
}

/**
 * Gordon growth terminal value on the final projected year.
 * Throws `TerminalValueUndefined` when WACC does not exceed terminal growth.
 */
export function terminalValue(
  finalYearFCF: number,
  growthRate: number,
  waccRate: number,
  policy: ValuationPolicy = DEFAULT_POLICY
): { value: number; terminalGrowth: number } {
  const terminalGrowth = cappedTerminalGrowth(growthRate, policy);
  if (!(waccRate > terminalGrowth)) {
    throw new ValuationError(
      'TerminalValueUndefined',
      `Terminal value undefined: WACC ${waccRate} does not exceed terminal growth ${terminalGrowth}`
    );
  }
  return {
    value: (finalYearFCF * (1 + terminalGrowth)) / (waccRate - terminalGrowth),
    terminalGrowth,
  };
}

export function discountFactor(waccRate: number, period: number): number {
  assertDiscountable(waccRate);
  return (1 + waccRate) ** period;
}

export function presentValue(cashFlows: readonly number[], waccRate: number): number {
  assertDiscountable(waccRate);
  return cashFlows.reduce((sum, cf, i) => sum + cf / (1 + waccRate) ** (i + 1), 0);
}
