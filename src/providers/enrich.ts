/**
 * Fill balance-sheet snapshot fields the overview endpoint does not carry
 * (TotalDebt, TotalCash, InterestExpense) from the latest annual statements.
 * Values already present on the overview win.
 */

import { toNullableNumber } from '@/valuation/normalize';
import type { CompanyOverview, FinancialStatements, StatementRecord } from '@/valuation/types';

type Derivation = (balance: StatementRecord, income: StatementRecord) => number | null;

const firstNumber = (record: StatementRecord, keys: string[]): number | null => {
  for (const key of keys) {
    const value = toNullableNumber(record[key]);
    if (value !== null) return value;
  }
  return null;
};

const DERIVATIONS: Record<'TotalDebt' | 'TotalCash' | 'InterestExpense', Derivation> = {
  TotalDebt: (balance) => {
    const total = firstNumber(balance, ['shortLongTermDebtTotal']);
    if (total !== null) return total;
    const shortTerm = firstNumber(balance, ['shortTermDebt', 'currentDebt']);
    const longTerm = firstNumber(balance, ['longTermDebt', 'longTermDebtNoncurrent']);
    if (shortTerm === null && longTerm === null) return null;
    return (shortTerm ?? 0) + (longTerm ?? 0);
  },
  TotalCash: (balance) =>
    firstNumber(balance, [
      'cashAndCashEquivalentsAtCarryingValue',
      'cashAndShortTermInvestments',
    ]),
  InterestExpense: (_balance, income) =>
    firstNumber(income, ['interestExpense', 'interestAndDebtExpense']),
};

export function enrichOverview(
  overview: CompanyOverview,
  financials: FinancialStatements
): { overview: CompanyOverview; derived: string[] } {
  const balance = financials.balance_sheet?.[0] ?? {};
  const income = financials.income_stmt?.[0] ?? {};
  const enriched: CompanyOverview = { ...overview };
  const derived: string[] = [];

  for (const [field, derive] of Object.entries(DERIVATIONS)) {
    if (toNullableNumber(enriched[field]) !== null) continue;
    const value = derive(balance, income);
    if (value !== null) {
      enriched[field] = value;
      derived.push(field);
    }
  }

  return { overview: enriched, derived };
}
