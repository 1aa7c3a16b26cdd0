import { describe, expect, it } from 'vitest';
import { enrichOverview } from '@/providers/enrich';
import type { FinancialStatements } from '@/valuation/types';

function statements(partial: Partial<FinancialStatements>): FinancialStatements {
  return { cash_flow: [], balance_sheet: [], income_stmt: [], ...partial };
}

describe('enrichOverview', () => {
  it('derives debt, cash and interest from the latest statements', () => {
    const { overview, derived } = enrichOverview(
      { Symbol: 'X' },
      statements({
        balance_sheet: [
          { shortLongTermDebtTotal: '1000', cashAndCashEquivalentsAtCarryingValue: '200' },
          { shortLongTermDebtTotal: '9999' },
        ],
        income_stmt: [{ interestExpense: '50' }],
      })
    );

    expect(overview).toEqual({ Symbol: 'X', TotalDebt: 1000, TotalCash: 200, InterestExpense: 50 });
    expect(derived).toEqual(['TotalDebt', 'TotalCash', 'InterestExpense']);
  });

  it('sums short and long term debt when no total is reported', () => {
    const { overview } = enrichOverview(
      {},
      statements({ balance_sheet: [{ shortTermDebt: 'None', currentDebt: '40', longTermDebt: '300' }] })
    );

    expect(overview.TotalDebt).toBe(340);
  });

  it('keeps usable values already on the overview', () => {
    const { overview, derived } = enrichOverview(
      { TotalDebt: '10', TotalCash: 'None' },
      statements({ balance_sheet: [{ shortLongTermDebtTotal: '1000', cashAndShortTermInvestments: '5' }] })
    );

    expect(overview.TotalDebt).toBe('10');
    expect(overview.TotalCash).toBe(5);
    expect(derived).toEqual(['TotalCash']);
  });

  it('leaves the overview untouched without statements', () => {
    const input = { Beta: '1.0' };
    const { overview, derived } = enrichOverview(input, statements({}));

    expect(overview).toEqual({ Beta: '1.0' });
    expect(overview).not.toBe(input);
    expect(derived).toEqual([]);
  });
});
