import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync } from 'fs';
import { join } from 'path';
import { tmpdir } from 'os';
import { LocalFileProvider } from '@/providers/file_provider';
import { ProviderError } from '@/providers/types';
import { valuate } from '@/valuation/engine';

let tempDir: string;

function writeBundle(symbol: string, content: unknown) {
  writeFileSync(
    join(tempDir, `${symbol}.json`),
    typeof content === 'string' ? content : JSON.stringify(content)
  );
}

beforeEach(() => {
  tempDir = mkdtempSync(join(tmpdir(), 'dcf-bundles-'));
});

afterEach(() => {
  rmSync(tempDir, { recursive: true, force: true });
});

describe('LocalFileProvider', () => {
  it('loads a bundle and defaults missing statements to empty lists', async () => {
    writeBundle('ACME', {
      overview: { Sector: 'CONSUMER DEFENSIVE', Beta: '0.8' },
      financials: { cash_flow: [{ operatingCashflow: 100, capitalExpenditures: -20 }] },
    });
    const provider = new LocalFileProvider(tempDir);

    const financials = await provider.getFinancials('acme');

    expect(financials).toEqual({
      cash_flow: [{ operatingCashflow: 100, capitalExpenditures: -20 }],
      balance_sheet: [],
      income_stmt: [],
    });
  });

  it('reads each file once per provider instance', async () => {
    writeBundle('ACME', { overview: {}, financials: { cash_flow: [] } });
    const provider = new LocalFileProvider(tempDir);

    await provider.getOverview('ACME');
    await provider.getFinancials('ACME');

    expect(provider.getRequestCount()).toBe(1);
  });

  it('enriches the overview from statements in getBundle', async () => {
    writeBundle('ACME', {
      overview: { TotalDebt: '500' },
      financials: {
        cash_flow: [],
        balance_sheet: [{ shortLongTermDebtTotal: '900', cashAndShortTermInvestments: '75' }],
        income_stmt: [{ interestAndDebtExpense: '30' }],
      },
    });
    const provider = new LocalFileProvider(tempDir);

    const { overview } = await provider.getBundle('ACME');

    expect(overview).toEqual({ TotalDebt: '500', TotalCash: 75, InterestExpense: 30 });
  });

  it('fails for a missing file', async () => {
    const provider = new LocalFileProvider(tempDir);

    await expect(provider.getBundle('NONE')).rejects.toThrow(
      `No bundle file at ${join(tempDir, 'NONE.json')}`
    );
  });

  it('fails for malformed JSON', async () => {
    writeBundle('BAD', '{ overview: ');
    const provider = new LocalFileProvider(tempDir);

    await expect(provider.getBundle('BAD')).rejects.toBeInstanceOf(ProviderError);
  });

  it('fails schema validation without a cash flow statement', async () => {
    writeBundle('NOCF', { overview: {}, financials: {} });
    const provider = new LocalFileProvider(tempDir);

    await expect(provider.getBundle('NOCF')).rejects.toThrow(
      "/financials: must have required property 'cash_flow'"
    );
  });

  it('rejects an invalid fiscal date', async () => {
    writeBundle('DATE', {
      overview: {},
      financials: { cash_flow: [{ fiscalDateEnding: '31/12/2023', operatingCashflow: 1 }] },
    });
    const provider = new LocalFileProvider(tempDir);

    await expect(provider.getBundle('DATE')).rejects.toThrow(
      '/financials/cash_flow/0/fiscalDateEnding: must match format "date"'
    );
  });

  it('values the bundled demo company', async () => {
    const provider = new LocalFileProvider();

    const bundle = await provider.getBundle('DEMO');
    const outcome = valuate('DEMO', bundle, 'base');

    expect(bundle.overview.TotalDebt).toBe(2_500_000_000);
    expect(bundle.overview.TotalCash).toBe(900_000_000);
    expect(bundle.overview.InterestExpense).toBe(140_000_000);
    expect(outcome.ok).toBe(true);
    if (outcome.ok) {
      expect(outcome.result.industry).toBe('manufacturing');
      expect(outcome.result.growthRate).toBe(0.08);
      expect(outcome.result.lowConfidence).toBe(false);
    }
  });
});
