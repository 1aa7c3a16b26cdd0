/**
 * Console presentation of ticker analyses (tables + JSON)
 */

import Table from 'cli-table3';
import { formatPercent, formatRate } from '@/lib/percent';
import type { TickerAnalysis } from '@/analysis/analyze';
import {
  SCENARIOS,
  type ScenarioOutcome,
  type ScenarioOutcomes,
  type ScenarioResult,
} from '@/valuation/types';
import { describeWarning, formatCurrency } from './format';

type Row = [label: string, cell: (result: ScenarioResult) => string];

const ROWS: Row[] = [
  ['Intrinsic value / share', (r) => formatCurrency(r.pricePerShare)],
  ['Current price', (r) => (r.currentPrice > 0 ? formatCurrency(r.currentPrice) : '--')],
  ['Upside', (r) => (r.currentPrice > 0 ? formatPercent(r.upside, { signed: true }) : 'n/a')],
  ['WACC', (r) => formatRate(r.wacc)],
  ['Growth rate', (r) => formatRate(r.growthRate)],
  ['Terminal growth', (r) => formatRate(r.terminalGrowth)],
  ['Enterprise value', (r) => formatCurrency(r.enterpriseValue)],
  ['Equity value', (r) => formatCurrency(r.equityValue)],
];

const titleCase = (s: string) => s.charAt(0).toUpperCase() + s.slice(1);

function cell(outcome: ScenarioOutcome, row: Row, index: number): string {
  if (outcome.ok) return row[1](outcome.result);
  return index === 0 ? `error: ${outcome.error.kind}` : '--';
}

function collectNotes(outcomes: ScenarioOutcomes): string[] {
  const notes = new Set<string>();
  for (const scenario of SCENARIOS) {
    const outcome = outcomes[scenario];
    if (outcome.ok) {
      outcome.result.warnings.forEach((w) => notes.add(describeWarning(w)));
    } else {
      notes.add(`${scenario}: ${outcome.error.message}`);
    }
  }
  return [...notes];
}

export function renderAnalysis(analysis: TickerAnalysis): string {
  if (analysis.status === 'failed') {
    return `${analysis.ticker}: ${analysis.error.kind}: ${analysis.error.message}`;
  }

  const { company, outcomes } = analysis;
  const header = [
    `${analysis.ticker}${company.name ? ` - ${company.name}` : ''}`,
    `Sector: ${company.sector || 'N/A'} | Industry: ${company.industry || 'N/A'} | Profile: ${company.industryProfile}`,
    `Market cap: ${formatCurrency(company.marketCap)}`,
  ];

  const table = new Table({
    head: ['', ...SCENARIOS.map(titleCase)],
    style: { head: [], border: [] },
  });
  ROWS.forEach((row, index) => {
    table.push([row[0], ...SCENARIOS.map((s) => cell(outcomes[s], row, index))]);
  });

  const notes = collectNotes(outcomes).map((note) => `  * ${note}`);
  return [...header, table.toString(), ...(notes.length > 0 ? ['Notes:', ...notes] : [])].join(
    '\n'
  );
}

function serializeOutcome(outcome: ScenarioOutcome) {
  if (outcome.ok) return outcome;
  return {
    ok: false,
    scenario: outcome.scenario,
    error: { kind: outcome.error.kind, message: outcome.error.message },
  };
}

export function renderJson(analyses: TickerAnalysis[]): string {
  const payload = analyses.map((analysis) =>
    analysis.status === 'ok'
      ? {
          ...analysis,
          outcomes: Object.fromEntries(
            SCENARIOS.map((s) => [s, serializeOutcome(analysis.outcomes[s])])
          ),
        }
      : analysis
  );
  return JSON.stringify(payload, null, 2);
}
