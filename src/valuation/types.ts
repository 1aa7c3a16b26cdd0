/**
 * Valuation engine types
 *
 * Inputs arrive as loosely typed provider payloads (strings or numbers keyed by
 * line-item name). The engine normalizes them once and works on the typed
 * shapes below.
 */

// ============================================================================
// Inputs
// ============================================================================

export type StatementValue = number | string | null | undefined;

export type StatementRecord = Record<string, StatementValue>;

/** Raw overview mapping as delivered by a provider. */
export type CompanyOverview = Record<string, unknown>;

export interface FinancialStatements {
  cash_flow: StatementRecord[];
  balance_sheet: StatementRecord[];
  income_stmt: StatementRecord[];
}

export interface ValuationInput {
  overview: CompanyOverview;
  financials: FinancialStatements;
}

/** On-disk bundle: only the cash flow statement is mandatory. */
export interface ValuationInputFile {
  overview: CompanyOverview;
  financials: Pick<FinancialStatements, 'cash_flow'> & Partial<FinancialStatements>;
}

export type OverviewNumericField =
  | 'Beta'
  | 'TotalDebt'
  | 'TotalCash'
  | 'InterestExpense'
  | 'MarketCapitalization'
  | 'SharesOutstanding'
  | 'MarketPrice'
  | 'Price';

export interface NormalizedOverview {
  symbol: string | null;
  name: string | null;
  sector: string;
  industry: string;
  beta: number | null;
  totalDebt: number;
  totalCash: number;
  interestExpense: number;
  marketCap: number;
  sharesOutstanding: number;
  currentPrice: number;
  priceSource: 'MarketPrice' | 'Price' | null;
  /** Fields that were absent or unparseable and fell back to a default. */
  defaulted: OverviewNumericField[];
}

// ============================================================================
// Engine-internal parameters
// ============================================================================

export type IndustryKey = 'semiconductor' | 'software' | 'manufacturing' | 'consumer' | 'default';

export interface GrowthTriple {
  base: number;
  optimistic: number;
  pessimistic: number;
}

export interface IndustryProfile {
  key: IndustryKey;
  label: string;
  revenueGrowth: number;
  fcfMargin: number;
  targetDebtRatio: number;
  beta: number;
  betaSource: 'profile' | 'overview' | 'default';
  /** Fixed growth scenarios that replace the history-derived ones. */
  growthOverride: GrowthTriple | null;
}

export interface GrowthRates extends GrowthTriple {
  source: 'override' | 'history' | 'fallback';
  /** Valid year-over-year ratios used, most recent pair first. */
  observations: number[];
}

export interface WaccBreakdown {
  wacc: number;
  costOfEquity: number;
  costOfDebt: number;
  debtRatio: number;
  equityRatio: number;
  unclamped: number;
  clamped: boolean;
  usedFallback: boolean;
}

// ============================================================================
// Outputs
// ============================================================================

export const SCENARIOS = ['base', 'optimistic', 'pessimistic'] as const;

export type Scenario = (typeof SCENARIOS)[number];

export type ValuationErrorKind =
  | 'InsufficientData'
  | 'TerminalValueUndefined'
  | 'InvalidDiscountRate'
  | 'NonFiniteResult';

export type ValuationWarning =
  | { kind: 'ConfigurationDefault'; field: OverviewNumericField; fallback: number }
  | { kind: 'UpsideUndetermined'; reason: string }
  | { kind: 'WaccFallback'; fallback: number };

export interface ScenarioResult {
  ticker: string;
  scenario: Scenario;
  industry: IndustryKey;
  enterpriseValue: number;
  equityValue: number;
  pricePerShare: number;
  currentPrice: number;
  upside: number;
  wacc: number;
  growthRate: number;
  growthSource: GrowthRates['source'];
  terminalGrowth: number;
  terminalValue: number;
  projectedCashFlows: number[];
  warnings: ValuationWarning[];
  lowConfidence: boolean;
}

export class ValuationError extends Error {
  constructor(
    public readonly kind: ValuationErrorKind,
    message: string
  ) {
    super(message);
    this.name = 'ValuationError';
  }
}

export type ScenarioOutcome =
  | { ok: true; result: ScenarioResult }
  | { ok: false; scenario: Scenario; error: ValuationError };

export type ScenarioOutcomes = Record<Scenario, ScenarioOutcome>;
