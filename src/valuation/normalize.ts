import type {
  CompanyOverview,
  NormalizedOverview,
  OverviewNumericField,
  StatementValue,
} from './types';

const MISSING_MARKERS = new Set(['none', '-', 'n/a', 'nan', 'null']);

export function toNullableNumber(value: unknown): number | null {
  if (value === null || value === undefined) return null;
  if (typeof value === 'number') {
    return Number.isFinite(value) ? value : null;
  }
  if (typeof value === 'string') {
    const trimmed = value.trim();
    if (!trimmed || MISSING_MARKERS.has(trimmed.toLowerCase())) return null;
    const parsed = Number(trimmed);
    return Number.isFinite(parsed) ? parsed : null;
  }
  return null;
}

export function statementNumber(value: StatementValue): number | null {
  return toNullableNumber(value);
}

function readString(overview: CompanyOverview, key: string): string | null {
  const value = overview[key];
  if (typeof value !== 'string') return null;
  const trimmed = value.trim();
  return trimmed && !MISSING_MARKERS.has(trimmed.toLowerCase()) ? trimmed : null;
}

/**
 * Coerce a provider overview into typed numbers. Missing numeric fields become 0
 * and are listed in `defaulted`. A non-positive `MarketPrice` falls through to
 * `Price`.
 */
export function normalizeOverview(overview: CompanyOverview): NormalizedOverview {
  const defaulted: OverviewNumericField[] = [];

  const read = (field: OverviewNumericField): number => {
    const value = toNullableNumber(overview[field]);
    if (value === null) {
      defaulted.push(field);
      return 0;
    }
    return value;
  };

  const beta = toNullableNumber(overview.Beta);
  if (beta === null) defaulted.push('Beta');

  const totalDebt = read('TotalDebt');
  const totalCash = read('TotalCash');
  const interestExpense = read('InterestExpense');
  const marketCap = read('MarketCapitalization');
  const sharesOutstanding = read('SharesOutstanding');

  const marketPrice = toNullableNumber(overview.MarketPrice);
  const price = toNullableNumber(overview.Price);
  let currentPrice = 0;
  let priceSource: NormalizedOverview['priceSource'] = null;
  if (marketPrice !== null && marketPrice > 0) {
    currentPrice = marketPrice;
    priceSource = 'MarketPrice';
  } else if (price !== null && price > 0) {
    currentPrice = price;
    priceSource = 'Price';
  }

  return {
    symbol: readString(overview, 'Symbol'),
    name: readString(overview, 'Name'),
    sector: readString(overview, 'Sector') ?? '',
    industry: readString(overview, 'Industry') ?? '',
    beta,
    totalDebt,
    totalCash,
    interestExpense,
    marketCap,
    sharesOutstanding,
    currentPrice,
    priceSource,
    defaulted,
  };
}
