import type { ValuationWarning } from '@/valuation/types';

const TIERS: Array<[number, string]> = [
  [1e12, 'T'],
  [1e9, 'B'],
  [1e6, 'M'],
];

export function formatCurrency(value: number): string {
  if (!Number.isFinite(value)) return '--';
  const sign = value < 0 ? '-' : '';
  const abs = Math.abs(value);
  for (const [threshold, suffix] of TIERS) {
    if (abs >= threshold) {
      return `${sign}$${(abs / threshold).toFixed(2)}${suffix}`;
    }
  }
  return `${sign}$${abs.toFixed(2)}`;
}

export function describeWarning(warning: ValuationWarning): string {
  switch (warning.kind) {
    case 'ConfigurationDefault':
      return `${warning.field} missing, assumed ${warning.fallback}`;
    case 'UpsideUndetermined':
      return `Upside undetermined: ${warning.reason}`;
    case 'WaccFallback':
      return `WACC could not be computed, used ${warning.fallback}`;
  }
}
