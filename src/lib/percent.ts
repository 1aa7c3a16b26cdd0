type FormatOptions = {
  signed?: boolean;
  decimals?: number;
};

/** Formats a decimal fraction (0.136 → "13.6%"). */
export function formatRate(
  value: number | null | undefined,
  opts: FormatOptions = {}
): string {
  if (value === null || value === undefined || !Number.isFinite(value)) return '--';
  return formatPercent(value * 100, opts);
}

/** Formats a value already expressed in percent (25.4 → "25.4%"). */
export function formatPercent(
  value: number | null | undefined,
  opts: FormatOptions = {}
): string {
  if (value === null || value === undefined || !Number.isFinite(value)) return '--';

  const decimals = opts.decimals ?? 1;
  const pct = `${Math.abs(value).toFixed(decimals)}%`;

  if (opts.signed) {
    const prefix = value > 0 ? '+' : value < 0 ? '-' : '';
    return `${prefix}${pct}`;
  }

  return `${value.toFixed(decimals)}%`;
}
