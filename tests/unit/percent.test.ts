import { describe, expect, it } from 'vitest';
import { formatPercent, formatRate } from '@/lib/percent';

describe('formatRate', () => {
  it('renders decimal fractions as percentages', () => {
    expect(formatRate(0.136)).toBe('13.6%');
    expect(formatRate(0.02, { decimals: 2 })).toBe('2.00%');
  });

  it('returns a placeholder for missing values', () => {
    expect(formatRate(null)).toBe('--');
    expect(formatRate(Number.NaN)).toBe('--');
  });
});

describe('formatPercent', () => {
  it('adds an explicit sign when requested', () => {
    expect(formatPercent(25.44, { signed: true })).toBe('+25.4%');
    expect(formatPercent(-3.25, { signed: true, decimals: 2 })).toBe('-3.25%');
    expect(formatPercent(0, { signed: true })).toBe('0.0%');
  });

  it('keeps the natural sign otherwise', () => {
    expect(formatPercent(-12.5)).toBe('-12.5%');
    expect(formatPercent(undefined)).toBe('--');
  });
});
