import { describe, expect, it } from 'vitest';
import { deriveGrowthRates, yearOverYearGrowth } from '@/valuation/formulas/growth';
import { classify } from '@/valuation/industry';

const general = classify('', '');

describe('yearOverYearGrowth', () => {
  it('measures newer over older for a most-recent-first series', () => {
    const ratios = yearOverYearGrowth([121, 110, 100]);

    expect(ratios).toHaveLength(2);
    expect(ratios[0]).toBeCloseTo(0.1, 10);
    expect(ratios[1]).toBeCloseTo(0.1, 10);
  });

  it('skips pairs where either side is not strictly positive', () => {
    expect(yearOverYearGrowth([100, 0, 50, -20, 40])).toEqual([]);
    expect(yearOverYearGrowth([150, 100, -5])).toEqual([0.5]);
  });
});

describe('deriveGrowthRates', () => {
  it('returns the fixed triple for growth-override profiles regardless of history', () => {
    const rates = deriveGrowthRates([100, 400, 50], classify('', 'SEMICONDUCTOR'));

    expect(rates).toEqual({
      base: 0.25,
      optimistic: 0.35,
      pessimistic: 0.15,
      source: 'override',
      observations: [],
    });
  });

  it('falls back to baseline multiples with fewer than two data points', () => {
    const rates = deriveGrowthRates([100], general);

    expect(rates.source).toBe('fallback');
    expect(rates.base).toBe(0.1);
    expect(rates.optimistic).toBeCloseTo(0.15, 10);
    expect(rates.pessimistic).toBeCloseTo(0.05, 10);
  });

  it('falls back when no pair yields a valid ratio', () => {
    const rates = deriveGrowthRates([100, -50, -20], general);

    expect(rates.source).toBe('fallback');
    expect(rates.optimistic).toBeCloseTo(0.15, 10);
  });

  it('derives optimistic growth from mean plus one standard deviation', () => {
    // ratios: 125.4/114 - 1 = 0.10, 114/100 - 1 = 0.14 -> mean 0.12, sigma 0.02
    const rates = deriveGrowthRates([125.4, 114, 100], general);

    expect(rates.source).toBe('history');
    expect(rates.base).toBe(0.1);
    expect(rates.optimistic).toBeCloseTo(0.14, 10);
    expect(rates.pessimistic).toBeCloseTo(0.05, 10);
    expect(rates.observations).toHaveLength(2);
  });

  it('caps optimistic growth at 1.5x the baseline', () => {
    const rates = deriveGrowthRates([200, 100, 50], general);

    expect(rates.optimistic).toBeCloseTo(0.15, 10);
  });

  it('floors optimistic growth at the baseline', () => {
    const rates = deriveGrowthRates([90, 100, 120], general);

    expect(rates.source).toBe('history');
    expect(rates.optimistic).toBe(0.1);
  });

  it('keeps optimistic >= base >= pessimistic on the history branch', () => {
    const histories = [
      [110, 100],
      [80, 100, 130, 90],
      [500, 20, 300],
      [1, 1000],
    ];
    for (const history of histories) {
      for (const profile of [general, classify('MANUFACTURING', ''), classify('', 'SOFTWARE')]) {
        const rates = deriveGrowthRates(history, profile);
        expect(rates.source).toBe('history');
        expect([rates.base, rates.optimistic, rates.pessimistic].every(Number.isFinite)).toBe(true);
        expect(rates.optimistic).toBeGreaterThanOrEqual(rates.base);
        expect(rates.base).toBeGreaterThanOrEqual(rates.pessimistic);
      }
    }
  });
});
