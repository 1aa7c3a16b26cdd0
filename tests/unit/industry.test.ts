import { describe, expect, it } from 'vitest';
import { classify, INDUSTRY_RULES } from '@/valuation/industry';

describe('classify', () => {
  it('selects the high-growth semiconductor profile with its fixed beta', () => {
    const profile = classify('TECHNOLOGY', 'Semiconductors & Related Devices', 0.9);

    expect(profile.key).toBe('semiconductor');
    expect(profile.revenueGrowth).toBe(0.25);
    expect(profile.fcfMargin).toBe(0.25);
    expect(profile.beta).toBe(1.6);
    expect(profile.betaSource).toBe('profile');
    expect(profile.growthOverride).toEqual({ base: 0.25, optimistic: 0.35, pessimistic: 0.15 });
  });

  it('uses the overview beta for profiles without a fixed one', () => {
    const profile = classify('TECHNOLOGY', 'SERVICES-PREPACKAGED SOFTWARE', 1.2);

    expect(profile.key).toBe('software');
    expect(profile.revenueGrowth).toBe(0.15);
    expect(profile.fcfMargin).toBe(0.2);
    expect(profile.targetDebtRatio).toBe(0.15);
    expect(profile.beta).toBe(1.2);
    expect(profile.betaSource).toBe('overview');
    expect(profile.growthOverride).toBeNull();
  });

  it('matches sector rules case-insensitively', () => {
    expect(classify('Manufacturing', 'Motor Vehicles').key).toBe('manufacturing');
    expect(classify('Consumer Cyclical', 'Retail-Apparel').key).toBe('consumer');
    expect(classify('consumer defensive', '').targetDebtRatio).toBe(0.25);
  });

  it('applies the first matching rule when several match', () => {
    expect(classify('MANUFACTURING', 'SEMICONDUCTORS').key).toBe('semiconductor');
    expect(classify('CONSUMER', 'APPLICATION SOFTWARE').key).toBe('software');
  });

  it('falls back to the default profile with beta 1.0 when nothing matches', () => {
    const profile = classify('', '');

    expect(profile).toEqual({
      key: 'default',
      label: 'General',
      revenueGrowth: 0.1,
      fcfMargin: 0.15,
      targetDebtRatio: 0.2,
      beta: 1,
      betaSource: 'default',
      growthOverride: null,
    });
  });

  it('is deterministic for the same input', () => {
    expect(classify('ENERGY', 'OIL & GAS', 0.7)).toEqual(classify('ENERGY', 'OIL & GAS', 0.7));
  });

  it('returns a copy of the override so callers cannot alter the rule table', () => {
    const override = classify('', 'SEMICONDUCTOR').growthOverride;
    expect(override).not.toBeNull();
    if (override) override.base = 9;

    expect(INDUSTRY_RULES[0].growthOverride?.base).toBe(0.25);
  });
});
