/**
 * Industry classification
 *
 * Ordered rule table; the first rule whose pattern occurs in the upper-cased
 * field wins. Unmatched input gets the default profile.
 */

import type { GrowthTriple, IndustryKey, IndustryProfile } from './types';

export interface IndustryRule {
  key: Exclude<IndustryKey, 'default'>;
  label: string;
  field: 'sector' | 'industry';
  pattern: string;
  revenueGrowth: number;
  fcfMargin: number;
  targetDebtRatio: number;
  /** Fixed equity beta; null defers to the overview. */
  beta: number | null;
  growthOverride: GrowthTriple | null;
}

const DEFAULT_BETA = 1.0;

export const INDUSTRY_RULES: readonly IndustryRule[] = [
  {
    key: 'semiconductor',
    label: 'Semiconductors (high growth)',
    field: 'industry',
    pattern: 'SEMICONDUCTOR',
    revenueGrowth: 0.25,
    fcfMargin: 0.25,
    targetDebtRatio: 0.15,
    beta: 1.6,
    growthOverride: { base: 0.25, optimistic: 0.35, pessimistic: 0.15 },
  },
  {
    key: 'software',
    label: 'Software',
    field: 'industry',
    pattern: 'SOFTWARE',
    revenueGrowth: 0.15,
    fcfMargin: 0.2,
    targetDebtRatio: 0.15,
    beta: null,
    growthOverride: null,
  },
  {
    key: 'manufacturing',
    label: 'Manufacturing',
    field: 'sector',
    pattern: 'MANUFACTURING',
    revenueGrowth: 0.08,
    fcfMargin: 0.12,
    targetDebtRatio: 0.3,
    beta: null,
    growthOverride: null,
  },
  {
    key: 'consumer',
    label: 'Consumer',
    field: 'sector',
    pattern: 'CONSUMER',
    revenueGrowth: 0.06,
    fcfMargin: 0.1,
    targetDebtRatio: 0.25,
    beta: null,
    growthOverride: null,
  },
];

const DEFAULT_PARAMETERS = {
  key: 'default',
  label: 'General',
  revenueGrowth: 0.1,
  fcfMargin: 0.15,
  targetDebtRatio: 0.2,
} as const;

export function classify(
  sector: string,
  industry: string,
  overviewBeta: number | null = null
): IndustryProfile {
  const fields = {
    sector: sector.toUpperCase(),
    industry: industry.toUpperCase(),
  };

  const betaFromOverview = (): Pick<IndustryProfile, 'beta' | 'betaSource'> =>
    overviewBeta !== null && Number.isFinite(overviewBeta)
      ? { beta: overviewBeta, betaSource: 'overview' }
      : { beta: DEFAULT_BETA, betaSource: 'default' };

  const rule = INDUSTRY_RULES.find((r) => fields[r.field].includes(r.pattern));
  if (!rule) {
    return {
      ...DEFAULT_PARAMETERS,
      ...betaFromOverview(),
      growthOverride: null,
    };
  }

  return {
    key: rule.key,
    label: rule.label,
    revenueGrowth: rule.revenueGrowth,
    fcfMargin: rule.fcfMargin,
    targetDebtRatio: rule.targetDebtRatio,
    ...(rule.beta !== null ? { beta: rule.beta, betaSource: 'profile' as const } : betaFromOverview()),
    growthOverride: rule.growthOverride ? { ...rule.growthOverride } : null,
  };
}
