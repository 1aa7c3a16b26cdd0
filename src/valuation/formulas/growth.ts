import { DEFAULT_POLICY, type ValuationPolicy } from '../policy';
import type { GrowthRates, IndustryProfile } from '../types';

const mean = (values: number[]): number =>
  values.reduce((sum, v) => sum + v, 0) / values.length;

/** Population standard deviation. */
const stdDev = (values: number[]): number => {
  const m = mean(values);
  return Math.sqrt(mean(values.map((v) => (v - m) ** 2)));
};

/**
 * Year-over-year growth for each consecutive pair of a most-recent-first
 * series. Pairs where either side is not strictly positive are skipped.
 * Growth runs forward in time (newer / older − 1), never the inverse ratio
 * older / newer − 1, so optimistic rates differ from tools that divide the
 * other way round.
 */
export function yearOverYearGrowth(history: number[]): number[] {
  const ratios: number[] = [];
  for (let i = 1; i < history.length; i++) {
    const newer = history[i - 1];
    const older = history[i];
    if (newer > 0 && older > 0) {
      ratios.push(newer / older - 1);
    }
  }
  return ratios;
}

function fallbackRates(
  profile: Pick<IndustryProfile, 'revenueGrowth'>,
  policy: ValuationPolicy
): GrowthRates {
  const base = profile.revenueGrowth;
  return {
    base,
    optimistic: base * policy.optimisticMultiplier,
    pessimistic: base * policy.pessimisticMultiplier,
    source: 'fallback',
    observations: [],
  };
}

/**
 * Base / optimistic / pessimistic growth.
 *
 * Base is always the industry baseline. When history has at least one valid
 * pair, optimistic follows mean + σ of the observed growth, floored at the
 * baseline and capped at 1.5× baseline.
 */
export function deriveGrowthRates(
  fcfHistory: number[],
  profile: Pick<IndustryProfile, 'revenueGrowth' | 'growthOverride'>,
  policy: ValuationPolicy = DEFAULT_POLICY
): GrowthRates {
  if (profile.growthOverride) {
    return { ...profile.growthOverride, source: 'override', observations: [] };
  }

  if (fcfHistory.length < 2) return fallbackRates(profile, policy);

  const observations = yearOverYearGrowth(fcfHistory);
  if (observations.length === 0) return fallbackRates(profile, policy);

  const base = profile.revenueGrowth;
  const signal = mean(observations) + stdDev(observations);
  const optimistic = Math.max(base, Math.min(signal, base * policy.optimisticMultiplier));
  const pessimistic = base * policy.pessimisticMultiplier;

  if (![base, optimistic, pessimistic].every(Number.isFinite)) {
    return fallbackRates(profile, policy);
  }

  return { base, optimistic, pessimistic, source: 'history', observations };
}
