export * from './types';
export { DEFAULT_POLICY, resolvePolicy, type ValuationPolicy } from './policy';
export { classify, INDUSTRY_RULES, type IndustryRule } from './industry';
export { normalizeOverview, toNullableNumber } from './normalize';
export { computeWACC, computeWACCBreakdown } from './formulas/wacc';
export { deriveGrowthRates, yearOverYearGrowth } from './formulas/growth';
export {
  cappedTerminalGrowth,
  extractFCF,
  presentValue,
  project,
  terminalValue,
} from './formulas/cash_flow';
export { bridgeToEquity, valuate, valuateAll, type EquityBridge } from './engine';
