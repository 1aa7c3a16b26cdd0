/**
 * Alpha Vantage API response types
 *
 * Every value arrives as a string; missing values are the literal "None".
 */

export type AlphaVantageFunction =
  | 'OVERVIEW'
  | 'GLOBAL_QUOTE'
  | 'CASH_FLOW'
  | 'BALANCE_SHEET'
  | 'INCOME_STATEMENT';

export type AlphaVantageReport = Record<string, string>;

/** Shapes returned instead of data when a request is rejected. */
export interface AlphaVantageNotice {
  Note?: string;
  Information?: string;
  'Error Message'?: string;
}
