/**
 * Output types for the CLI.
 *
 * Field names are snake_case and every amount, rate and percentage is a
 * canonical decimal string. Human-formatted values sit next to them in
 * `display` fields.
 */

import type { ConversionRoute } from '../fx/convert.js';

// ---------------------------------------------------------------------------
// Shared
// ---------------------------------------------------------------------------

export interface ErrorOutput {
  success: false;
  error: string;
}

export interface MissOutput {
  from: string;
  to: string;
  as_of_date: string;
}

// ---------------------------------------------------------------------------
// Accounts
// ---------------------------------------------------------------------------

export interface AccountOutput {
  id: string;
  name: string;
  owner: string;
  account_type: string;
  currency: string;
  created_at: string;
}

// ---------------------------------------------------------------------------
// Snapshots
// ---------------------------------------------------------------------------

export interface SnapshotBalanceOutput {
  account_id: string;
  currency: string;
  amount: string;
}

export interface SnapshotOutput {
  snapshot_date: string;
  label: string;
  created_at: string;
  rates_as_of: string;
  balances: SnapshotBalanceOutput[];
}

export interface RecordSnapshotOutput {
  success: true;
  replaced: boolean;
  snapshot: SnapshotOutput;
  /** Bases whose rates could not be fetched; conversions from them may miss. */
  rate_failures: { base: string; reason: string }[];
}

// ---------------------------------------------------------------------------
// Rates and currencies
// ---------------------------------------------------------------------------

export interface CurrencyOutput {
  code: string;
  symbol: string;
  reporting: boolean;
}

export interface RateOutput {
  from: string;
  to: string;
  rate: string;
}

export interface RatesOutput {
  as_of_date: string;
  currencies: string[];
  rates: RateOutput[];
  failures: { base: string; reason: string }[];
}

// ---------------------------------------------------------------------------
// Net worth
// ---------------------------------------------------------------------------

export interface TotalOutput {
  currency: string;
  total: string;
  display: string;
}

export interface BreakdownRowOutput {
  account_id: string;
  account_name: string;
  owner: string;
  account_type: string;
  currency: string;
  balance: string;
  value: string;
  route: ConversionRoute;
}

export interface NetWorthOutput {
  snapshot_date: string;
  label: string;
  rates_as_of: string;
  currency: string;
  total: string;
  display: string;
  totals: TotalOutput[];
  accounts: BreakdownRowOutput[];
  misses: MissOutput[];
}

// ---------------------------------------------------------------------------
// History / growth / year-over-year
// ---------------------------------------------------------------------------

export interface HistoryPointOutput {
  date: string;
  label: string;
  total: string;
  display: string;
}

export interface HistoryOutput {
  currency: string;
  points: HistoryPointOutput[];
  misses: MissOutput[];
}

export interface GrowthPointOutput {
  date: string;
  label: string;
  /** currency code -> percent of the baseline (baseline = 100). */
  values: Record<string, string>;
}

export interface GrowthOutput {
  baseline: string;
  currencies: string[];
  /** Currencies with nothing held at the baseline; their values are raw totals x 100. */
  zero_baselines: string[];
  points: GrowthPointOutput[];
}

export interface YearMonthOutput {
  month: number;
  label: string;
  date: string;
  total: string;
}

export interface YearOverYearOutput {
  currency: string;
  has_history: boolean;
  months: readonly string[];
  years: { year: number; months: YearMonthOutput[] }[];
}
