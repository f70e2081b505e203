/**
 * Report commands: currencies, rate tables, net worth, history, growth and
 * year-over-year.
 *
 * Reports only read the store. Every snapshot is valued with the rates pinned
 * to it; `rates` is the only report that talks to the rate source.
 */

import { Currency, type CurrencyCode } from '../models/currency.js';
import type { SnapshotType } from '../models/snapshot.js';
import type { ConversionMiss } from '../fx/convert.js';
import {
  BaselineNotFoundError,
  GrowthNormalizer,
  type CurrencyAmounts,
} from '../portfolio/growth.js';
import type { TimeSeries } from '../portfolio/time-series.js';
import { MONTH_LABELS, YearOverYearGrouper } from '../portfolio/year-over-year.js';
import { monthStart, periodLabel } from '../period.js';
import { currencySymbol, decStr, decStrRounded, formatCurrencyDisplay } from '../format/decimal.js';
import type { Decimal } from '../decimal.js';
import type { ResolvedConfig } from '../config.js';
import type { AppServices } from './services.js';
import type {
  CurrencyOutput,
  ErrorOutput,
  GrowthOutput,
  HistoryOutput,
  MissOutput,
  NetWorthOutput,
  RateOutput,
  RatesOutput,
  YearOverYearOutput,
} from './types.js';

const PERCENT_DECIMALS = 2;

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function serializeMisses(misses: readonly ConversionMiss[]): MissOutput[] {
  const seen = new Set<string>();
  const out: MissOutput[] = [];
  for (const miss of misses) {
    const key = `${miss.as_of_date}:${miss.from}:${miss.to}`;
    if (!seen.has(key)) {
      seen.add(key);
      out.push({ from: miss.from, to: miss.to, as_of_date: miss.as_of_date });
    }
  }
  return out;
}

function display(config: ResolvedConfig, value: Decimal, currency: CurrencyCode): string {
  return formatCurrencyDisplay(value, config.display, currency);
}

/**
 * Resolve a `--currency` option. Reports are limited to the active currencies
 * because those are the only ones every pinned rate map covers.
 */
function reportCurrency(config: ResolvedConfig, value: string | undefined): CurrencyCode {
  if (value === undefined) {
    return config.reporting_currency;
  }
  const code = Currency.parse(value);
  if (!config.currencies.includes(code)) {
    throw new Error(
      `Currency ${code} is not active; configured currencies are ${config.currencies.join(', ')}`,
    );
  }
  return code;
}

// ---------------------------------------------------------------------------
// currencies / rates
// ---------------------------------------------------------------------------

export function listCurrencies(config: ResolvedConfig): CurrencyOutput[] {
  return config.currencies.map((code) => ({
    code,
    symbol: currencySymbol(code),
    reporting: code === config.reporting_currency,
  }));
}

/** Current (or `date`'s) pairwise rate table for the active currencies. */
export async function rateTable(
  services: AppServices,
  date?: string,
): Promise<RatesOutput | ErrorOutput> {
  const { config } = services;
  const result = await services.rateTables.build(config.currencies, date);
  if (!result.ok) {
    return { success: false, error: result.error.message };
  }

  const rates: RateOutput[] = [];
  for (const from of config.currencies) {
    for (const to of config.currencies) {
      if (from === to) continue;
      const rate = result.rates.get(from, to);
      if (rate !== undefined) {
        rates.push({ from, to, rate: decStr(rate) });
      }
    }
  }

  return {
    as_of_date: result.rates.as_of_date,
    currencies: [...config.currencies],
    rates,
    failures: result.failures.map((f) => ({ base: f.base, reason: f.reason })),
  };
}

// ---------------------------------------------------------------------------
// networth
// ---------------------------------------------------------------------------

export interface NetWorthOptions {
  currency?: string;
  /** Month to report; defaults to the latest snapshot. */
  date?: string;
}

export async function netWorth(
  services: AppServices,
  opts: NetWorthOptions = {},
): Promise<NetWorthOutput | ErrorOutput> {
  const { config, store, aggregator } = services;
  const currency = reportCurrency(config, opts.currency);

  let snapshot: SnapshotType | null;
  if (opts.date !== undefined) {
    snapshot = await store.getSnapshot(opts.date);
    if (snapshot === null) {
      return { success: false, error: `No snapshot for ${monthStart(opts.date)}` };
    }
  } else {
    snapshot = await store.getLatestSnapshot();
    if (snapshot === null) {
      return { success: false, error: 'No snapshots recorded' };
    }
  }

  const accounts = await store.listAccounts();
  const breakdown = aggregator.breakdown(snapshot, accounts, currency);
  const totals = aggregator.totalsByCurrency(snapshot, config.currencies);

  return {
    snapshot_date: snapshot.snapshot_date,
    label: periodLabel(snapshot.snapshot_date),
    rates_as_of: snapshot.rates.as_of_date,
    currency,
    total: decStr(breakdown.total),
    display: display(config, breakdown.total, currency),
    totals: totals.map((t) => ({
      currency: t.currency,
      total: decStr(t.total),
      display: display(config, t.total, t.currency),
    })),
    accounts: breakdown.rows.map((row) => ({
      account_id: row.account_id,
      account_name: row.account_name,
      owner: row.owner,
      account_type: row.account_type,
      currency: row.currency,
      balance: decStr(row.balance),
      value: decStr(row.value),
      route: row.route,
    })),
    misses: serializeMisses([...breakdown.misses, ...totals.flatMap((t) => t.misses)]),
  };
}

// ---------------------------------------------------------------------------
// history
// ---------------------------------------------------------------------------

/** Net worth at every snapshot date, each valued with its own pinned rates. */
export async function history(services: AppServices, currencyOpt?: string): Promise<HistoryOutput> {
  const { config, store, aggregator } = services;
  const currency = reportCurrency(config, currencyOpt);
  const series = aggregator.series(await store.listSnapshots(), currency);

  return {
    currency,
    points: series.series.map((point) => ({
      date: point.period,
      label: periodLabel(point.period),
      total: decStr(point.value),
      display: display(config, point.value, currency),
    })),
    misses: serializeMisses(series.misses),
  };
}

// ---------------------------------------------------------------------------
// growth
// ---------------------------------------------------------------------------

/**
 * Holdings per active currency, normalized so the baseline month is 100.
 * The baseline defaults to the first recorded snapshot.
 */
export async function growth(
  services: AppServices,
  baselineOpt?: string,
): Promise<GrowthOutput | ErrorOutput> {
  const { config, store } = services;
  const snapshots = await store.listSnapshots();
  if (snapshots.length === 0) {
    return { success: false, error: 'No snapshots recorded' };
  }

  const baseline = baselineOpt !== undefined ? monthStart(baselineOpt) : snapshots[0].snapshot_date;
  const holdings = GrowthNormalizer.holdingsByCurrency(snapshots, config.currencies);
  let normalized: TimeSeries<CurrencyAmounts>;
  try {
    normalized = GrowthNormalizer.normalize(holdings, baseline, config.currencies);
  } catch (e: unknown) {
    if (e instanceof BaselineNotFoundError) {
      return { success: false, error: e.message };
    }
    throw e;
  }

  return {
    baseline,
    currencies: [...config.currencies],
    zero_baselines: GrowthNormalizer.zeroBaselines(holdings, baseline, config.currencies),
    points: normalized.map((point) => {
      const values: Record<string, string> = {};
      for (const [code, percent] of point.value) {
        values[code] = decStrRounded(percent, PERCENT_DECIMALS);
      }
      return { date: point.period, label: periodLabel(point.period), values };
    }),
  };
}

// ---------------------------------------------------------------------------
// yoy
// ---------------------------------------------------------------------------

export async function yearOverYear(
  services: AppServices,
  currencyOpt?: string,
): Promise<YearOverYearOutput> {
  const { config, store, aggregator } = services;
  const currency = reportCurrency(config, currencyOpt);
  const { series } = aggregator.series(await store.listSnapshots(), currency);
  const years = YearOverYearGrouper.groupByYear(series);

  return {
    currency,
    has_history: YearOverYearGrouper.hasYearOverYearHistory(series),
    months: MONTH_LABELS,
    years: [...years].map(([year, months]) => ({
      year,
      months: months.map((m) => ({
        month: m.month,
        label: m.label,
        date: m.period,
        total: decStr(m.value),
      })),
    })),
  };
}
