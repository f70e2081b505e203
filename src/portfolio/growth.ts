/**
 * GrowthNormalizer.
 *
 * Rebases per-currency holdings to a baseline period: the baseline is 100 and
 * every later period is `(periodTotal / baselineTotal) * 100`. Holdings are
 * raw native amounts, not converted ones, so the series shows how much of
 * each currency is held, independent of exchange rates.
 *
 * A zero baseline is replaced by 1, which makes a later non-zero total show
 * up as `total * 100` percent. That is a known approximation for "infinite
 * growth", not a meaningful percentage.
 */

import { Decimal } from '../decimal.js';
import type { CurrencyCode } from '../models/currency.js';
import type { SnapshotType } from '../models/snapshot.js';
import { sortSeries, type SeriesPoint, type TimeSeries } from './time-series.js';

export type CurrencyAmounts = ReadonlyMap<CurrencyCode, Decimal>;

export class BaselineNotFoundError extends Error {
  public readonly period: string;

  constructor(period: string) {
    super(`Baseline period ${period} has no data`);
    this.name = 'BaselineNotFoundError';
    this.period = period;
  }
}

const ZERO = new Decimal(0);
const ONE = new Decimal(1);
const HUNDRED = new Decimal(100);

function currencyUniverse(series: TimeSeries<CurrencyAmounts>): CurrencyCode[] {
  const seen = new Set<CurrencyCode>();
  for (const point of series) {
    for (const code of point.value.keys()) {
      seen.add(code);
    }
  }
  return [...seen];
}

function baselineTotals(
  point: SeriesPoint<CurrencyAmounts>,
  currencies: readonly CurrencyCode[],
): { totals: Map<CurrencyCode, Decimal>; substituted: CurrencyCode[] } {
  const totals = new Map<CurrencyCode, Decimal>();
  const substituted: CurrencyCode[] = [];
  for (const code of currencies) {
    const amount = point.value.get(code) ?? ZERO;
    if (amount.gt(ZERO)) {
      totals.set(code, amount);
    } else {
      totals.set(code, ONE);
      substituted.push(code);
    }
  }
  return { totals, substituted };
}

function locateBaseline(
  series: TimeSeries<CurrencyAmounts>,
  baselinePeriod: string,
): { ordered: SeriesPoint<CurrencyAmounts>[]; index: number } {
  const ordered = sortSeries(series);
  const index = ordered.findIndex((point) => point.period === baselinePeriod);
  if (index < 0) {
    throw new BaselineNotFoundError(baselinePeriod);
  }
  return { ordered, index };
}

export const GrowthNormalizer = {
  /**
   * Normalize `series` to `baselinePeriod`.
   *
   * The output starts at the baseline period and covers every later period,
   * with one entry per currency per period. Currencies come from
   * `currencies` when given, otherwise from the series in order of first
   * appearance; a currency absent from a period counts as 0 there.
   *
   * Throws BaselineNotFoundError if the series has no point at
   * `baselinePeriod`.
   */
  normalize(
    series: TimeSeries<CurrencyAmounts>,
    baselinePeriod: string,
    currencies?: readonly CurrencyCode[],
  ): SeriesPoint<Map<CurrencyCode, Decimal>>[] {
    const { ordered, index } = locateBaseline(series, baselinePeriod);
    const universe = currencies ?? currencyUniverse(ordered);
    const { totals } = baselineTotals(ordered[index], universe);

    return ordered.slice(index).map((point) => {
      const value = new Map<CurrencyCode, Decimal>();
      for (const code of universe) {
        const amount = point.value.get(code) ?? ZERO;
        const baseline = totals.get(code) ?? ONE;
        value.set(code, amount.div(baseline).times(HUNDRED));
      }
      return { period: point.period, value };
    });
  },

  /** Currencies whose baseline total is zero and was replaced by 1. */
  zeroBaselines(
    series: TimeSeries<CurrencyAmounts>,
    baselinePeriod: string,
    currencies?: readonly CurrencyCode[],
  ): CurrencyCode[] {
    const { ordered, index } = locateBaseline(series, baselinePeriod);
    return baselineTotals(ordered[index], currencies ?? currencyUniverse(ordered)).substituted;
  },

  /**
   * Raw (unconverted) totals per currency for every snapshot, ascending.
   *
   * With `currencies` every listed code gets an entry (0 when nothing is
   * held) and balances in other currencies are left out.
   */
  holdingsByCurrency(
    snapshots: readonly SnapshotType[],
    currencies?: readonly CurrencyCode[],
  ): SeriesPoint<Map<CurrencyCode, Decimal>>[] {
    const points = snapshots.map((snapshot) => {
      const totals = new Map<CurrencyCode, Decimal>();
      for (const code of currencies ?? []) {
        totals.set(code, ZERO);
      }
      for (const balance of snapshot.balances) {
        const current = totals.get(balance.currency);
        if (current !== undefined) {
          totals.set(balance.currency, current.plus(balance.amount));
        } else if (currencies === undefined) {
          totals.set(balance.currency, balance.amount);
        }
      }
      return { period: snapshot.snapshot_date, value: totals };
    });
    return sortSeries(points);
  },
} as const;
