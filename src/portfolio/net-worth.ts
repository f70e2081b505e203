/**
 * NetWorthAggregator.
 *
 * Sums balances into one total in a target currency. Each balance is
 * converted with the rate map pinned to its own snapshot; the current rates
 * are never consulted, so historical totals do not drift.
 */

import { Decimal } from '../decimal.js';
import type { CurrencyCode } from '../models/currency.js';
import type { AccountType } from '../models/account.js';
import type { BalanceType } from '../models/balance.js';
import type { SnapshotType } from '../models/snapshot.js';
import type { RateMap } from '../fx/rate-map.js';
import type { ConversionEngine, ConversionMiss, ConversionRoute } from '../fx/convert.js';
import { sortSeries, type SeriesPoint, type TimeSeries } from './time-series.js';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface NetWorthTotal {
  readonly currency: CurrencyCode;
  readonly total: Decimal;
  /** Pairs that could not be converted; their amounts were added as-is. */
  readonly misses: readonly ConversionMiss[];
}

export interface NetWorthSeries {
  readonly currency: CurrencyCode;
  readonly series: TimeSeries<Decimal>;
  readonly misses: readonly ConversionMiss[];
}

/** One account row of a snapshot breakdown. */
export interface BreakdownRow {
  readonly account_id: string;
  readonly account_name: string;
  readonly owner: string;
  readonly account_type: string;
  readonly currency: CurrencyCode;
  /** Native balance. */
  readonly balance: Decimal;
  /** Balance in the target currency. */
  readonly value: Decimal;
  readonly route: ConversionRoute;
}

export interface Breakdown {
  readonly snapshot_date: string;
  readonly currency: CurrencyCode;
  readonly rows: readonly BreakdownRow[];
  readonly total: Decimal;
  readonly misses: readonly ConversionMiss[];
}

const ZERO = new Decimal(0);

// ---------------------------------------------------------------------------
// NetWorthAggregator
// ---------------------------------------------------------------------------

export class NetWorthAggregator {
  private readonly engine: ConversionEngine;

  constructor(engine: ConversionEngine) {
    this.engine = engine;
  }

  /** Sum `balances` in `target`, converting every balance with `pinned`. */
  total(balances: readonly BalanceType[], target: CurrencyCode, pinned: RateMap): NetWorthTotal {
    let total = ZERO;
    const misses: ConversionMiss[] = [];
    for (const balance of balances) {
      const result = this.engine.convert(balance.amount, balance.currency, target, pinned);
      total = total.plus(result.value);
      if (result.miss !== undefined) {
        misses.push(result.miss);
      }
    }
    return { currency: target, total, misses };
  }

  totalForSnapshot(snapshot: SnapshotType, target: CurrencyCode): NetWorthTotal {
    return this.total(snapshot.balances, target, snapshot.rates);
  }

  /** Net worth in every one of `currencies`, in that order. */
  totalsByCurrency(snapshot: SnapshotType, currencies: readonly CurrencyCode[]): NetWorthTotal[] {
    return currencies.map((currency) => this.totalForSnapshot(snapshot, currency));
  }

  /**
   * One total per snapshot date, ascending, each converted with that
   * snapshot's pinned rates.
   */
  series(snapshots: readonly SnapshotType[], target: CurrencyCode): NetWorthSeries {
    const points: SeriesPoint<Decimal>[] = [];
    const misses: ConversionMiss[] = [];
    for (const snapshot of snapshots) {
      const result = this.totalForSnapshot(snapshot, target);
      points.push({ period: snapshot.snapshot_date, value: result.total });
      misses.push(...result.misses);
    }
    return { currency: target, series: sortSeries(points), misses };
  }

  /**
   * Per-account rows for one snapshot. Accounts missing from `accounts` are
   * listed under their id.
   */
  breakdown(
    snapshot: SnapshotType,
    accounts: readonly AccountType[],
    target: CurrencyCode,
  ): Breakdown {
    const byId = new Map<string, AccountType>();
    for (const account of accounts) {
      byId.set(account.id.asStr(), account);
    }

    let total = ZERO;
    const rows: BreakdownRow[] = [];
    const misses: ConversionMiss[] = [];

    for (const balance of snapshot.balances) {
      const result = this.engine.convert(balance.amount, balance.currency, target, snapshot.rates);
      const account = byId.get(balance.account_id.asStr());
      rows.push({
        account_id: balance.account_id.asStr(),
        account_name: account?.name ?? balance.account_id.asStr(),
        owner: account?.owner ?? '',
        account_type: account?.account_type ?? '',
        currency: balance.currency,
        balance: balance.amount,
        value: result.value,
        route: result.route,
      });
      total = total.plus(result.value);
      if (result.miss !== undefined) {
        misses.push(result.miss);
      }
    }

    rows.sort((a, b) => a.owner.localeCompare(b.owner) || a.account_name.localeCompare(b.account_name));

    return { snapshot_date: snapshot.snapshot_date, currency: target, rows, total, misses };
  }
}
