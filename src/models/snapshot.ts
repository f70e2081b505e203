/**
 * Monthly snapshot: every account's balance for one month, bound to the rate
 * map that was effective when the snapshot was recorded.
 *
 * The binding is permanent. Later corrections to historical rates never touch
 * an existing snapshot, so a past month's net worth always recomputes to the
 * same value. Overwriting a month means replacing the whole snapshot.
 */

import { monthStart } from '../period.js';
import { RateMap, type RateMapJSON } from '../fx/rate-map.js';
import { Balance, BalanceError, type BalanceJSON, type BalanceType } from './balance.js';
import type { Id } from './id.js';
import type { Decimal } from '../decimal.js';
import { type Clock, SystemClock } from '../clock.js';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface SnapshotType {
  /** "YYYY-MM-01". */
  readonly snapshot_date: string;
  readonly balances: readonly BalanceType[];
  /** Rates pinned at creation. */
  readonly rates: RateMap;
  readonly created_at: Date;
}

export interface SnapshotBalanceInput {
  account_id: Id;
  currency: string;
  amount: Decimal.Value;
}

export interface SnapshotJSON {
  snapshot_date: string;
  created_at: string;
  balances: BalanceJSON[];
  exchange_rates: RateMapJSON;
}

// ---------------------------------------------------------------------------
// Snapshot namespace
// ---------------------------------------------------------------------------

export const Snapshot = {
  /**
   * Create a snapshot for the month containing `date`, pinned to `rates`.
   *
   * Throws MalformedRateMapError if `rates` breaks the self-pair invariant and
   * BalanceError if an account appears twice.
   */
  new(
    date: string,
    balances: readonly SnapshotBalanceInput[],
    rates: RateMap,
    clock: Clock = new SystemClock(),
  ): SnapshotType {
    return Snapshot.newWith(date, balances, rates, clock.now());
  },

  newWith(
    date: string,
    balances: readonly SnapshotBalanceInput[],
    rates: RateMap,
    createdAt: Date,
  ): SnapshotType {
    rates.assertWellFormed();
    const snapshotDate = monthStart(date);

    const seen = new Set<string>();
    const built: BalanceType[] = [];
    for (const b of balances) {
      const key = b.account_id.asStr();
      if (seen.has(key)) {
        throw new BalanceError(`Account ${key} appears twice in snapshot ${snapshotDate}`);
      }
      seen.add(key);
      built.push(Object.freeze(Balance.new(b.account_id, b.currency, b.amount, snapshotDate)));
    }

    return Object.freeze({
      snapshot_date: snapshotDate,
      balances: Object.freeze(built),
      rates,
      created_at: new Date(createdAt.getTime()),
    });
  },

  toJSON(snapshot: SnapshotType): SnapshotJSON {
    return {
      snapshot_date: snapshot.snapshot_date,
      created_at: snapshot.created_at.toISOString(),
      balances: snapshot.balances.map(Balance.toJSON),
      exchange_rates: snapshot.rates.toJSON(),
    };
  },

  /** Restore a stored snapshot. The stored rate map is checked, not repaired. */
  fromJSON(json: SnapshotJSON): SnapshotType {
    const rates = RateMap.fromJSON(json.exchange_rates);
    const snapshotDate = monthStart(json.snapshot_date);
    return Snapshot.newWith(
      snapshotDate,
      json.balances.map((b) => {
        const balance = Balance.fromJSON(b, snapshotDate);
        return { account_id: balance.account_id, currency: balance.currency, amount: balance.amount };
      }),
      rates,
      new Date(json.created_at),
    );
  },
} as const;
