/**
 * Snapshot commands.
 *
 * Recording a snapshot is the only place exchange rates get pinned: the rate
 * table for the 1st of the month is fetched once and stored with the
 * balances. Reports never fetch rates.
 */

import { Decimal } from '../decimal.js';
import { Id } from '../models/id.js';
import { Snapshot, type SnapshotBalanceInput, type SnapshotType } from '../models/snapshot.js';
import { Balance, BalanceError, type BalanceType } from '../models/balance.js';
import { monthStart, periodLabel } from '../period.js';
import { childLogger } from '../logger.js';
import type { SnapshotStore } from '../storage/storage.js';
import type { AppServices } from './services.js';
import type { ErrorOutput, RecordSnapshotOutput, SnapshotOutput } from './types.js';

export function serializeSnapshot(snapshot: SnapshotType): SnapshotOutput {
  return {
    snapshot_date: snapshot.snapshot_date,
    label: periodLabel(snapshot.snapshot_date),
    created_at: snapshot.created_at.toISOString(),
    rates_as_of: snapshot.rates.as_of_date,
    balances: snapshot.balances.map(Balance.toJSON),
  };
}

export interface BalanceEntry {
  account_id: string;
  amount: string;
}

/**
 * Parse repeated `accountId=amount` arguments.
 *
 * Throws on an entry without `=`; amounts are validated when recording.
 */
export function parseBalanceArgs(args: readonly string[]): BalanceEntry[] {
  return args.map((arg) => {
    const eq = arg.indexOf('=');
    if (eq <= 0) {
      throw new Error(`Invalid balance ${JSON.stringify(arg)}: expected <accountId>=<amount>`);
    }
    return { account_id: arg.slice(0, eq).trim(), amount: arg.slice(eq + 1).trim() };
  });
}

/**
 * Record (or replace) the snapshot for the month containing `date`.
 *
 * Every account must exist, and at least one balance must be non-zero. Rates
 * for every active currency, plus the accounts' own currencies, are fetched
 * for the first day of the month and pinned to the snapshot.
 */
export async function recordSnapshot(
  services: AppServices,
  date: string,
  entries: readonly BalanceEntry[],
): Promise<RecordSnapshotOutput | ErrorOutput> {
  const { store, config } = services;
  const snapshotDate = monthStart(date);

  if (entries.length === 0) {
    return { success: false, error: 'No balances given' };
  }

  const balances: SnapshotBalanceInput[] = [];
  const seen = new Set<string>();
  for (const entry of entries) {
    const id = Id.fromString(entry.account_id);
    if (seen.has(id.asStr())) {
      return { success: false, error: `Account ${entry.account_id} is given more than once` };
    }
    seen.add(id.asStr());

    const account = await store.getAccount(id);
    if (account === null) {
      return { success: false, error: `Account not found: ${entry.account_id}` };
    }
    let balance: BalanceType;
    try {
      balance = Balance.new(account.id, account.currency, entry.amount, snapshotDate);
    } catch (e: unknown) {
      if (e instanceof BalanceError) {
        return { success: false, error: `Invalid amount for ${entry.account_id}: ${entry.amount}` };
      }
      throw e;
    }
    balances.push({
      account_id: balance.account_id,
      currency: balance.currency,
      amount: balance.amount,
    });
  }

  if (balances.every((b) => new Decimal(b.amount).isZero())) {
    return { success: false, error: 'At least one balance must be non-zero' };
  }

  const codes = [...config.currencies, ...balances.map((b) => b.currency)];
  const table = await services.rateTables.build(codes, snapshotDate);
  if (!table.ok) {
    return { success: false, error: table.error.message };
  }

  const snapshot = Snapshot.new(snapshotDate, balances, table.rates, services.clock);
  const replaced = await store.replaceSnapshot(snapshot);
  childLogger('snapshots').info(
    { date: snapshotDate, balances: balances.length, replaced },
    'snapshot recorded',
  );

  return {
    success: true,
    replaced,
    snapshot: serializeSnapshot(snapshot),
    rate_failures: table.failures.map((f) => ({ base: f.base, reason: f.reason })),
  };
}

export async function listSnapshots(store: SnapshotStore): Promise<SnapshotOutput[]> {
  const snapshots = await store.listSnapshots();
  return snapshots.map(serializeSnapshot);
}

export async function deleteSnapshot(
  store: SnapshotStore,
  date: string,
): Promise<{ success: true; snapshot_date: string } | ErrorOutput> {
  const snapshotDate = monthStart(date);
  const deleted = await store.deleteSnapshot(snapshotDate);
  if (!deleted) {
    return { success: false, error: `No snapshot for ${snapshotDate}` };
  }
  return { success: true, snapshot_date: snapshotDate };
}
