/**
 * Account commands.
 *
 * Each function takes a SnapshotStore and returns plain result objects.
 * User errors are returned as `{ success: false, error }`, not thrown, so the
 * CLI can render them as JSON.
 */

import { Account, type AccountType } from '../models/account.js';
import { Currency } from '../models/currency.js';
import { Id } from '../models/id.js';
import { type Clock, SystemClock } from '../clock.js';
import type { SnapshotStore } from '../storage/storage.js';
import type { AccountOutput, ErrorOutput } from './types.js';

export function serializeAccount(account: AccountType): AccountOutput {
  return {
    id: account.id.asStr(),
    name: account.name,
    owner: account.owner,
    account_type: account.account_type,
    currency: account.currency,
    created_at: account.created_at.toISOString(),
  };
}

export interface AddAccountInput {
  name: string;
  owner: string;
  account_type: string;
  currency: string;
}

/**
 * Create an account.
 *
 * The currency must be one of `currencies` (the configured active set). An
 * account with the same name and owner (case-insensitive) is rejected.
 */
export async function addAccount(
  store: SnapshotStore,
  input: AddAccountInput,
  currencies: readonly string[],
  clock: Clock = new SystemClock(),
): Promise<{ success: true; account: AccountOutput } | ErrorOutput> {
  const currency = Currency.parse(input.currency);
  if (!currencies.includes(currency)) {
    return {
      success: false,
      error: `Currency ${currency} is not active; configured currencies are ${currencies.join(', ')}`,
    };
  }

  const name = input.name.trim().toLowerCase();
  const owner = input.owner.trim().toLowerCase();
  const existing = await store.listAccounts();
  if (existing.some((a) => a.name.toLowerCase() === name && a.owner.toLowerCase() === owner)) {
    return {
      success: false,
      error: `Account '${input.name.trim()}' already exists for owner '${input.owner.trim()}'`,
    };
  }

  const account = Account.new({ ...input, currency }, clock);
  await store.saveAccount(account);
  return { success: true, account: serializeAccount(account) };
}

/** All accounts, ordered by owner then name. */
export async function listAccounts(store: SnapshotStore): Promise<AccountOutput[]> {
  const accounts = await store.listAccounts();
  return accounts
    .map(serializeAccount)
    .sort((a, b) => a.owner.localeCompare(b.owner) || a.name.localeCompare(b.name));
}

/**
 * Remove an account. Accounts that still have balances in a recorded snapshot
 * are kept; delete or re-record those snapshots first.
 */
export async function removeAccount(
  store: SnapshotStore,
  idStr: string,
): Promise<{ success: true; account: AccountOutput } | ErrorOutput> {
  const id = Id.fromString(idStr);
  const account = await store.getAccount(id);
  if (account === null) {
    return { success: false, error: `Account not found: ${idStr}` };
  }

  const snapshots = await store.listSnapshots();
  const referencing = snapshots
    .filter((s) => s.balances.some((b) => b.account_id.equals(id)))
    .map((s) => s.snapshot_date);
  if (referencing.length > 0) {
    return {
      success: false,
      error: `Account ${idStr} has balances in snapshots ${referencing.join(', ')}`,
    };
  }

  await store.deleteAccount(id);
  return { success: true, account: serializeAccount(account) };
}
