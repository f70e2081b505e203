import { type Id } from '../models/id.js';
import { type AccountType } from '../models/account.js';
import { type SnapshotType } from '../models/snapshot.js';

// ---------------------------------------------------------------------------
// SnapshotStore
// ---------------------------------------------------------------------------

/**
 * Async storage for accounts and monthly snapshots.
 *
 * Snapshots are keyed by their "YYYY-MM-01" date; there is at most one per
 * month. Reports only read from the store, the snapshot and account commands
 * write to it.
 */
export interface SnapshotStore {
  // Accounts
  listAccounts(): Promise<AccountType[]>;
  getAccount(id: Id): Promise<AccountType | null>;
  saveAccount(account: AccountType): Promise<void>;
  deleteAccount(id: Id): Promise<boolean>;

  // Snapshots
  /** All snapshots, ascending by date. */
  listSnapshots(): Promise<SnapshotType[]>;
  /** Snapshot for the month containing `date`. */
  getSnapshot(date: string): Promise<SnapshotType | null>;
  getLatestSnapshot(): Promise<SnapshotType | null>;
  /**
   * Store `snapshot`, replacing any snapshot of the same month as a whole.
   * Resolves to true when an existing snapshot was replaced.
   */
  replaceSnapshot(snapshot: SnapshotType): Promise<boolean>;
  deleteSnapshot(date: string): Promise<boolean>;
}
