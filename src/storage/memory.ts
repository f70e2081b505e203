import { type Id } from '../models/id.js';
import { type AccountType } from '../models/account.js';
import { type SnapshotType } from '../models/snapshot.js';
import { monthStart } from '../period.js';
import { type SnapshotStore } from './storage.js';

/**
 * In-memory snapshot store.
 *
 * Accounts are keyed by the string form of their Id, snapshots by their
 * "YYYY-MM-01" date.
 */
export class MemorySnapshotStore implements SnapshotStore {
  private readonly accounts = new Map<string, AccountType>();
  private readonly snapshots = new Map<string, SnapshotType>();

  // -----------------------------------------------------------------------
  // Accounts
  // -----------------------------------------------------------------------

  async listAccounts(): Promise<AccountType[]> {
    return Array.from(this.accounts.values());
  }

  async getAccount(id: Id): Promise<AccountType | null> {
    return this.accounts.get(id.asStr()) ?? null;
  }

  async saveAccount(account: AccountType): Promise<void> {
    this.accounts.set(account.id.asStr(), account);
  }

  async deleteAccount(id: Id): Promise<boolean> {
    return this.accounts.delete(id.asStr());
  }

  // -----------------------------------------------------------------------
  // Snapshots
  // -----------------------------------------------------------------------

  async listSnapshots(): Promise<SnapshotType[]> {
    return Array.from(this.snapshots.values()).sort((a, b) =>
      a.snapshot_date.localeCompare(b.snapshot_date),
    );
  }

  async getSnapshot(date: string): Promise<SnapshotType | null> {
    return this.snapshots.get(monthStart(date)) ?? null;
  }

  async getLatestSnapshot(): Promise<SnapshotType | null> {
    const all = await this.listSnapshots();
    return all.at(-1) ?? null;
  }

  async replaceSnapshot(snapshot: SnapshotType): Promise<boolean> {
    const replaced = this.snapshots.has(snapshot.snapshot_date);
    this.snapshots.set(snapshot.snapshot_date, snapshot);
    return replaced;
  }

  async deleteSnapshot(date: string): Promise<boolean> {
    return this.snapshots.delete(monthStart(date));
  }
}
