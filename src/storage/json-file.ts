import * as fs from 'node:fs/promises';
import * as path from 'node:path';

import { type Id } from '../models/id.js';
import { Account, type AccountType, type AccountJSON } from '../models/account.js';
import { type BalanceJSON } from '../models/balance.js';
import { Snapshot, type SnapshotType, type SnapshotJSON } from '../models/snapshot.js';
import { type RateMapJSON } from '../fx/rate-map.js';
import { monthKey } from '../period.js';
import { type SnapshotStore } from './storage.js';

// ---------------------------------------------------------------------------
// Errors and JSON shape checks
// ---------------------------------------------------------------------------

export class StorageFormatError extends Error {
  public readonly file: string;

  constructor(file: string, message: string) {
    super(`${file}: ${message}`);
    this.name = 'StorageFormatError';
    this.file = file;
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isNotFound(e: unknown): boolean {
  return e instanceof Error && 'code' in e && e.code === 'ENOENT';
}

function stringField(file: string, obj: Record<string, unknown>, key: string): string {
  const value = obj[key];
  if (typeof value !== 'string') {
    throw new StorageFormatError(file, `expected string field "${key}"`);
  }
  return value;
}

function toAccountJSON(file: string, value: unknown): AccountJSON {
  if (!isRecord(value)) {
    throw new StorageFormatError(file, 'expected an account object');
  }
  return {
    id: stringField(file, value, 'id'),
    name: stringField(file, value, 'name'),
    owner: stringField(file, value, 'owner'),
    account_type: stringField(file, value, 'account_type'),
    currency: stringField(file, value, 'currency'),
    created_at: stringField(file, value, 'created_at'),
  };
}

function toBalanceJSON(file: string, value: unknown): BalanceJSON {
  if (!isRecord(value)) {
    throw new StorageFormatError(file, 'expected a balance object');
  }
  const amount = value.amount;
  if (typeof amount !== 'string' && typeof amount !== 'number') {
    throw new StorageFormatError(file, 'expected balance "amount" to be a string or number');
  }
  return {
    account_id: stringField(file, value, 'account_id'),
    currency: stringField(file, value, 'currency'),
    amount: String(amount),
  };
}

function toRateMapJSON(file: string, value: unknown): RateMapJSON {
  if (!isRecord(value) || !isRecord(value.rates)) {
    throw new StorageFormatError(file, 'expected "exchange_rates" with a "rates" object');
  }
  const rates: Record<string, string> = {};
  for (const [key, rate] of Object.entries(value.rates)) {
    if (typeof rate !== 'string' && typeof rate !== 'number') {
      throw new StorageFormatError(file, `expected rate "${key}" to be a string or number`);
    }
    rates[key] = String(rate);
  }
  return { as_of_date: stringField(file, value, 'as_of_date'), rates };
}

function toSnapshotJSON(file: string, value: unknown): SnapshotJSON {
  if (!isRecord(value) || !Array.isArray(value.balances)) {
    throw new StorageFormatError(file, 'expected a snapshot object with a "balances" array');
  }
  return {
    snapshot_date: stringField(file, value, 'snapshot_date'),
    created_at: stringField(file, value, 'created_at'),
    balances: value.balances.map((b: unknown) => toBalanceJSON(file, b)),
    exchange_rates: toRateMapJSON(file, value.exchange_rates),
  };
}

// ---------------------------------------------------------------------------
// JsonFileSnapshotStore
// ---------------------------------------------------------------------------

const SNAPSHOT_FILE_PATTERN = /^\d{4}-\d{2}\.json$/;

/**
 * JSON file-based snapshot store.
 *
 * Directory structure:
 * ```
 * data/
 *   accounts.json          # array of accounts
 *   snapshots/
 *     2024-01.json         # one file per month, rates pinned inside
 * ```
 */
export class JsonFileSnapshotStore implements SnapshotStore {
  private readonly basePath: string;

  constructor(basePath: string) {
    this.basePath = basePath;
  }

  // -----------------------------------------------------------------------
  // Path helpers
  // -----------------------------------------------------------------------

  private accountsFile(): string {
    return path.join(this.basePath, 'accounts.json');
  }

  private snapshotsDir(): string {
    return path.join(this.basePath, 'snapshots');
  }

  private snapshotFile(date: string): string {
    return path.join(this.snapshotsDir(), `${monthKey(date)}.json`);
  }

  // -----------------------------------------------------------------------
  // I/O helpers
  // -----------------------------------------------------------------------

  private async readJson(filePath: string): Promise<unknown> {
    let content: string;
    try {
      content = await fs.readFile(filePath, 'utf-8');
    } catch (e: unknown) {
      if (isNotFound(e)) {
        return null;
      }
      throw e;
    }
    try {
      return JSON.parse(content);
    } catch (e: unknown) {
      throw new StorageFormatError(filePath, e instanceof Error ? e.message : String(e));
    }
  }

  private async writeJson(filePath: string, value: unknown): Promise<void> {
    await fs.mkdir(path.dirname(filePath), { recursive: true });
    const tmp = `${filePath}.tmp`;
    await fs.writeFile(tmp, JSON.stringify(value, null, 2) + '\n', 'utf-8');
    await fs.rename(tmp, filePath);
  }

  private async fileExists(filePath: string): Promise<boolean> {
    try {
      await fs.access(filePath);
      return true;
    } catch (e: unknown) {
      if (isNotFound(e)) {
        return false;
      }
      throw e;
    }
  }

  private async removeFile(filePath: string): Promise<boolean> {
    try {
      await fs.rm(filePath);
      return true;
    } catch (e: unknown) {
      if (isNotFound(e)) {
        return false;
      }
      throw e;
    }
  }

  private async readAccounts(): Promise<AccountType[]> {
    const file = this.accountsFile();
    const json = await this.readJson(file);
    if (json === null) return [];
    if (!Array.isArray(json)) {
      throw new StorageFormatError(file, 'expected an array of accounts');
    }
    return json.map((item: unknown) => Account.fromJSON(toAccountJSON(file, item)));
  }

  private async writeAccounts(accounts: readonly AccountType[]): Promise<void> {
    await this.writeJson(this.accountsFile(), accounts.map(Account.toJSON));
  }

  private async readSnapshotFile(file: string): Promise<SnapshotType | null> {
    const json = await this.readJson(file);
    if (json === null) return null;
    return Snapshot.fromJSON(toSnapshotJSON(file, json));
  }

  // -----------------------------------------------------------------------
  // Accounts
  // -----------------------------------------------------------------------

  async listAccounts(): Promise<AccountType[]> {
    return this.readAccounts();
  }

  async getAccount(id: Id): Promise<AccountType | null> {
    const accounts = await this.readAccounts();
    return accounts.find((a) => a.id.equals(id)) ?? null;
  }

  async saveAccount(account: AccountType): Promise<void> {
    const accounts = await this.readAccounts();
    const index = accounts.findIndex((a) => a.id.equals(account.id));
    if (index >= 0) {
      accounts[index] = account;
    } else {
      accounts.push(account);
    }
    await this.writeAccounts(accounts);
  }

  async deleteAccount(id: Id): Promise<boolean> {
    const accounts = await this.readAccounts();
    const remaining = accounts.filter((a) => !a.id.equals(id));
    if (remaining.length === accounts.length) {
      return false;
    }
    await this.writeAccounts(remaining);
    return true;
  }

  // -----------------------------------------------------------------------
  // Snapshots
  // -----------------------------------------------------------------------

  async listSnapshots(): Promise<SnapshotType[]> {
    let names: string[];
    try {
      names = await fs.readdir(this.snapshotsDir());
    } catch (e: unknown) {
      if (isNotFound(e)) {
        return [];
      }
      throw e;
    }

    const snapshots: SnapshotType[] = [];
    for (const name of names.filter((n) => SNAPSHOT_FILE_PATTERN.test(n)).sort()) {
      const snapshot = await this.readSnapshotFile(path.join(this.snapshotsDir(), name));
      if (snapshot !== null) {
        snapshots.push(snapshot);
      }
    }
    return snapshots;
  }

  async getSnapshot(date: string): Promise<SnapshotType | null> {
    return this.readSnapshotFile(this.snapshotFile(date));
  }

  async getLatestSnapshot(): Promise<SnapshotType | null> {
    const all = await this.listSnapshots();
    return all.at(-1) ?? null;
  }

  async replaceSnapshot(snapshot: SnapshotType): Promise<boolean> {
    const file = this.snapshotFile(snapshot.snapshot_date);
    const replaced = await this.fileExists(file);
    await this.writeJson(file, Snapshot.toJSON(snapshot));
    return replaced;
  }

  async deleteSnapshot(date: string): Promise<boolean> {
    return this.removeFile(this.snapshotFile(date));
  }
}
