import { Id } from './id.js';
import { Currency, type CurrencyCode } from './currency.js';
import { type Clock, SystemClock } from '../clock.js';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface AccountType {
  readonly id: Id;
  readonly name: string;
  readonly owner: string;
  /** Free-form kind, e.g. "Checking", "Savings", "TFSA". */
  readonly account_type: string;
  /** Native currency every balance of this account is recorded in. */
  readonly currency: CurrencyCode;
  readonly created_at: Date;
}

export interface AccountJSON {
  id: string;
  name: string;
  owner: string;
  account_type: string;
  currency: string;
  created_at: string;
}

export interface NewAccount {
  name: string;
  owner: string;
  account_type: string;
  currency: string;
}

// ---------------------------------------------------------------------------
// Account namespace (factory functions + serialization)
// ---------------------------------------------------------------------------

export const Account = {
  /**
   * Create a new account with a random id and the current time.
   */
  new(fields: NewAccount, clock: Clock = new SystemClock()): AccountType {
    return Account.newWith(Id.new(), clock.now(), fields);
  },

  /**
   * Create an account with explicit id and timestamp.
   */
  newWith(id: Id, createdAt: Date, fields: NewAccount): AccountType {
    const name = fields.name.trim();
    if (name === '') {
      throw new Error('Account name must not be empty');
    }
    return {
      id,
      name,
      owner: fields.owner.trim(),
      account_type: fields.account_type.trim(),
      currency: Currency.parse(fields.currency),
      created_at: createdAt,
    };
  },

  toJSON(account: AccountType): AccountJSON {
    return {
      id: account.id.asStr(),
      name: account.name,
      owner: account.owner,
      account_type: account.account_type,
      currency: account.currency,
      created_at: account.created_at.toISOString(),
    };
  },

  fromJSON(json: AccountJSON): AccountType {
    return Account.newWith(Id.fromString(json.id), new Date(json.created_at), {
      name: json.name,
      owner: json.owner,
      account_type: json.account_type,
      currency: json.currency,
    });
  },
} as const;
