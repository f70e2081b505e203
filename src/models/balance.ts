import { Decimal } from '../decimal.js';
import { Id } from './id.js';
import { Currency, type CurrencyCode } from './currency.js';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

/** One account's balance in one monthly snapshot. */
export interface BalanceType {
  readonly account_id: Id;
  readonly currency: CurrencyCode;
  /** Non-negative, full precision. */
  readonly amount: Decimal;
  /** "YYYY-MM-01" of the snapshot this balance belongs to. */
  readonly snapshot_date: string;
}

export interface BalanceJSON {
  account_id: string;
  currency: string;
  amount: string;
}

export class BalanceError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'BalanceError';
  }
}

// ---------------------------------------------------------------------------
// Balance namespace
// ---------------------------------------------------------------------------

export const Balance = {
  /**
   * Create a balance. Throws BalanceError for a negative or non-numeric
   * amount and CurrencyCodeError for an invalid currency.
   */
  new(accountId: Id, currency: string, amount: Decimal.Value, snapshotDate: string): BalanceType {
    let value: Decimal;
    try {
      value = amount instanceof Decimal ? amount : new Decimal(amount);
    } catch {
      throw new BalanceError(`Invalid amount ${JSON.stringify(String(amount))}`);
    }
    if (!value.isFinite() || value.isNeg()) {
      throw new BalanceError(`Balance must be a non-negative number, got ${value.toString()}`);
    }
    return {
      account_id: accountId,
      currency: Currency.parse(currency),
      amount: value,
      snapshot_date: snapshotDate,
    };
  },

  toJSON(balance: BalanceType): BalanceJSON {
    return {
      account_id: balance.account_id.asStr(),
      currency: balance.currency,
      amount: balance.amount.toFixed(),
    };
  },

  fromJSON(json: BalanceJSON, snapshotDate: string): BalanceType {
    return Balance.new(Id.fromString(json.account_id), json.currency, json.amount, snapshotDate);
  },
} as const;
