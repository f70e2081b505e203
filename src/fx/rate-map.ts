/**
 * Pairwise exchange-rate table scoped to one as-of date.
 *
 * A `RateMap` maps an ordered pair `(from, to)` to the positive multiplier
 * that turns an amount in `from` into `to`. Maps are immutable once built and
 * are what a snapshot pins for the lifetime of its month.
 *
 * Invariants:
 * - every code that appears in any pair has `(code, code) -> 1`;
 * - every rate is finite and strictly positive.
 *
 * The map is neither guaranteed symmetric nor complete; callers go through
 * the ConversionEngine, which falls back to inverse and triangulated rates.
 */

import { Decimal } from '../decimal.js';
import { Currency, type CurrencyCode } from '../models/currency.js';
import { MalformedRateMapError } from './errors.js';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

/** Serialized pair key, `FROM_TO`. */
export type PairKey = `${CurrencyCode}_${CurrencyCode}`;

export interface RateEntry {
  readonly from: CurrencyCode;
  readonly to: CurrencyCode;
  readonly rate: Decimal;
}

export interface RateEntryInput {
  from: string;
  to: string;
  rate: Decimal.Value;
}

/** Plain-object shape of a serialized RateMap. Rates are decimal strings. */
export interface RateMapJSON {
  as_of_date: string;
  rates: Record<string, string>;
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

const ONE = new Decimal(1);
const PAIR_KEY_PATTERN = /^([A-Z]{3})_([A-Z]{3})$/;

export function pairKey(from: CurrencyCode, to: CurrencyCode): PairKey {
  return `${from}_${to}`;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function toRate(asOfDate: string, from: string, to: string, value: Decimal.Value): Decimal {
  let rate: Decimal;
  try {
    rate = value instanceof Decimal ? value : new Decimal(value);
  } catch {
    throw new MalformedRateMapError(asOfDate, `${from}->${to} rate ${String(value)} is not a number`);
  }
  if (!rate.isFinite() || !rate.gt(0)) {
    throw new MalformedRateMapError(asOfDate, `${from}->${to} rate ${rate.toString()} is not positive`);
  }
  return rate;
}

// ---------------------------------------------------------------------------
// RateMap
// ---------------------------------------------------------------------------

export class RateMap {
  /** "YYYY-MM-DD" date the rates are effective for. */
  readonly as_of_date: string;
  readonly #rates: ReadonlyMap<PairKey, RateEntry>;

  private constructor(asOfDate: string, rates: Map<PairKey, RateEntry>) {
    this.as_of_date = asOfDate;
    this.#rates = rates;
    Object.freeze(this);
  }

  /**
   * Build a map from raw entries, inserting `(code, code) -> 1` for every code
   * in `codes` and every code that appears in an entry.
   *
   * Later entries for the same pair overwrite earlier ones. An explicit self
   * pair with a rate other than 1 is rejected.
   */
  static create(
    asOfDate: string,
    entries: Iterable<RateEntryInput>,
    codes: Iterable<string> = [],
  ): RateMap {
    const rates = new Map<PairKey, RateEntry>();
    const present = new Set<CurrencyCode>();

    for (const code of codes) {
      present.add(Currency.parse(code));
    }

    for (const entry of entries) {
      const from = Currency.parse(entry.from);
      const to = Currency.parse(entry.to);
      const rate = toRate(asOfDate, from, to, entry.rate);
      if (from === to && !rate.eq(ONE)) {
        throw new MalformedRateMapError(asOfDate, `${from}->${to} must be 1, got ${rate.toString()}`);
      }
      rates.set(pairKey(from, to), { from, to, rate });
      present.add(from);
      present.add(to);
    }

    for (const code of present) {
      rates.set(pairKey(code, code), { from: code, to: code, rate: ONE });
    }

    return new RateMap(asOfDate, rates);
  }

  /** A map with no pairs at all. Every non-identity conversion misses. */
  static empty(asOfDate: string): RateMap {
    return new RateMap(asOfDate, new Map());
  }

  /**
   * Restore a stored map verbatim and check its invariants.
   *
   * Unlike `create`, missing self pairs are not filled in: a stored map that
   * lacks them was pinned incorrectly and raises MalformedRateMapError.
   */
  static fromJSON(json: unknown): RateMap {
    if (!isRecord(json) || typeof json.as_of_date !== 'string' || !isRecord(json.rates)) {
      throw new MalformedRateMapError('unknown date', 'expected { as_of_date, rates }');
    }
    const asOfDate = json.as_of_date;
    const rates = new Map<PairKey, RateEntry>();

    for (const [key, raw] of Object.entries(json.rates)) {
      const match = PAIR_KEY_PATTERN.exec(key);
      if (match === null) {
        throw new MalformedRateMapError(asOfDate, `invalid pair key ${JSON.stringify(key)}`);
      }
      if (typeof raw !== 'string' && typeof raw !== 'number') {
        throw new MalformedRateMapError(asOfDate, `rate for ${key} must be a string or number`);
      }
      const from = match[1];
      const to = match[2];
      rates.set(pairKey(from, to), { from, to, rate: toRate(asOfDate, from, to, raw) });
    }

    const map = new RateMap(asOfDate, rates);
    map.assertWellFormed();
    return map;
  }

  // -- Lookups --------------------------------------------------------------

  get(from: CurrencyCode, to: CurrencyCode): Decimal | undefined {
    return this.#rates.get(pairKey(from, to))?.rate;
  }

  has(from: CurrencyCode, to: CurrencyCode): boolean {
    return this.#rates.has(pairKey(from, to));
  }

  get size(): number {
    return this.#rates.size;
  }

  /** Every code that appears in at least one pair, in insertion order. */
  codes(): CurrencyCode[] {
    const out = new Set<CurrencyCode>();
    for (const entry of this.#rates.values()) {
      out.add(entry.from);
      out.add(entry.to);
    }
    return [...out];
  }

  entries(): RateEntry[] {
    return [...this.#rates.values()];
  }

  /**
   * Throws MalformedRateMapError unless every present code maps to itself at
   * exactly 1.
   */
  assertWellFormed(): void {
    for (const code of this.codes()) {
      const self = this.get(code, code);
      if (self === undefined) {
        throw new MalformedRateMapError(this.as_of_date, `missing ${code}->${code}`);
      }
      if (!self.eq(ONE)) {
        throw new MalformedRateMapError(
          this.as_of_date,
          `${code}->${code} must be 1, got ${self.toString()}`,
        );
      }
    }
  }

  // -- Serialization --------------------------------------------------------

  toJSON(): RateMapJSON {
    const rates: Record<string, string> = {};
    for (const [key, entry] of this.#rates) {
      rates[key] = entry.rate.toFixed();
    }
    return { as_of_date: this.as_of_date, rates };
  }
}
