/**
 * Rate source contract and routing.
 *
 * - `RateSource` is the contract for external exchange-rate providers: one
 *   call returns the rates from a base currency to a list of targets.
 * - `RateSourceRouter` holds a list of sources and tries them in order,
 *   returning the first non-null quote.
 */

import type { Decimal } from '../decimal.js';
import type { CurrencyCode } from '../models/currency.js';
import { childLogger, type Logger } from '../logger.js';
import { errorMessage } from './errors.js';

// ---------------------------------------------------------------------------
// Contract
// ---------------------------------------------------------------------------

/** Rates quoted from one base currency, as returned by a source. */
export interface RateQuote {
  readonly base: CurrencyCode;
  /** "YYYY-MM-DD" date the provider says the rates are effective for. */
  readonly as_of_date: string;
  /** target code -> multiplier from `base` to target. */
  readonly rates: ReadonlyMap<CurrencyCode, Decimal>;
  readonly source: string;
}

export interface RateSource {
  /**
   * Fetch `base -> target` rates for `date` ("YYYY-MM-DD"), or the most recent
   * available rates when `date` is omitted.
   *
   * Resolves to null when the source has no data; rejects on transport or
   * response errors. Both count as a failure for this base.
   */
  fetchRates(
    base: CurrencyCode,
    targets: readonly CurrencyCode[],
    date?: string,
  ): Promise<RateQuote | null>;

  name(): string;
}

// ---------------------------------------------------------------------------
// Router
// ---------------------------------------------------------------------------

/**
 * Tries several rate sources in order.
 *
 * A source that throws is logged and skipped. If no source produced a quote
 * and at least one threw, the last error is rethrown so the caller records
 * why the base failed; otherwise the router resolves to null.
 */
export class RateSourceRouter implements RateSource {
  readonly #sources: RateSource[];
  readonly #log: Logger;

  constructor(sources: RateSource[], logger?: Logger) {
    this.#sources = sources;
    this.#log = logger ?? childLogger('rate-source');
  }

  async fetchRates(
    base: CurrencyCode,
    targets: readonly CurrencyCode[],
    date?: string,
  ): Promise<RateQuote | null> {
    let lastError: unknown = undefined;
    let failed = false;

    for (const source of this.#sources) {
      try {
        const quote = await source.fetchRates(base, targets, date);
        if (quote !== null) {
          return quote;
        }
      } catch (err) {
        this.#log.warn(
          { source: source.name(), base, date: date ?? 'latest', err: errorMessage(err) },
          'rate source failed, trying next',
        );
        lastError = err;
        failed = true;
      }
    }

    if (failed) {
      throw lastError;
    }
    return null;
  }

  name(): string {
    return `router(${this.#sources.map((s) => s.name()).join(',')})`;
  }
}
