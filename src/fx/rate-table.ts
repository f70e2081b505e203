/**
 * RateTableBuilder.
 *
 * Builds a complete pairwise RateMap for a set of currencies by asking the
 * rate source once per currency as base (base -> every other code) and merging
 * the answers. Keys are base-qualified, so merge order never matters.
 */

import { type Clock, SystemClock } from '../clock.js';
import { Currency, type CurrencyCode } from '../models/currency.js';
import { childLogger, type Logger } from '../logger.js';
import { RateMap, type RateEntryInput } from './rate-map.js';
import type { RateQuote, RateSource } from './sources.js';
import { RateSourceUnavailableError, errorMessage } from './errors.js';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

/** A base currency whose request failed, and why. */
export interface BaseFailure {
  readonly base: CurrencyCode;
  readonly reason: string;
}

export type RateTableResult =
  | {
      readonly ok: true;
      readonly rates: RateMap;
      /** Bases that failed; their outgoing pairs are missing from `rates`. */
      readonly failures: readonly BaseFailure[];
    }
  | {
      readonly ok: false;
      readonly error: RateSourceUnavailableError;
    };

export interface RateTableBuilderOptions {
  clock?: Clock;
  logger?: Logger;
}

// ---------------------------------------------------------------------------
// RateTableBuilder
// ---------------------------------------------------------------------------

export class RateTableBuilder {
  readonly #source: RateSource;
  readonly #clock: Clock;
  readonly #log: Logger;

  constructor(source: RateSource, options: RateTableBuilderOptions = {}) {
    this.#source = source;
    this.#clock = options.clock ?? new SystemClock();
    this.#log = options.logger ?? childLogger('rate-table');
  }

  /**
   * Build the rate table for `codes` as of `asOfDate` ("YYYY-MM-DD"), or for
   * the latest rates when omitted.
   *
   * Every requested code gets its self pair. One attempt is made per base; if
   * all of them fail the result is `{ ok: false }`, otherwise the partial map
   * is returned together with the failed bases.
   */
  async build(codes: Iterable<string>, asOfDate?: string): Promise<RateTableResult> {
    const currencies = Currency.parseList(codes);

    if (currencies.length === 0) {
      return {
        ok: false,
        error: new RateSourceUnavailableError([], asOfDate, ['no currencies requested']),
      };
    }

    // A single currency needs nothing from the source.
    if (currencies.length === 1) {
      return {
        ok: true,
        rates: RateMap.create(asOfDate ?? this.#clock.today(), [], currencies),
        failures: [],
      };
    }

    const entries: RateEntryInput[] = [];
    const failures: BaseFailure[] = [];
    let reportedDate: string | undefined;

    for (const base of currencies) {
      const others = currencies.filter((code) => code !== base);

      let quote: RateQuote | null;
      try {
        quote = await this.#source.fetchRates(base, others, asOfDate);
      } catch (err) {
        failures.push({ base, reason: errorMessage(err) });
        this.#log.warn(
          { base, date: asOfDate ?? 'latest', err: errorMessage(err) },
          'rate request failed',
        );
        continue;
      }

      if (quote === null) {
        failures.push({ base, reason: 'no rates returned' });
        this.#log.warn({ base, date: asOfDate ?? 'latest' }, 'rate source returned no rates');
        continue;
      }

      const quoted: RateEntryInput[] = [];
      let invalid: string | null = null;
      for (const [target, rate] of quote.rates) {
        const to = target.trim().toUpperCase();
        if (!others.includes(to)) {
          continue;
        }
        if (!rate.isFinite() || !rate.gt(0)) {
          invalid = `invalid rate ${rate.toString()} for ${base}->${to}`;
          break;
        }
        quoted.push({ from: base, to, rate });
      }
      if (invalid !== null) {
        failures.push({ base, reason: invalid });
        this.#log.warn({ base, date: asOfDate ?? 'latest' }, invalid);
        continue;
      }

      reportedDate ??= quote.as_of_date;
      entries.push(...quoted);
    }

    if (failures.length === currencies.length) {
      return {
        ok: false,
        error: new RateSourceUnavailableError(
          currencies,
          asOfDate,
          failures.map((f) => `${f.base}: ${f.reason}`),
        ),
      };
    }

    const rates = RateMap.create(asOfDate ?? reportedDate ?? this.#clock.today(), entries, currencies);
    this.#log.debug(
      { date: rates.as_of_date, pairs: rates.size, failed: failures.length },
      'rate table built',
    );
    return { ok: true, rates, failures };
  }
}
