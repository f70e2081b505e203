/**
 * ConversionEngine.
 *
 * Converts one amount between two currencies with a RateMap. Resolution order,
 * first match wins:
 *
 * 1. identity: `from == to`, the amount is returned untouched;
 * 2. direct: `(from, to)` present, `amount * rate`;
 * 3. inverse: `(to, from)` present, `amount / rate`;
 * 4. triangulated: `(from, I)` and `(I, to)` present for the configured
 *    intermediary `I`, `amount * r1 * r2`;
 * 5. miss: the amount is returned unconverted and a ConversionMiss is
 *    attached to the result and logged.
 *
 * A miss never throws; aggregation continues with a degraded total and the
 * miss is reported to the caller.
 */

import { Decimal } from '../decimal.js';
import { Currency, type CurrencyCode } from '../models/currency.js';
import { childLogger, type Logger } from '../logger.js';
import type { RateMap } from './rate-map.js';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export type ConversionRoute = 'identity' | 'direct' | 'inverse' | 'triangulated' | 'miss';

/** A pair with no resolvable path in the map it was converted with. */
export interface ConversionMiss {
  readonly from: CurrencyCode;
  readonly to: CurrencyCode;
  /** As-of date of the rate map that lacked the pair. */
  readonly as_of_date: string;
}

export interface ConversionResult {
  readonly value: Decimal;
  readonly route: ConversionRoute;
  readonly miss?: ConversionMiss;
}

export const DEFAULT_INTERMEDIARY: CurrencyCode = 'USD';

export interface ConversionEngineOptions {
  /** Currency used for triangulation. Defaults to USD. */
  intermediary?: string;
  logger?: Logger;
  /** Called once for every miss, after it is logged. */
  onMiss?: (miss: ConversionMiss) => void;
}

// ---------------------------------------------------------------------------
// ConversionEngine
// ---------------------------------------------------------------------------

export class ConversionEngine {
  readonly intermediary: CurrencyCode;
  readonly #log: Logger;
  readonly #onMiss: ((miss: ConversionMiss) => void) | undefined;

  constructor(options: ConversionEngineOptions = {}) {
    this.intermediary = Currency.parse(options.intermediary ?? DEFAULT_INTERMEDIARY);
    this.#log = options.logger ?? childLogger('convert');
    this.#onMiss = options.onMiss;
  }

  convert(amount: Decimal.Value, from: string, to: string, rates: RateMap): ConversionResult {
    const value = amount instanceof Decimal ? amount : new Decimal(amount);
    const src = from.trim().toUpperCase();
    const dst = to.trim().toUpperCase();

    if (src === dst) {
      return { value, route: 'identity' };
    }

    const direct = rates.get(src, dst);
    if (direct !== undefined) {
      return { value: value.times(direct), route: 'direct' };
    }

    const inverse = rates.get(dst, src);
    if (inverse !== undefined) {
      return { value: value.div(inverse), route: 'inverse' };
    }

    const toIntermediary = rates.get(src, this.intermediary);
    const fromIntermediary = rates.get(this.intermediary, dst);
    if (toIntermediary !== undefined && fromIntermediary !== undefined) {
      return { value: value.times(toIntermediary).times(fromIntermediary), route: 'triangulated' };
    }

    const miss: ConversionMiss = { from: src, to: dst, as_of_date: rates.as_of_date };
    this.#log.warn(miss, 'no conversion rate; amount left unconverted');
    this.#onMiss?.(miss);
    return { value, route: 'miss', miss };
  }

  /** Like `convert`, returning only the converted amount. */
  convertValue(amount: Decimal.Value, from: string, to: string, rates: RateMap): Decimal {
    return this.convert(amount, from, to, rates).value;
  }
}
