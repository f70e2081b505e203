/**
 * Rate source backed by the frankfurter.app API (ECB reference rates).
 *
 *   GET {baseUrl}/latest?from=USD&to=CAD,INR
 *   GET {baseUrl}/2024-03-01?from=USD&to=CAD,INR
 *
 * Response body:
 *   { "amount": 1.0, "base": "USD", "date": "2024-03-01",
 *     "rates": { "CAD": 1.3546, "INR": 82.91 } }
 *
 * For a date without a fixing (weekend, holiday) the API answers with the
 * closest earlier business day and reports that day in `date`.
 */

import { Decimal } from '../decimal.js';
import type { CurrencyCode } from '../models/currency.js';
import type { RateQuote, RateSource } from './sources.js';
import { RateSourceResponseError } from './errors.js';

export const DEFAULT_FRANKFURTER_URL = 'https://api.frankfurter.app';
export const DEFAULT_TIMEOUT_MS = 10_000;

export type FetchFn = (input: string, init?: RequestInit) => Promise<Response>;

export interface FrankfurterOptions {
  baseUrl?: string;
  timeoutMs?: number;
  /** Injected for tests; defaults to the global fetch. */
  fetch?: FetchFn;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export class FrankfurterRateSource implements RateSource {
  readonly #baseUrl: string;
  readonly #timeoutMs: number;
  readonly #fetch: FetchFn;

  constructor(options: FrankfurterOptions = {}) {
    this.#baseUrl = (options.baseUrl ?? DEFAULT_FRANKFURTER_URL).replace(/\/+$/, '');
    this.#timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.#fetch = options.fetch ?? ((input, init) => fetch(input, init));
  }

  name(): string {
    return 'frankfurter';
  }

  /** Build the request URL. Codes are validated upstream, so no escaping. */
  requestUrl(base: CurrencyCode, targets: readonly CurrencyCode[], date?: string): string {
    const others = targets.filter((code) => code !== base);
    return `${this.#baseUrl}/${date ?? 'latest'}?from=${base}&to=${others.join(',')}`;
  }

  async fetchRates(
    base: CurrencyCode,
    targets: readonly CurrencyCode[],
    date?: string,
  ): Promise<RateQuote | null> {
    const url = this.requestUrl(base, targets, date);
    const resp = await this.#fetch(url, {
      method: 'GET',
      headers: { accept: 'application/json' },
      signal: AbortSignal.timeout(this.#timeoutMs),
    });
    const body = await resp.text();
    if (!resp.ok) {
      throw new RateSourceResponseError(
        this.name(),
        `request failed (${resp.status}): ${body}`,
        resp.status,
      );
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(body);
    } catch (e: unknown) {
      throw new RateSourceResponseError(
        this.name(),
        `failed to parse JSON response: ${e instanceof Error ? e.message : String(e)}`,
      );
    }

    return this.parseBody(parsed, base);
  }

  private parseBody(body: unknown, base: CurrencyCode): RateQuote | null {
    if (!isRecord(body) || typeof body.date !== 'string' || !isRecord(body.rates)) {
      throw new RateSourceResponseError(this.name(), 'unexpected response shape');
    }

    const rates = new Map<CurrencyCode, Decimal>();
    for (const [code, value] of Object.entries(body.rates)) {
      if (typeof value !== 'number' || !Number.isFinite(value) || value <= 0) {
        throw new RateSourceResponseError(
          this.name(),
          `invalid rate for ${code}: ${JSON.stringify(value)}`,
        );
      }
      rates.set(code.toUpperCase(), new Decimal(value));
    }

    if (rates.size === 0) {
      return null;
    }

    return { base, as_of_date: body.date, rates, source: this.name() };
  }
}
