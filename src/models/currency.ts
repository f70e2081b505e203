/**
 * Currency codes.
 *
 * Codes are three uppercase ASCII letters ("USD", "CAD"). Input is trimmed and
 * uppercased before validation.
 */

export type CurrencyCode = string;

const CODE_PATTERN = /^[A-Z]{3}$/;

export class CurrencyCodeError extends Error {
  public readonly value: string;

  constructor(value: string) {
    super(`Invalid currency code ${JSON.stringify(value)}: expected three letters`);
    this.name = 'CurrencyCodeError';
    this.value = value;
  }
}

export const Currency = {
  /** True when `value` is already a normalized code. */
  isCode(value: string): boolean {
    return CODE_PATTERN.test(value);
  },

  /** Normalize and validate a currency code. Throws CurrencyCodeError. */
  parse(value: string): CurrencyCode {
    const normalized = value.trim().toUpperCase();
    if (!CODE_PATTERN.test(normalized)) {
      throw new CurrencyCodeError(value);
    }
    return normalized;
  },

  /**
   * Parse a list of codes, dropping duplicates while keeping the first
   * occurrence's position (the display order).
   */
  parseList(values: Iterable<string>): CurrencyCode[] {
    const seen = new Set<CurrencyCode>();
    const out: CurrencyCode[] = [];
    for (const value of values) {
      const code = Currency.parse(value);
      if (!seen.has(code)) {
        seen.add(code);
        out.push(code);
      }
    }
    return out;
  },
} as const;
