/**
 * Decimal formatting utilities shared by the library and CLI layers.
 *
 * JSON output carries canonical decimal strings ({@link decStr}); the
 * `display` settings only affect the human-readable strings next to them.
 */

import fs from 'node:fs';
import { Decimal } from '../decimal.js';
import type { CurrencyCode } from '../models/currency.js';

/**
 * Format a Decimal to string, stripping trailing zeros.
 */
export function decStr(d: Decimal): string {
  // Decimal.js toFixed() keeps trailing zeros; we need to strip them.
  const s = d.toFixed();
  if (!s.includes('.')) return s === '-0' ? '0' : s;
  let result = s.replace(/0+$/, '');
  if (result.endsWith('.')) {
    result = result.slice(0, -1);
  }
  if (result === '-0') return '0';
  return result;
}

function groupIntDigits(intPart: string): string {
  if (intPart.length <= 3) return intPart;
  let out = '';
  for (let i = 0; i < intPart.length; i++) {
    out += intPart[i];
    const remaining = intPart.length - i - 1;
    if (remaining > 0 && remaining % 3 === 0) out += ',';
  }
  return out;
}

function groupNumberString(s: string): string {
  const dot = s.indexOf('.');
  if (dot === -1) return groupIntDigits(s);
  const intPart = s.slice(0, dot);
  const frac = s.slice(dot + 1);
  const grouped = groupIntDigits(intPart);
  return frac.length > 0 ? `${grouped}.${frac}` : grouped;
}

/**
 * Round a Decimal to at most `dp` decimal places (half-up) and format it with
 * {@link decStr}.
 */
export function decStrRounded(d: Decimal, dp: number | undefined): string {
  if (dp === undefined) return decStr(d);
  if (!Number.isInteger(dp) || dp < 0) return decStr(d);
  return decStr(d.toDecimalPlaces(dp, Decimal.ROUND_HALF_UP));
}

// ---------------------------------------------------------------------------
// Currency symbols
// ---------------------------------------------------------------------------

let symbols: ReadonlyMap<CurrencyCode, string> | undefined;

function loadSymbols(): ReadonlyMap<CurrencyCode, string> {
  if (symbols === undefined) {
    const file = new URL('../../data/currency-symbols.json', import.meta.url);
    const parsed: unknown = JSON.parse(fs.readFileSync(file, 'utf-8'));
    const map = new Map<CurrencyCode, string>();
    if (typeof parsed === 'object' && parsed !== null) {
      for (const [code, symbol] of Object.entries(parsed)) {
        if (typeof symbol === 'string') {
          map.set(code, symbol);
        }
      }
    }
    symbols = map;
  }
  return symbols;
}

/** Display symbol for a currency; unknown codes render as the code itself. */
export function currencySymbol(code: CurrencyCode): string {
  return loadSymbols().get(code) ?? code;
}

// ---------------------------------------------------------------------------
// Display
// ---------------------------------------------------------------------------

export type CurrencyDisplayOptions = {
  currency_decimals?: number;
  currency_grouping?: boolean;
  /** A literal symbol, or "auto" for the symbol of `currency`. */
  currency_symbol?: string;
  currency_fixed_decimals?: boolean;
};

/**
 * Format a Decimal for human display.
 *
 * This is intended for UI surfaces. It does not change any canonical JSON
 * numeric string fields.
 */
export function formatCurrencyDisplay(
  d: Decimal,
  opts: CurrencyDisplayOptions,
  currency?: CurrencyCode,
): string {
  const dp = opts.currency_decimals;
  const fixed = opts.currency_fixed_decimals === true && dp !== undefined;
  const grouping = opts.currency_grouping === true;
  let symbol = typeof opts.currency_symbol === 'string' ? opts.currency_symbol : undefined;
  if (symbol === 'auto') {
    symbol = currency !== undefined ? currencySymbol(currency) : undefined;
  }

  const rounded = dp !== undefined ? d.toDecimalPlaces(dp, Decimal.ROUND_HALF_UP) : d;
  const negative = rounded.isNeg() && !rounded.isZero();
  const abs = rounded.abs();

  let s = fixed && dp !== undefined ? abs.toFixed(dp) : decStr(abs);
  if (grouping) s = groupNumberString(s);

  return `${negative ? '-' : ''}${symbol ?? ''}${s}`;
}
