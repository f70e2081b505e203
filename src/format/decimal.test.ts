import { describe, it, expect } from 'vitest';
import { Decimal } from '../decimal.js';
import { currencySymbol, decStr, decStrRounded, formatCurrencyDisplay } from './decimal.js';

describe('decStr', () => {
  it('strips trailing zeros', () => {
    expect(decStr(new Decimal('1675.00'))).toBe('1675');
    expect(decStr(new Decimal('0.7400'))).toBe('0.74');
    expect(decStr(new Decimal('-0'))).toBe('0');
  });

  it('never uses exponent notation', () => {
    expect(decStr(new Decimal('1e21'))).toBe('1000000000000000000000');
    expect(decStr(new Decimal('1e-8'))).toBe('0.00000001');
  });
});

describe('decStrRounded', () => {
  it('rounds half up', () => {
    expect(decStrRounded(new Decimal('109.995'), 2)).toBe('110');
    expect(decStrRounded(new Decimal('33.3333'), 2)).toBe('33.33');
    expect(decStrRounded(new Decimal('33.3333'), undefined)).toBe('33.3333');
  });
});

describe('formatCurrencyDisplay', () => {
  it('defaults to decStr-like output without grouping/symbol', () => {
    expect(formatCurrencyDisplay(new Decimal('1234.500'), {})).toBe('1234.5');
  });

  it('supports grouping + symbol + fixed decimals', () => {
    expect(
      formatCurrencyDisplay(new Decimal('1675'), {
        currency_decimals: 2,
        currency_grouping: true,
        currency_symbol: '$',
        currency_fixed_decimals: true,
      }),
    ).toBe('$1,675.00');
  });

  it('resolves the "auto" symbol from the currency', () => {
    const opts = { currency_decimals: 2, currency_fixed_decimals: true, currency_symbol: 'auto' };
    expect(formatCurrencyDisplay(new Decimal('135'), opts, 'CAD')).toBe('CA$135.00');
    expect(formatCurrencyDisplay(new Decimal('74'), opts, 'USD')).toBe('US$74.00');
    expect(formatCurrencyDisplay(new Decimal('74'), opts)).toBe('74.00');
  });

  it('puts negative sign before symbol', () => {
    expect(
      formatCurrencyDisplay(new Decimal('-1234.5'), {
        currency_decimals: 2,
        currency_grouping: true,
        currency_symbol: '€',
        currency_fixed_decimals: true,
      }),
    ).toBe('-€1,234.50');
  });
});

describe('currencySymbol', () => {
  it('knows common currencies', () => {
    expect(currencySymbol('INR')).toBe('₹');
    expect(currencySymbol('GBP')).toBe('£');
    expect(currencySymbol('CAD')).toBe('CA$');
  });

  it('falls back to the code', () => {
    expect(currencySymbol('XAU')).toBe('XAU');
  });
});
