import { Decimal } from 'decimal.js';

// Balances and rates are kept at 29 significant digits; rounding to display
// precision happens only when values are rendered.
Decimal.set({ precision: 29 });

export { Decimal };
