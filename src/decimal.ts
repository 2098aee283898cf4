import Decimal from 'decimal.js-light';

// Centralized Decimal config: 34 significant digits, the precision of an
// IEEE quad, so weighted keys keep their order far past what a double holds.
Decimal.set({ precision: 34, rounding: Decimal.ROUND_HALF_EVEN });

export { Decimal };
