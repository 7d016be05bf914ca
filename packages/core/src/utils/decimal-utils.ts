import { Decimal } from 'decimal.js';

// Configure Decimal.js for ledger precision.
// Token amounts carry up to 18 decimal places, so precision is kept high.
Decimal.set({
  maxE: 9e15,
  minE: -9e15,
  modulo: Decimal.ROUND_HALF_UP,
  precision: 40,
  rounding: Decimal.ROUND_HALF_UP,
  toExpNeg: -7,
  toExpPos: 21,
});

/**
 * Number of decimal digits ledger amounts are rounded to before emission.
 * Matches the precision of the native currency's smallest unit.
 */
export const LEDGER_AMOUNT_PRECISION = 9;

export type DecimalInput = string | number | Decimal;

/**
 * Try to parse a string or number to a Decimal
 */
export function tryParseDecimal(value: DecimalInput | undefined | null, out?: { value: Decimal }): boolean {
  if (value === undefined || value === null || value === '') {
    if (out) out.value = new Decimal(0);
    return true;
  }

  try {
    const decimal = new Decimal(value);
    if (!decimal.isFinite()) {
      return false;
    }
    if (out) out.value = decimal;
    return true;
  } catch {
    return false;
  }
}

/**
 * Parse a string or number to a Decimal with fallback to zero
 */
export function parseDecimal(value: DecimalInput | undefined | null): Decimal {
  const result = { value: new Decimal(0) };
  tryParseDecimal(value, result);
  return result.value;
}

/**
 * Scale an integer amount expressed in smallest units by `10^decimals`.
 *
 * `scaleByDecimals('1500000000', 9)` is `1.5`.
 */
export function scaleByDecimals(rawAmount: DecimalInput, decimals: number): Decimal {
  return parseDecimal(rawAmount).dividedBy(new Decimal(10).pow(decimals));
}

/**
 * Round to the ledger precision (half-up).
 */
export function roundLedgerAmount(value: Decimal, decimalPlaces = LEDGER_AMOUNT_PRECISION): Decimal {
  return value.toDecimalPlaces(decimalPlaces, Decimal.ROUND_HALF_UP);
}

/**
 * Render a Decimal in plain notation without trailing zeros (`1.5`, `0.000005`).
 */
export function formatDecimal(decimal: Decimal): string {
  return decimal.toFixed();
}
