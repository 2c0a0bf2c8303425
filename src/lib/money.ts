/**
 * Fixed-point helpers for wallet amounts.
 *
 * Every amount that reaches the ledger is a Decimal with at most `scale`
 * fractional digits. Floats never cross this boundary.
 */

import Decimal from 'decimal.js';
import { InvalidOperationError } from './errors';

Decimal.set({
  precision: 40,
  rounding: Decimal.ROUND_HALF_UP,
});

export type AmountInput = Decimal.Value;

export const ZERO = new Decimal(0);

export function toDecimal(value: AmountInput, field: string = 'amount'): Decimal {
  let parsed: Decimal;
  try {
    parsed = new Decimal(value);
  } catch {
    throw new InvalidOperationError(`${field} is not a number`, { field, value: String(value) });
  }
  if (!parsed.isFinite()) {
    throw new InvalidOperationError(`${field} must be finite`, { field, value: String(value) });
  }
  return parsed;
}

/**
 * Parse a strictly positive amount with no more than `scale` fractional digits.
 */
export function positiveAmount(value: AmountInput, scale: number, field: string = 'amount'): Decimal {
  const amount = toDecimal(value, field);
  if (amount.lte(0)) {
    throw new InvalidOperationError(`${field} must be greater than zero`, {
      field,
      value: amount.toFixed(),
    });
  }
  if (amount.decimalPlaces() > scale) {
    throw new InvalidOperationError(`${field} has more than ${scale} decimal places`, {
      field,
      value: amount.toFixed(),
    });
  }
  return amount;
}

/**
 * Parse a strictly positive price. Prices are not bound to the wallet scale.
 */
export function positivePrice(value: AmountInput, field: string = 'price'): Decimal {
  const price = toDecimal(value, field);
  if (price.lte(0)) {
    throw new InvalidOperationError(`${field} must be greater than zero`, {
      field,
      value: price.toFixed(),
    });
  }
  return price;
}

export function roundUp(value: Decimal, scale: number): Decimal {
  return value.toDecimalPlaces(scale, Decimal.ROUND_UP);
}

export function roundDown(value: Decimal, scale: number): Decimal {
  return value.toDecimalPlaces(scale, Decimal.ROUND_DOWN);
}

export function sum(values: Iterable<Decimal>): Decimal {
  let total = ZERO;
  for (const v of values) total = total.plus(v);
  return total;
}

export { Decimal };
