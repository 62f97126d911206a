import Decimal from 'decimal.js';

Decimal.set({ precision: 40, rounding: Decimal.ROUND_HALF_EVEN });

export type DecimalInput = Decimal | number | string;

export const ZERO = new Decimal(0);
export const ONE = new Decimal(1);

export function dec(value: DecimalInput): Decimal {
  return value instanceof Decimal ? value : new Decimal(value);
}

export function sum(values: readonly Decimal[]): Decimal {
  return values.reduce((acc, value) => acc.plus(value), ZERO);
}
