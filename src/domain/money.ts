import Decimal from 'decimal.js';

// Cash moves are computed on decimals and stored back as numbers, so a debit
// followed by an equal credit lands on the original balance.

export function notional(price: number, shares: number): number {
  return new Decimal(price).times(shares).toNumber();
}

export function addMoney(left: number, right: number): number {
  return new Decimal(left).plus(right).toNumber();
}

export function subtractMoney(left: number, right: number): number {
  return new Decimal(left).minus(right).toNumber();
}

export function sumMoney(values: number[]): number {
  return values.reduce((acc, value) => acc.plus(value), new Decimal(0)).toNumber();
}

/** `(numerator / denominator) * 100`, or 0 when the denominator is not positive. */
export function percentOf(numerator: number, denominator: number): number {
  if (denominator <= 0) {
    return 0;
  }

  return new Decimal(numerator).div(denominator).times(100).toNumber();
}

export function floorDiv(numerator: number, denominator: number): number {
  return new Decimal(numerator).div(denominator).floor().toNumber();
}

export function roundTo(value: number, places: number): number {
  return new Decimal(value).toDecimalPlaces(places, Decimal.ROUND_HALF_UP).toNumber();
}

/** Scale of every stored price column. */
export const PRICE_DECIMALS = 6;

export function roundPrice(value: number): number {
  return roundTo(value, PRICE_DECIMALS);
}
