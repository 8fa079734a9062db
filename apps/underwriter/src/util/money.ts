import Decimal from "decimal.js";

const Money = Decimal.clone({ precision: 40, rounding: Decimal.ROUND_HALF_UP });

export type MoneyValue = Decimal;

export function money(value: Decimal.Value): Decimal {
  return new Money(value);
}

/** Round to whole cents, halves away from zero. */
export function roundHalfUpCents(value: Decimal.Value): number {
  return new Money(value).toDecimalPlaces(0, Decimal.ROUND_HALF_UP).toNumber();
}

/** `12345` → `"$123.45"` */
export function formatCents(cents: number): string {
  const sign = cents < 0 ? "-" : "";
  return `${sign}$${new Money(Math.abs(cents)).div(100).toFixed(2, Decimal.ROUND_HALF_UP)}`;
}
