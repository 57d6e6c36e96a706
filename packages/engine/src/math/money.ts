import { Decimal } from 'decimal.js';

/** Round to 2 decimal places, half-up (away from zero at the midpoint). */
export function quantize(amount: Decimal.Value): Decimal {
  return new Decimal(amount).toDecimalPlaces(2, Decimal.ROUND_HALF_UP);
}

export function toCents(amount: Decimal.Value): number {
  const cents = quantize(amount).times(100).toNumber();
  // normalize -0
  return cents === 0 ? 0 : cents;
}

export function centsToString(cents: number): string {
  return new Decimal(cents).dividedBy(100).toFixed(2);
}

/** "$1,234.56", with a leading "-" for negative amounts. */
export function formatMoney(amountCents: number): string {
  const sign = amountCents < 0 ? '-' : '';
  const [whole, fraction] = centsToString(Math.abs(amountCents)).split('.');
  return `${sign}$${whole.replace(/\B(?=(\d{3})+(?!\d))/g, ',')}.${fraction}`;
}

export function subtractCents(a: number, b: number): number {
  return new Decimal(a).minus(b).toNumber();
}

export function sumCents(amounts: readonly number[]): number {
  return amounts.reduce((acc, val) => new Decimal(acc).plus(val).toNumber(), 0);
}

/** One month of interest at `apr` percent per year, rounded to the cent. */
export function monthlyInterestCents(balanceCents: number, apr: number): number {
  return new Decimal(balanceCents)
    .times(new Decimal(String(apr)))
    .dividedBy(1200)
    .toDecimalPlaces(0, Decimal.ROUND_HALF_UP)
    .toNumber();
}
