import Decimal from 'decimal.js';

export const ZERO = new Decimal(0);

let knownCurrencies: Set<string> | null = null;

/** ISO 4217 codes recognised by the runtime's Intl data. */
export function isCurrencyCode(code: string): boolean {
  if (!knownCurrencies) {
    knownCurrencies = new Set(Intl.supportedValuesOf('currency'));
  }
  return knownCurrencies.has(code);
}

export function toDecimal(value: Decimal.Value): Decimal {
  return value instanceof Decimal ? value : new Decimal(value);
}

export function sum(values: Iterable<Decimal>): Decimal {
  let total = ZERO;
  for (const v of values) total = total.plus(v);
  return total;
}

export function mean(values: Decimal[]): Decimal {
  if (values.length === 0) return ZERO;
  return sum(values).dividedBy(values.length);
}

/** Sample standard deviation (n − 1). Zero for fewer than two values. */
export function sampleStdDev(values: Decimal[]): Decimal {
  if (values.length < 2) return ZERO;
  const m = mean(values);
  const squares = values.map((v) => v.minus(m).pow(2));
  return sum(squares).dividedBy(values.length - 1).sqrt();
}

export function toCents(value: Decimal): Decimal {
  return value.toDecimalPlaces(2, Decimal.ROUND_HALF_UP);
}

export function ratio(numerator: Decimal, denominator: Decimal, places: number): number {
  if (denominator.isZero()) return 0;
  return numerator.dividedBy(denominator).toDecimalPlaces(places, Decimal.ROUND_HALF_UP).toNumber();
}

export function formatAmount(value: Decimal, currency: string): string {
  return `${toCents(value).toFixed(2)} ${currency}`;
}
