/**
 * Monetary helpers. Rates are plain numbers in dollars; every value that leaves
 * the engine is rounded to cents.
 */

/**
 * Round to 2 decimals, half away from zero (half-up for the non-negative
 * amounts the engine handles). The product is first trimmed to 12 significant
 * digits so binary noise such as 1.005 * 100 = 100.49999999999999 rounds the
 * way the decimal value would.
 */
export function roundRate(value: number): number {
  const cents = Number((Math.abs(value) * 100).toPrecision(12));
  return (Math.sign(value) * Math.round(cents)) / 100 + 0;
}

export function clampRate(value: number, minimum: number, maximum: number): number {
  return Math.min(Math.max(value, minimum), maximum);
}

/** Percentage of `offer` over `reference`, rounded to 2 decimals. */
export function percentageOver(offer: number, reference: number): number {
  if (reference === 0) return 0;
  return roundRate(((offer - reference) / reference) * 100);
}

export function formatRate(value: number): string {
  return `$${value.toFixed(2)}`;
}
