/**
 * Money helpers. The core keeps every amount in integer cents; conversion to
 * and from decimal currency only happens at the edges.
 */

export function toCents(amount: number): number {
  return Math.round(amount * 100);
}

export function toCurrency(cents: number): number {
  return cents / 100;
}

export function formatMoney(cents: number): string {
  return `$${toCurrency(cents).toFixed(2)}`;
}

export function isWholeCents(cents: number): boolean {
  return Number.isSafeInteger(cents);
}

/**
 * Multiply a non-negative cent amount by `numerator / denominator`, rounding
 * half-up to the cent.
 */
export function scaleHalfUp(cents: number, numerator: number, denominator: number): number {
  return Math.floor((cents * numerator * 2 + denominator) / (denominator * 2));
}
