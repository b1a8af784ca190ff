/**
 * Cents ↔ dollars helpers. Storage always holds integer cents.
 */

export function centsToDollars(cents: number): number {
  return cents / 100;
}

/** "12.50": no currency symbol, always two decimals */
export function centsToDollarsString(cents: number): string {
  return (cents / 100).toFixed(2);
}
