/**
 * Timezone utilities for order times.
 *
 * RULES:
 * - Order times are stored as unix seconds (UTC)
 * - Courier-facing times are rendered in the operating timezone
 *   (ORDER_TIMEZONE, see lib/config/order-config.ts)
 */

/**
 * Convert unix seconds to a Date.
 *
 * @throws Error if the value is not a finite number
 */
export function unixToDate(unixSeconds: number): Date {
  if (!Number.isFinite(unixSeconds)) {
    throw new Error(`Invalid unix timestamp: ${String(unixSeconds)}`);
  }
  return new Date(unixSeconds * 1000);
}

/** ISO-8601 string for a unix timestamp, or null when absent */
export function unixToIso(unixSeconds: number | null): string | null {
  return unixSeconds === null ? null : unixToDate(unixSeconds).toISOString();
}

/**
 * Full human-readable date and time in `timeZone`.
 *
 * @example
 * formatFull(1767225600, 'America/Los_Angeles') // "Wed, Dec 31, 2025, 4:00 PM"
 */
export function formatFull(unixSeconds: number, timeZone: string): string {
  return unixToDate(unixSeconds).toLocaleString('en-US', {
    timeZone,
    weekday: 'short',
    year: 'numeric',
    month: 'short',
    day: 'numeric',
    hour: 'numeric',
    minute: '2-digit',
  });
}

/** Current time in unix seconds */
export function nowUnix(): number {
  return Math.floor(Date.now() / 1000);
}
