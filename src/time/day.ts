/**
 * Trading-day boundaries. Days roll over at UTC midnight.
 */

/**
 * Get the start of the day containing `now` in milliseconds (UTC midnight).
 */
export function getDayStart(now: number = Date.now()): number {
  const date = new Date(now);
  return Date.UTC(
    date.getUTCFullYear(),
    date.getUTCMonth(),
    date.getUTCDate(),
    0,
    0,
    0,
    0
  );
}

export function isSameDay(a: number, b: number): boolean {
  return getDayStart(a) === getDayStart(b);
}

/**
 * YYYY-MM-DD for a timestamp (UTC).
 */
export function formatDay(now: number = Date.now()): string {
  return new Date(getDayStart(now)).toISOString().substring(0, 10);
}
