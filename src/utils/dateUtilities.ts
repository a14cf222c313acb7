/**
 * Calendar helpers. All arithmetic is in the server's local calendar so that
 * "N days ago" and "same day" match what the user sees on a clock.
 */

/**
 * Subtract whole calendar days, keeping the wall-clock time.
 */
export function subtractDays(date: Date, days: number): Date {
  const result = new Date(date);
  result.setDate(result.getDate() - days);
  return result;
}

/**
 * Subtract whole calendar months. Day-of-month overflow rolls forward the way
 * `Date#setMonth` does (March 31 minus one month is March 2/3).
 */
export function subtractMonths(date: Date, months: number): Date {
  const result = new Date(date);
  result.setMonth(result.getMonth() - months);
  return result;
}

export function subtractYears(date: Date, years: number): Date {
  const result = new Date(date);
  result.setFullYear(result.getFullYear() - years);
  return result;
}

export function isSameLocalDay(a: Date, b: Date): boolean {
  return (
    a.getFullYear() === b.getFullYear() &&
    a.getMonth() === b.getMonth() &&
    a.getDate() === b.getDate()
  );
}

/**
 * Format a date as a YYYY-MM-DD key in the local calendar.
 */
export function getDateKey(date: Date): string {
  const year = String(date.getFullYear());
  const month = String(date.getMonth() + 1).padStart(2, '0');
  const day = String(date.getDate()).padStart(2, '0');
  return `${year}-${month}-${day}`;
}

/**
 * Parse a date key (YYYY-MM-DD) into a Date object in local timezone.
 * Avoids timezone issues from `new Date("YYYY-MM-DD")` which interprets as UTC midnight.
 *
 * @throws Error if dateKey format is invalid or the date does not exist
 */
export function parseDateKey(dateKey: string): Date {
  const match = /^(\d{4})-(\d{2})-(\d{2})$/.exec(dateKey);
  if (!match) {
    throw new Error(`Invalid date key format: ${dateKey}. Expected YYYY-MM-DD`);
  }

  const year = Number.parseInt(match[1], 10);
  const month = Number.parseInt(match[2], 10) - 1; // 0-indexed
  const day = Number.parseInt(match[3], 10);

  const date = new Date(year, month, day);

  // Reject dates that rolled over, e.g. "2025-02-30"
  if (date.getFullYear() !== year || date.getMonth() !== month || date.getDate() !== day) {
    throw new Error(`Invalid date: ${dateKey}. Date does not exist.`);
  }

  return date;
}

/**
 * Elapsed seconds between two instants.
 */
export function secondsBetween(start: Date, end: Date): number {
  return (end.getTime() - start.getTime()) / 1000;
}
