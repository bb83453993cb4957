/**
 * Calendar date helpers shared by the date parsers
 */

export interface CalendarDate {
  year: number;
  month: number; // 1-12
  day: number;
}

/**
 * Check that year/month/day name a real day (no Feb 30, no month 13)
 */
export function isValidCalendarDate({ year, month, day }: CalendarDate): boolean {
  if (month < 1 || month > 12 || day < 1) {
    return false;
  }
  const date = new Date(Date.UTC(year, month - 1, day));
  return (
    date.getUTCFullYear() === year &&
    date.getUTCMonth() === month - 1 &&
    date.getUTCDate() === day
  );
}

/**
 * Format as YYYY-MM-DD
 *
 * @example
 * formatIsoDate({ year: 2012, month: 10, day: 1 }) // "2012-10-01"
 */
export function formatIsoDate({ year, month, day }: CalendarDate): string {
  const pad = (n: number, width = 2) => String(n).padStart(width, "0");
  return `${pad(year, 4)}-${pad(month)}-${pad(day)}`;
}

/**
 * The local calendar date of a point in time
 */
export function localCalendarDate(date: Date): CalendarDate {
  return {
    year: date.getFullYear(),
    month: date.getMonth() + 1,
    day: date.getDate(),
  };
}
