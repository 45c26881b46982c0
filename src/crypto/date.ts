/**
 * Date header helpers
 */

const DAYS = ['Sun', 'Mon', 'Tue', 'Wed', 'Thu', 'Fri', 'Sat'] as const;
const MONTHS = [
  'Jan', 'Feb', 'Mar', 'Apr', 'May', 'Jun',
  'Jul', 'Aug', 'Sep', 'Oct', 'Nov', 'Dec',
] as const;

function pad(value: number): string {
  return String(value).padStart(2, '0');
}

/**
 * Format a date as RFC 1123 in UTC
 *
 * @example
 * formatHttpDate(new Date('1981-08-22T20:52:00Z'));
 * // Returns: "Sat, 22 Aug 1981 20:52:00 +0000"
 */
export function formatHttpDate(date: Date): string {
  const day = DAYS[date.getUTCDay()];
  const month = MONTHS[date.getUTCMonth()];
  const time = [date.getUTCHours(), date.getUTCMinutes(), date.getUTCSeconds()].map(pad).join(':');

  return `${day}, ${pad(date.getUTCDate())} ${month} ${date.getUTCFullYear()} ${time} +0000`;
}

/**
 * Parse a Date / X-Date header value.
 * Accepts RFC 1123 (with GMT or a numeric offset) and ISO 8601.
 *
 * @returns The date, or null if the value can't be parsed
 */
export function parseHttpDate(value: string): Date | null {
  const time = Date.parse(value.trim());
  return Number.isNaN(time) ? null : new Date(time);
}

/**
 * Difference between two dates in whole seconds, ignoring direction
 */
export function diffInSeconds(a: Date, b: Date): number {
  return Math.floor(Math.abs(a.getTime() - b.getTime()) / 1000);
}
