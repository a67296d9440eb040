/**
 * Civil-date helpers. Every date in the service is a YYYY-MM-DD string in
 * the Los Angeles calendar; arithmetic is done on UTC midnights so the
 * server's own timezone never leaks in.
 */

export const LA_TIME_ZONE = 'America/Los_Angeles';

const DATE_RE = /^\d{4}-\d{2}-\d{2}$/;

const WEEKDAY_ABBR = ['Sun', 'Mon', 'Tue', 'Wed', 'Thu', 'Fri', 'Sat'];
const MONTH_ABBR = [
  'Jan', 'Feb', 'Mar', 'Apr', 'May', 'Jun',
  'Jul', 'Aug', 'Sep', 'Oct', 'Nov', 'Dec',
];

// en-CA formats as YYYY-MM-DD
const laDateFormatter = new Intl.DateTimeFormat('en-CA', {
  timeZone: LA_TIME_ZONE,
  year: 'numeric',
  month: '2-digit',
  day: '2-digit',
});

/** Parse YYYY-MM-DD to { year, month, day } numbers. */
export function parseDateStr(d: string): { year: number; month: number; day: number } {
  const [y, m, day] = d.split('-').map(Number);
  return { year: y, month: m, day };
}

/**
 * Validate that a date string is both well-formatted (YYYY-MM-DD) and
 * represents a real calendar date (e.g. rejects 2026-02-30).
 */
export function isValidDateStr(dateStr: string): boolean {
  if (!DATE_RE.test(dateStr)) return false;
  const { year, month, day } = parseDateStr(dateStr);
  const dt = new Date(Date.UTC(year, month - 1, day));
  return (
    dt.getUTCFullYear() === year &&
    dt.getUTCMonth() === month - 1 &&
    dt.getUTCDate() === day
  );
}

/** Format a JS Date as YYYY-MM-DD (UTC-safe). */
export function formatAsISO(d: Date): string {
  const yyyy = d.getUTCFullYear();
  const mm = String(d.getUTCMonth() + 1).padStart(2, '0');
  const dd = String(d.getUTCDate()).padStart(2, '0');
  return `${yyyy}-${mm}-${dd}`;
}

/** Build a YYYY-MM-DD string from numeric parts (month is 1-based). */
export function toDateStr(year: number, month: number, day: number): string {
  return formatAsISO(new Date(Date.UTC(year, month - 1, day)));
}

/** Format an instant as YYYY-MM-DD in Los Angeles. */
export const toLADateString = (d: Date): string => laDateFormatter.format(d);

/** Today's date in Los Angeles. */
export const getTodayString = (): string => toLADateString(new Date());

/** Day of week, 0 = Sunday. */
export function getDayIndex(dateStr: string): number {
  const { year, month, day } = parseDateStr(dateStr);
  return new Date(Date.UTC(year, month - 1, day)).getUTCDay();
}

/** Number of days in a month (month is 1-based). */
export function daysInMonth(year: number, month: number): number {
  return new Date(Date.UTC(year, month, 0)).getUTCDate();
}

/** Short display form, e.g. "Tue Mar 10". */
export function formatShortDate(dateStr: string): string {
  const { month, day } = parseDateStr(dateStr);
  return `${WEEKDAY_ABBR[getDayIndex(dateStr)]} ${MONTH_ABBR[month - 1]} ${day}`;
}
