/**
 * Sweep schedule engine.
 *
 * A posted route sweeps on one weekday, either on its 1st & 3rd or on its
 * 2nd & 4th occurrence in the month. A 5th occurrence is never swept.
 * Holidays are skipped outright, not moved to another day.
 *
 * Everything here is pure: same inputs, same dates. "Today" is passed in
 * as `referenceDate` by the caller.
 */

import { Errors } from './AppError.js';
import {
  daysInMonth,
  getDayIndex,
  isValidDateStr,
  parseDateStr,
  toDateStr,
} from './date.js';

/* ------------------------------------------------------------------ */
/*  Types                                                             */
/* ------------------------------------------------------------------ */

export const WEEKDAYS = [
  'Sunday',
  'Monday',
  'Tuesday',
  'Wednesday',
  'Thursday',
  'Friday',
  'Saturday',
] as const;

export type Weekday = (typeof WEEKDAYS)[number];

export type WeekParity = 'FirstThird' | 'SecondFourth';

/** Occurrence numbers swept under each parity. */
export const PARITY_OCCURRENCES: Record<WeekParity, readonly [number, number]> = {
  FirstThird: [1, 3],
  SecondFourth: [2, 4],
};

/** Months searched after the reference month before giving up. */
export const SEARCH_HORIZON_MONTHS = 12;

/* ------------------------------------------------------------------ */
/*  Parsing                                                           */
/* ------------------------------------------------------------------ */

const WEEKDAY_ALIASES = new Map<string, Weekday>([
  ['su', 'Sunday'], ['sun', 'Sunday'],
  ['m', 'Monday'], ['mo', 'Monday'], ['mon', 'Monday'],
  ['tu', 'Tuesday'], ['tue', 'Tuesday'], ['tues', 'Tuesday'],
  ['w', 'Wednesday'], ['we', 'Wednesday'], ['wed', 'Wednesday'],
  ['th', 'Thursday'], ['thu', 'Thursday'], ['thur', 'Thursday'], ['thurs', 'Thursday'],
  ['f', 'Friday'], ['fr', 'Friday'], ['fri', 'Friday'],
  ['sa', 'Saturday'], ['sat', 'Saturday'],
]);

/**
 * Map a posted day ("Tuesday", "tue", "Tu") to a Weekday.
 * Throws UNPARSEABLE_SCHEDULE for anything else.
 */
export function parseWeekday(text: string): Weekday {
  const key = text.trim().toLowerCase().replace(/\.$/, '');
  const full = WEEKDAYS.find((day) => day.toLowerCase() === key);
  if (full) return full;

  const alias = WEEKDAY_ALIASES.get(key);
  if (alias) return alias;

  throw Errors.unparseableSchedule(`Unrecognized posted day "${text}".`);
}

// "1 & 3", "2nd & 4th", "1st and 3rd week", "2/4"
const PARITY_RE =
  /^(\d)(?:st|nd|rd|th)?\s*(?:&|and|\/|,)\s*(\d)(?:st|nd|rd|th)?(?:\s+weeks?)?$/i;

/**
 * Parse a route's week field into a parity. Only the 1 & 3 and 2 & 4
 * patterns are recognized; anything else (including "3 & 5") throws.
 */
export function parseWeekParity(text: string): WeekParity {
  const match = PARITY_RE.exec(text.trim());
  if (match) {
    const pair = `${match[1]}${match[2]}`;
    if (pair === '13') return 'FirstThird';
    if (pair === '24') return 'SecondFourth';
  }
  throw Errors.unparseableSchedule(`Unrecognized sweep weeks "${text}".`);
}

/* ------------------------------------------------------------------ */
/*  Date arithmetic                                                   */
/* ------------------------------------------------------------------ */

/** Which occurrence (1-5) of its weekday the date is within its month. */
export function getWeekOccurrence(dateStr: string): number {
  return Math.floor((parseDateStr(dateStr).day - 1) / 7) + 1;
}

/** Every date in the month falling on `weekday`, in order (4 or 5 dates). */
export function weekdayDatesInMonth(year: number, month: number, weekday: Weekday): string[] {
  const target = WEEKDAYS.indexOf(weekday);
  const firstDow = getDayIndex(toDateStr(year, month, 1));
  const total = daysInMonth(year, month);

  const dates: string[] = [];
  for (let day = 1 + ((target - firstDow + 7) % 7); day <= total; day += 7) {
    dates.push(toDateStr(year, month, day));
  }
  return dates;
}

function assertReferenceDate(referenceDate: string): void {
  if (!isValidDateStr(referenceDate)) {
    throw Errors.validation(`Reference date "${referenceDate}" is not a valid YYYY-MM-DD date.`);
  }
}

/**
 * The next `count` sweep dates on or after `referenceDate`, in order.
 *
 * Walks month by month from the reference month. Throws
 * SEARCH_HORIZON_EXHAUSTED (with the partial result attached) if fewer than
 * `count` dates exist within SEARCH_HORIZON_MONTHS.
 */
export function nextSweepDates(
  referenceDate: string,
  postedDay: Weekday,
  weekParity: WeekParity,
  holidays: ReadonlySet<string>,
  count: number,
): string[] {
  assertReferenceDate(referenceDate);
  if (!Number.isInteger(count) || count < 1) {
    throw Errors.validation(`Count must be a positive integer, got ${count}.`);
  }

  const { year, month } = parseDateStr(referenceDate);
  const results: string[] = [];

  for (let offset = 0; offset <= SEARCH_HORIZON_MONTHS; offset++) {
    const y = year + Math.floor((month - 1 + offset) / 12);
    const m = ((month - 1 + offset) % 12) + 1;
    const monthDates = weekdayDatesInMonth(y, m, postedDay);

    for (const occurrence of PARITY_OCCURRENCES[weekParity]) {
      const candidate = monthDates[occurrence - 1];
      if (candidate < referenceDate || holidays.has(candidate)) continue;

      results.push(candidate);
      if (results.length === count) return results;
    }
  }

  throw Errors.searchHorizonExhausted(
    results,
    `Found ${results.length} of ${count} ${postedDay} sweep dates within ${SEARCH_HORIZON_MONTHS} months of ${referenceDate}.`,
  );
}

/** Whether `referenceDate` itself is a sweep day for the route. */
export function isSweepToday(
  referenceDate: string,
  postedDay: Weekday,
  weekParity: WeekParity,
  holidays: ReadonlySet<string>,
): boolean {
  assertReferenceDate(referenceDate);
  if (WEEKDAYS[getDayIndex(referenceDate)] !== postedDay) return false;
  if (!PARITY_OCCURRENCES[weekParity].includes(getWeekOccurrence(referenceDate))) {
    return false;
  }
  return !holidays.has(referenceDate);
}
