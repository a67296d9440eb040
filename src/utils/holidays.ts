/**
 * Holiday table: no-sweep days keyed by year.
 *
 * Loaded once at startup from a JSON file shaped like
 *   { "2026": [{ "date": "2026-01-01", "name": "New Year's Day" }, ...] }
 * and read-only afterwards. A year missing from the file has no holidays.
 */

import { readFileSync } from 'node:fs';
import { z } from 'zod';
import { isValidDateStr, parseDateStr } from './date.js';

/* ------------------------------------------------------------------ */
/*  Types                                                             */
/* ------------------------------------------------------------------ */

export interface Holiday {
  date: string;
  name: string;
}

export type HolidayTable = ReadonlyMap<number, readonly Holiday[]>;

/* ------------------------------------------------------------------ */
/*  Zod schemas                                                       */
/* ------------------------------------------------------------------ */

/** YYYY-MM-DD shape check + semantic validity (rejects e.g. 2026-13-45). */
const validDate = z
  .string()
  .regex(/^\d{4}-\d{2}-\d{2}$/, 'Date must be YYYY-MM-DD')
  .refine(isValidDateStr, { message: 'Date is not a valid calendar date' });

const holidaySchema = z.object({
  date: validDate,
  name: z.string().trim().min(1, 'Holiday name is required').max(200),
});

const tableSchema = z
  .record(z.string().regex(/^\d{4}$/, 'Year keys must be four digits'), z.array(holidaySchema))
  .superRefine((table, ctx) => {
    for (const [year, holidays] of Object.entries(table)) {
      const seen = new Set<string>();
      holidays.forEach((h, i) => {
        if (parseDateStr(h.date).year !== Number(year)) {
          ctx.addIssue({
            code: z.ZodIssueCode.custom,
            path: [year, i, 'date'],
            message: `${h.date} is not in ${year}`,
          });
        }
        if (seen.has(h.date)) {
          ctx.addIssue({
            code: z.ZodIssueCode.custom,
            path: [year, i, 'date'],
            message: `${h.date} is listed twice`,
          });
        }
        seen.add(h.date);
      });
    }
  });

/* ------------------------------------------------------------------ */
/*  Loading                                                           */
/* ------------------------------------------------------------------ */

/** Validate raw JSON into a holiday table. Throws with every issue listed. */
export function parseHolidayTable(raw: unknown): HolidayTable {
  const result = tableSchema.safeParse(raw);
  if (!result.success) {
    const messages = result.error.issues.map(
      (i) => `${i.path.join('.')}: ${i.message}`,
    );
    throw new Error(`Invalid holiday table: ${messages.join('; ')}`);
  }

  const table = new Map<number, Holiday[]>();
  for (const [year, holidays] of Object.entries(result.data)) {
    table.set(
      Number(year),
      [...holidays].sort((a, b) => a.date.localeCompare(b.date)),
    );
  }
  return table;
}

export function loadHolidayTable(filePath: string): HolidayTable {
  const raw: unknown = JSON.parse(readFileSync(filePath, 'utf8'));
  return parseHolidayTable(raw);
}

/* ------------------------------------------------------------------ */
/*  Queries                                                           */
/* ------------------------------------------------------------------ */

export function holidaysForYear(table: HolidayTable, year: number): readonly Holiday[] {
  return table.get(year) ?? [];
}

/** Every configured holiday, oldest first. */
export function allHolidays(table: HolidayTable): Holiday[] {
  return [...table.values()]
    .flat()
    .sort((a, b) => a.date.localeCompare(b.date));
}

/** Flatten the table into the date set the schedule engine consumes. */
export function toHolidaySet(table: HolidayTable): ReadonlySet<string> {
  return new Set(allHolidays(table).map((h) => h.date));
}
