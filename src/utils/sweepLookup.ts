/**
 * Coordinates → sweep routes → display card.
 *
 * Transport-agnostic: the chat adapter and the web lookup API both build
 * their replies from `lookupSweepInfo`.
 */

import { AppError, ErrorCode, SearchHorizonError, messageFor } from './AppError.js';
import { formatShortDate } from './date.js';
import type { Coordinates } from './geocoder.js';
import {
  isSweepToday,
  nextSweepDates,
  parseWeekParity,
  parseWeekday,
} from './sweepSchedule.js';
import { querySweepRoutes, type SweepRouteRecord } from './sweepRoutes.js';
import { logger } from '../middleware/requestLogger.js';

/* ------------------------------------------------------------------ */
/*  Types                                                             */
/* ------------------------------------------------------------------ */

export interface SweepDetails {
  /** Records on the primary street, in upstream order */
  routes: SweepRouteRecord[];
  /** Distinct posted days, first seen first */
  sweepDays: string[];
  /** Raw week field of the first record, e.g. "2 & 4" */
  sweepSchedule: string;
  sweepTime: string | null;
  /** "VENICE BLVD"; travel direction is left out */
  streetName: string;
}

/** What the schedule is computed against. */
export interface ScheduleContext {
  today: string;
  holidays: ReadonlySet<string>;
}

export interface LookupResult {
  found: boolean;
  text: string;
}

/* ------------------------------------------------------------------ */
/*  Constants                                                         */
/* ------------------------------------------------------------------ */

const NEAR_RADIUS_FT = 200;
const FAR_RADIUS_FT = 500;
const DATES_PER_DAY = 3;
const MAX_DATES_SHOWN = 4;

/* ------------------------------------------------------------------ */
/*  Route consolidation                                               */
/* ------------------------------------------------------------------ */

function unique(values: (string | null)[]): string[] {
  return [...new Set(values.filter((v): v is string => typeof v === 'string' && v !== ''))];
}

/**
 * Reduce raw records to one street's schedule: drop unposted segments,
 * keep the most common street name (first seen wins a tie), and merge
 * the posted days and times.
 */
export function summarizeRoutes(records: SweepRouteRecord[]): SweepDetails | null {
  const posted = records.filter((r) => r.postedDay);
  if (posted.length === 0) return null;

  const counts = new Map<string, number>();
  for (const r of posted) {
    const name = r.streetName ?? '';
    counts.set(name, (counts.get(name) ?? 0) + 1);
  }

  let primary = '';
  let best = 0;
  for (const [name, count] of counts) {
    if (count > best) {
      primary = name;
      best = count;
    }
  }

  const routes = posted.filter((r) => (r.streetName ?? '') === primary);
  const first = routes[0];
  const times = unique(routes.map((r) => r.postedTime));

  return {
    routes,
    sweepDays: unique(routes.map((r) => r.postedDay)),
    sweepSchedule: first.weeks ?? '',
    sweepTime: times.length > 0 ? times.join(', ') : null,
    streetName: [first.streetName, first.streetSuffix]
      .filter(Boolean)
      .join(' ')
      .toUpperCase(),
  };
}

/** Query nearby routes, widening the envelope once if nothing is close. */
export async function getSweepDetails(point: Coordinates): Promise<SweepDetails | null> {
  let records = await querySweepRoutes(point, NEAR_RADIUS_FT);
  if (records.length === 0) {
    records = await querySweepRoutes(point, FAR_RADIUS_FT);
  }
  return summarizeRoutes(records);
}

/* ------------------------------------------------------------------ */
/*  Formatting                                                        */
/* ------------------------------------------------------------------ */

function isDataQualityError(err: unknown): err is AppError {
  return (
    err instanceof AppError &&
    (err.code === ErrorCode.UNPARSEABLE_SCHEDULE ||
      err.code === ErrorCode.SEARCH_HORIZON_EXHAUSTED)
  );
}

function scheduleLines(details: SweepDetails, ctx: ScheduleContext): string[] {
  try {
    const parity = parseWeekParity(details.sweepSchedule);
    const days = details.sweepDays.map(parseWeekday);
    const lines: string[] = [];

    if (days.some((day) => isSweepToday(ctx.today, day, parity, ctx.holidays))) {
      lines.push('\n⚠️ *SWEEPING TODAY — MOVE YOUR CAR!*');
    }

    const upcoming = [
      ...new Set(
        days.flatMap((day) => nextSweepDates(ctx.today, day, parity, ctx.holidays, DATES_PER_DAY)),
      ),
    ]
      .sort()
      .slice(0, MAX_DATES_SHOWN);
    lines.push(`\n📆 Next: ${upcoming.map(formatShortDate).join(', ')}`);

    return lines;
  } catch (err: unknown) {
    if (!isDataQualityError(err)) throw err;

    logger.warn({
      type: 'data_quality',
      code: err.code,
      message: err.message,
      route: details.routes[0]?.route ?? null,
      weeks: details.sweepSchedule,
      days: details.sweepDays,
      partialDates: err instanceof SearchHorizonError ? err.partialDates : undefined,
    });
    return [`\n⚠️ ${messageFor(err.code)} Check the posted signs.`];
  }
}

/** Multi-line Markdown card for one street. */
export function formatStreetSummary(details: SweepDetails, ctx: ScheduleContext): string {
  const lines = [`🧹 *${details.streetName}*`];
  if (details.sweepDays.length > 0) {
    lines.push(`📅 ${details.sweepDays.join(' & ')}`);
  }
  if (details.sweepSchedule) {
    lines.push(`🔄 ${details.sweepSchedule}`);
  }
  if (details.sweepTime) {
    lines.push(`🕐 ${details.sweepTime}`);
  }

  // A posted day with a blank week field is reported like any unreadable one
  if (details.sweepDays.length > 0) {
    lines.push(...scheduleLines(details, ctx));
  }

  return lines.join('\n');
}

/* ------------------------------------------------------------------ */
/*  Lookup                                                            */
/* ------------------------------------------------------------------ */

export async function lookupSweepInfo(
  point: Coordinates,
  ctx: ScheduleContext,
): Promise<LookupResult> {
  const details = await getSweepDetails(point);
  if (!details) {
    return { found: false, text: messageFor(ErrorCode.NO_ROUTE_AT_LOCATION) };
  }
  return { found: true, text: formatStreetSummary(details, ctx) };
}
