import { Request } from 'express';
import type { HolidayTable } from '../utils/holidays.js';

/** Process-wide, read-only state handed to the routers at startup. */
export interface AppContext {
  holidayTable: HolidayTable;
  /** Flattened `holidayTable`, as the schedule engine consumes it */
  holidays: ReadonlySet<string>;
  /** Today's civil date in Los Angeles (YYYY-MM-DD) */
  today: () => string;
}

/** Request whose body has already been validated into `T`. */
export type BodyRequest<T> = Request<Record<string, string>, unknown, T>;
