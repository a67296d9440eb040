import { Request, Response, NextFunction } from 'express';
import { z } from 'zod';
import { AppContext } from '../types/index.js';
import { Errors } from '../utils/AppError.js';
import { allHolidays, holidaysForYear } from '../utils/holidays.js';

const holidayQuerySchema = z.object({
  year: z.coerce.number().int().min(1900).max(2999).optional(),
});

/**
 * Configured no-sweep holidays.
 * GET /api/holidays?year=YYYY
 *
 * An unconfigured year returns an empty list.
 */
export function createHolidayList(ctx: AppContext) {
  return (req: Request, res: Response, next: NextFunction): void => {
    try {
      const parsed = holidayQuerySchema.safeParse(req.query);
      if (!parsed.success) {
        throw Errors.validation('year must be a four-digit year.');
      }

      const { year } = parsed.data;
      const holidays =
        year === undefined
          ? allHolidays(ctx.holidayTable)
          : holidaysForYear(ctx.holidayTable, year);

      res.json({ success: true, data: holidays });
    } catch (error) {
      next(error);
    }
  };
}
