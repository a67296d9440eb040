import { Request, Response, NextFunction } from 'express';
import { z } from 'zod';
import { AppContext } from '../types/index.js';
import { Errors } from '../utils/AppError.js';
import {
  isSweepToday,
  nextSweepDates,
  parseWeekParity,
  parseWeekday,
} from '../utils/sweepSchedule.js';

const MAX_COUNT = 24;

const nextQuerySchema = z.object({
  day: z.string().trim().min(1, 'day is required'),
  weeks: z.string().trim().min(1, 'weeks is required'),
  from: z.string().trim().optional(),
  count: z.coerce.number().int().min(1).max(MAX_COUNT).default(3),
});

/**
 * Upcoming sweep dates for a posted day + week pattern.
 * GET /api/schedule/next?day=Tuesday&weeks=2%20%26%204&from=YYYY-MM-DD&count=3
 *
 * `from` defaults to today in Los Angeles.
 */
export function createNextSweeps(ctx: AppContext) {
  return (req: Request, res: Response, next: NextFunction): void => {
    try {
      const parsed = nextQuerySchema.safeParse(req.query);
      if (!parsed.success) {
        throw Errors.validation(
          parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; '),
        );
      }

      const { day, weeks, count } = parsed.data;
      const from = parsed.data.from || ctx.today();
      const postedDay = parseWeekday(day);
      const weekParity = parseWeekParity(weeks);

      const dates = nextSweepDates(from, postedDay, weekParity, ctx.holidays, count);
      const sweepToday = isSweepToday(from, postedDay, weekParity, ctx.holidays);

      res.json({
        success: true,
        data: { postedDay, weekParity, from, dates, sweepToday },
      });
    } catch (error) {
      next(error);
    }
  };
}
