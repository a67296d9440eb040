import { Router } from 'express';
import { createHolidayList } from '../controllers/holidayController.js';
import { AppContext } from '../types/index.js';

export function createHolidayRouter(ctx: AppContext): Router {
  const router = Router();

  router.get('/', createHolidayList(ctx));

  return router;
}
