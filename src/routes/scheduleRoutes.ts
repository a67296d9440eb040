import { Router } from 'express';
import { createNextSweeps } from '../controllers/scheduleController.js';
import { AppContext } from '../types/index.js';

export function createScheduleRouter(ctx: AppContext): Router {
  const router = Router();

  router.get('/next', createNextSweeps(ctx));

  return router;
}
