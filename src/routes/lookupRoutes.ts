import { Router } from 'express';
import {
  createAddressLookup,
  createCoordsLookup,
} from '../controllers/lookupController.js';
import { validateAddress, validateCoords } from '../middleware/lookupValidation.js';
import { createLookupRateLimiter } from '../middleware/rateLimiter.js';
import { AppContext } from '../types/index.js';

export function createLookupRouter(ctx: AppContext): Router {
  const router = Router();

  const limiter = createLookupRateLimiter();

  router.post('/lookup', limiter, validateCoords, createCoordsLookup(ctx));
  router.post('/address', limiter, validateAddress, createAddressLookup(ctx));

  return router;
}
