import { Response, NextFunction } from 'express';
import type { AddressBody, CoordsBody } from '../middleware/lookupValidation.js';
import { AppContext, BodyRequest } from '../types/index.js';
import { resolveAddress } from '../utils/geocoder.js';
import { lookupSweepInfo } from '../utils/sweepLookup.js';

/**
 * Look up the sweep schedule at a coordinate.
 * POST /api/lookup
 * Body: { lat, lon }
 */
export function createCoordsLookup(ctx: AppContext) {
  return async (
    req: BodyRequest<CoordsBody>,
    res: Response,
    next: NextFunction,
  ): Promise<void> => {
    try {
      const { lat, lon } = req.body;
      const result = await lookupSweepInfo(
        { x: lon, y: lat },
        { today: ctx.today(), holidays: ctx.holidays },
      );
      res.json({ success: true, data: result });
    } catch (error) {
      next(error);
    }
  };
}

/**
 * Geocode an address, then look up its sweep schedule.
 * POST /api/address
 * Body: { address }
 */
export function createAddressLookup(ctx: AppContext) {
  return async (
    req: BodyRequest<AddressBody>,
    res: Response,
    next: NextFunction,
  ): Promise<void> => {
    try {
      const geo = await resolveAddress(req.body.address);
      const result = await lookupSweepInfo(geo, {
        today: ctx.today(),
        holidays: ctx.holidays,
      });
      res.json({ success: true, data: { ...result, address: geo.matchAddress } });
    } catch (error) {
      next(error);
    }
  };
}
