/**
 * Spatial lookup against LA's Clean_Street_Routes FeatureServer.
 *
 * The service rejects the `units` parameter a point-buffer query needs, so
 * the search area is a bounding envelope around the point instead.
 */

import { z } from 'zod';
import config from '../config/index.js';
import { fetchArcgisJson } from './arcgisClient.js';
import { Errors } from './AppError.js';
import type { Coordinates } from './geocoder.js';
import { logger } from '../middleware/requestLogger.js';

/* ------------------------------------------------------------------ */
/*  Types                                                             */
/* ------------------------------------------------------------------ */

/** One route feature's attributes. Upstream leaves any of them null. */
export interface SweepRouteRecord {
  route: string | null;
  postedDay: string | null;
  postedTime: string | null;
  boundaries: string | null;
  weeks: string | null;
  dayShort: string | null;
  streetName: string | null;
  travelDirection: string | null;
  streetSuffix: string | null;
}

const text = z.string().nullish().transform((v) => v ?? null);

const featuresSchema = z.object({
  features: z
    .array(
      z.object({
        attributes: z.object({
          Route: text,
          Posted_Day: text,
          Posted_Time: text,
          Boundaries: text,
          Weeks: text,
          Day_Short: text,
          STNAME: text,
          TDIR: text,
          STSFX: text,
        }),
      }),
    )
    .default([]),
});

/* ------------------------------------------------------------------ */
/*  Constants                                                         */
/* ------------------------------------------------------------------ */

/** Roughly one foot in degrees at LA's latitude. */
export const DEGREES_PER_FOOT = 0.000003;

const OUT_FIELDS = [
  'Route',
  'Posted_Day',
  'Posted_Time',
  'Boundaries',
  'Weeks',
  'Day_Short',
  'STNAME',
  'TDIR',
  'STSFX',
].join(',');

const MAX_RECORDS = 10;

/* ------------------------------------------------------------------ */
/*  Query                                                             */
/* ------------------------------------------------------------------ */

/** xmin,ymin,xmax,ymax envelope `radiusFt` feet around the point. */
export function buildEnvelope(point: Coordinates, radiusFt: number): string {
  const offset = radiusFt * DEGREES_PER_FOOT;
  return [
    point.x - offset,
    point.y - offset,
    point.x + offset,
    point.y + offset,
  ].join(',');
}

/** Route records intersecting the envelope around `point`. */
export async function querySweepRoutes(
  point: Coordinates,
  radiusFt = 200,
): Promise<SweepRouteRecord[]> {
  const data = await fetchArcgisJson(
    config.routesUrl,
    {
      f: 'json',
      geometry: buildEnvelope(point, radiusFt),
      geometryType: 'esriGeometryEnvelope',
      inSR: '4326',
      spatialRel: 'esriSpatialRelIntersects',
      outFields: OUT_FIELDS,
      returnGeometry: 'false',
      resultRecordCount: MAX_RECORDS,
    },
    'routes',
  );

  const parsed = featuresSchema.safeParse(data);
  if (!parsed.success) {
    logger.error({
      type: 'upstream',
      service: 'routes',
      message: 'Unexpected response shape',
      issues: parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`),
    });
    throw Errors.serviceUnavailable();
  }

  return parsed.data.features.map(({ attributes: a }) => ({
    route: a.Route,
    postedDay: a.Posted_Day,
    postedTime: a.Posted_Time,
    boundaries: a.Boundaries,
    weeks: a.Weeks,
    dayShort: a.Day_Short,
    streetName: a.STNAME,
    travelDirection: a.TDIR,
    streetSuffix: a.STSFX,
  }));
}
