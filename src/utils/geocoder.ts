/**
 * Address → coordinates via the ArcGIS World Geocoder.
 */

import { z } from 'zod';
import config from '../config/index.js';
import { fetchArcgisJson, type QueryParams } from './arcgisClient.js';
import { Errors } from './AppError.js';
import { logger } from '../middleware/requestLogger.js';

/* ------------------------------------------------------------------ */
/*  Types                                                             */
/* ------------------------------------------------------------------ */

/** WGS84 point; x is longitude, y is latitude. */
export interface Coordinates {
  x: number;
  y: number;
}

export interface GeocodeResult extends Coordinates {
  matchAddress: string;
  score: number;
}

const candidatesSchema = z.object({
  candidates: z
    .array(
      z.object({
        location: z.object({ x: z.number(), y: z.number() }),
        score: z.number().optional(),
        attributes: z.object({ Match_addr: z.string().optional() }).passthrough().optional(),
      }),
    )
    .default([]),
});

/* ------------------------------------------------------------------ */
/*  Helpers                                                           */
/* ------------------------------------------------------------------ */

// Downtown LA, used to bias candidates
const LA_CENTER = '-118.25,34.05';
const BIAS_DISTANCE_M = 50_000;

/** Append ", Los Angeles, CA" unless the address already mentions LA. */
export function normalizeAddress(address: string): string {
  const trimmed = address.trim();
  if (!/\blos angeles\b|\bla\b/i.test(trimmed)) {
    return `${trimmed}, Los Angeles, CA`;
  }
  return trimmed;
}

/* ------------------------------------------------------------------ */
/*  Geocoding                                                         */
/* ------------------------------------------------------------------ */

/**
 * Best-scoring candidate for the address, or null when the geocoder has
 * none. Score filtering is left to `resolveAddress`.
 */
export async function geocodeAddress(address: string): Promise<GeocodeResult | null> {
  const params: QueryParams = {
    f: 'json',
    singleLine: address,
    outFields: 'Match_addr,Addr_type',
    maxLocations: 5,
    location: LA_CENTER,
    distance: BIAS_DISTANCE_M,
  };
  if (config.arcgisApiKey) {
    params.token = config.arcgisApiKey;
  }

  const data = await fetchArcgisJson(config.geocodeUrl, params, 'geocoder');
  const parsed = candidatesSchema.safeParse(data);
  if (!parsed.success) {
    logger.error({
      type: 'upstream',
      service: 'geocoder',
      message: 'Unexpected response shape',
      issues: parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`),
    });
    throw Errors.serviceUnavailable();
  }

  const { candidates } = parsed.data;
  if (candidates.length === 0) return null;

  // First candidate wins a tie
  const best = candidates.reduce((top, c) => ((c.score ?? 0) > (top.score ?? 0) ? c : top));

  return {
    x: best.location.x,
    y: best.location.y,
    matchAddress: best.attributes?.Match_addr ?? address,
    score: best.score ?? 0,
  };
}

/**
 * Normalize, geocode and apply the score threshold.
 * Throws LOCATION_NOT_FOUND when nothing usable comes back.
 */
export async function resolveAddress(address: string): Promise<GeocodeResult> {
  const normalized = normalizeAddress(address);
  const geo = await geocodeAddress(normalized);

  if (!geo || geo.score < config.minGeocodeScore) {
    logger.info({
      type: 'geocode_miss',
      score: geo?.score ?? null,
    });
    throw Errors.locationNotFound();
  }

  logger.info({
    type: 'geocode',
    x: geo.x,
    y: geo.y,
    score: geo.score,
  });
  return geo;
}
