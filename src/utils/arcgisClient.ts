/**
 * Shared GET helper for the ArcGIS REST endpoints (geocoder + FeatureServer).
 *
 * Timeouts, network errors, non-2xx responses, non-JSON bodies and ArcGIS
 * `{ error: {...} }` payloads (sent with HTTP 200) are logged and surfaced
 * as SERVICE_UNAVAILABLE. Nothing is retried.
 */

import config from '../config/index.js';
import { Errors } from './AppError.js';
import { logger } from '../middleware/requestLogger.js';

export type QueryParams = Record<string, string | number>;

function hasArcgisError(data: unknown): data is { error: unknown } {
  return typeof data === 'object' && data !== null && 'error' in data;
}

/**
 * GET `url?params` and return the parsed JSON body.
 * `service` names the upstream in logs ("geocoder", "routes").
 */
export async function fetchArcgisJson(
  url: string,
  params: QueryParams,
  service: string,
): Promise<unknown> {
  const query = new URLSearchParams();
  for (const [key, value] of Object.entries(params)) {
    query.set(key, String(value));
  }

  const ac = new AbortController();
  const timer = setTimeout(() => ac.abort(), config.upstreamTimeoutMs);
  const start = Date.now();

  let res: Response;
  try {
    res = await fetch(`${url}?${query.toString()}`, { signal: ac.signal });
  } catch (err: unknown) {
    const timedOut = err instanceof Error && err.name === 'AbortError';
    logger.error({
      type: 'upstream',
      service,
      message: timedOut
        ? `Timeout after ${config.upstreamTimeoutMs}ms`
        : err instanceof Error ? err.message : String(err),
    });
    throw Errors.serviceUnavailable();
  } finally {
    clearTimeout(timer);
  }

  if (!res.ok) {
    const errBody = await res.text();
    logger.error({
      type: 'upstream',
      service,
      status: res.status,
      body: errBody.substring(0, 200),
    });
    throw Errors.serviceUnavailable();
  }

  let data: unknown;
  try {
    data = await res.json();
  } catch (err: unknown) {
    logger.error({
      type: 'upstream',
      service,
      message: `Invalid JSON: ${err instanceof Error ? err.message : String(err)}`,
    });
    throw Errors.serviceUnavailable();
  }

  if (hasArcgisError(data)) {
    logger.error({ type: 'upstream', service, error: data.error });
    throw Errors.serviceUnavailable();
  }

  logger.info({ type: 'upstream', service, duration: `${Date.now() - start}ms` });
  return data;
}
