/**
 * HTTP request logger middleware.
 *
 * Logs:  route · method · status · duration · ip
 * Never logs:  raw tokens · API keys · full chat text
 */

import { Request, Response, NextFunction } from 'express';

/* ------------------------------------------------------------------ */
/*  Structured logger                                                 */
/* ------------------------------------------------------------------ */

const SENSITIVE_KEYS = new Set([
  'token',
  'accesstoken',
  'authorization',
  'cookie',
  'secret',
  'apikey',
  'text',
  'address',
]);

function sanitizeBody(body: unknown): unknown {
  if (body === null || body === undefined) return undefined;
  if (Array.isArray(body)) return body.map(item => sanitizeBody(item));
  if (typeof body === 'object') {
    const sanitized: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(body)) {
      if (SENSITIVE_KEYS.has(key.toLowerCase())) {
        sanitized[key] = '[REDACTED]';
      } else {
        sanitized[key] = sanitizeBody(value);
      }
    }
    return sanitized;
  }
  return body;
}

export const logger = {
  info(data: Record<string, unknown>): void {
    console.log(
      JSON.stringify({ level: 'info', timestamp: new Date().toISOString(), ...data }),
    );
  },
  warn(data: Record<string, unknown>): void {
    console.warn(
      JSON.stringify({ level: 'warn', timestamp: new Date().toISOString(), ...data }),
    );
  },
  error(data: Record<string, unknown>): void {
    console.error(
      JSON.stringify({ level: 'error', timestamp: new Date().toISOString(), ...data }),
    );
  },
};

/* ------------------------------------------------------------------ */
/*  Quiet routes: suppress logging for uptime probes                  */
/* ------------------------------------------------------------------ */

const QUIET_ROUTES = new Set(['/api/health']);

function isQuietRoute(method: string, path: string, status: number): boolean {
  if (method !== 'GET') return false;
  // Still log a failing probe
  if (status >= 400) return false;
  const basePath = path.split('?')[0];
  return QUIET_ROUTES.has(basePath);
}

/** Strip sensitive query parameters from the logged path. */
function sanitizePath(url: string): string {
  const qIndex = url.indexOf('?');
  if (qIndex === -1) return url;
  const basePath = url.substring(0, qIndex);
  const params = new URLSearchParams(url.substring(qIndex + 1));
  for (const key of [...params.keys()]) {
    if (SENSITIVE_KEYS.has(key.toLowerCase())) {
      params.set(key, '[REDACTED]');
    }
  }
  const remaining = params.toString();
  return remaining ? `${basePath}?${remaining}` : basePath;
}

/* ------------------------------------------------------------------ */
/*  Express middleware                                                 */
/* ------------------------------------------------------------------ */

export function requestLogger(req: Request, res: Response, next: NextFunction): void {
  const start = Date.now();

  res.on('finish', () => {
    const duration = Date.now() - start;

    if (isQuietRoute(req.method, req.originalUrl, res.statusCode)) {
      return;
    }

    const logEntry: Record<string, unknown> = {
      method: req.method,
      path: sanitizePath(req.originalUrl),
      status: res.statusCode,
      duration: `${duration}ms`,
      ip: req.ip,
    };

    // Only log body for non-GET requests, and always sanitize
    if (req.method !== 'GET' && isNonEmptyObject(req.body)) {
      logEntry.body = sanitizeBody(req.body);
    }

    if (res.statusCode >= 400) {
      logger.warn(logEntry);
    } else {
      logger.info(logEntry);
    }
  });

  next();
}

function isNonEmptyObject(value: unknown): value is object {
  return typeof value === 'object' && value !== null && Object.keys(value).length > 0;
}
