/**
 * Global Express error-handling middleware.
 *
 * Catches any error thrown or passed via next(err) and returns a
 * standardized JSON response.  Internal details (stack traces, raw
 * upstream payloads) are logged server-side but never sent to clients.
 */

import { Request, Response, NextFunction } from 'express';
import { AppError, ErrorCode } from '../utils/AppError.js';
import { logger } from './requestLogger.js';

/** body-parser rejects malformed JSON with a SyntaxError carrying status 400 */
function isJsonSyntaxError(err: Error): boolean {
  return err instanceof SyntaxError && 'status' in err && err.status === 400;
}

/* ------------------------------------------------------------------ */
/*  Error handler                                                     */
/* ------------------------------------------------------------------ */

export function globalErrorHandler(
  err: Error | AppError,
  req: Request,
  res: Response,
  _next: NextFunction,
): void {
  // ── AppError (operational) ────────────────────────────────────
  if (err instanceof AppError) {
    const log = err.statusCode >= 500 ? logger.error : logger.warn;
    log({
      type: 'operational',
      code: err.code,
      message: err.message,
      method: req.method,
      path: req.path,
      stack: err.isOperational ? undefined : err.stack,
    });

    res.status(err.statusCode).json({
      success: false,
      message: err.message,
      code: err.code,
    });
    return;
  }

  // ── Malformed JSON body ───────────────────────────────────────
  if (isJsonSyntaxError(err)) {
    logger.warn({
      type: 'malformed_json',
      method: req.method,
      path: req.path,
    });

    res.status(400).json({
      success: false,
      message: 'Request body is not valid JSON.',
      code: ErrorCode.VALIDATION_ERROR,
    });
    return;
  }

  // ── Unknown / programming error ───────────────────────────────
  logger.error({
    type: 'unexpected',
    message: err.message,
    name: err.name,
    method: req.method,
    path: req.path,
    stack: err.stack,
  });

  res.status(500).json({
    success: false,
    message: 'Something went wrong. Please try again later.',
    code: ErrorCode.INTERNAL_ERROR,
  });
}

/* ------------------------------------------------------------------ */
/*  404 catch-all (mounted after all routes)                          */
/* ------------------------------------------------------------------ */

export function notFoundHandler(req: Request, res: Response): void {
  res.status(404).json({
    success: false,
    message: `Route ${req.method} ${req.path} not found.`,
    code: ErrorCode.NOT_FOUND,
  });
}
