/**
 * Centralized application error class.
 *
 * Throw AppError anywhere in a controller, service or the schedule engine
 * and the global error handler will format it into the standardized API
 * response:
 *   { success: false, message: "...", code: "ERROR_CODE" }
 *
 * The chat adapter catches the same errors and turns them into replies.
 */

/* ------------------------------------------------------------------ */
/*  Error codes                                                       */
/* ------------------------------------------------------------------ */

export const ErrorCode = {
  // Lookup
  LOCATION_NOT_FOUND: 'LOCATION_NOT_FOUND',
  NO_ROUTE_AT_LOCATION: 'NO_ROUTE_AT_LOCATION',

  // Schedule data
  UNPARSEABLE_SCHEDULE: 'UNPARSEABLE_SCHEDULE',
  SEARCH_HORIZON_EXHAUSTED: 'SEARCH_HORIZON_EXHAUSTED',

  // Validation
  VALIDATION_ERROR: 'VALIDATION_ERROR',

  // Resource
  NOT_FOUND: 'NOT_FOUND',

  // External services
  SERVICE_UNAVAILABLE: 'SERVICE_UNAVAILABLE',

  // Generic
  INTERNAL_ERROR: 'INTERNAL_ERROR',
  RATE_LIMITED: 'RATE_LIMITED',
} as const;

export type ErrorCodeType = (typeof ErrorCode)[keyof typeof ErrorCode];

/* ------------------------------------------------------------------ */
/*  User-friendly default messages per code                           */
/* ------------------------------------------------------------------ */

const defaultMessages: Record<ErrorCodeType, string> = {
  LOCATION_NOT_FOUND:
    "Couldn't find that address. Try including the full street name and zip code.",
  NO_ROUTE_AT_LOCATION:
    'No posted sweep routes found nearby. This street may not have posted sweeping, or it might be outside the City of LA.',
  UNPARSEABLE_SCHEDULE: "This route's sweep schedule could not be read.",
  SEARCH_HORIZON_EXHAUSTED: 'No upcoming sweep dates could be found for this route.',
  VALIDATION_ERROR: 'Please check your input and try again.',
  NOT_FOUND: 'The requested resource was not found.',
  SERVICE_UNAVAILABLE: 'The City map service is not responding. Please try again later.',
  INTERNAL_ERROR: 'Something went wrong. Please try again later.',
  RATE_LIMITED: 'Too many requests. Please wait a moment and try again.',
};

/* ------------------------------------------------------------------ */
/*  AppError class                                                    */
/* ------------------------------------------------------------------ */

export class AppError extends Error {
  public readonly statusCode: number;
  public readonly code: ErrorCodeType;
  public readonly isOperational: boolean;

  constructor(
    statusCode: number,
    code: ErrorCodeType,
    message?: string,
    isOperational = true,
  ) {
    super(message || defaultMessages[code] || 'An unexpected error occurred.');
    this.name = 'AppError';
    this.statusCode = statusCode;
    this.code = code;
    this.isOperational = isOperational;

    // Capture proper stack trace
    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * Raised when the date search runs past its horizon. Carries the dates that
 * were found before giving up so callers can still log or show them.
 */
export class SearchHorizonError extends AppError {
  public readonly partialDates: readonly string[];

  constructor(partialDates: readonly string[], message?: string) {
    super(422, ErrorCode.SEARCH_HORIZON_EXHAUSTED, message);
    this.name = 'SearchHorizonError';
    this.partialDates = partialDates;
  }
}

/** Default user-facing message for a code. */
export function messageFor(code: ErrorCodeType): string {
  return defaultMessages[code];
}

/* ------------------------------------------------------------------ */
/*  Convenience factory helpers                                       */
/* ------------------------------------------------------------------ */

export const Errors = {
  locationNotFound: (msg?: string) =>
    new AppError(404, ErrorCode.LOCATION_NOT_FOUND, msg),

  unparseableSchedule: (msg?: string) =>
    new AppError(422, ErrorCode.UNPARSEABLE_SCHEDULE, msg),

  searchHorizonExhausted: (partialDates: readonly string[], msg?: string) =>
    new SearchHorizonError(partialDates, msg),

  validation: (msg?: string) =>
    new AppError(400, ErrorCode.VALIDATION_ERROR, msg),

  serviceUnavailable: (msg?: string) =>
    new AppError(503, ErrorCode.SERVICE_UNAVAILABLE, msg),
};
