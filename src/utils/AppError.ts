/**
 * Centralized application error class.
 *
 * Throw AppError anywhere in a controller or middleware and the global
 * error handler will format it into the standardized API response:
 *   { success: false, message: "...", code: "ERROR_CODE", reason?: "..." }
 *
 * `reason` carries the machine-checkable cause of a scheduling validation
 * failure (e.g. INVALID_DAY_OF_WEEK_MASK).  Stack traces are logged
 * server-side only.
 */

/* ------------------------------------------------------------------ */
/*  Error codes                                                       */
/* ------------------------------------------------------------------ */

export const ErrorCode = {
  // Auth
  UNAUTHORIZED: 'UNAUTHORIZED',

  // Validation
  VALIDATION_ERROR: 'VALIDATION_ERROR',

  // Resource
  NOT_FOUND: 'NOT_FOUND',

  // External services
  AI_UNAVAILABLE: 'AI_UNAVAILABLE',
  MONITORING_API_ERROR: 'MONITORING_API_ERROR',
  SERVICE_UNAVAILABLE: 'SERVICE_UNAVAILABLE',

  // Generic
  BAD_REQUEST: 'BAD_REQUEST',
  INTERNAL_ERROR: 'INTERNAL_ERROR',
  RATE_LIMITED: 'RATE_LIMITED',
} as const;

export type ErrorCodeType = (typeof ErrorCode)[keyof typeof ErrorCode];

/* ------------------------------------------------------------------ */
/*  User-friendly default messages per code                           */
/* ------------------------------------------------------------------ */

const defaultMessages: Record<ErrorCodeType, string> = {
  UNAUTHORIZED: 'Unauthorized. You must be logged in to Zabbix.',
  VALIDATION_ERROR: 'Please check your input and try again.',
  NOT_FOUND: 'The requested resource was not found.',
  AI_UNAVAILABLE: 'The AI assistant is not available right now. Please try again later.',
  MONITORING_API_ERROR: 'The Zabbix API rejected the request.',
  SERVICE_UNAVAILABLE: 'Service is temporarily unavailable. Please try again later.',
  BAD_REQUEST: 'The request could not be processed.',
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
  public readonly reason?: string;

  constructor(
    statusCode: number,
    code: ErrorCodeType,
    message?: string,
    isOperational = true,
    reason?: string,
  ) {
    super(message || defaultMessages[code] || 'An unexpected error occurred.');
    this.statusCode = statusCode;
    this.code = code;
    this.isOperational = isOperational;
    this.reason = reason;

    // Capture proper stack trace
    Error.captureStackTrace(this, this.constructor);
  }
}

/* ------------------------------------------------------------------ */
/*  Convenience factory helpers                                       */
/* ------------------------------------------------------------------ */

export const Errors = {
  unauthorized: (msg?: string) =>
    new AppError(401, ErrorCode.UNAUTHORIZED, msg),

  validation: (msg?: string, reason?: string) =>
    new AppError(400, ErrorCode.VALIDATION_ERROR, msg, true, reason),

  notFound: (msg?: string) =>
    new AppError(404, ErrorCode.NOT_FOUND, msg),

  aiUnavailable: (msg?: string) =>
    new AppError(503, ErrorCode.AI_UNAVAILABLE, msg),

  upstream: (msg?: string) =>
    new AppError(502, ErrorCode.MONITORING_API_ERROR, msg),

  serviceUnavailable: (msg?: string) =>
    new AppError(503, ErrorCode.SERVICE_UNAVAILABLE, msg),
};
