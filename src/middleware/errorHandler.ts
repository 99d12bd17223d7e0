/**
 * Global Express error-handling middleware.
 *
 * Catches any error thrown or passed via next(err) and returns a
 * standardized JSON response.  Internal details (stack traces, raw
 * upstream errors) are logged server-side but never sent to clients.
 */

import { Request, Response, NextFunction } from 'express';
import { AppError, ErrorCode } from '../utils/AppError.js';
import { AuthRequest } from '../types/index.js';
import { logger } from './requestLogger.js';

/* ------------------------------------------------------------------ */
/*  Helpers                                                           */
/* ------------------------------------------------------------------ */

/** body-parser sets `type` on the errors it raises for unreadable bodies */
function isBodyParseError(err: Error): boolean {
  return 'type' in err && err.type === 'entity.parse.failed';
}

/* ------------------------------------------------------------------ */
/*  Error handler                                                     */
/* ------------------------------------------------------------------ */

export function globalErrorHandler(
  err: Error,
  req: Request,
  res: Response,
  _next: NextFunction,
): void {
  const userId = (req as AuthRequest).user?.userid;

  // ── AppError (operational) ────────────────────────────────────
  if (err instanceof AppError) {
    logger.error({
      type: 'operational',
      code: err.code,
      reason: err.reason,
      message: err.message,
      method: req.method,
      path: req.path,
      userId,
      stack: err.isOperational ? undefined : err.stack,
    });

    res.status(err.statusCode).json({
      success: false,
      message: err.message,
      code: err.code,
      ...(err.reason ? { reason: err.reason } : {}),
    });
    return;
  }

  // ── Malformed JSON body ───────────────────────────────────────
  if (isBodyParseError(err)) {
    logger.warn({
      type: 'body_parse',
      message: err.message,
      method: req.method,
      path: req.path,
    });

    res.status(400).json({
      success: false,
      message: 'The request body is not valid JSON.',
      code: ErrorCode.BAD_REQUEST,
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
    userId,
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
