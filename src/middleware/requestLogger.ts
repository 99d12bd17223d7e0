/**
 * HTTP request logger middleware.
 *
 * Logs:  route · method · duration · Zabbix user (if authenticated)
 * Never logs:  API tokens · passwords · raw credentials
 */

import { Request, Response, NextFunction } from 'express';
import { AuthRequest } from '../types/index.js';

/* ------------------------------------------------------------------ */
/*  Structured logger                                                 */
/* ------------------------------------------------------------------ */

const SENSITIVE_KEYS = new Set([
  'password',
  'token',
  'accesstoken',
  'authorization',
  'cookie',
  'secret',
  'apikey',
  'auth',
  'sessionid',
]);

export function sanitizeBody(body: unknown): unknown {
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
/*  Quiet routes: suppress logging for health polling                 */
/* ------------------------------------------------------------------ */

const QUIET_ROUTES = new Set(['/api/health']);

/** The widget polls /api/health; only failures are worth a line. */
function isQuietRoute(method: string, path: string, status: number): boolean {
  if (method !== 'GET') return false;
  if (status >= 400) return false;
  const basePath = path.split('?')[0];
  return QUIET_ROUTES.has(basePath);
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

    const user = (req as AuthRequest).user;

    const logEntry: Record<string, unknown> = {
      method: req.method,
      path: req.originalUrl.split('?')[0],
      status: res.statusCode,
      duration: `${duration}ms`,
      userId: user?.userid ?? null,
      username: user?.username ?? null,
      ip: req.ip,
    };

    // Only log body for non-GET requests, and always sanitize
    if (req.method !== 'GET' && req.body && Object.keys(req.body).length > 0) {
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
