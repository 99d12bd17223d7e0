import { Response, NextFunction } from 'express';
import { z } from 'zod';
import rateLimit from 'express-rate-limit';
import { AuthRequest } from '../types/index.js';
import { ErrorCode } from '../utils/AppError.js';
import { parseLocalDateTime } from '../utils/date.js';

/* ------------------------------------------------------------------ */
/*  Shared helpers                                                    */
/* ------------------------------------------------------------------ */

const dateTimeStr = z
  .string()
  .trim()
  .refine((v) => parseLocalDateTime(v) !== null, {
    message: 'Must be a valid date in YYYY-MM-DD HH:MM format',
  });

const nameList = z.array(z.string().trim().min(1).max(255)).max(100);

const triggerTag = z.object({
  tag: z.string().trim().min(1).max(255),
  value: z.string().max(255).optional(),
  operator: z.number().int().min(0).max(5).optional(),
});

/**
 * Field values are left unchecked here: the maintenance validator owns the
 * range rules and reports them with a machine-readable reason.
 */
const recurrenceConfig = z.object({
  start_time: z.unknown(),
  duration: z.unknown(),
  every: z.unknown(),
  dayofweek: z.unknown(),
  day: z.unknown(),
  month: z.unknown(),
});

/* ------------------------------------------------------------------ */
/*  Zod schemas                                                       */
/* ------------------------------------------------------------------ */

const chatSchema = z.object({
  message: z.string().trim().min(1, 'Message is required').max(2000),
});

const createMaintenanceSchema = z
  .object({
    hosts: nameList.default([]),
    groups: nameList.default([]),
    trigger_tags: z.array(triggerTag).max(20).default([]),
    start_time: dateTimeStr,
    end_time: dateTimeStr,
    recurrence_type: z.string().trim().min(1).default('once'),
    recurrence_config: recurrenceConfig.optional(),
    description: z.string().max(1000).optional(),
    ticket_number: z.string().trim().max(64).optional(),
  })
  .superRefine((d, ctx) => {
    if (d.hosts.length === 0 && d.groups.length === 0) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: 'At least one host or host group is required',
        path: ['hosts'],
      });
    }
  });

const previewSchema = z.object({
  recurrence_type: z.string().trim().min(1),
  recurrence_config: recurrenceConfig.optional(),
  start_time: dateTimeStr.optional(),
  end_time: dateTimeStr.optional(),
});

const searchSchema = z.object({
  search: z.string().trim().min(1, 'Search term is required').max(255),
});

const listQuerySchema = z.object({
  limit: z.coerce.number().int().min(1).max(200).default(50),
});

export type ChatBody = z.infer<typeof chatSchema>;
export type CreateMaintenanceBody = z.infer<typeof createMaintenanceSchema>;
export type PreviewBody = z.infer<typeof previewSchema>;
export type SearchBody = z.infer<typeof searchSchema>;

/* ------------------------------------------------------------------ */
/*  Validation middleware factory                                     */
/* ------------------------------------------------------------------ */

/**
 * Recursively remove null values.  Request bodies are often built from
 * model output, which spells "not given" as null.
 */
export function stripNulls(obj: unknown): unknown {
  if (obj === null) return undefined;
  if (Array.isArray(obj)) return obj.map(stripNulls).filter((v) => v !== undefined);
  if (typeof obj === 'object') {
    const cleaned: Record<string, unknown> = {};
    for (const [key, val] of Object.entries(obj)) {
      const stripped = stripNulls(val);
      if (stripped !== undefined) cleaned[key] = stripped;
    }
    return cleaned;
  }
  return obj;
}

function rejectInvalid(res: Response, error: z.ZodError): void {
  const messages = error.issues.map((i) => `${i.path.join('.')}: ${i.message}`);
  res.status(400).json({
    success: false,
    message: 'Validation failed',
    code: ErrorCode.VALIDATION_ERROR,
    errors: messages,
  });
}

function validate(schema: z.ZodSchema) {
  return (req: AuthRequest, res: Response, next: NextFunction): void => {
    const result = schema.safeParse(stripNulls(req.body));
    if (!result.success) {
      rejectInvalid(res, result.error);
      return;
    }
    // Replace body with parsed (cleaned) data
    req.body = result.data;
    next();
  };
}

function validateQuery(schema: z.ZodSchema) {
  return (req: AuthRequest, res: Response, next: NextFunction): void => {
    const result = schema.safeParse(req.query);
    if (!result.success) {
      rejectInvalid(res, result.error);
      return;
    }
    req.query = result.data;
    next();
  };
}

/* ------------------------------------------------------------------ */
/*  Exports                                                           */
/* ------------------------------------------------------------------ */

export const validateChat = validate(chatSchema);
export const validateCreateMaintenance = validate(createMaintenanceSchema);
export const validatePreview = validate(previewSchema);
export const validateSearch = validate(searchSchema);
export const validateListQuery = validateQuery(listQuerySchema);

/**
 * Rate limiter for maintenance creation.
 * 10 requests per minute per Zabbix user.
 * Auth middleware must run before this; keyGenerator requires req.user.
 */
export const createMaintenanceRateLimiter = () =>
  rateLimit({
    windowMs: 60_000,
    max: 10,
    keyGenerator: (req) => {
      const userId = (req as AuthRequest).user?.userid;
      if (!userId) {
        throw new Error('createMaintenanceRateLimiter: missing authenticated user, ensure auth middleware runs first');
      }
      return userId;
    },
    standardHeaders: true,
    legacyHeaders: false,
    message: {
      success: false,
      message: 'Too many maintenance requests. Please wait a minute before trying again.',
      code: ErrorCode.RATE_LIMITED,
    },
  });
