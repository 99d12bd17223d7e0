/**
 * Error values returned by the recurrence validator and codec.
 *
 * These are data, not exceptions: both components return a `Result` and
 * leave it to the HTTP layer to turn a failure into an AppError.
 */

export const ScheduleErrorCode = {
  UNSUPPORTED_RECURRENCE_KIND: 'UNSUPPORTED_RECURRENCE_KIND',
  MISSING_RECURRENCE_CONFIG: 'MISSING_RECURRENCE_CONFIG',
  INVALID_DAY_OF_WEEK_MASK: 'INVALID_DAY_OF_WEEK_MASK',
  INVALID_DAY_OF_MONTH: 'INVALID_DAY_OF_MONTH',
  AMBIGUOUS_OR_MISSING_MONTHLY_SELECTOR: 'AMBIGUOUS_OR_MISSING_MONTHLY_SELECTOR',
  INVALID_OCCURRENCE_SELECTOR: 'INVALID_OCCURRENCE_SELECTOR',
  INVALID_MONTH_MASK: 'INVALID_MONTH_MASK',
  MISSING_TIMING_FIELD: 'MISSING_TIMING_FIELD',
  INVALID_TIME_WINDOW: 'INVALID_TIME_WINDOW',
  CONFIGURATION_ERROR: 'CONFIGURATION_ERROR',
} as const;

export type ScheduleErrorCodeType = (typeof ScheduleErrorCode)[keyof typeof ScheduleErrorCode];

export type ValidationErrorCode = Exclude<
  ScheduleErrorCodeType,
  typeof ScheduleErrorCode.CONFIGURATION_ERROR
>;

export interface ValidationError {
  code: ValidationErrorCode;
  message: string;
}

export interface ConfigurationError {
  code: typeof ScheduleErrorCode.CONFIGURATION_ERROR;
  message: string;
}

export type Result<T, E> = { ok: true; value: T } | { ok: false; error: E };

export const ok = <T>(value: T): { ok: true; value: T } => ({ ok: true, value });

export const validationError = (
  code: ValidationErrorCode,
  message: string,
): { ok: false; error: ValidationError } => ({ ok: false, error: { code, message } });

export const configurationError = (
  message: string,
): { ok: false; error: ConfigurationError } => ({
  ok: false,
  error: { code: ScheduleErrorCode.CONFIGURATION_ERROR, message },
});
