/**
 * Turns a scheduling request (as spelled by the HTTP API and the language
 * model) into the time-period record for `maintenance.create`, plus the
 * decoded view of that record for display.
 *
 * Shared by chat, preview and create so all three apply the same rules.
 */

import { Errors, type AppError } from './AppError.js';
import { parseLocalDateTime } from './date.js';
import {
  fromWireConfig,
  validateMaintenanceRequest,
  type WireRecurrenceConfig,
} from './maintenanceValidator.js';
import {
  decode,
  describeSchedule,
  encode,
  type AbsoluteWindow,
  type RecurrenceKind,
  type ScheduleSummary,
  type TimePeriodRecord,
} from './recurrenceCodec.js';
import {
  ScheduleErrorCode,
  ok,
  validationError,
  type ConfigurationError,
  type Result,
  type ValidationError,
} from './scheduleErrors.js';

export interface ScheduleRequest {
  recurrenceType: string;
  recurrenceConfig?: WireRecurrenceConfig;
  /** "YYYY-MM-DD HH:MM", local time. */
  startTime?: string;
  endTime?: string;
  /**
   * Maintenance creation always needs the active period, whatever the
   * kind; previews of recurring kinds do not.
   */
  requireWindow: boolean;
}

export interface PlannedSchedule {
  kind: RecurrenceKind;
  window?: AbsoluteWindow;
  timeperiod: TimePeriodRecord;
  summary: ScheduleSummary;
  details: string[];
}

export type ScheduleError = ValidationError | ConfigurationError;

function parseTime(value: string | undefined): number | undefined | null {
  if (value === undefined || value.trim() === '') return undefined;
  return parseLocalDateTime(value);
}

export function planSchedule(request: ScheduleRequest): Result<PlannedSchedule, ScheduleError> {
  const startTime = parseTime(request.startTime);
  const endTime = parseTime(request.endTime);

  if (startTime === null || endTime === null) {
    return validationError(
      ScheduleErrorCode.INVALID_TIME_WINDOW,
      'Dates must use the YYYY-MM-DD HH:MM format.',
    );
  }

  const validated = validateMaintenanceRequest({
    recurrenceKind: request.recurrenceType,
    recurrenceConfig: request.recurrenceConfig ? fromWireConfig(request.recurrenceConfig) : undefined,
    startTime,
    endTime,
  });
  if (!validated.ok) return validated;

  const { kind, config, window } = validated.value;

  if (request.requireWindow && (!window || window.endTime <= window.startTime)) {
    return validationError(
      ScheduleErrorCode.INVALID_TIME_WINDOW,
      window
        ? 'The end time must be after the start time.'
        : 'A start and end time are required.',
    );
  }

  const encoded = encode(kind, config, window);
  if (!encoded.ok) return encoded;

  const summary = decode(encoded.value);
  return ok({
    kind,
    window,
    timeperiod: encoded.value,
    summary,
    details: describeSchedule(summary),
  });
}

/** 400 VALIDATION_ERROR carrying the schedule error code as `reason`. */
export const toScheduleAppError = (error: ScheduleError): AppError =>
  Errors.validation(error.message, error.code);
