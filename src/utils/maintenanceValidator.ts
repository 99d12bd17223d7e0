/**
 * Maintenance request validator.
 *
 * Gate-keeps every scheduling request before it reaches the recurrence codec
 * or the Zabbix API.  Rules are checked in a fixed order and the first
 * violation is returned as a ValidationError value; nothing is thrown.
 */

import { fullMask, MONTH_NAMES, WEEKDAY_NAMES } from './bitmask.js';
import {
  MAX_DAY_OF_MONTH,
  MAX_OCCURRENCE_SELECTOR,
  isRecurrenceKind,
  type AbsoluteWindow,
  type RecurrenceConfigInput,
  type RecurrenceKind,
} from './recurrenceCodec.js';
import {
  ScheduleErrorCode,
  ok,
  validationError,
  type Result,
  type ValidationError,
} from './scheduleErrors.js';

/* ------------------------------------------------------------------ */
/*  Types                                                             */
/* ------------------------------------------------------------------ */

export interface MaintenanceRequestInput {
  recurrenceKind: unknown;
  recurrenceConfig?: RecurrenceConfigInput | null;
  /** Epoch seconds. */
  startTime?: number;
  /** Epoch seconds. */
  endTime?: number;
}

export interface NormalizedRequest {
  kind: RecurrenceKind;
  config: RecurrenceConfigInput;
  window?: AbsoluteWindow;
}

/**
 * Recurrence config as the language model and the HTTP API spell it, i.e. the
 * field names of the Zabbix time period.
 */
export interface WireRecurrenceConfig {
  start_time?: unknown;
  duration?: unknown;
  every?: unknown;
  dayofweek?: unknown;
  day?: unknown;
  month?: unknown;
}

/* ------------------------------------------------------------------ */
/*  Helpers                                                           */
/* ------------------------------------------------------------------ */

const DAY_OF_WEEK_MAX = fullMask(WEEKDAY_NAMES);
const MONTH_MASK_MAX = fullMask(MONTH_NAMES);

const isPresent = (value: unknown): boolean => value !== undefined && value !== null;

const isIntInRange = (value: unknown, min: number, max: number): boolean =>
  typeof value === 'number' && Number.isInteger(value) && value >= min && value <= max;

/** Map wire field names onto RecurrenceConfigInput, dropping absent ones. */
export function fromWireConfig(wire: WireRecurrenceConfig): RecurrenceConfigInput {
  const config: RecurrenceConfigInput = {};
  if (isPresent(wire.start_time)) config.startOffsetSeconds = wire.start_time;
  if (isPresent(wire.duration)) config.durationSeconds = wire.duration;
  if (isPresent(wire.every)) config.everyUnit = wire.every;
  if (isPresent(wire.dayofweek)) config.daysOfWeekMask = wire.dayofweek;
  if (isPresent(wire.day)) config.dayOfMonth = wire.day;
  if (isPresent(wire.month)) config.monthsMask = wire.month;
  return config;
}

/* ------------------------------------------------------------------ */
/*  Validation                                                        */
/* ------------------------------------------------------------------ */

export function validateMaintenanceRequest(
  request: MaintenanceRequestInput,
): Result<NormalizedRequest, ValidationError> {
  const { recurrenceKind: kind, recurrenceConfig, startTime, endTime } = request;

  // 1. Kind
  if (!isRecurrenceKind(kind)) {
    return validationError(
      ScheduleErrorCode.UNSUPPORTED_RECURRENCE_KIND,
      'Unsupported recurrence type. Use once, daily, weekly or monthly.',
    );
  }

  const window =
    typeof startTime === 'number' && typeof endTime === 'number'
      ? { startTime, endTime }
      : undefined;

  // 2. Recurring kinds need a config object
  if (kind !== 'once' && (!recurrenceConfig || typeof recurrenceConfig !== 'object')) {
    return validationError(
      ScheduleErrorCode.MISSING_RECURRENCE_CONFIG,
      'Routine maintenance needs a recurrence configuration. Could you give more details?',
    );
  }

  const config: RecurrenceConfigInput = { ...(recurrenceConfig ?? {}) };

  // 3. Weekly
  if (kind === 'weekly' && !isIntInRange(config.daysOfWeekMask, 1, DAY_OF_WEEK_MAX)) {
    return validationError(
      ScheduleErrorCode.INVALID_DAY_OF_WEEK_MASK,
      isPresent(config.daysOfWeekMask)
        ? `Invalid day-of-week mask. It must be between 1 and ${DAY_OF_WEEK_MAX}.`
        : 'Weekly maintenance needs the day(s) of the week.',
    );
  }

  if (kind === 'monthly') {
    // 4. Exactly one selector, each within range
    const hasDay = isPresent(config.dayOfMonth);
    const hasWeekdays = isPresent(config.daysOfWeekMask);

    if (hasDay === hasWeekdays) {
      return validationError(
        ScheduleErrorCode.AMBIGUOUS_OR_MISSING_MONTHLY_SELECTOR,
        hasDay
          ? 'Specify either a day of the month or a day of the week, not both.'
          : 'Monthly maintenance needs a day of the month (e.g. the 5th) or a day of the week (e.g. first Monday).',
      );
    }

    if (hasDay && !isIntInRange(config.dayOfMonth, 1, MAX_DAY_OF_MONTH)) {
      return validationError(
        ScheduleErrorCode.INVALID_DAY_OF_MONTH,
        `Invalid day of the month. It must be between 1 and ${MAX_DAY_OF_MONTH}.`,
      );
    }

    if (hasWeekdays) {
      if (!isIntInRange(config.daysOfWeekMask, 1, DAY_OF_WEEK_MAX)) {
        return validationError(
          ScheduleErrorCode.INVALID_DAY_OF_WEEK_MASK,
          `Invalid day-of-week mask. It must be between 1 and ${DAY_OF_WEEK_MAX}.`,
        );
      }
      if (!isPresent(config.everyUnit)) {
        config.everyUnit = 1;
      } else if (!isIntInRange(config.everyUnit, 1, MAX_OCCURRENCE_SELECTOR)) {
        return validationError(
          ScheduleErrorCode.INVALID_OCCURRENCE_SELECTOR,
          'Invalid week occurrence. Use 1=first, 2=second, 3=third, 4=fourth, 5=last, or a sum of them.',
        );
      }
    }

    // 5. Month mask
    if (isPresent(config.monthsMask) && !isIntInRange(config.monthsMask, 1, MONTH_MASK_MAX)) {
      return validationError(
        ScheduleErrorCode.INVALID_MONTH_MASK,
        `Invalid month mask. It must be between 1 and ${MONTH_MASK_MAX}.`,
      );
    }

    // 6. Timing presence
    if (!isPresent(config.startOffsetSeconds) || !isPresent(config.durationSeconds)) {
      return validationError(
        ScheduleErrorCode.MISSING_TIMING_FIELD,
        isPresent(config.startOffsetSeconds)
          ? 'Monthly maintenance is missing its duration.'
          : 'Monthly maintenance is missing its start time.',
      );
    }
  }

  // 7. Once
  if (kind === 'once' && (!window || window.endTime <= window.startTime)) {
    return validationError(
      ScheduleErrorCode.INVALID_TIME_WINDOW,
      window
        ? 'The end time must be after the start time.'
        : 'One-time maintenance needs a start and end time.',
    );
  }

  return ok(window ? { kind, config, window } : { kind, config });
}
