/**
 * Recurrence codec: translates between a recurrence kind + config and the
 * time-period record of the Zabbix maintenance API, and back again.
 *
 *   encode(kind, config, window?)  → TimePeriodRecord | ConfigurationError
 *   decode(record)                 → ScheduleSummary
 *
 * Both directions are pure and synchronous.  `encode` re-checks everything it
 * relies on even when the request validator already ran, since it is the last
 * step before a record reaches the API.
 */

import {
  ALL_MONTHS_MASK,
  MONTH_NAMES,
  WEEKDAY_NAMES,
  fullMask,
  namesFromMask,
  occurrenceNameFromValue,
  type MonthName,
  type OccurrenceName,
  type WeekdayName,
} from './bitmask.js';
import { SECONDS_PER_DAY, formatDuration, formatLocalDateTime, formatTimeOfDay } from './date.js';
import {
  configurationError,
  ok,
  type ConfigurationError,
  type Result,
} from './scheduleErrors.js';

/* ------------------------------------------------------------------ */
/*  Types                                                             */
/* ------------------------------------------------------------------ */

export const RECURRENCE_KINDS = ['once', 'daily', 'weekly', 'monthly'] as const;

export type RecurrenceKind = (typeof RECURRENCE_KINDS)[number];

export function isRecurrenceKind(value: unknown): value is RecurrenceKind {
  return typeof value === 'string' && (RECURRENCE_KINDS as readonly string[]).includes(value);
}

export interface RecurrenceConfig {
  /** Seconds since midnight at which the window opens. */
  startOffsetSeconds?: number;
  durationSeconds?: number;
  /**
   * Every N days / weeks / months or, for monthly-by-weekday, the summed
   * week-occurrence selector (first=1 … last=5).
   */
  everyUnit?: number;
  daysOfWeekMask?: number;
  dayOfMonth?: number;
  monthsMask?: number;
}

/** Same fields as RecurrenceConfig, values not yet checked. */
export type RecurrenceConfigInput = { [K in keyof RecurrenceConfig]?: unknown };

/** Absolute maintenance window in Unix epoch seconds. */
export interface AbsoluteWindow {
  startTime: number;
  endTime: number;
}

export const TimePeriodType = {
  ONCE: 0,
  DAILY: 2,
  WEEKLY: 3,
  MONTHLY: 4,
} as const;

export interface OnceTimePeriod {
  readonly timeperiod_type: typeof TimePeriodType.ONCE;
  readonly start_date: number;
  readonly period: number;
}

export interface DailyTimePeriod {
  readonly timeperiod_type: typeof TimePeriodType.DAILY;
  readonly start_time: number;
  readonly period: number;
  readonly every: number;
}

export interface WeeklyTimePeriod {
  readonly timeperiod_type: typeof TimePeriodType.WEEKLY;
  readonly start_time: number;
  readonly period: number;
  readonly dayofweek: number;
  readonly every: number;
}

export interface MonthlyByDayTimePeriod {
  readonly timeperiod_type: typeof TimePeriodType.MONTHLY;
  readonly start_time: number;
  readonly period: number;
  readonly day: number;
  readonly every: number;
  readonly month: number;
}

export interface MonthlyByWeekdayTimePeriod {
  readonly timeperiod_type: typeof TimePeriodType.MONTHLY;
  readonly start_time: number;
  readonly period: number;
  readonly dayofweek: number;
  /** Summed occurrence selector, not a month interval. */
  readonly every: number;
  readonly month: number;
}

export type TimePeriodRecord =
  | OnceTimePeriod
  | DailyTimePeriod
  | WeeklyTimePeriod
  | MonthlyByDayTimePeriod
  | MonthlyByWeekdayTimePeriod;

/**
 * A time period as read back from the API.  `maintenance.get` returns every
 * number as a string and fills unused fields with "0".
 */
export type StoredTimePeriod = Partial<
  Record<
    'timeperiod_type' | 'start_date' | 'period' | 'start_time' | 'every' | 'dayofweek' | 'day' | 'month',
    number | string | null
  >
>;

export type OccurrenceSelector =
  | { type: 'single'; value: number; name: OccurrenceName }
  | { type: 'composite'; value: number };

export interface ScheduleSummary {
  kind: RecurrenceKind | 'unknown';
  /** Weekdays present in `dayofweek`, Monday first. */
  dayNames: WeekdayName[];
  /** Months present in `month`, January first; empty when unrestricted. */
  monthNames: MonthName[];
  /** False when `month` is absent or selects all twelve months. */
  monthsRestricted: boolean;
  occurrence?: OccurrenceSelector;
  occurrenceLabel?: string;
  dayOfMonth?: number;
  /** Every N days / weeks / months. */
  interval?: number;
  startTimeOfDay?: string;
  durationLabel?: string;
  /** Once only; epoch seconds. */
  startDate?: number;
}

/* ------------------------------------------------------------------ */
/*  Field rules                                                       */
/* ------------------------------------------------------------------ */

/** Widest accepted occurrence selector (the sum of all five is 15). */
export const MAX_OCCURRENCE_SELECTOR = 31;
export const MAX_DAY_OF_MONTH = 31;

interface FieldRule {
  label: string;
  min: number;
  max?: number;
}

const FIELD_RULES: Record<keyof RecurrenceConfig, FieldRule> = {
  startOffsetSeconds: { label: 'start time (seconds since midnight)', min: 0, max: SECONDS_PER_DAY - 1 },
  durationSeconds: { label: 'duration (seconds)', min: 1 },
  everyUnit: { label: 'every', min: 1 },
  daysOfWeekMask: { label: 'day-of-week mask', min: 1, max: fullMask(WEEKDAY_NAMES) },
  dayOfMonth: { label: 'day of month', min: 1, max: MAX_DAY_OF_MONTH },
  monthsMask: { label: 'month mask', min: 1, max: fullMask(MONTH_NAMES) },
};

const OCCURRENCE_RULE: FieldRule = {
  label: 'week occurrence selector',
  min: 1,
  max: MAX_OCCURRENCE_SELECTOR,
};

/* ------------------------------------------------------------------ */
/*  Encode                                                            */
/* ------------------------------------------------------------------ */

class EncodeFailure extends Error {}

function fail(message: string): never {
  throw new EncodeFailure(message);
}

function optionalField(
  config: RecurrenceConfigInput,
  field: keyof RecurrenceConfig,
  rule: FieldRule = FIELD_RULES[field],
): number | undefined {
  const value = config[field];
  if (value === undefined || value === null) return undefined;
  if (
    typeof value !== 'number' ||
    !Number.isInteger(value) ||
    value < rule.min ||
    (rule.max !== undefined && value > rule.max)
  ) {
    fail(
      rule.max === undefined
        ? `${rule.label} must be an integer of at least ${rule.min}.`
        : `${rule.label} must be an integer between ${rule.min} and ${rule.max}.`,
    );
  }
  return value;
}

function requiredField(
  config: RecurrenceConfigInput,
  field: keyof RecurrenceConfig,
  kind: RecurrenceKind,
): number {
  const value = optionalField(config, field);
  if (value === undefined) {
    fail(`${FIELD_RULES[field].label} is required for ${kind} maintenance.`);
  }
  return value;
}

function timing(config: RecurrenceConfigInput, kind: RecurrenceKind) {
  return {
    start_time: requiredField(config, 'startOffsetSeconds', kind),
    period: requiredField(config, 'durationSeconds', kind),
  };
}

function buildRecord(
  kind: string,
  config: RecurrenceConfigInput,
  window: AbsoluteWindow | undefined,
): TimePeriodRecord {
  switch (kind) {
    case 'once': {
      if (!window) fail('once maintenance requires an absolute start and end time.');
      const { startTime, endTime } = window;
      if (!Number.isInteger(startTime) || !Number.isInteger(endTime)) {
        fail('start and end time must be whole epoch seconds.');
      }
      if (endTime <= startTime) fail('end time must be after start time.');
      return {
        timeperiod_type: TimePeriodType.ONCE,
        start_date: startTime,
        period: endTime - startTime,
      };
    }

    case 'daily':
      return {
        timeperiod_type: TimePeriodType.DAILY,
        ...timing(config, kind),
        every: optionalField(config, 'everyUnit') ?? 1,
      };

    case 'weekly': {
      const t = timing(config, kind);
      return {
        timeperiod_type: TimePeriodType.WEEKLY,
        ...t,
        dayofweek: requiredField(config, 'daysOfWeekMask', kind),
        every: optionalField(config, 'everyUnit') ?? 1,
      };
    }

    case 'monthly': {
      const hasDay = config.dayOfMonth !== undefined && config.dayOfMonth !== null;
      const hasWeekdays = config.daysOfWeekMask !== undefined && config.daysOfWeekMask !== null;
      if (hasDay && hasWeekdays) {
        fail('monthly maintenance takes either a day of month or weekdays, not both.');
      }
      if (!hasDay && !hasWeekdays) {
        fail('monthly maintenance needs a day of month or weekdays.');
      }

      const t = timing(config, kind);
      const month = optionalField(config, 'monthsMask') ?? ALL_MONTHS_MASK;

      if (hasDay) {
        return {
          timeperiod_type: TimePeriodType.MONTHLY,
          ...t,
          day: requiredField(config, 'dayOfMonth', kind),
          every: optionalField(config, 'everyUnit') ?? 1,
          month,
        };
      }
      return {
        timeperiod_type: TimePeriodType.MONTHLY,
        ...t,
        dayofweek: requiredField(config, 'daysOfWeekMask', kind),
        every: optionalField(config, 'everyUnit', OCCURRENCE_RULE) ?? 1,
        month,
      };
    }

    default:
      return fail(`unsupported recurrence kind "${kind}".`);
  }
}

/**
 * Build the time-period record for a recurrence.  `window` is only used (and
 * required) for once maintenance.
 */
export function encode(
  kind: string,
  config: RecurrenceConfigInput | undefined,
  window?: AbsoluteWindow,
): Result<TimePeriodRecord, ConfigurationError> {
  try {
    return ok(buildRecord(kind, config ?? {}, window));
  } catch (err) {
    if (err instanceof EncodeFailure) return configurationError(err.message);
    throw err;
  }
}

/* ------------------------------------------------------------------ */
/*  Decode                                                            */
/* ------------------------------------------------------------------ */

const KIND_BY_TYPE: ReadonlyMap<number, RecurrenceKind> = new Map([
  [TimePeriodType.ONCE, 'once'],
  [TimePeriodType.DAILY, 'daily'],
  [TimePeriodType.WEEKLY, 'weekly'],
  [TimePeriodType.MONTHLY, 'monthly'],
]);

function toInt(value: number | string | null | undefined): number | undefined {
  if (typeof value === 'number') return Number.isInteger(value) ? value : undefined;
  if (typeof value === 'string' && /^-?\d+$/.test(value.trim())) return Number(value.trim());
  return undefined;
}

function toPositiveInt(value: number | string | null | undefined): number | undefined {
  const n = toInt(value);
  return n !== undefined && n > 0 ? n : undefined;
}

/**
 * Single values 1 to 5 map to their ordinal name.  Any other value is a sum of
 * several ordinals that may be split more than one way (6 = 2+4 = 1+5), so it
 * is reported as composite without picking a decomposition.
 */
export function decodeOccurrence(value: number): OccurrenceSelector {
  const name = occurrenceNameFromValue(value);
  return name ? { type: 'single', value, name } : { type: 'composite', value };
}

export function occurrenceLabel(selector: OccurrenceSelector): string {
  return selector.type === 'single' ? selector.name : `occurrences summing to ${selector.value}`;
}

/** Human-readable view of a stored time period.  Never throws. */
export function decode(record: StoredTimePeriod): ScheduleSummary {
  const type = toInt(record.timeperiod_type);
  const kind = (type !== undefined && KIND_BY_TYPE.get(type)) || 'unknown';

  const summary: ScheduleSummary = {
    kind,
    dayNames: [],
    monthNames: [],
    monthsRestricted: false,
  };

  const period = toPositiveInt(record.period);
  if (period !== undefined) summary.durationLabel = formatDuration(period);

  if (kind === 'once') {
    const startDate = toPositiveInt(record.start_date);
    if (startDate !== undefined) summary.startDate = startDate;
    return summary;
  }
  if (kind === 'unknown') return summary;

  // 0 is midnight, so only negative / oversized values are dropped here
  const startTime = toInt(record.start_time);
  if (startTime !== undefined && startTime >= 0 && startTime < SECONDS_PER_DAY) {
    summary.startTimeOfDay = formatTimeOfDay(startTime);
  }

  const every = toPositiveInt(record.every);
  const dayofweek = toPositiveInt(record.dayofweek);

  if (kind === 'daily') {
    if (every !== undefined) summary.interval = every;
    return summary;
  }

  if (dayofweek !== undefined) summary.dayNames = namesFromMask(dayofweek, WEEKDAY_NAMES);

  if (kind === 'weekly') {
    if (every !== undefined) summary.interval = every;
    return summary;
  }

  // monthly
  const month = toPositiveInt(record.month);
  if (month !== undefined && (month & ALL_MONTHS_MASK) !== ALL_MONTHS_MASK) {
    summary.monthsRestricted = true;
    summary.monthNames = namesFromMask(month, MONTH_NAMES);
  }

  const day = toPositiveInt(record.day);
  if (day !== undefined) {
    summary.dayOfMonth = day;
    if (every !== undefined) summary.interval = every;
  } else if (dayofweek !== undefined && every !== undefined) {
    summary.occurrence = decodeOccurrence(every);
    summary.occurrenceLabel = occurrenceLabel(summary.occurrence);
  }

  return summary;
}

/* ------------------------------------------------------------------ */
/*  Presentation                                                      */
/* ------------------------------------------------------------------ */

/** One line per decoded detail, for chat replies and previews. */
export function describeSchedule(summary: ScheduleSummary): string[] {
  const lines: string[] = [`Type: ${summary.kind}`];

  if (summary.startDate !== undefined) lines.push(`Start: ${formatLocalDateTime(summary.startDate)}`);

  if (summary.kind === 'monthly' && summary.dayOfMonth !== undefined) {
    lines.push(`Day of month: ${summary.dayOfMonth}`);
  }
  if (summary.dayNames.length > 0) {
    const days = summary.dayNames.join(', ');
    if (summary.occurrence?.type === 'single') {
      lines.push(`Schedule: ${summary.occurrence.name} ${days}`);
    } else {
      lines.push(`Days: ${days}`);
      if (summary.occurrenceLabel) lines.push(`Week occurrence: ${summary.occurrenceLabel}`);
    }
  }
  if (summary.interval !== undefined && summary.interval > 1) {
    const unit = summary.kind === 'daily' ? 'days' : summary.kind === 'weekly' ? 'weeks' : 'months';
    lines.push(`Every: ${summary.interval} ${unit}`);
  }
  if (summary.monthsRestricted) {
    lines.push(`Months: ${summary.monthNames.join(', ')}`);
  }
  if (summary.startTimeOfDay) lines.push(`Start time: ${summary.startTimeOfDay}`);
  if (summary.durationLabel) lines.push(`Duration: ${summary.durationLabel}`);

  return lines;
}
