/**
 * Unit tests for src/utils/recurrenceCodec.ts
 *
 * Run with:
 *   npx tsx --test src/utils/__tests__/recurrenceCodec.test.ts
 */

import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import {
  decode,
  describeSchedule,
  encode,
  type AbsoluteWindow,
  type RecurrenceConfigInput,
  type TimePeriodRecord,
} from '../recurrenceCodec.js';
import { parseLocalDateTime } from '../date.js';

function encodeOk(
  kind: string,
  config?: RecurrenceConfigInput,
  window?: AbsoluteWindow,
): TimePeriodRecord {
  const result = encode(kind, config, window);
  if (!result.ok) {
    throw new Error(`expected encode to succeed, got: ${result.error.message}`);
  }
  return result.value;
}

function encodeError(kind: string, config?: RecurrenceConfigInput, window?: AbsoluteWindow): string {
  const result = encode(kind, config, window);
  if (result.ok) {
    throw new Error('expected encode to fail');
  }
  assert.equal(result.error.code, 'CONFIGURATION_ERROR');
  return result.error.message;
}

/* ================================================================== */
/*  encode                                                            */
/* ================================================================== */

describe('encode', () => {
  it('encodes a one-time window as start_date + period', () => {
    const record = encodeOk('once', undefined, { startTime: 1_767_225_600, endTime: 1_767_232_800 });
    assert.deepEqual(record, { timeperiod_type: 0, start_date: 1_767_225_600, period: 7200 });
  });

  it('defaults every to 1 for daily maintenance', () => {
    const record = encodeOk('daily', { startOffsetSeconds: 7200, durationSeconds: 3600 });
    assert.deepEqual(record, { timeperiod_type: 2, start_time: 7200, period: 3600, every: 1 });
  });

  it('keeps an explicit daily interval', () => {
    const record = encodeOk('daily', { startOffsetSeconds: 0, durationSeconds: 600, everyUnit: 3 });
    assert.deepEqual(record, { timeperiod_type: 2, start_time: 0, period: 600, every: 3 });
  });

  it('encodes Thursday + Friday weekly maintenance', () => {
    const record = encodeOk('weekly', {
      startOffsetSeconds: 18000,
      durationSeconds: 7200,
      daysOfWeekMask: 24,
      everyUnit: 1,
    });
    assert.deepEqual(record, {
      timeperiod_type: 3,
      start_time: 18000,
      period: 7200,
      dayofweek: 24,
      every: 1,
    });
  });

  it('encodes monthly by day with all-month and every-month defaults', () => {
    const record = encodeOk('monthly', { startOffsetSeconds: 0, durationSeconds: 3600, dayOfMonth: 5 });
    assert.deepEqual(record, {
      timeperiod_type: 4,
      start_time: 0,
      period: 3600,
      day: 5,
      every: 1,
      month: 4095,
    });
  });

  it('encodes the last Friday of each quarter-opening month', () => {
    const record = encodeOk('monthly', {
      startOffsetSeconds: 3600,
      durationSeconds: 7200,
      daysOfWeekMask: 16,
      everyUnit: 5,
      monthsMask: 585,
    });
    assert.deepEqual(record, {
      timeperiod_type: 4,
      start_time: 3600,
      period: 7200,
      dayofweek: 16,
      every: 5,
      month: 585,
    });
  });

  it('rejects an unknown kind', () => {
    assert.equal(encodeError('yearly', {}), 'unsupported recurrence kind "yearly".');
  });

  it('rejects once without a window', () => {
    assert.equal(
      encodeError('once', {}),
      'once maintenance requires an absolute start and end time.',
    );
  });

  it('rejects once with an empty window', () => {
    assert.equal(
      encodeError('once', undefined, { startTime: 100, endTime: 100 }),
      'end time must be after start time.',
    );
  });

  it('rejects weekly without a day-of-week mask', () => {
    assert.equal(
      encodeError('weekly', { startOffsetSeconds: 0, durationSeconds: 60 }),
      'day-of-week mask is required for weekly maintenance.',
    );
  });

  it('rejects daily without a duration', () => {
    assert.equal(
      encodeError('daily', { startOffsetSeconds: 0 }),
      'duration (seconds) is required for daily maintenance.',
    );
  });

  it('rejects a start offset of a full day', () => {
    assert.equal(
      encodeError('daily', { startOffsetSeconds: 86400, durationSeconds: 60 }),
      'start time (seconds since midnight) must be an integer between 0 and 86399.',
    );
  });

  it('rejects a zero duration', () => {
    assert.equal(
      encodeError('daily', { startOffsetSeconds: 0, durationSeconds: 0 }),
      'duration (seconds) must be an integer of at least 1.',
    );
  });

  it('rejects non-integer values', () => {
    assert.equal(
      encodeError('weekly', { startOffsetSeconds: 0, durationSeconds: 60, daysOfWeekMask: '24' }),
      'day-of-week mask must be an integer between 1 and 127.',
    );
  });

  it('rejects monthly with both selectors', () => {
    assert.equal(
      encodeError('monthly', {
        startOffsetSeconds: 0,
        durationSeconds: 60,
        dayOfMonth: 1,
        daysOfWeekMask: 1,
      }),
      'monthly maintenance takes either a day of month or weekdays, not both.',
    );
  });

  it('rejects monthly with neither selector', () => {
    assert.equal(
      encodeError('monthly', { startOffsetSeconds: 0, durationSeconds: 60 }),
      'monthly maintenance needs a day of month or weekdays.',
    );
  });

  it('rejects an out-of-range occurrence selector', () => {
    assert.equal(
      encodeError('monthly', {
        startOffsetSeconds: 0,
        durationSeconds: 60,
        daysOfWeekMask: 1,
        everyUnit: 32,
      }),
      'week occurrence selector must be an integer between 1 and 31.',
    );
  });

  it('rejects a month mask of 0', () => {
    assert.equal(
      encodeError('monthly', { startOffsetSeconds: 0, durationSeconds: 60, dayOfMonth: 1, monthsMask: 0 }),
      'month mask must be an integer between 1 and 4095.',
    );
  });

  it('treats null fields as absent', () => {
    const record = encodeOk('monthly', {
      startOffsetSeconds: 0,
      durationSeconds: 60,
      dayOfMonth: 10,
      daysOfWeekMask: null,
      monthsMask: null,
    });
    assert.deepEqual(record, {
      timeperiod_type: 4,
      start_time: 0,
      period: 60,
      day: 10,
      every: 1,
      month: 4095,
    });
  });

  it('does not mutate the config it was given', () => {
    const config = { startOffsetSeconds: 0, durationSeconds: 60, daysOfWeekMask: 1 };
    encodeOk('monthly', config);
    assert.deepEqual(config, { startOffsetSeconds: 0, durationSeconds: 60, daysOfWeekMask: 1 });
  });
});

/* ================================================================== */
/*  decode                                                            */
/* ================================================================== */

describe('decode', () => {
  it('decodes the weekly Thursday + Friday record', () => {
    const summary = decode({ timeperiod_type: 3, start_time: 18000, period: 7200, dayofweek: 24, every: 1 });
    assert.deepEqual(summary, {
      kind: 'weekly',
      dayNames: ['Thursday', 'Friday'],
      monthNames: [],
      monthsRestricted: false,
      interval: 1,
      startTimeOfDay: '05:00',
      durationLabel: '2h 0m',
    });
  });

  it('decodes the last Friday in January, April, July and October', () => {
    const summary = decode({
      timeperiod_type: 4,
      start_time: 3600,
      period: 7200,
      dayofweek: 16,
      every: 5,
      month: 585,
    });
    assert.equal(summary.kind, 'monthly');
    assert.equal(summary.occurrenceLabel, 'last');
    assert.deepEqual(summary.occurrence, { type: 'single', value: 5, name: 'last' });
    assert.deepEqual(summary.dayNames, ['Friday']);
    assert.deepEqual(summary.monthNames, ['January', 'April', 'July', 'October']);
    assert.equal(summary.monthsRestricted, true);
    assert.equal(summary.dayOfMonth, undefined);
  });

  it('decodes string-valued records as returned by maintenance.get', () => {
    const summary = decode({
      timeperiod_type: '3',
      start_date: '0',
      start_time: '18000',
      period: '7200',
      every: '1',
      dayofweek: '24',
      day: '0',
      month: '0',
    });
    assert.equal(summary.kind, 'weekly');
    assert.deepEqual(summary.dayNames, ['Thursday', 'Friday']);
    assert.equal(summary.startTimeOfDay, '05:00');
  });

  it('reports 4095 as no month restriction', () => {
    const summary = decode({ timeperiod_type: 4, start_time: 0, period: 60, day: 1, every: 1, month: 4095 });
    assert.equal(summary.monthsRestricted, false);
    assert.deepEqual(summary.monthNames, []);
    assert.equal(summary.dayOfMonth, 1);
    assert.equal(summary.interval, 1);
  });

  it('reports an absent month as no month restriction', () => {
    const summary = decode({ timeperiod_type: 4, start_time: 0, period: 60, day: 15 });
    assert.equal(summary.monthsRestricted, false);
    assert.equal(summary.interval, undefined);
  });

  it('keeps midnight as a start time', () => {
    assert.equal(decode({ timeperiod_type: 2, start_time: 0, period: 60 }).startTimeOfDay, '00:00');
  });

  it('decodes a one-time record', () => {
    const summary = decode({ timeperiod_type: 0, start_date: 1_767_225_600, period: 7200 });
    assert.deepEqual(summary, {
      kind: 'once',
      dayNames: [],
      monthNames: [],
      monthsRestricted: false,
      durationLabel: '2h 0m',
      startDate: 1_767_225_600,
    });
  });

  it('decodes an unknown period type without throwing', () => {
    const summary = decode({ timeperiod_type: 1, period: 60 });
    assert.equal(summary.kind, 'unknown');
    assert.equal(summary.durationLabel, '0h 1m');
  });

  it('tolerates an empty record', () => {
    assert.deepEqual(decode({}), {
      kind: 'unknown',
      dayNames: [],
      monthNames: [],
      monthsRestricted: false,
    });
  });
});

/* ================================================================== */
/*  Round trip                                                        */
/* ================================================================== */

describe('encode → decode', () => {
  it('recovers every single occurrence exactly', () => {
    const expected = ['first', 'second', 'third', 'fourth', 'last'];
    for (let every = 1; every <= 5; every++) {
      const record = encodeOk('monthly', {
        startOffsetSeconds: 7200,
        durationSeconds: 3600,
        daysOfWeekMask: 1,
        everyUnit: every,
        monthsMask: 7,
      });
      const summary = decode(record);
      assert.equal(summary.occurrenceLabel, expected[every - 1]);
      assert.deepEqual(summary.dayNames, ['Monday']);
      assert.deepEqual(summary.monthNames, ['January', 'February', 'March']);
    }
  });

  it('recovers daily, weekly and monthly-by-day content', () => {
    const daily = decode(encodeOk('daily', { startOffsetSeconds: 82800, durationSeconds: 5400, everyUnit: 2 }));
    assert.equal(daily.kind, 'daily');
    assert.equal(daily.interval, 2);
    assert.equal(daily.startTimeOfDay, '23:00');
    assert.equal(daily.durationLabel, '1h 30m');

    const weekly = decode(
      encodeOk('weekly', { startOffsetSeconds: 3600, durationSeconds: 7200, daysOfWeekMask: 96 }),
    );
    assert.deepEqual(weekly.dayNames, ['Saturday', 'Sunday']);

    const byDay = decode(
      encodeOk('monthly', { startOffsetSeconds: 0, durationSeconds: 60, dayOfMonth: 15, monthsMask: 65 }),
    );
    assert.equal(byDay.dayOfMonth, 15);
    assert.deepEqual(byDay.monthNames, ['January', 'July']);
  });

  it('marks a summed selector as composite instead of guessing', () => {
    const record = encodeOk('monthly', {
      startOffsetSeconds: 3600,
      durationSeconds: 3600,
      daysOfWeekMask: 1,
      everyUnit: 6,
    });
    const summary = decode(record);
    assert.deepEqual(summary.occurrence, { type: 'composite', value: 6 });
    assert.equal(summary.occurrenceLabel, 'occurrences summing to 6');
  });
});

/* ================================================================== */
/*  describeSchedule                                                  */
/* ================================================================== */

describe('describeSchedule', () => {
  it('describes a monthly-by-weekday schedule', () => {
    const lines = describeSchedule(
      decode({ timeperiod_type: 4, start_time: 3600, period: 7200, dayofweek: 16, every: 5, month: 585 }),
    );
    assert.deepEqual(lines, [
      'Type: monthly',
      'Schedule: last Friday',
      'Months: January, April, July, October',
      'Start time: 01:00',
      'Duration: 2h 0m',
    ]);
  });

  it('describes a weekly schedule every other week', () => {
    const lines = describeSchedule(
      decode({ timeperiod_type: 3, start_time: 18000, period: 7200, dayofweek: 24, every: 2 }),
    );
    assert.deepEqual(lines, [
      'Type: weekly',
      'Days: Thursday, Friday',
      'Every: 2 weeks',
      'Start time: 05:00',
      'Duration: 2h 0m',
    ]);
  });

  it('lists the days before a composite week occurrence', () => {
    const lines = describeSchedule(
      decode({ timeperiod_type: 4, start_time: 79200, period: 10800, dayofweek: 1, every: 6, month: 585 }),
    );
    assert.deepEqual(lines, [
      'Type: monthly',
      'Days: Monday',
      'Week occurrence: occurrences summing to 6',
      'Months: January, April, July, October',
      'Start time: 22:00',
      'Duration: 3h 0m',
    ]);
  });

  it('shows the start of a once window', () => {
    const start = parseLocalDateTime('2026-03-10 08:00');
    if (start === null) throw new Error('fixture date did not parse');
    const lines = describeSchedule(decode({ timeperiod_type: 0, start_date: start, period: 7200 }));
    assert.deepEqual(lines, ['Type: once', 'Start: 2026-03-10 08:00', 'Duration: 2h 0m']);
  });

  it('describes a monthly-by-day schedule', () => {
    const lines = describeSchedule(
      decode({ timeperiod_type: 4, start_time: 0, period: 3600, day: 5, every: 1, month: 4095 }),
    );
    assert.deepEqual(lines, ['Type: monthly', 'Day of month: 5', 'Start time: 00:00', 'Duration: 1h 0m']);
  });
});
