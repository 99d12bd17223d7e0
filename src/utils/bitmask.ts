/**
 * Bitmask helpers for the maintenance time-period fields.
 *
 * Weekday and month masks are plain power-of-two flag sets: the name at
 * index `i` of its table owns bit value `2 ** i`.  The week-occurrence
 * selector is NOT one of these (see OCCURRENCE_VALUES below).
 */

/* ------------------------------------------------------------------ */
/*  Name tables                                                       */
/* ------------------------------------------------------------------ */

export const WEEKDAY_NAMES = [
  'Monday',
  'Tuesday',
  'Wednesday',
  'Thursday',
  'Friday',
  'Saturday',
  'Sunday',
] as const;

export const MONTH_NAMES = [
  'January',
  'February',
  'March',
  'April',
  'May',
  'June',
  'July',
  'August',
  'September',
  'October',
  'November',
  'December',
] as const;

export type WeekdayName = (typeof WEEKDAY_NAMES)[number];
export type MonthName = (typeof MONTH_NAMES)[number];

/** Every month selected, the API's "no month restriction" value. */
export const ALL_MONTHS_MASK = 4095;

/* ------------------------------------------------------------------ */
/*  Occurrence selector                                               */
/* ------------------------------------------------------------------ */

/**
 * Ordinal values of the week-occurrence selector.  Several occurrences are
 * combined by adding these values (second + fourth = 6), so composite values
 * cannot always be split back into a unique set.
 */
export const OCCURRENCE_VALUES = {
  first: 1,
  second: 2,
  third: 3,
  fourth: 4,
  last: 5,
} as const;

export type OccurrenceName = keyof typeof OCCURRENCE_VALUES;

export function isOccurrenceName(value: string): value is OccurrenceName {
  return Object.hasOwn(OCCURRENCE_VALUES, value);
}

const OCCURRENCE_BY_VALUE: ReadonlyMap<number, OccurrenceName> = new Map(
  Object.entries(OCCURRENCE_VALUES).flatMap(([name, value]) =>
    isOccurrenceName(name) ? [[value, name] as const] : [],
  ),
);

/** Sum the ordinal values of the given occurrences (duplicates count once). */
export function occurrenceSelectorFromNames(names: readonly OccurrenceName[]): number {
  return [...new Set(names)].reduce((sum, name) => sum + OCCURRENCE_VALUES[name], 0);
}

/** Name of a single-occurrence selector value, or undefined for anything else. */
export function occurrenceNameFromValue(value: number): OccurrenceName | undefined {
  return OCCURRENCE_BY_VALUE.get(value);
}

/* ------------------------------------------------------------------ */
/*  Mask <-> names                                                    */
/* ------------------------------------------------------------------ */

/**
 * Names whose bit is set in `mask`, in table order.  Bits above the table
 * width are ignored.
 */
export function namesFromMask<T extends string>(mask: number, table: readonly T[]): T[] {
  return table.filter((_name, i) => (mask & (1 << i)) !== 0);
}

/** Inverse of {@link namesFromMask}. */
export function maskFromNames<T extends string>(
  names: readonly T[],
  table: readonly T[],
): number {
  let mask = 0;
  for (const name of names) {
    const i = table.indexOf(name);
    if (i >= 0) mask |= 1 << i;
  }
  return mask;
}

/** Highest valid mask value for a table (all bits set). */
export function fullMask(table: readonly string[]): number {
  return (1 << table.length) - 1;
}
