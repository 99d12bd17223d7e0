const DATE_TIME_RE = /^(\d{4})-(\d{2})-(\d{2}) (\d{2}):(\d{2})$/;

export const SECONDS_PER_DAY = 86_400;

const pad = (n: number): string => String(n).padStart(2, '0');

/**
 * Parse a "YYYY-MM-DD HH:MM" string in the server's local time zone into
 * Unix epoch seconds.  Returns null for malformed or impossible values
 * (e.g. 2026-02-30 or 25:00).
 */
export const parseLocalDateTime = (value: string): number | null => {
  const match = DATE_TIME_RE.exec(value.trim());
  if (!match) return null;
  const [y, m, d, hh, mm] = match.slice(1).map(Number);
  if (hh > 23 || mm > 59) return null;
  const dt = new Date(y, m - 1, d, hh, mm);
  if (dt.getFullYear() !== y || dt.getMonth() !== m - 1 || dt.getDate() !== d) {
    return null;
  }
  return Math.floor(dt.getTime() / 1000);
};

/** Format epoch seconds as "YYYY-MM-DD HH:MM" in local time. */
export const formatLocalDateTime = (epochSeconds: number): string => {
  const dt = new Date(epochSeconds * 1000);
  return (
    `${dt.getFullYear()}-${pad(dt.getMonth() + 1)}-${pad(dt.getDate())} ` +
    `${pad(dt.getHours())}:${pad(dt.getMinutes())}`
  );
};

/** Format a Date as YYYY-MM-DD in local time. */
export const toLocalDateString = (d: Date): string =>
  `${d.getFullYear()}-${pad(d.getMonth() + 1)}-${pad(d.getDate())}`;

/** Seconds since midnight → "HH:MM". */
export const formatTimeOfDay = (seconds: number): string => {
  const hours = Math.floor(seconds / 3600);
  const minutes = Math.floor((seconds % 3600) / 60);
  return `${pad(hours)}:${pad(minutes)}`;
};

/** Seconds → "Xh Ym". */
export const formatDuration = (seconds: number): string => {
  const hours = Math.floor(seconds / 3600);
  const minutes = Math.floor((seconds % 3600) / 60);
  return `${hours}h ${minutes}m`;
};
