/**
 * Calendar date helpers for 'YYYY-MM-DD' strings.
 *
 * Arithmetic runs on UTC midnights so DST never shifts a day.
 */

const ISO_DATE_PATTERN = /^(\d{4})-(\d{2})-(\d{2})$/;

const DAY_MS = 86_400_000;

/** 0000-01-01 and 9999-12-31, the bounds of a four-digit year */
const MIN_MILLIS = -62_167_219_200_000;
const MAX_MILLIS = 253_402_214_400_000;

const pad = (value: number, width = 2): string => String(value).padStart(width, '0');

const toUtcMillis = (isoDate: string): number | null => {
  const match = ISO_DATE_PATTERN.exec(isoDate);
  if (match === null) {
    return null;
  }
  const [, year, month, day] = match;
  const millis = Date.UTC(Number(year), Number(month) - 1, Number(day));
  // Rejects rollovers such as 2025-02-30
  return new Date(millis).toISOString().slice(0, 10) === isoDate ? millis : null;
};

export const isIsoDate = (value: string): boolean => toUtcMillis(value) !== null;

/**
 * Adds calendar days. Returns null for malformed input and for results
 * outside years 0000-9999.
 */
export const addDays = (isoDate: string, days: number): string | null => {
  const millis = toUtcMillis(isoDate);
  if (millis === null) {
    return null;
  }
  const result = millis + days * DAY_MS;
  if (!Number.isFinite(result) || result < MIN_MILLIS || result > MAX_MILLIS) {
    return null;
  }
  return new Date(result).toISOString().slice(0, 10);
};

/**
 * The server-local calendar date of `date`.
 */
export const toLocalIsoDate = (date: Date): string =>
  `${String(date.getFullYear())}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}`;

/**
 * First day of the month containing `isoDate`.
 */
export const firstOfMonth = (isoDate: string): string => `${isoDate.slice(0, 7)}-01`;

/**
 * First day of the month after the one containing `isoDate`.
 */
export const firstOfNextMonth = (isoDate: string): string => {
  const year = Number(isoDate.slice(0, 4));
  const month = Number(isoDate.slice(5, 7));
  return month === 12 ? `${String(year + 1)}-01-01` : `${String(year)}-${pad(month + 1)}-01`;
};

/**
 * "YYYY-MM-DD HH:MM" in server-local wall time.
 */
export const formatLocalMinute = (timestamp: Date): string =>
  `${toLocalIsoDate(timestamp)} ${pad(timestamp.getHours())}:${pad(timestamp.getMinutes())}`;
