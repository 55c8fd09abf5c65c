const ISO_DATE_PATTERN = /^(\d{4})-(\d{2})-(\d{2})$/;
const MS_PER_DAY = 24 * 60 * 60 * 1000;
const MAX_ISO_DATE_MS = Date.UTC(9999, 11, 31);

/** Calendar date as an ISO `YYYY-MM-DD` string. */
export type IsoDate = string;

function toUtcMs(date: IsoDate): number {
  const match = ISO_DATE_PATTERN.exec(date);
  if (!match) {
    throw new RangeError(`Invalid ISO date: ${date}`);
  }
  return Date.UTC(Number(match[1]), Number(match[2]) - 1, Number(match[3]));
}

export function isIsoDate(value: unknown): value is IsoDate {
  if (typeof value !== 'string') return false;
  const match = ISO_DATE_PATTERN.exec(value);
  if (!match) return false;
  const parsed = new Date(Date.UTC(Number(match[1]), Number(match[2]) - 1, Number(match[3])));
  // Rejects rollovers such as 2024-02-30.
  return parsed.toISOString().slice(0, 10) === value;
}

/**
 * Shifts a calendar date by whole days. Arithmetic runs on UTC midnight so
 * DST transitions never move the result.
 */
export function addDays(date: IsoDate, days: number): IsoDate {
  return new Date(toUtcMs(date) + days * MS_PER_DAY).toISOString().slice(0, 10);
}

/** False when moving `date` forward by `days` would leave the four-digit year range. */
export function canAddDays(date: IsoDate, days: number): boolean {
  const shifted = toUtcMs(date) + days * MS_PER_DAY;
  return Number.isFinite(shifted) && shifted <= MAX_ISO_DATE_MS;
}

/** Whole days from `from` to `to` (negative when `to` is earlier). */
export function diffInDays(from: IsoDate, to: IsoDate): number {
  return Math.round((toUtcMs(to) - toUtcMs(from)) / MS_PER_DAY);
}

export function compareIsoDates(a: IsoDate, b: IsoDate): number {
  if (a === b) return 0;
  return a < b ? -1 : 1;
}

export function todayIsoDate(now: Date = new Date()): IsoDate {
  return now.toISOString().slice(0, 10);
}
