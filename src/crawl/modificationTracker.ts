const CALENDAR_DATE_PATTERN = /^(\d{4})-(\d{1,2})-(\d{1,2})$/;

export class DateParseError extends Error {
  constructor(value: string) {
    super(`Unparsable date (expected YYYY-MM-DD): "${value}"`);
    this.name = "DateParseError";
  }
}

/** Days since the epoch for a `YYYY-MM-DD` calendar date. */
export function parseCalendarDate(value: string): number {
  const match = value.trim().match(CALENDAR_DATE_PATTERN);
  if (!match) {
    throw new DateParseError(value);
  }

  const year = Number.parseInt(match[1], 10);
  const month = Number.parseInt(match[2], 10);
  const day = Number.parseInt(match[3], 10);
  const date = new Date(Date.UTC(year, month - 1, day));
  if (date.getUTCFullYear() !== year || date.getUTCMonth() !== month - 1 || date.getUTCDate() !== day) {
    throw new DateParseError(value);
  }

  return date.getTime() / 86_400_000;
}

/**
 * True when the document has never been stored, without looking at the fetched date. Otherwise true
 * only when the repository date is strictly later than the stored one; throws `DateParseError` when
 * either date is unparsable.
 */
export function needsRefresh(storedDate: string | undefined, fetchedDate: string): boolean {
  if (storedDate === undefined) {
    return true;
  }
  return parseCalendarDate(fetchedDate) > parseCalendarDate(storedDate);
}
