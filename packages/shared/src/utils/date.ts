import { isValid, parseISO } from 'date-fns';

const CALENDAR_DATE_RE = /^\d{4}-\d{2}-\d{2}/;

/**
 * Normalize a Date or ISO-8601 string to a YYYY-MM-DD calendar date.
 * Date objects are read in UTC (the database connection runs in UTC) so the
 * result does not depend on the host time zone. Returns null for anything
 * that is not a valid date.
 */
export function toCalendarDate(value: Date | string): string | null {
  if (value instanceof Date) {
    return isValid(value) ? value.toISOString().slice(0, 10) : null;
  }

  const trimmed = value.trim();
  if (!CALENDAR_DATE_RE.test(trimmed)) return null;
  if (!isValid(parseISO(trimmed))) return null;
  return trimmed.slice(0, 10);
}
