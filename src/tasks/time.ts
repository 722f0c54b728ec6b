import { DateTime } from "luxon";

const TIME_PATTERN = /^\d{1,2}:\d{2}$/;

const DATE_FORMAT = "yyyy-MM-dd";

/**
 * Checks the shape of a time string ("H:MM" or "HH:MM") without checking its range.
 */
export function isTimeString(value: string): boolean {
  return TIME_PATTERN.test(value);
}

/**
 * Parses "H:MM"/"HH:MM" into hour and minute.
 * Returns null for anything luxon rejects, e.g. "25:00".
 */
export function parseClockTime(value: string): { hour: number; minute: number } | null {
  if (!isTimeString(value)) {
    return null;
  }

  const dt = DateTime.fromFormat(value, "H:mm");
  if (!dt.isValid) {
    return null;
  }

  return { hour: dt.hour, minute: dt.minute };
}

/**
 * Returns the value if it is a real yyyy-MM-dd calendar date, null otherwise.
 */
export function parseIsoDate(value: string): string | null {
  const dt = DateTime.fromFormat(value, DATE_FORMAT);
  return dt.isValid ? dt.toFormat(DATE_FORMAT) : null;
}

/**
 * Local calendar date of a DateTime as yyyy-MM-dd.
 */
export function toIsoDate(dt: DateTime): string {
  return dt.toFormat(DATE_FORMAT);
}

/**
 * Formats the HH:mm portion of a DateTime.
 */
export function formatTimeOnly(dt: DateTime): string {
  return dt.toFormat("HH:mm");
}

/**
 * Gets the current time on the host clock.
 */
export function getNow(): DateTime {
  return DateTime.local();
}
