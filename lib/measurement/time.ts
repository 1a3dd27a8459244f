import {
  CalendarDate,
  CalendarDateTime,
  ZonedDateTime,
  toZoned,
} from "@internationalized/date";
import { ParseError } from "../errors";

/**
 * Signed duration in milliseconds. Branded so a duration cannot be mixed up
 * with a plain count or an epoch timestamp.
 */
export type Milliseconds = number & { readonly __brand: "Milliseconds" };

export function milliseconds(value: number): Milliseconds {
  return value as Milliseconds;
}

export function seconds(value: number): Milliseconds {
  return milliseconds(value * 1000);
}

export function minutes(value: number): Milliseconds {
  return milliseconds(value * 60 * 1000);
}

/**
 * Signed time from `from` to `to`; negative when `to` is earlier
 */
export function durationBetween(from: ZonedDateTime, to: ZonedDateTime): Milliseconds {
  return milliseconds(to.toDate().getTime() - from.toDate().getTime());
}

// Site-local formats used by the API, e.g. "2023-11-09 10:28:56" and "2023-11-09"
const SITE_DATE_TIME_PATTERN = /^(\d{4})-(\d{2})-(\d{2}) (\d{2}):(\d{2}):(\d{2})$/;
const SITE_DATE_PATTERN = /^(\d{4})-(\d{2})-(\d{2})$/;

function requireString(raw: unknown, field: string): string {
  if (raw === undefined || raw === null) {
    throw new ParseError(field, "value is missing");
  }
  if (typeof raw !== "string") {
    throw new ParseError(field, `expected a string, got ${JSON.stringify(raw)}`);
  }
  return raw;
}

/**
 * Parse a "YYYY-MM-DD" string to CalendarDate.
 *
 * CalendarDate clamps out-of-range parts (2023-02-30 becomes 2023-02-28), so
 * the result is compared against the input and rejected when it moved.
 */
export function parseSiteDate(raw: unknown, field: string): CalendarDate {
  const str = requireString(raw, field);
  const match = SITE_DATE_PATTERN.exec(str);
  if (!match) {
    throw new ParseError(field, `expected YYYY-MM-DD, got "${str}"`);
  }

  const [year, month, day] = match.slice(1).map(Number);
  const date = new CalendarDate(year, month, day);
  if (date.year !== year || date.month !== month || date.day !== day) {
    throw new ParseError(field, `not a calendar date: "${str}"`);
  }
  return date;
}

/**
 * Parse a site-local "YYYY-MM-DD HH:MM:SS" string into a ZonedDateTime in
 * the site's time zone
 */
export function parseSiteDateTime(
  raw: unknown,
  timeZone: string,
  field: string,
): ZonedDateTime {
  const str = requireString(raw, field);
  const match = SITE_DATE_TIME_PATTERN.exec(str);
  if (!match) {
    throw new ParseError(field, `expected YYYY-MM-DD HH:MM:SS, got "${str}"`);
  }

  const [year, month, day, hour, minute, second] = match.slice(1).map(Number);
  // CalendarDateTime keeps out-of-range clock fields and toZoned rolls them over
  if (hour > 23 || minute > 59 || second > 59) {
    throw new ParseError(field, `not a valid date and time: "${str}"`);
  }

  const local = new CalendarDateTime(year, month, day, hour, minute, second);
  if (
    local.year !== year ||
    local.month !== month ||
    local.day !== day ||
    local.hour !== hour ||
    local.minute !== minute ||
    local.second !== second
  ) {
    throw new ParseError(field, `not a valid date and time: "${str}"`);
  }
  return toZoned(local, timeZone);
}

function pad2(value: number): string {
  return String(value).padStart(2, "0");
}

/**
 * Format a CalendarDate as YYYY-MM-DD
 */
export function formatDateISO(date: CalendarDate): string {
  return `${date.year}-${pad2(date.month)}-${pad2(date.day)}`;
}

/**
 * Format as the API's site-local "YYYY-MM-DD HH:MM:SS". A ZonedDateTime is
 * written in its own zone's wall-clock time.
 */
export function formatSiteDateTime(dateTime: CalendarDateTime | ZonedDateTime): string {
  const time = `${pad2(dateTime.hour)}:${pad2(dateTime.minute)}:${pad2(dateTime.second)}`;
  return `${dateTime.year}-${pad2(dateTime.month)}-${pad2(dateTime.day)} ${time}`;
}
