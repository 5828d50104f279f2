import { createExportError } from "../errors";

// RFC 3339 date-time: full-date "T" full-time, with fraction and offset
const RFC3339_PATTERN =
  /^(\d{4})-(\d{2})-(\d{2})T(\d{2}):(\d{2}):(\d{2})(\.\d+)?(Z|([+-])(\d{2}):(\d{2}))$/;

function daysInMonth(year: number, month: number): number {
  // Leap years repeat every 400 years; shifting keeps Date.UTC out of its 0-99 quirk
  return new Date(Date.UTC(2000 + (year % 400), month, 0)).getUTCDate();
}

function parseError(timestamp: string, reason: string): Error {
  return createExportError(`Cannot parse "${timestamp}" as RFC 3339: ${reason}`, "TIMESTAMP_PARSE");
}

/**
 * Parse an RFC 3339 timestamp into epoch milliseconds.
 */
export function parseTimestamp(timestamp: string): number {
  const match = RFC3339_PATTERN.exec(timestamp);
  if (!match) {
    throw parseError(timestamp, "not a date-time");
  }

  const [, y, mo, d, h, mi, s, fraction, zone, sign, oh, om] = match;
  const year = Number(y);
  const month = Number(mo);
  const day = Number(d);
  const hour = Number(h);
  const minute = Number(mi);
  const second = Number(s);

  if (month < 1 || month > 12) throw parseError(timestamp, "month out of range");
  if (day < 1 || day > daysInMonth(year, month)) throw parseError(timestamp, "day out of range");
  if (hour > 23) throw parseError(timestamp, "hour out of range");
  if (minute > 59) throw parseError(timestamp, "minute out of range");
  if (second > 59) throw parseError(timestamp, "second out of range");

  let offsetMinutes = 0;
  if (zone !== "Z") {
    const offsetHours = Number(oh);
    const offsetMins = Number(om);
    if (offsetHours > 23 || offsetMins > 59) throw parseError(timestamp, "time zone offset out of range");
    offsetMinutes = (sign === "-" ? -1 : 1) * (offsetHours * 60 + offsetMins);
  }

  const date = new Date(0);
  date.setUTCFullYear(year, month - 1, day);
  date.setUTCHours(hour, minute, second, 0);
  const millis = fraction ? Math.floor(Number(`0${fraction}`) * 1000) : 0;

  return date.getTime() + millis - offsetMinutes * 60_000;
}

/**
 * Format epoch milliseconds as RFC 3339 in UTC, fractional seconds dropped.
 */
export function formatTimestamp(epochMs: number): string {
  const wholeSeconds = Math.floor(epochMs / 1000) * 1000;
  return new Date(wholeSeconds).toISOString().replace(/\.\d{3}Z$/, "Z");
}

/**
 * Convert an RFC 3339 timestamp to UTC and move it by offsetMs.
 * "2024-09-07T10:00:00Z" + 30_000 → "2024-09-07T10:00:30Z"
 */
export function shiftTimestamp(timestamp: string, offsetMs: number): string {
  return formatTimestamp(parseTimestamp(timestamp) + offsetMs);
}
