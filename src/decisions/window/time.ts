import { TimeFormatError } from "../../errors.js";
import { isNumber } from "../utils.js";

export const NAIVE_DATETIME_NOTE = "Naive ISO datetime provided; assuming UTC.";

const ISO_PATTERN =
  /^(\d{4})-(\d{2})-(\d{2})(?:[T ](\d{2}):(\d{2})(?::(\d{2})(?:[.,](\d+))?)?\s*(Z|[+-]\d{2}(?::?\d{2})?)?)?$/i;

function parseOffsetSeconds(raw: string): number {
  if (raw.toUpperCase() === "Z") {
    return 0;
  }
  const sign = raw.startsWith("-") ? -1 : 1;
  const digits = raw.slice(1).replace(":", "");
  const hours = Number(digits.slice(0, 2));
  const minutes = digits.length > 2 ? Number(digits.slice(2, 4)) : 0;
  return sign * (hours * 3600 + minutes * 60);
}

function parseIsoSeconds(value: string, notes?: string[]): number | null {
  const match = ISO_PATTERN.exec(value.trim());
  if (!match) {
    return null;
  }
  const [, year, month, day, hour, minute, second, fraction, offset] = match;
  const y = Number(year);
  const mo = Number(month);
  const d = Number(day);
  const h = hour ? Number(hour) : 0;
  const mi = minute ? Number(minute) : 0;
  const s = second ? Number(second) : 0;
  if (mo < 1 || mo > 12 || h > 23 || mi > 59 || s > 59) {
    return null;
  }
  const date = new Date(0);
  date.setUTCFullYear(y, mo - 1, d);
  date.setUTCHours(h, mi, s, 0);
  if (date.getUTCFullYear() !== y || date.getUTCMonth() !== mo - 1 || date.getUTCDate() !== d) {
    return null;
  }
  if (offset === undefined) {
    notes?.push(NAIVE_DATETIME_NOTE);
  }
  const offsetSeconds = offset === undefined ? 0 : parseOffsetSeconds(offset);
  const fractionSeconds = fraction ? Number(`0.${fraction}`) : 0;
  return date.getTime() / 1000 + fractionSeconds - offsetSeconds;
}

/**
 * Epoch seconds from a number (taken as epoch seconds) or an ISO-8601 string.
 * Offset-naive strings are read as UTC and leave a note in `notes`.
 */
export function parseTimeValue(value: unknown, notes?: string[]): number {
  if (isNumber(value)) {
    return value;
  }
  if (typeof value !== "string") {
    const kind = value === null ? "null" : Array.isArray(value) ? "array" : typeof value;
    throw new TimeFormatError(`Unsupported time value type: ${kind}`);
  }
  const parsed = parseIsoSeconds(value, notes);
  if (parsed === null) {
    throw new TimeFormatError(`Invalid ISO datetime: ${JSON.stringify(value)}`);
  }
  return parsed;
}

export function tryParseTimeValue(value: unknown, notes?: string[]): number | null {
  if (isNumber(value)) {
    return value;
  }
  if (typeof value !== "string") {
    return null;
  }
  return parseIsoSeconds(value, notes);
}
