// impactscore-backend/src/services/dateRange.ts

import { format, isValid, lastDayOfMonth, parse, subDays, subMonths } from "date-fns";
import { InvalidRangeError } from "../types/errors";

export const DATE_FORMAT = "yyyy-MM-dd";
export const DEFAULT_WINDOW_DAYS = 90;
export const MAX_WINDOW_DAYS = 365;
export const MAX_WINDOW_MONTHS = 12;
export const MIN_YEAR = 1000;

export type DateRangeKind =
  | "default"
  | "quarter"
  | "half"
  | "year"
  | "relative"
  | "explicit";

export interface DateRange {
  start: string;   // YYYY-MM-DD, inclusive
  end: string;     // YYYY-MM-DD, inclusive
  kind: DateRangeKind;
}

const QUARTER = /^q([1-4])(?:\s+(\d{4}))?$/;
const QUARTER_YEAR_FIRST = /^(\d{4})[-\s]q([1-4])$/;
const HALF = /^h([12])(?:\s+(\d{4}))?$/;
const HALF_YEAR_FIRST = /^(\d{4})[-\s]h([12])$/;
const RELATIVE = /^last\s+(\d+)\s+(days?|months?)$/;
const YEAR = /^(\d{4})$/;
const EXPLICIT = /^(\d{4}-\d{2}-\d{2})\s*(?:to|\.\.)\s*(\d{4}-\d{2}-\d{2})$/;

function fmt(d: Date): string {
  return format(d, DATE_FORMAT);
}

function monthSpan(year: number, firstMonth: number, months: number): [string, string] {
  const start = new Date(year, firstMonth, 1);
  const end = lastDayOfMonth(new Date(year, firstMonth + months - 1, 1));
  return [fmt(start), fmt(end)];
}

// Date treats years 0-99 as 1900-1999
function parseYear(token: string, digits: string): number {
  const year = Number(digits);
  if (year < MIN_YEAR) {
    throw new InvalidRangeError(token, `year must be ${MIN_YEAR} or later`);
  }
  return year;
}

function quarter(year: number, q: number): DateRange {
  const [start, end] = monthSpan(year, (q - 1) * 3, 3);
  return { start, end, kind: "quarter" };
}

function half(year: number, h: number): DateRange {
  const [start, end] = monthSpan(year, (h - 1) * 6, 6);
  return { start, end, kind: "half" };
}

/**
 * Strict calendar date: "2025-02-30" is rejected rather than rolled over.
 */
function parseCalendarDate(token: string, value: string, now: Date): Date {
  const d = parse(value, DATE_FORMAT, now);
  if (!isValid(d) || fmt(d) !== value) {
    throw new InvalidRangeError(token, `"${value}" is not a calendar date`);
  }
  if (d.getFullYear() < MIN_YEAR) {
    throw new InvalidRangeError(token, `year must be ${MIN_YEAR} or later`);
  }
  return d;
}

/**
 * Normalizes a named or explicit window into inclusive calendar dates.
 * `now` is the invocation date; relative windows end on it.
 */
export function resolveDateRange(token: string | null | undefined, now: Date): DateRange {
  const raw = (token ?? "").trim();
  const t = raw.toLowerCase().replace(/\s+/g, " ");
  const today = fmt(now);
  const currentYear = now.getFullYear();

  if (!t) {
    return { start: fmt(subDays(now, DEFAULT_WINDOW_DAYS)), end: today, kind: "default" };
  }

  let m = QUARTER.exec(t);
  if (m) return quarter(m[2] ? parseYear(raw, m[2]) : currentYear, Number(m[1]));

  m = QUARTER_YEAR_FIRST.exec(t);
  if (m) return quarter(parseYear(raw, m[1]), Number(m[2]));

  m = HALF.exec(t);
  if (m) return half(m[2] ? parseYear(raw, m[2]) : currentYear, Number(m[1]));

  m = HALF_YEAR_FIRST.exec(t);
  if (m) return half(parseYear(raw, m[1]), Number(m[2]));

  m = RELATIVE.exec(t);
  if (m) {
    const n = Number(m[1]);
    if (m[2].startsWith("day")) {
      if (n < 1 || n > MAX_WINDOW_DAYS) {
        throw new InvalidRangeError(raw, `days must be between 1 and ${MAX_WINDOW_DAYS}`);
      }
      return { start: fmt(subDays(now, n)), end: today, kind: "relative" };
    }
    if (n < 1 || n > MAX_WINDOW_MONTHS) {
      throw new InvalidRangeError(raw, `months must be between 1 and ${MAX_WINDOW_MONTHS}`);
    }
    return { start: fmt(subMonths(now, n)), end: today, kind: "relative" };
  }

  m = YEAR.exec(t);
  if (m) {
    const [start, end] = monthSpan(parseYear(raw, m[1]), 0, 12);
    return { start, end, kind: "year" };
  }

  m = EXPLICIT.exec(t);
  if (m) {
    const start = parseCalendarDate(raw, m[1], now);
    const end = parseCalendarDate(raw, m[2], now);
    if (start.getTime() > end.getTime()) {
      throw new InvalidRangeError(raw, "start date is after end date");
    }
    return { start: m[1], end: m[2], kind: "explicit" };
  }

  throw new InvalidRangeError(raw, "unrecognized range format");
}

/**
 * True when the ISO timestamp's calendar date falls inside the range.
 */
export function isWithinRange(timestamp: string, range: DateRange): boolean {
  const day = timestamp.slice(0, 10);
  return day >= range.start && day <= range.end;
}
