/**
 * Date decoding for GS1 date fields.
 *
 * Goals:
 * - Avoid JS Date overflow bugs (e.g. month 13 silently rolling into next year)
 * - Resolve two-digit years through a century pivot instead of guessing
 * - Support YYMMDD, YYMMD0 (day 00 = unspecified), YYYYMMDD and YYMMDDHH[MM]
 */
import type { DateFormat } from '../gs1/types';

export const DEFAULT_CENTURY_PIVOT = 51;

export interface DecodedDate {
  year: number;
  month: number;
  day: number;
  hour?: number;
  minute?: number;
  dayUnspecified: boolean;
}

export type DateDecodeOutcome = { ok: true; date: DecodedDate } | { ok: false; error: string };

export function resolveCentury(yy: number, pivot: number = DEFAULT_CENTURY_PIVOT): number {
  return yy >= pivot ? 1900 + yy : 2000 + yy;
}

export function daysInMonth(year: number, month1to12: number): number {
  // Day 0 of the next month is the last day of this one
  return new Date(Date.UTC(year, month1to12, 0)).getUTCDate();
}

const EXPECTED_LENGTH: Record<DateFormat, string> = {
  YYMMDD: '6 digits',
  YYMMD0: '6 digits',
  YYYYMMDD: '8 digits',
  YYMMDDHH: '8 or 10 digits',
};

const hasExpectedLength = (format: DateFormat, length: number) => {
  switch (format) {
    case 'YYYYMMDD':
      return length === 8;
    case 'YYMMDDHH':
      return length === 8 || length === 10;
    default:
      return length === 6;
  }
};

export function decodeGs1Date(
  value: string,
  format: DateFormat,
  pivot: number = DEFAULT_CENTURY_PIVOT
): DateDecodeOutcome {
  if (!/^\d+$/.test(value)) return { ok: false, error: 'Date must be numeric' };
  if (!hasExpectedLength(format, value.length)) {
    return { ok: false, error: `${format} date must be ${EXPECTED_LENGTH[format]}, got ${value.length}` };
  }

  const fullYear = format === 'YYYYMMDD';
  const year = fullYear ? Number(value.slice(0, 4)) : resolveCentury(Number(value.slice(0, 2)), pivot);
  const rest = fullYear ? value.slice(4) : value.slice(2);
  const month = Number(rest.slice(0, 2));
  let day = Number(rest.slice(2, 4));

  if (month < 1 || month > 12) return { ok: false, error: `Invalid month: ${month}` };

  const lastDay = daysInMonth(year, month);
  let dayUnspecified = false;
  if (day === 0 && format === 'YYMMD0') {
    dayUnspecified = true;
    day = lastDay;
  } else if (day < 1 || day > 31) {
    return { ok: false, error: `Invalid day: ${day}` };
  } else if (day > lastDay) {
    return { ok: false, error: `Day ${day} invalid for month ${month} in year ${year}` };
  }

  const date: DecodedDate = { year, month, day, dayUnspecified };
  if (format === 'YYMMDDHH') {
    const hour = Number(rest.slice(4, 6));
    if (hour > 23) return { ok: false, error: `Invalid hour: ${hour}` };
    date.hour = hour;
    if (rest.length > 6) {
      const minute = Number(rest.slice(6, 8));
      if (minute > 59) return { ok: false, error: `Invalid minute: ${minute}` };
      date.minute = minute;
    }
  }
  return { ok: true, date };
}

const pad = (n: number, width = 2) => String(n).padStart(width, '0');

export function toIsoDateOnly(date: DecodedDate): string {
  return `${pad(date.year, 4)}-${pad(date.month)}-${pad(date.day)}`;
}

export function toIsoDateTime(date: DecodedDate): string {
  return `${toIsoDateOnly(date)}T${pad(date.hour ?? 0)}:${pad(date.minute ?? 0)}`;
}

/** DD/MM/YYYY, or XX/MM/YYYY when the label left the day unspecified */
export function toDisplayDate(date: DecodedDate): string {
  const day = date.dayUnspecified ? 'XX' : pad(date.day);
  return `${day}/${pad(date.month)}/${pad(date.year, 4)}`;
}
