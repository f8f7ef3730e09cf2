/**
 * Calendar helpers for date-only values.
 *
 * All functions take and return `YYYY-MM-DD` strings and work in UTC,
 * so a post date never shifts with the host time zone.
 * Inputs are assumed valid; check untrusted values with `isIsoDate` first.
 */

import type { IsoDate } from "./financial.js";

const ISO_DATE_PATTERN = /^(\d{4})-(\d{2})-(\d{2})$/;

export interface CalendarDate {
  readonly year: number;
  readonly month: number; // 1-12
  readonly day: number;
}

/**
 * Number of days in a month (1-12), leap years included.
 */
export function daysInMonth(year: number, month: number): number {
  return new Date(Date.UTC(year, month, 0)).getUTCDate();
}

export function formatIsoDate(year: number, month: number, day: number): IsoDate {
  return `${String(year).padStart(4, "0")}-${String(month).padStart(2, "0")}-${String(day).padStart(2, "0")}`;
}

/**
 * Split a date string into its parts.
 * Throws RangeError if the value is not a real calendar date.
 */
export function parseIsoDate(value: IsoDate): CalendarDate {
  const match = ISO_DATE_PATTERN.exec(value);
  if (match === null) {
    throw new RangeError(`Invalid date: "${value}"`);
  }
  const year = Number(match[1]);
  const month = Number(match[2]);
  const day = Number(match[3]);
  if (month < 1 || month > 12 || day < 1 || day > daysInMonth(year, month)) {
    throw new RangeError(`Invalid date: "${value}"`);
  }
  return { year, month, day };
}

/** The UTC calendar date of a Date instance. */
export function toIsoDate(date: Date): IsoDate {
  return formatIsoDate(date.getUTCFullYear(), date.getUTCMonth() + 1, date.getUTCDate());
}

export function firstDayOfMonth(date: IsoDate): IsoDate {
  const { year, month } = parseIsoDate(date);
  return formatIsoDate(year, month, 1);
}

export function lastDayOfMonth(date: IsoDate): IsoDate {
  const { year, month } = parseIsoDate(date);
  return formatIsoDate(year, month, daysInMonth(year, month));
}

/** First day of the calendar month before `date`'s month. */
export function previousMonth(date: IsoDate): IsoDate {
  const { year, month } = parseIsoDate(date);
  return month === 1 ? formatIsoDate(year - 1, 12, 1) : formatIsoDate(year, month - 1, 1);
}

export function startOfYear(date: IsoDate): IsoDate {
  return formatIsoDate(parseIsoDate(date).year, 1, 1);
}

/** "2024-03-05" → "20240305" */
export function compactDate(date: IsoDate): string {
  parseIsoDate(date);
  return date.replace(/-/g, "");
}
