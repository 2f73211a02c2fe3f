import {
  format,
  getDate,
  getISODay,
  getMonth,
  getYear,
  isValid,
  parse,
} from "date-fns";
import type { CalendarParts } from "../domain/types";

export const WEEKDAY_NAMES = [
  "Monday",
  "Tuesday",
  "Wednesday",
  "Thursday",
  "Friday",
  "Saturday",
  "Sunday",
] as const;

export const MONTH_NAMES = [
  "January",
  "February",
  "March",
  "April",
  "May",
  "June",
  "July",
  "August",
  "September",
  "October",
  "November",
  "December",
] as const;

export const WEEKS_OF_MONTH = [1, 2, 3, 4, 5] as const;

const ISO_FORMAT = "yyyy-MM-dd";
const REFERENCE_DATE = new Date(2000, 0, 1);
const ISO_PATTERN = /^\d{4}-\d{2}-\d{2}$/;
const US_PATTERN = /^(\d{1,2})\/(\d{1,2})\/(\d{4})$/;

/**
 * Normalizes `YYYY-MM-DD` or `MM/DD/YYYY` to ISO. Returns null for anything
 * else, including impossible dates such as 2023-02-29.
 */
export function normalizeDate(raw: string): string | null {
  const value = raw.trim();
  let parsed: Date;
  if (ISO_PATTERN.test(value)) {
    parsed = parse(value, ISO_FORMAT, REFERENCE_DATE);
  } else {
    const us = US_PATTERN.exec(value);
    if (!us) return null;
    const [, month, day, year] = us;
    parsed = parse(
      `${month.padStart(2, "0")}/${day.padStart(2, "0")}/${year}`,
      "MM/dd/yyyy",
      REFERENCE_DATE
    );
  }
  return isValid(parsed) ? format(parsed, ISO_FORMAT) : null;
}

export function isIsoDate(value: string): boolean {
  return ISO_PATTERN.test(value) && normalizeDate(value) === value;
}

export function calendarParts(isoDate: string): CalendarParts {
  const d = parse(isoDate, ISO_FORMAT, REFERENCE_DATE);
  const day = getDate(d);
  return {
    year: getYear(d),
    month: getMonth(d) + 1,
    day,
    weekday: getISODay(d),
    weekOfMonth: Math.ceil(day / 7),
    monthKey: isoDate.slice(0, 7),
  };
}

export function weekdayName(isoWeekday: number): string {
  return WEEKDAY_NAMES[isoWeekday - 1] ?? `Day ${isoWeekday}`;
}

export function monthName(month: number): string {
  return MONTH_NAMES[month - 1] ?? `Month ${month}`;
}

export function weekLabel(week: number): string {
  return `Week ${week}`;
}
