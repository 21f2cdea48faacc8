import fs from "fs";
import { z } from "zod";
import type { CalendarDateInfo, CalendarMonthInfo } from "../types.js";

export const WEEKDAY_NAMES = ["Sunday", "Monday", "Tuesday", "Wednesday", "Thursday", "Friday", "Saturday"] as const;

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

const DAY_MS = 24 * 60 * 60 * 1000;
const HOLIDAYS_PATH = new URL("../../resources/holidays.json", import.meta.url);

const holidayTableSchema = z.record(z.string(), z.record(z.string(), z.string()));

let holidayTable: Record<string, Record<string, string>> | null = null;

function loadHolidayTable(): Record<string, Record<string, string>> {
  if (holidayTable) return holidayTable;
  const raw: unknown = JSON.parse(fs.readFileSync(HOLIDAYS_PATH, "utf-8"));
  holidayTable = holidayTableSchema.parse(raw);
  return holidayTable;
}

/** U.S. federal holidays (observed dates included) for the years the table covers; empty otherwise. */
export function holidaysFor(year: number): Record<string, string> {
  return loadHolidayTable()[String(year)] ?? {};
}

export function isLeapYear(year: number): boolean {
  return year % 4 === 0 && (year % 100 !== 0 || year % 400 === 0);
}

export function daysInYear(year: number): number {
  return isLeapYear(year) ? 366 : 365;
}

export function daysInMonth(year: number, month: number): number {
  if (month === 2) return isLeapYear(year) ? 29 : 28;
  return [4, 6, 9, 11].includes(month) ? 30 : 31;
}

function pad(n: number, width = 2): string {
  return String(n).padStart(width, "0");
}

export function formatIsoDate(year: number, month: number, day: number): string {
  return `${pad(year, 4)}-${pad(month)}-${pad(day)}`;
}

function assertDate(year: number, month: number, day: number) {
  if (!Number.isInteger(year) || !Number.isInteger(month) || !Number.isInteger(day)) {
    throw new RangeError(`Invalid date: ${year}-${month}-${day}`);
  }
  if (month < 1 || month > 12 || day < 1 || day > daysInMonth(year, month)) {
    throw new RangeError(`Invalid date: ${formatIsoDate(year, month, day)}`);
  }
}

function utcDate(year: number, month: number, day: number): Date {
  const d = new Date(0);
  d.setUTCFullYear(year, month - 1, day);
  d.setUTCHours(0, 0, 0, 0);
  return d;
}

/** 0 = Sunday … 6 = Saturday */
export function weekdayIndex(year: number, month: number, day: number): number {
  return utcDate(year, month, day).getUTCDay();
}

export function weekdayOf(year: number, month: number, day: number): string {
  return WEEKDAY_NAMES[weekdayIndex(year, month, day)];
}

/** ISO-8601 week number: weeks start Monday, week 1 holds the year's first Thursday. */
export function isoWeek(year: number, month: number, day: number): number {
  const target = utcDate(year, month, day);
  const dayNr = (target.getUTCDay() + 6) % 7;
  target.setUTCDate(target.getUTCDate() - dayNr + 3);

  const firstThursday = utcDate(target.getUTCFullYear(), 1, 4);
  const firstDayNr = (firstThursday.getUTCDay() + 6) % 7;
  firstThursday.setUTCDate(firstThursday.getUTCDate() - firstDayNr + 3);

  return 1 + Math.round((target.getTime() - firstThursday.getTime()) / (7 * DAY_MS));
}

export function dateInfo(year: number, month: number, day: number): CalendarDateInfo {
  assertDate(year, month, day);
  const date = formatIsoDate(year, month, day);
  const weekday = weekdayIndex(year, month, day);
  const holidayName = holidaysFor(year)[date] ?? null;

  return {
    date,
    year,
    month,
    day,
    weekday: WEEKDAY_NAMES[weekday],
    week_number: isoWeek(year, month, day),
    is_weekend: weekday === 0 || weekday === 6,
    is_holiday: holidayName !== null,
    holiday_name: holidayName,
  };
}

export function monthInfo(year: number, month: number): CalendarMonthInfo {
  assertDate(year, month, 1);
  const last = daysInMonth(year, month);
  return {
    month,
    name: MONTH_NAMES[month - 1],
    days_in_month: last,
    first_day: formatIsoDate(year, month, 1),
    last_day: formatIsoDate(year, month, last),
    first_weekday: weekdayOf(year, month, 1),
  };
}

const ISO_DATE = /^(\d{4})-(\d{2})-(\d{2})$/;

/** "YYYY-MM-DD" naming a real calendar day, or null. */
export function parseIsoDate(value: string): { year: number; month: number; day: number } | null {
  const match = ISO_DATE.exec(value.trim());
  if (!match) return null;
  const year = Number(match[1]);
  const month = Number(match[2]);
  const day = Number(match[3]);
  if (month < 1 || month > 12 || day < 1 || day > daysInMonth(year, month)) return null;
  return { year, month, day };
}

const RFC3339 =
  /^(\d{4})-(\d{2})-(\d{2})[Tt](\d{2}):(\d{2}):(\d{2})(?:\.(\d+))?([Zz]|[+-]\d{2}:\d{2})$/;

/**
 * Strict RFC3339 parse. Fractional seconds of any length are accepted and truncated to
 * milliseconds. Returns null for anything else, including date-only strings.
 */
export function parseRfc3339(value: string): Date | null {
  const match = RFC3339.exec(value.trim());
  if (!match) return null;
  const [, y, mo, d, h, mi, s, frac, zone] = match;
  const year = Number(y);
  const month = Number(mo);
  const day = Number(d);
  const hour = Number(h);
  const minute = Number(mi);
  const second = Number(s);

  if (month < 1 || month > 12 || day < 1 || day > daysInMonth(year, month)) return null;
  if (hour > 23 || minute > 59 || second > 59) return null;

  let offsetMinutes = 0;
  if (zone !== "Z" && zone !== "z") {
    const sign = zone.startsWith("-") ? -1 : 1;
    const oh = Number(zone.slice(1, 3));
    const om = Number(zone.slice(4, 6));
    if (oh > 23 || om > 59) return null;
    offsetMinutes = sign * (oh * 60 + om);
  }

  const ms = frac ? Number(frac.slice(0, 3).padEnd(3, "0")) : 0;
  const base = utcDate(year, month, day).getTime();
  const epoch = base + ((hour * 60 + minute - offsetMinutes) * 60 + second) * 1000 + ms;
  return new Date(epoch);
}
