import type { CircadianPhase, Instant, TimeOfDay, Weekday } from "../types.js";
import { formatIsoDate, isoWeek, MONTH_NAMES, WEEKDAY_NAMES } from "./calendarMath.js";

export type ZonedParts = {
  year: number;
  month: number;
  day: number;
  hour: number;
  minute: number;
  second: number;
  weekdayIndex: number; // 0 = Sunday
};

const formatters = new Map<string, Intl.DateTimeFormat>();

function formatterFor(timeZone: string): Intl.DateTimeFormat {
  let fmt = formatters.get(timeZone);
  if (!fmt) {
    fmt = new Intl.DateTimeFormat("en-GB", {
      timeZone,
      hourCycle: "h23",
      year: "numeric",
      month: "2-digit",
      day: "2-digit",
      hour: "2-digit",
      minute: "2-digit",
      second: "2-digit",
      weekday: "long",
    });
    formatters.set(timeZone, fmt);
  }
  return fmt;
}

export function zonedParts(date: Date, timeZone: string): ZonedParts {
  const parts = formatterFor(timeZone).formatToParts(date);
  const get = (type: Intl.DateTimeFormatPartTypes) => Number(parts.find((p) => p.type === type)?.value ?? 0);
  const weekdayName = parts.find((p) => p.type === "weekday")?.value ?? "";
  const weekdayIndex = WEEKDAY_NAMES.findIndex((name) => name === weekdayName);
  return {
    year: get("year"),
    month: get("month"),
    day: get("day"),
    hour: get("hour") % 24,
    minute: get("minute"),
    second: get("second"),
    weekdayIndex: weekdayIndex < 0 ? 0 : weekdayIndex,
  };
}

export function weekdayKey(index: number): Weekday {
  const keys: Weekday[] = ["sunday", "monday", "tuesday", "wednesday", "thursday", "friday", "saturday"];
  return keys[((index % 7) + 7) % 7];
}

export function timeOfDayFor(hour: number): { timeOfDay: TimeOfDay; circadianPhase: CircadianPhase } {
  if (hour >= 5 && hour < 12) return { timeOfDay: "morning", circadianPhase: "peak" };
  if (hour >= 12 && hour < 17) return { timeOfDay: "afternoon", circadianPhase: "normal" };
  if (hour >= 17 && hour < 21) return { timeOfDay: "evening", circadianPhase: "normal" };
  return { timeOfDay: "night", circadianPhase: "low" };
}

export function describeInstant(at: Date, timeZone: string): Instant {
  const p = zonedParts(at, timeZone);
  return {
    at,
    hour: p.hour,
    minute: p.minute,
    minuteOfDay: p.hour * 60 + p.minute,
    weekday: weekdayKey(p.weekdayIndex),
    isoWeek: isoWeek(p.year, p.month, p.day),
    date: formatIsoDate(p.year, p.month, p.day),
    ...timeOfDayFor(p.hour),
  };
}

function pad(n: number): string {
  return String(n).padStart(2, "0");
}

export function minutesToClock(minutes: number): string {
  const m = ((minutes % 1440) + 1440) % 1440;
  return `${pad(Math.floor(m / 60))}:${pad(m % 60)}`;
}

/** "Mon Oct 19, 2026 at 07:52:00" */
export function formatLongTimestamp(at: Date, timeZone: string): string {
  const p = zonedParts(at, timeZone);
  const weekday = WEEKDAY_NAMES[p.weekdayIndex].slice(0, 3);
  const month = MONTH_NAMES[p.month - 1]?.slice(0, 3) ?? "";
  return `${weekday} ${month} ${pad(p.day)}, ${p.year} at ${pad(p.hour)}:${pad(p.minute)}:${pad(p.second)}`;
}

/** "07:52" or "07:52:10" in the given zone */
export function formatClockTime(at: Date, timeZone: string, withSeconds = false): string {
  const p = zonedParts(at, timeZone);
  const base = `${pad(p.hour)}:${pad(p.minute)}`;
  return withSeconds ? `${base}:${pad(p.second)}` : base;
}
