import type { BaseCalendar, CalendarDateInfo, CalendarMonthInfo, TemporalEnv } from "../types.js";
import { UsageError } from "../errors.js";
import { dateInfo, daysInMonth, daysInYear, monthInfo } from "../utils/calendarMath.js";
import { describeInstant } from "../utils/zonedTime.js";
import { saveMonthlyCalendars, saveYearlyCalendar } from "../stores/calendarStore.js";

export const MIN_YEAR = 1000;
export const MAX_YEAR = 9999;

export function assertCalendarYear(year: number): void {
  if (!Number.isInteger(year) || year < MIN_YEAR || year > MAX_YEAR) {
    throw new UsageError(`Invalid year: ${year} (expected ${MIN_YEAR}-${MAX_YEAR})`);
  }
}

function deepFreeze<T extends object>(value: T): Readonly<T> {
  const children: unknown[] = Object.values(value);
  for (const child of children) {
    if (child && typeof child === "object" && !Object.isFrozen(child)) deepFreeze(child);
  }
  return Object.freeze(value);
}

/** Every date of the year plus the twelve month summaries. The result is frozen. */
export function buildCalendar(year: number, opts: { created: string; timeZone: string }): BaseCalendar {
  assertCalendarYear(year);
  const dates: Record<string, CalendarDateInfo> = {};
  const months: Record<string, CalendarMonthInfo> = {};

  for (let month = 1; month <= 12; month++) {
    months[String(month)] = monthInfo(year, month);
    for (let day = 1; day <= daysInMonth(year, month); day++) {
      const info = dateInfo(year, month, day);
      dates[info.date] = info;
    }
  }

  return deepFreeze({
    year,
    metadata: {
      created: opts.created,
      timezone: opts.timeZone,
      observes_holidays: ["US Federal"],
      total_days: daysInYear(year),
    },
    dates,
    months,
  });
}

export function splitCalendarByMonth(calendar: BaseCalendar): BaseCalendar[] {
  const monthly: BaseCalendar[] = [];
  for (let month = 1; month <= 12; month++) {
    const info = calendar.months[String(month)];
    const dates: Record<string, CalendarDateInfo> = {};
    for (const [key, entry] of Object.entries(calendar.dates)) {
      if (entry.month === month) dates[key] = entry;
    }
    monthly.push(
      deepFreeze({
        year: calendar.year,
        metadata: { ...calendar.metadata, total_days: info.days_in_month },
        dates,
        months: { [String(month)]: info },
      })
    );
  }
  return monthly;
}

/** One-shot: compute, then persist. Write failures surface as CalendarWriteError and are not retried. */
export async function generateCalendar(year: number, monthly: boolean, env: TemporalEnv): Promise<string[]> {
  const created = describeInstant(env.clock.now(), env.timeZone).date;
  const calendar = buildCalendar(year, { created, timeZone: env.timeZone });
  if (monthly) {
    return saveMonthlyCalendars(env, splitCalendarByMonth(calendar));
  }
  return [await saveYearlyCalendar(env, calendar)];
}
