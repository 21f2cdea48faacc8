import fs from "fs/promises";
import path from "path";
import { z } from "zod";
import type { BaseCalendar, CalendarDateInfo, CalendarMonthInfo, TemporalEnv } from "../types.js";
import { CalendarWriteError, isMissingFile } from "../errors.js";
import { formatIsoDate, MONTH_NAMES } from "../utils/calendarMath.js";

const dateInfoSchema = z.object({
  date: z.string(),
  year: z.number().int(),
  month: z.number().int(),
  day: z.number().int(),
  weekday: z.string(),
  week_number: z.number().int(),
  is_weekend: z.boolean().default(false),
  is_holiday: z.boolean(),
  holiday_name: z.string().nullable().default(null),
});

const monthInfoSchema = z.object({
  month: z.number().int(),
  name: z.string(),
  days_in_month: z.number().int(),
  first_day: z.string(),
  last_day: z.string(),
  first_weekday: z.string(),
});

const calendarSchema = z.object({
  year: z.number().int(),
  metadata: z.object({
    created: z.string(),
    timezone: z.string(),
    observes_holidays: z.array(z.string()),
    total_days: z.number().int(),
  }),
  dates: z.record(z.string(), dateInfoSchema),
  months: z.record(z.string(), monthInfoSchema),
});

export function calendarBaseDir(env: TemporalEnv): string {
  return path.join(env.dataDir, "calendar", "base");
}

export function yearlyCalendarPath(env: TemporalEnv, year: number): string {
  return path.join(calendarBaseDir(env), `${year}.json`);
}

export function monthlyCalendarPath(env: TemporalEnv, year: number, month: number): string {
  const name = MONTH_NAMES[month - 1].toLowerCase();
  return path.join(calendarBaseDir(env), String(year), `${String(month).padStart(2, "0")}-${name}.json`);
}

async function writeJson(file: string, payload: BaseCalendar): Promise<void> {
  try {
    await fs.mkdir(path.dirname(file), { recursive: true });
    await fs.writeFile(file, JSON.stringify(payload, null, 2), "utf-8");
  } catch (err) {
    throw new CalendarWriteError(file, err);
  }
}

export async function saveYearlyCalendar(env: TemporalEnv, calendar: BaseCalendar): Promise<string> {
  const file = yearlyCalendarPath(env, calendar.year);
  await writeJson(file, calendar);
  return file;
}

/** `monthly` is ordered January..December, as splitCalendarByMonth returns it. */
export async function saveMonthlyCalendars(env: TemporalEnv, monthly: BaseCalendar[]): Promise<string[]> {
  const written: string[] = [];
  for (const [index, cal] of monthly.entries()) {
    const file = monthlyCalendarPath(env, cal.year, index + 1);
    await writeJson(file, cal);
    written.push(file);
  }
  return written;
}

async function readCalendarFile(file: string): Promise<BaseCalendar | null> {
  try {
    const data = await fs.readFile(file, "utf-8");
    const parsed = calendarSchema.safeParse(JSON.parse(data));
    if (!parsed.success) {
      console.error("[calendarStore] invalid calendar file", file, parsed.error.message);
      return null;
    }
    return parsed.data;
  } catch (err) {
    if (!isMissingFile(err)) console.error("[calendarStore] read failed", file, err);
    return null;
  }
}

export type CalendarDay = {
  date: CalendarDateInfo;
  month: CalendarMonthInfo;
};

/** Monthly file first, then the yearly file. Null when neither holds the date. */
export async function lookupCalendarDay(
  env: TemporalEnv,
  year: number,
  month: number,
  day: number
): Promise<CalendarDay | null> {
  if (month < 1 || month > 12) return null;
  const key = formatIsoDate(year, month, day);
  const candidates = [monthlyCalendarPath(env, year, month), yearlyCalendarPath(env, year)];

  for (const file of candidates) {
    const cal = await readCalendarFile(file);
    if (!cal) continue;
    const date = cal.dates[key];
    const monthEntry = cal.months[String(month)];
    if (date && monthEntry) return { date, month: monthEntry };
  }
  return null;
}
