import path from "path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { createTestEnv, type TestEnv } from "../../__tests__/testEnv.js";
import { CalendarWriteError } from "../../errors.js";
import { buildCalendar, splitCalendarByMonth } from "../../services/calendarService.js";
import {
  lookupCalendarDay,
  monthlyCalendarPath,
  saveMonthlyCalendars,
  saveYearlyCalendar,
  yearlyCalendarPath,
} from "../calendarStore.js";

describe("calendar store", () => {
  let env: TestEnv;
  const calendar = buildCalendar(2026, { created: "2026-10-19", timeZone: "UTC" });

  beforeEach(async () => {
    env = await createTestEnv("2026-10-19T07:52:00Z");
  });

  afterEach(async () => {
    await env.cleanup();
  });

  it("lays files out by year and month", () => {
    expect(yearlyCalendarPath(env, 2026)).toBe(path.join(env.dataDir, "calendar", "base", "2026.json"));
    expect(monthlyCalendarPath(env, 2026, 3)).toBe(
      path.join(env.dataDir, "calendar", "base", "2026", "03-march.json")
    );
  });

  it("finds a day in the yearly file", async () => {
    await saveYearlyCalendar(env, calendar);
    const day = await lookupCalendarDay(env, 2026, 11, 26);
    expect(day?.date.holiday_name).toBe("Thanksgiving Day");
    expect(day?.date.weekday).toBe("Thursday");
    expect(day?.month.name).toBe("November");
  });

  it("finds a day in the monthly files", async () => {
    const written = await saveMonthlyCalendars(env, splitCalendarByMonth(calendar));
    expect(written).toHaveLength(12);
    expect(written[11]).toBe(monthlyCalendarPath(env, 2026, 12));

    const day = await lookupCalendarDay(env, 2026, 12, 25);
    expect(day?.date.holiday_name).toBe("Christmas Day");
    expect(day?.month.days_in_month).toBe(31);
  });

  it("prefers the monthly file over the yearly one", async () => {
    await saveYearlyCalendar(env, calendar);
    const october = splitCalendarByMonth(calendar)[9];
    await env.writeJson("calendar/base/2026/10-october.json", {
      ...october,
      dates: {
        ...october.dates,
        "2026-10-19": { ...october.dates["2026-10-19"], is_holiday: true, holiday_name: "Company Day" },
      },
    });

    const day = await lookupCalendarDay(env, 2026, 10, 19);
    expect(day?.date.holiday_name).toBe("Company Day");
  });

  it("returns null when nothing was generated", async () => {
    expect(await lookupCalendarDay(env, 2026, 10, 19)).toBeNull();
    expect(await lookupCalendarDay(env, 2026, 13, 1)).toBeNull();
  });

  it("wraps write failures", async () => {
    const blocked = { ...env, dataDir: await env.writeText("not-a-dir", "") };
    await expect(saveYearlyCalendar(blocked, calendar)).rejects.toBeInstanceOf(CalendarWriteError);
  });
});
