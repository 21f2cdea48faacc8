import fs from "fs/promises";
import path from "path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { createTestEnv, SAMPLE_PLANNER, type TestEnv } from "../../__tests__/testEnv.js";
import { MINUTE_MS } from "../../utils/duration.js";
import { generateCalendar } from "../calendarService.js";
import {
  EMPTY_EXTERNAL_CALENDAR,
  EMPTY_INTERNAL_SCHEDULE,
  EMPTY_INTERNAL_TIME,
  getExternalTime,
  getTemporalContext,
  sessionPhaseFor,
} from "../temporalService.js";

describe("sessionPhaseFor", () => {
  it("moves from fresh to active to long", () => {
    expect(sessionPhaseFor(29 * MINUTE_MS)).toBe("fresh");
    expect(sessionPhaseFor(30 * MINUTE_MS)).toBe("active");
    expect(sessionPhaseFor(119 * MINUTE_MS)).toBe("active");
    expect(sessionPhaseFor(120 * MINUTE_MS)).toBe("long");
  });
});

describe("temporal context", () => {
  let env: TestEnv;

  beforeEach(async () => {
    env = await createTestEnv("2026-10-19T07:52:00Z");
  });

  afterEach(async () => {
    await env.cleanup();
  });

  it("reads the external clock", () => {
    expect(getExternalTime(env)).toEqual({
      available: true,
      currentTime: "2026-10-19T07:52:00.000Z",
      formatted: "Mon Oct 19, 2026 at 07:52:00",
      hour: 7,
      minute: 52,
      weekday: "monday",
      isoWeek: 43,
      timeOfDay: "morning",
      circadianPhase: "peak",
    });
  });

  it("has only the external clock when nothing is on disk", async () => {
    const ctx = await getTemporalContext(env);
    expect(ctx.externalTime.available).toBe(true);
    expect(ctx.internalTime).toEqual(EMPTY_INTERNAL_TIME);
    expect(ctx.internalSchedule).toEqual(EMPTY_INTERNAL_SCHEDULE);
    expect(ctx.externalCalendar).toEqual(EMPTY_EXTERNAL_CALENDAR);
  });

  it("assembles every dimension from session, planner and calendar", async () => {
    await env.writeJson("session/current.json", { user_id: "sam", start_time: "2026-10-19T00:15:00Z" });
    await env.writeJson("planner/templates/sam-template.json", SAMPLE_PLANNER);
    await generateCalendar(2026, false, env);

    const ctx = await getTemporalContext(env);
    expect(ctx.internalTime).toEqual({
      available: true,
      sessionStart: "2026-10-19T00:15:00.000Z",
      elapsedMs: 27_420_000,
      elapsedFormatted: "7h37m",
      sessionPhase: "long",
    });
    expect(ctx.internalSchedule).toEqual({
      available: true,
      currentActivity: "Morning focus",
      activityType: "work",
      nextActivity: "Lunch",
      nextActivityTime: "12:00",
      inWorkWindow: true,
      expectedDowntime: false,
    });
    expect(ctx.externalCalendar).toEqual({
      available: true,
      date: "2026-10-19",
      year: 2026,
      dayOfWeek: "Monday",
      weekNumber: 43,
      isHoliday: false,
      holidayName: null,
      monthName: "October",
      dayOfMonth: 19,
    });
  });

  it("loses only the schedule when the planner disappears", async () => {
    await env.writeJson("session/current.json", { user_id: "sam", start_time: "2026-10-19T00:15:00Z" });
    const plannerFile = await env.writeJson("planner/templates/sam-template.json", SAMPLE_PLANNER);
    await generateCalendar(2026, false, env);
    await fs.rm(plannerFile);

    const ctx = await getTemporalContext(env);
    expect(ctx.internalSchedule).toEqual(EMPTY_INTERNAL_SCHEDULE);
    expect(ctx.internalTime.available).toBe(true);
    expect(ctx.externalCalendar.available).toBe(true);
  });

  it("loses the session dimensions when the session file is corrupt", async () => {
    await env.writeText("session/current.json", "{broken");
    await env.writeJson("planner/templates/sam-template.json", SAMPLE_PLANNER);
    await generateCalendar(2026, false, env);

    const ctx = await getTemporalContext(env);
    expect(ctx.internalTime).toEqual(EMPTY_INTERNAL_TIME);
    expect(ctx.internalSchedule).toEqual(EMPTY_INTERNAL_SCHEDULE);
    expect(ctx.externalCalendar.available).toBe(true);
    expect(ctx.externalCalendar.date).toBe("2026-10-19");
  });

  it("falls back to the yearly calendar when the monthly file is corrupt", async () => {
    await generateCalendar(2026, false, env);
    await env.writeText("calendar/base/2026/10-october.json", "{broken");

    const ctx = await getTemporalContext(env);
    expect(ctx.externalCalendar).toMatchObject({ available: true, date: "2026-10-19", monthName: "October" });
  });

  it("says tomorrow when the next block is past midnight", async () => {
    env.setNow("2026-10-19T23:30:00Z");
    await env.writeJson("session/current.json", { user_id: "sam", start_time: "2026-10-19T22:00:00Z" });
    await env.writeJson("planner/templates/sam-template.json", SAMPLE_PLANNER);

    const ctx = await getTemporalContext(env);
    expect(ctx.internalSchedule.currentActivity).toBe("Sleep");
    expect(ctx.internalSchedule.expectedDowntime).toBe(true);
    expect(ctx.internalSchedule.nextActivity).toBe("Morning focus");
    expect(ctx.internalSchedule.nextActivityTime).toBe("tomorrow 07:30");
  });

  it("reads the calendar in the configured zone", async () => {
    const la = { ...env, timeZone: "America/Los_Angeles" };
    await generateCalendar(2026, true, la);
    await fs.access(path.join(env.dataDir, "calendar", "base", "2026", "10-october.json"));

    la.clock = { now: () => new Date("2026-10-19T02:00:00Z") };
    const ctx = await getTemporalContext(la);
    expect(ctx.externalCalendar.date).toBe("2026-10-18");
    expect(ctx.externalCalendar.dayOfWeek).toBe("Sunday");
  });
});
