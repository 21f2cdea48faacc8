import { describe, expect, it } from "vitest";
import type { Planner, TimeBlock } from "../../types.js";
import { buildDaySchedule, busyIntervals, findFreeWindows, freeWindowsFor } from "../dayScheduleService.js";

const sleep: TimeBlock = { start: 1380, end: 420, type: "sleep", description: "Sleep" };
const lunch: TimeBlock = { start: 720, end: 780, type: "meal", description: "Lunch" };
const deepWork: TimeBlock = { start: 540, end: 720, type: "work", description: "Deep work" };
const teamSync: TimeBlock = { start: 840, end: 900, type: "commitment", description: "Team sync" };
const dentist: TimeBlock = { start: 960, end: 1050, type: "commitment", description: "Dentist" };
const reading: TimeBlock = { start: 1200, end: 1260, type: "flex", description: "Reading" };

const planner: Planner = {
  plannerId: "p1",
  owner: "sam",
  month: "2026-10",
  recurringPatterns: {
    daily: [sleep, lunch],
    weekly: { monday: [deepWork, teamSync] },
  },
  events: { "2026-10-19": [dentist, reading] },
};

describe("buildDaySchedule", () => {
  it("merges daily, weekday and dated blocks in start order", () => {
    expect(buildDaySchedule(planner, "2026-10-19")).toEqual({
      date: "2026-10-19",
      weekday: "monday",
      blocks: [
        { ...deepWork, source: "weekly" },
        { ...lunch, source: "daily" },
        { ...teamSync, source: "weekly" },
        { ...dentist, source: "event" },
        { ...reading, source: "event" },
        { ...sleep, source: "daily" },
      ],
    });
  });

  it("leaves out another weekday's blocks and other dates' events", () => {
    const schedule = buildDaySchedule(planner, "2026-10-20");
    expect(schedule?.weekday).toBe("tuesday");
    expect(schedule?.blocks.map((b) => b.description)).toEqual(["Lunch", "Sleep"]);
  });

  it("keeps daily before weekly when two blocks start together", () => {
    const standup: TimeBlock = { start: 720, end: 735, type: "commitment", description: "Standup" };
    const withTie: Planner = { ...planner, recurringPatterns: { daily: [lunch], weekly: { monday: [standup] } } };
    expect(buildDaySchedule(withTie, "2026-10-19")?.blocks.map((b) => b.source)).toEqual(["daily", "weekly"]);
  });

  it("returns null for a date that does not exist", () => {
    expect(buildDaySchedule(planner, "2026-02-30")).toBeNull();
    expect(buildDaySchedule(planner, "tomorrow")).toBeNull();
  });
});

describe("busyIntervals", () => {
  it("splits the overnight block and skips flex time", () => {
    const schedule = buildDaySchedule(planner, "2026-10-19");
    expect(schedule && busyIntervals(schedule)).toEqual([
      { start: 0, end: 420 },
      { start: 540, end: 720 },
      { start: 720, end: 780 },
      { start: 840, end: 900 },
      { start: 960, end: 1050 },
      { start: 1380, end: 1440 },
    ]);
  });
});

describe("findFreeWindows", () => {
  it("returns the whole day when nothing is busy", () => {
    expect(findFreeWindows([])).toEqual([
      { start: "00:00", end: "24:00", startMinute: 0, endMinute: 1440, durationMinutes: 1440 },
    ]);
  });

  it("treats overlapping intervals as one busy stretch", () => {
    const windows = findFreeWindows([
      { start: 120, end: 150 },
      { start: 60, end: 180 },
      { start: 170, end: 240 },
    ]);
    expect(windows).toEqual([
      { start: "00:00", end: "01:00", startMinute: 0, endMinute: 60, durationMinutes: 60 },
      { start: "04:00", end: "24:00", startMinute: 240, endMinute: 1440, durationMinutes: 1200 },
    ]);
  });

  it("finds the gaps around a planned day", () => {
    const schedule = buildDaySchedule(planner, "2026-10-19");
    const windows = schedule ? freeWindowsFor(schedule) : [];
    expect(windows.map((w) => `${w.start}-${w.end}`)).toEqual([
      "07:00-09:00",
      "13:00-14:00",
      "15:00-16:00",
      "17:30-23:00",
    ]);
  });

  it("drops windows shorter than the minimum", () => {
    const schedule = buildDaySchedule(planner, "2026-10-19");
    const windows = schedule ? freeWindowsFor(schedule, 90) : [];
    expect(windows.map((w) => [w.start, w.durationMinutes])).toEqual([
      ["07:00", 120],
      ["17:30", 330],
    ]);
  });
});
