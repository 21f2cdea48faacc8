import { describe, expect, it } from "vitest";
import {
  describeInstant,
  formatClockTime,
  formatLongTimestamp,
  minutesToClock,
  timeOfDayFor,
  zonedParts,
} from "../zonedTime.js";

const AT = new Date("2026-10-19T07:52:10Z");

describe("zoned time", () => {
  it("splits an instant into wall-clock parts for the zone", () => {
    expect(zonedParts(AT, "UTC")).toEqual({
      year: 2026,
      month: 10,
      day: 19,
      hour: 7,
      minute: 52,
      second: 10,
      weekdayIndex: 1,
    });
    expect(zonedParts(AT, "America/New_York").hour).toBe(3);
    expect(zonedParts(new Date("2026-10-19T00:05:00Z"), "UTC").hour).toBe(0);
  });

  it("describes an instant", () => {
    expect(describeInstant(AT, "UTC")).toEqual({
      at: AT,
      hour: 7,
      minute: 52,
      minuteOfDay: 472,
      weekday: "monday",
      isoWeek: 43,
      date: "2026-10-19",
      timeOfDay: "morning",
      circadianPhase: "peak",
    });
  });

  it("uses the zone's calendar date", () => {
    const late = new Date("2026-10-19T02:00:00Z");
    expect(describeInstant(late, "America/Los_Angeles").date).toBe("2026-10-18");
    expect(describeInstant(late, "America/Los_Angeles").weekday).toBe("sunday");
  });

  it("maps hours to time of day and circadian phase", () => {
    expect(timeOfDayFor(4)).toEqual({ timeOfDay: "night", circadianPhase: "low" });
    expect(timeOfDayFor(5)).toEqual({ timeOfDay: "morning", circadianPhase: "peak" });
    expect(timeOfDayFor(12)).toEqual({ timeOfDay: "afternoon", circadianPhase: "normal" });
    expect(timeOfDayFor(17)).toEqual({ timeOfDay: "evening", circadianPhase: "normal" });
    expect(timeOfDayFor(21)).toEqual({ timeOfDay: "night", circadianPhase: "low" });
  });

  it("formats clocks and timestamps", () => {
    expect(minutesToClock(75)).toBe("01:15");
    expect(minutesToClock(1380)).toBe("23:00");
    expect(minutesToClock(1440)).toBe("00:00");
    expect(minutesToClock(-60)).toBe("23:00");
    expect(formatLongTimestamp(AT, "UTC")).toBe("Mon Oct 19, 2026 at 07:52:10");
    expect(formatClockTime(AT, "UTC")).toBe("07:52");
    expect(formatClockTime(AT, "UTC", true)).toBe("07:52:10");
  });
});
