import type { DaySchedule, Planner, ScheduledBlock, TimeBlock, TimeWindow } from "../types.js";
import { formatIsoDate, parseIsoDate, weekdayIndex } from "../utils/calendarMath.js";
import { minutesToClock, weekdayKey } from "../utils/zonedTime.js";

const DAY_MINUTES = 1440;

export type Interval = { start: number; end: number };

function tag(blocks: TimeBlock[], source: ScheduledBlock["source"]): ScheduledBlock[] {
  return blocks.map((block) => ({ ...block, source }));
}

/**
 * Daily, weekly and one-time blocks for a calendar date, ordered by start minute.
 * Blocks that start together keep daily → weekly → event order.
 */
export function buildDaySchedule(planner: Planner, date: string): DaySchedule | null {
  const parsed = parseIsoDate(date);
  if (!parsed) return null;
  const key = formatIsoDate(parsed.year, parsed.month, parsed.day);
  const weekday = weekdayKey(weekdayIndex(parsed.year, parsed.month, parsed.day));

  const blocks = [
    ...tag(planner.recurringPatterns.daily, "daily"),
    ...tag(planner.recurringPatterns.weekly[weekday] ?? [], "weekly"),
    ...tag(planner.events[key] ?? [], "event"),
  ].sort((a, b) => a.start - b.start);

  return { date: key, weekday, blocks };
}

/** Minutes of the day taken by non-flex blocks. A block that wraps midnight yields both of its ends. */
export function busyIntervals(schedule: DaySchedule): Interval[] {
  const intervals: Interval[] = [];
  for (const block of schedule.blocks) {
    if (block.type === "flex" || block.start === block.end) continue;
    if (block.end < block.start) {
      intervals.push({ start: block.start, end: DAY_MINUTES });
      if (block.end > 0) intervals.push({ start: 0, end: block.end });
    } else {
      intervals.push({ start: block.start, end: block.end });
    }
  }
  return intervals.sort((a, b) => a.start - b.start);
}

function clockLabel(minute: number): string {
  return minute >= DAY_MINUTES ? "24:00" : minutesToClock(minute);
}

function toWindow(start: number, end: number): TimeWindow {
  return {
    start: clockLabel(start),
    end: clockLabel(end),
    startMinute: start,
    endMinute: end,
    durationMinutes: end - start,
  };
}

/** Gaps between busy intervals across [00:00, 24:00), at least `minMinutes` long. */
export function findFreeWindows(busy: Interval[], minMinutes = 0): TimeWindow[] {
  const sorted = [...busy].sort((a, b) => a.start - b.start);
  const windows: TimeWindow[] = [];
  let cursor = 0;

  const emit = (end: number) => {
    const length = end - cursor;
    if (length > 0 && length >= minMinutes) windows.push(toWindow(cursor, end));
  };

  for (const interval of sorted) {
    if (interval.start > cursor) emit(interval.start);
    cursor = Math.max(cursor, interval.end);
  }
  if (cursor < DAY_MINUTES) emit(DAY_MINUTES);
  return windows;
}

export function freeWindowsFor(schedule: DaySchedule, minMinutes = 0): TimeWindow[] {
  return findFreeWindows(busyIntervals(schedule), minMinutes);
}
