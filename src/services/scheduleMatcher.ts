import type { GapClassification, Instant, NextActivity, Planner, ScheduleMatch, TimeBlock, Weekday } from "../types.js";
import { minutesToClock, weekdayKey } from "../utils/zonedTime.js";

const WEEKDAY_ORDER: Weekday[] = ["sunday", "monday", "tuesday", "wednesday", "thursday", "friday", "saturday"];

const UNSCHEDULED: ScheduleMatch = {
  description: "Unscheduled time",
  type: "flex",
  inWorkWindow: false,
  expectedDowntime: false,
  source: "default",
  block: null,
};

/** Half-open [start, end); end < start wraps past midnight; start == end contains nothing. */
export function isMinuteInBlock(minute: number, block: TimeBlock): boolean {
  if (block.end < block.start) {
    return minute >= block.start || minute < block.end;
  }
  return minute >= block.start && minute < block.end;
}

function isDowntimeType(type: TimeBlock["type"]): boolean {
  return type === "sleep" || type === "meal" || type === "break";
}

/**
 * Daily blocks are scanned before the weekday's blocks and the first containing block wins.
 * `priority` is not consulted; declaration order breaks ties.
 * Weekly `commitment` blocks count as work windows; daily ones do not.
 */
export function matchCurrentActivity(instant: Instant, planner: Planner): ScheduleMatch {
  const minute = instant.minuteOfDay;

  const daily = planner.recurringPatterns.daily.find((block) => isMinuteInBlock(minute, block));
  if (daily) {
    return {
      description: daily.description,
      type: daily.type,
      inWorkWindow: daily.type === "work",
      expectedDowntime: isDowntimeType(daily.type),
      source: "daily",
      block: daily,
    };
  }

  const weeklyBlocks = planner.recurringPatterns.weekly[instant.weekday] ?? [];
  const weekly = weeklyBlocks.find((block) => isMinuteInBlock(minute, block));
  if (weekly) {
    return {
      description: weekly.description,
      type: weekly.type,
      inWorkWindow: weekly.type === "work" || weekly.type === "commitment",
      expectedDowntime: isDowntimeType(weekly.type),
      source: "weekly",
      block: weekly,
    };
  }

  return { ...UNSCHEDULED };
}

function blocksFor(planner: Planner, day: Weekday): TimeBlock[] {
  return [...planner.recurringPatterns.daily, ...(planner.recurringPatterns.weekly[day] ?? [])];
}

function earliest(blocks: TimeBlock[]): TimeBlock | null {
  let best: TimeBlock | null = null;
  for (const block of blocks) {
    if (!best || block.start < best.start) best = block;
  }
  return best;
}

export function findNextActivity(instant: Instant, planner: Planner): NextActivity | null {
  const later = blocksFor(planner, instant.weekday).filter((b) => b.start > instant.minuteOfDay);
  const today = earliest(later);
  if (today) {
    return { description: today.description, type: today.type, startsAt: minutesToClock(today.start), dayOffset: 0 };
  }

  const tomorrowKey = weekdayKey(WEEKDAY_ORDER.indexOf(instant.weekday) + 1);
  const tomorrow = earliest(blocksFor(planner, tomorrowKey));
  if (tomorrow) {
    return {
      description: tomorrow.description,
      type: tomorrow.type,
      startsAt: minutesToClock(tomorrow.start),
      dayOffset: 1,
    };
  }
  return null;
}

export type DowntimeVerdict = {
  classification: GapClassification;
  reason?: string;
};

export function classifyDowntime(instant: Instant, planner: Planner | null): DowntimeVerdict {
  if (!planner) return { classification: "unknown" };
  const match = matchCurrentActivity(instant, planner);
  if (match.expectedDowntime) {
    return { classification: "expected", reason: `${match.description} (${match.type})` };
  }
  return { classification: "unexpected" };
}
