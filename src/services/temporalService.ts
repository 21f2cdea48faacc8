import type {
  ExternalCalendar,
  ExternalTime,
  InternalSchedule,
  InternalTime,
  SessionPhase,
  TemporalContext,
  TemporalEnv,
} from "../types.js";
import { formatDuration, MINUTE_MS } from "../utils/duration.js";
import { describeInstant, formatLongTimestamp } from "../utils/zonedTime.js";
import { lookupCalendarDay } from "../stores/calendarStore.js";
import { loadPlanner } from "../stores/plannerStore.js";
import { readSessionState, sessionStartOf } from "../stores/sessionStore.js";
import { findNextActivity, matchCurrentActivity } from "./scheduleMatcher.js";

export const EMPTY_INTERNAL_TIME: InternalTime = {
  available: false,
  sessionStart: null,
  elapsedMs: 0,
  elapsedFormatted: "",
  sessionPhase: null,
};

export const EMPTY_INTERNAL_SCHEDULE: InternalSchedule = {
  available: false,
  currentActivity: "",
  activityType: null,
  nextActivity: "",
  nextActivityTime: "",
  inWorkWindow: false,
  expectedDowntime: false,
};

export const EMPTY_EXTERNAL_CALENDAR: ExternalCalendar = {
  available: false,
  date: "",
  year: 0,
  dayOfWeek: "",
  weekNumber: 0,
  isHoliday: false,
  holidayName: null,
  monthName: "",
  dayOfMonth: 0,
};

export function sessionPhaseFor(elapsedMs: number): SessionPhase {
  const minutes = Math.floor(elapsedMs / MINUTE_MS);
  if (minutes < 30) return "fresh";
  if (minutes < 120) return "active";
  return "long";
}

/** Pure clock read; cannot fail. */
export function getExternalTime(env: TemporalEnv, now: Date = env.clock.now()): ExternalTime {
  const instant = describeInstant(now, env.timeZone);
  return {
    available: true,
    currentTime: now.toISOString(),
    formatted: formatLongTimestamp(now, env.timeZone),
    hour: instant.hour,
    minute: instant.minute,
    weekday: instant.weekday,
    isoWeek: instant.isoWeek,
    timeOfDay: instant.timeOfDay,
    circadianPhase: instant.circadianPhase,
  };
}

export async function getInternalTime(env: TemporalEnv, now: Date = env.clock.now()): Promise<InternalTime | null> {
  const state = await readSessionState(env);
  if (!state) return null;
  const start = sessionStartOf(state);
  if (!start) return null;

  const elapsed = Math.max(0, now.getTime() - start.getTime());
  return {
    available: true,
    sessionStart: start.toISOString(),
    elapsedMs: elapsed,
    elapsedFormatted: formatDuration(elapsed),
    sessionPhase: sessionPhaseFor(elapsed),
  };
}

export async function getInternalSchedule(
  env: TemporalEnv,
  now: Date = env.clock.now()
): Promise<InternalSchedule | null> {
  const state = await readSessionState(env);
  if (!state || !state.user_id.trim()) return null;

  const planner = await loadPlanner(env, state.user_id.trim());
  if (!planner) return null;

  const instant = describeInstant(now, env.timeZone);
  const match = matchCurrentActivity(instant, planner);
  const next = findNextActivity(instant, planner);

  return {
    available: true,
    currentActivity: match.description,
    activityType: match.type,
    nextActivity: next?.description ?? "",
    nextActivityTime: next ? (next.dayOffset === 1 ? `tomorrow ${next.startsAt}` : next.startsAt) : "",
    inWorkWindow: match.inWorkWindow,
    expectedDowntime: match.expectedDowntime,
  };
}

export async function getExternalCalendar(
  env: TemporalEnv,
  now: Date = env.clock.now()
): Promise<ExternalCalendar | null> {
  const instant = describeInstant(now, env.timeZone);
  const [year, month, day] = instant.date.split("-").map(Number);
  const entry = await lookupCalendarDay(env, year, month, day);
  if (!entry) return null;

  return {
    available: true,
    date: entry.date.date,
    year,
    dayOfWeek: entry.date.weekday,
    weekNumber: entry.date.week_number,
    isHoliday: entry.date.is_holiday,
    holidayName: entry.date.holiday_name,
    monthName: entry.month.name,
    dayOfMonth: day,
  };
}

async function settle<T extends object>(label: string, task: () => Promise<T | null>, empty: T): Promise<T> {
  try {
    const value = await task();
    return value ?? { ...empty };
  } catch (err) {
    console.error(`[temporal] ${label} unavailable`, err);
    return { ...empty };
  }
}

/**
 * All four dimensions, each acquired independently from the files on disk. A missing or broken
 * source leaves only its own dimension at the zero value with available=false. Never rejects.
 */
export async function getTemporalContext(env: TemporalEnv): Promise<TemporalContext> {
  const now = env.clock.now();
  const externalTime = getExternalTime(env, now);

  const [internalTime, internalSchedule, externalCalendar] = await Promise.all([
    settle("internal time", () => getInternalTime(env, now), EMPTY_INTERNAL_TIME),
    settle("internal schedule", () => getInternalSchedule(env, now), EMPTY_INTERNAL_SCHEDULE),
    settle("external calendar", () => getExternalCalendar(env, now), EMPTY_EXTERNAL_CALENDAR),
  ]);

  return { externalTime, internalTime, internalSchedule, externalCalendar };
}
