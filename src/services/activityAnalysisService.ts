import type {
  ActivityEvent,
  ActivityGap,
  ClassifiedGap,
  Planner,
  SessionTimeReport,
  TemporalEnv,
  TimeAwareness,
} from "../types.js";
import { parseRfc3339 } from "../utils/calendarMath.js";
import { MINUTE_MS } from "../utils/duration.js";
import { describeInstant } from "../utils/zonedTime.js";
import { readActivityEvents } from "../stores/activityLogStore.js";
import { loadPlanner } from "../stores/plannerStore.js";
import { readSessionState, sessionIdFor, sessionStartOf } from "../stores/sessionStore.js";
import { readWorkSchedule } from "../stores/workScheduleStore.js";
import { classifyDowntime } from "./scheduleMatcher.js";

export const SEMI_DOWNTIME_THRESHOLD_MS = 30 * MINUTE_MS;

function gapBetween(startMs: number, endMs: number): ActivityGap {
  return {
    start: new Date(startMs).toISOString(),
    end: new Date(endMs).toISOString(),
    durationMs: endMs - startMs,
  };
}

/**
 * Valid activity timestamps inside [sessionStart, now], ascending. Unparseable timestamps are dropped
 * one by one; the log is not assumed to be append-ordered.
 */
export function activityTimes(events: ActivityEvent[], sessionStartMs: number, nowMs: number): number[] {
  const times: number[] = [];
  for (const event of events) {
    const parsed = parseRfc3339(event.ts);
    if (!parsed) continue;
    const ms = parsed.getTime();
    if (ms < sessionStartMs || ms > nowMs) continue;
    times.push(ms);
  }
  return times.sort((a, b) => a - b);
}

/**
 * Splits the session's wall-clock span into active time and idle gaps. A gap is recorded only when
 * it is strictly longer than the 30 minute threshold: session start to first activity, between
 * consecutive activities, and last activity to now (which also flips the state to semi_downtime).
 */
export function analyzeTimeAwareness(sessionStart: Date, events: ActivityEvent[], now: Date): TimeAwareness {
  const startMs = sessionStart.getTime();
  const nowMs = now.getTime();
  const wallClock = Math.max(0, nowMs - startMs);
  const times = activityTimes(events, startMs, nowMs);

  if (times.length === 0) {
    return {
      wallClockElapsedMs: wallClock,
      activeUptimeMs: 0,
      semiDowntimeMs: wallClock,
      lastActivity: null,
      activityGaps: wallClock > 0 ? [gapBetween(startMs, nowMs)] : [],
      currentState: "semi_downtime",
    };
  }

  const gaps: ActivityGap[] = [];

  const first = times[0];
  if (first - startMs > SEMI_DOWNTIME_THRESHOLD_MS) {
    gaps.push(gapBetween(startMs, first));
  }

  for (let i = 1; i < times.length; i++) {
    if (times[i] - times[i - 1] > SEMI_DOWNTIME_THRESHOLD_MS) {
      gaps.push(gapBetween(times[i - 1], times[i]));
    }
  }

  const last = times[times.length - 1];
  let currentState: TimeAwareness["currentState"] = "uptime";
  if (nowMs - last > SEMI_DOWNTIME_THRESHOLD_MS) {
    gaps.push(gapBetween(last, nowMs));
    currentState = "semi_downtime";
  }

  const semiDowntime = gaps.reduce((sum, g) => sum + g.durationMs, 0);

  return {
    wallClockElapsedMs: wallClock,
    activeUptimeMs: Math.max(0, wallClock - semiDowntime),
    semiDowntimeMs: semiDowntime,
    lastActivity: new Date(last).toISOString(),
    activityGaps: gaps,
    currentState,
  };
}

/** Advisory labels only; the uptime/downtime totals never depend on them. */
export function classifyGaps(gaps: ActivityGap[], planner: Planner | null, timeZone: string): ClassifiedGap[] {
  return gaps.map((gap) => {
    const verdict = classifyDowntime(describeInstant(new Date(gap.start), timeZone), planner);
    return { ...gap, ...verdict };
  });
}

export async function getSessionTimeAwareness(env: TemporalEnv): Promise<SessionTimeReport | null> {
  const state = await readSessionState(env);
  if (!state) return null;
  const sessionStart = sessionStartOf(state);
  const sessionId = sessionIdFor(state, env.timeZone);
  if (!sessionStart || !sessionId) return null;

  const now = env.clock.now();
  const events = await readActivityEvents(env, sessionId);
  const awareness = analyzeTimeAwareness(sessionStart, events, now);
  const planner = state.user_id ? await loadPlanner(env, state.user_id) : null;

  return {
    sessionId,
    userId: state.user_id,
    sessionStart: sessionStart.toISOString(),
    generatedAt: now.toISOString(),
    awareness,
    gaps: classifyGaps(awareness.activityGaps, planner, env.timeZone),
    plannerAvailable: planner !== null,
    workSchedule: await readWorkSchedule(env),
  };
}
