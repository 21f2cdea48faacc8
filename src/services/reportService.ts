import type { ClassifiedGap, DaySchedule, SessionTimeReport, TemporalContext, TimeWindow } from "../types.js";
import { MINUTE_MS, formatDuration, percentOf } from "../utils/duration.js";
import { formatClockTime, formatLongTimestamp, minutesToClock } from "../utils/zonedTime.js";
import { SEMI_DOWNTIME_THRESHOLD_MS } from "./activityAnalysisService.js";

const RULE = "-".repeat(65);
const MAX_LISTED_GAPS = 5;

function gapLabel(gap: ClassifiedGap): string {
  switch (gap.classification) {
    case "expected":
      return `Expected: ${gap.reason ?? ""}`.trimEnd();
    case "unexpected":
      return "Unexpected downtime";
    default:
      return "Unclassified (no planner)";
  }
}

export function formatTimeAwarenessReport(report: SessionTimeReport, timeZone: string): string {
  const a = report.awareness;
  const lines: string[] = [];

  lines.push("Time Awareness", RULE, "");
  lines.push(`Wall-Clock Elapsed:  ${formatDuration(a.wallClockElapsedMs)}`);
  lines.push(`  Session started: ${formatLongTimestamp(new Date(report.sessionStart), timeZone)}`, "");

  const uptimePct = Math.round(percentOf(a.activeUptimeMs, a.wallClockElapsedMs));
  const downtimePct = Math.round(percentOf(a.semiDowntimeMs, a.wallClockElapsedMs));
  lines.push(`Active Uptime:       ${formatDuration(a.activeUptimeMs)} (${uptimePct}%)`);
  lines.push("  Time actively working", "");
  lines.push(`Semi-Downtime:       ${formatDuration(a.semiDowntimeMs)} (${downtimePct}%)`);
  lines.push("  Session open but idle (>30min gaps)", "");

  const stateText = a.currentState === "semi_downtime" ? "SEMI-DOWNTIME - Idle" : "UPTIME - Actively working";
  lines.push(`Current State:       ${stateText}`);
  if (a.lastActivity) {
    const last = new Date(a.lastActivity);
    const since = Date.parse(report.generatedAt) - last.getTime();
    lines.push(`  Last activity: ${formatClockTime(last, timeZone, true)}`);
    lines.push(
      since < SEMI_DOWNTIME_THRESHOLD_MS ? `  Active ${formatDuration(since)} ago` : `  Idle for ${formatDuration(since)}`
    );
  } else {
    lines.push("  No activity recorded");
  }

  if (report.gaps.length > 0) {
    lines.push("", `Idle Periods: ${report.gaps.length} gap(s) detected`);
    report.gaps.slice(0, MAX_LISTED_GAPS).forEach((gap, i) => {
      const start = formatClockTime(new Date(gap.start), timeZone);
      lines.push(`  ${i + 1}. ${start} (duration: ${formatDuration(gap.durationMs)}) ${gapLabel(gap)}`);
    });
    if (report.gaps.length > MAX_LISTED_GAPS) {
      lines.push(`  ... and ${report.gaps.length - MAX_LISTED_GAPS} more`);
    }
  }

  if (report.workSchedule) {
    const ws = report.workSchedule;
    const pct = Math.round(percentOf(ws.sessionsCompleted, ws.totalSessions));
    lines.push("", "Internal Calendar:", `  Work: ${ws.workItem}`);
    lines.push(
      `  Session ${ws.currentSessionNumber} of ${ws.totalSessions} | Day ${ws.daysElapsed + 1} of ${ws.totalDays} | ${pct}% complete`
    );
  }

  lines.push("", RULE);
  return lines.join("\n") + "\n";
}

function capitalize(word: string): string {
  return word.charAt(0).toUpperCase() + word.slice(1);
}

export function formatDaySchedule(schedule: DaySchedule, windows: TimeWindow[], minMinutes = 0): string {
  const lines: string[] = [`Day Schedule: ${capitalize(schedule.weekday)} ${schedule.date}`, RULE];

  if (schedule.blocks.length === 0) lines.push("  Nothing planned");
  for (const block of schedule.blocks) {
    const span = `${minutesToClock(block.start)}-${minutesToClock(block.end)}`;
    lines.push(`  ${span}  ${block.description} [${block.type}] (${block.source})`);
  }

  lines.push("", minMinutes > 0 ? `Free Windows (at least ${minMinutes}m):` : "Free Windows:");
  if (windows.length === 0) lines.push("  none");
  for (const w of windows) {
    lines.push(`  ${w.start}-${w.end}  ${formatDuration(w.durationMinutes * MINUTE_MS)}`);
  }

  lines.push(RULE);
  return lines.join("\n") + "\n";
}

const UNAVAILABLE = "(unavailable)";

export function formatTemporalContext(ctx: TemporalContext): string {
  const { externalTime: ext, internalTime: internal, internalSchedule: schedule, externalCalendar: cal } = ctx;
  const lines: string[] = ["Temporal Context", RULE];

  lines.push(`External time:     ${ext.formatted} (${ext.timeOfDay}, ${ext.circadianPhase} phase)`);

  lines.push(
    internal.available
      ? `Session:           ${internal.elapsedFormatted || "0s"} elapsed (${internal.sessionPhase})`
      : `Session:           ${UNAVAILABLE}`
  );

  if (schedule.available) {
    const flags = [schedule.inWorkWindow ? "work window" : null, schedule.expectedDowntime ? "expected downtime" : null]
      .filter((f): f is string => f !== null)
      .join(", ");
    lines.push(`Schedule now:      ${schedule.currentActivity} [${schedule.activityType}]${flags ? ` (${flags})` : ""}`);
    lines.push(
      schedule.nextActivity
        ? `Schedule next:     ${schedule.nextActivity} at ${schedule.nextActivityTime}`
        : "Schedule next:     nothing planned"
    );
  } else {
    lines.push(`Schedule:          ${UNAVAILABLE}`);
  }

  if (cal.available) {
    const holiday = cal.isHoliday ? `, holiday: ${cal.holidayName ?? "yes"}` : "";
    lines.push(`Calendar:          ${cal.dayOfWeek}, ${cal.monthName} ${cal.dayOfMonth} ${cal.year} (week ${cal.weekNumber}${holiday})`);
  } else {
    lines.push(`Calendar:          ${UNAVAILABLE}`);
  }

  lines.push(RULE);
  return lines.join("\n") + "\n";
}
