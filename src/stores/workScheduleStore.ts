import fs from "fs/promises";
import path from "path";
import { z } from "zod";
import type { TemporalEnv, WorkSchedule } from "../types.js";
import { isMissingFile } from "../errors.js";

const count = z.number().int().nonnegative();

const workScheduleSchema = z.object({
  work_item: z.string().trim().min(1),
  estimates: z.object({ total_days: count, total_sessions: count }),
  progress: z.object({
    days_elapsed: count.default(0),
    sessions_completed: count.default(0),
    current_session_number: count.default(1),
  }).default({}),
});

export function workSchedulePath(env: TemporalEnv): string {
  return path.join(env.dataDir, "schedule", "current-schedule.json");
}

export function parseWorkSchedule(raw: unknown): WorkSchedule | null {
  const parsed = workScheduleSchema.safeParse(raw);
  if (!parsed.success) return null;
  const { work_item, estimates, progress } = parsed.data;
  return {
    workItem: work_item,
    totalDays: estimates.total_days,
    totalSessions: estimates.total_sessions,
    daysElapsed: progress.days_elapsed,
    sessionsCompleted: progress.sessions_completed,
    currentSessionNumber: progress.current_session_number,
  };
}

/** The tracked multi-session plan, or null when there is none or it cannot be read. */
export async function readWorkSchedule(env: TemporalEnv): Promise<WorkSchedule | null> {
  const file = workSchedulePath(env);
  try {
    const data = await fs.readFile(file, "utf-8");
    const schedule = parseWorkSchedule(JSON.parse(data));
    if (!schedule) console.error("[workSchedule] invalid schedule", file);
    return schedule;
  } catch (err) {
    if (!isMissingFile(err)) console.error("[workSchedule] read failed", err);
    return null;
  }
}
