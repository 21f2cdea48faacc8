import fs from "fs/promises";
import path from "path";
import { z } from "zod";
import type { SessionState, TemporalEnv } from "../types.js";
import { isMissingFile } from "../errors.js";
import { parseRfc3339 } from "../utils/calendarMath.js";
import { zonedParts } from "../utils/zonedTime.js";

const sessionStateSchema = z
  .object({
    session_id: z.string().trim().min(1).optional(),
    user_id: z.string().default(""),
    start_time: z.string().refine((v) => parseRfc3339(v) !== null, { message: "start_time must be RFC3339" }),
  })
  .passthrough();

export function sessionPath(env: TemporalEnv): string {
  return path.join(env.dataDir, "session", "current.json");
}

export function parseSessionState(raw: unknown): SessionState | null {
  const parsed = sessionStateSchema.safeParse(raw);
  return parsed.success ? parsed.data : null;
}

export async function readSessionState(env: TemporalEnv): Promise<SessionState | null> {
  const file = sessionPath(env);
  try {
    const data = await fs.readFile(file, "utf-8");
    const state = parseSessionState(JSON.parse(data));
    if (!state) console.error("[sessionStore] invalid session state", file);
    return state;
  } catch (err) {
    if (!isMissingFile(err)) console.error("[sessionStore] read failed", err);
    return null;
  }
}

export function sessionStartOf(state: SessionState): Date | null {
  return parseRfc3339(state.start_time);
}

function pad(n: number): string {
  return String(n).padStart(2, "0");
}

function sessionIdAt(at: Date, timeZone: string): string {
  const p = zonedParts(at, timeZone);
  return `${p.year}-${pad(p.month)}-${pad(p.day)}_${pad(p.hour)}${pad(p.minute)}`;
}

/** Explicit session_id when present, otherwise YYYY-MM-DD_HHMM of the start in the configured zone. */
export function sessionIdFor(state: SessionState, timeZone: string): string | null {
  if (state.session_id) return state.session_id;
  const start = sessionStartOf(state);
  return start ? sessionIdAt(start, timeZone) : null;
}

export async function startSession(env: TemporalEnv, userId: string): Promise<SessionState> {
  const now = env.clock.now();
  const state: SessionState = {
    session_id: sessionIdAt(now, env.timeZone),
    user_id: userId,
    start_time: now.toISOString(),
    start_unix: Math.floor(now.getTime() / 1000),
    session_phase: "active",
  };
  const file = sessionPath(env);
  await fs.mkdir(path.dirname(file), { recursive: true });
  await fs.writeFile(file, JSON.stringify(state, null, 2), "utf-8");
  return state;
}
