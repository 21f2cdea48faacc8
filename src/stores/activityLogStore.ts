import fs from "fs/promises";
import path from "path";
import type { ActivityEvent, TemporalEnv } from "../types.js";
import { isMissingFile } from "../errors.js";

const SAFE_SEGMENT = /^[A-Za-z0-9._-]+$/;

export function activityLogPath(env: TemporalEnv, sessionId: string): string {
  if (!SAFE_SEGMENT.test(sessionId) || sessionId.startsWith(".")) {
    throw new Error(`Invalid session id: ${sessionId}`);
  }
  return path.join(env.dataDir, "session", "activity", `${sessionId}.jsonl`);
}

function toActivityEvent(value: unknown): ActivityEvent | null {
  if (!value || typeof value !== "object") return null;
  const ts = "ts" in value ? value.ts : undefined;
  const tool = "tool" in value ? value.tool : undefined;
  if (typeof ts !== "string") return null;
  return { ts, tool: typeof tool === "string" ? tool : "" };
}

export function parseActivityLines(data: string): ActivityEvent[] {
  const events: ActivityEvent[] = [];
  for (const line of data.split("\n")) {
    if (!line.trim()) continue;
    try {
      const event = toActivityEvent(JSON.parse(line));
      if (event) events.push(event);
    } catch {
      // ignore malformed lines
    }
  }
  return events;
}

export async function readActivityEvents(env: TemporalEnv, sessionId: string): Promise<ActivityEvent[]> {
  try {
    const data = await fs.readFile(activityLogPath(env, sessionId), "utf-8");
    return parseActivityLines(data);
  } catch (err) {
    if (isMissingFile(err)) return [];
    console.error("[activityLog] read failed", err);
    return [];
  }
}

export async function appendActivityEvent(env: TemporalEnv, sessionId: string, tool: string): Promise<ActivityEvent> {
  const file = activityLogPath(env, sessionId);
  const event: ActivityEvent = { ts: env.clock.now().toISOString(), tool };
  await fs.mkdir(path.dirname(file), { recursive: true });
  await fs.appendFile(file, JSON.stringify(event) + "\n", "utf-8");
  return event;
}
