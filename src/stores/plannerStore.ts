import fs from "fs/promises";
import path from "path";
import { z } from "zod";
import type { BlockType, Planner, RecurringPatternSet, TemporalEnv, TimeBlock, Weekday } from "../types.js";
import { isMissingFile } from "../errors.js";
import { formatIsoDate, parseIsoDate } from "../utils/calendarMath.js";

const BLOCK_TYPES: readonly BlockType[] = ["work", "sleep", "meal", "break", "commitment", "flex"];
const WEEKDAYS: readonly Weekday[] = ["sunday", "monday", "tuesday", "wednesday", "thursday", "friday", "saturday"];
const SAFE_OWNER = /^[A-Za-z0-9._-]+$/;

/** "HH:MM" -> minutes since midnight. "24:00" only when allowEndOfDay. */
export function clockToMinutes(value: string, allowEndOfDay = false): number | null {
  const match = /^(\d{1,2}):(\d{2})$/.exec(value.trim());
  if (!match) return null;
  const hours = Number(match[1]);
  const minutes = Number(match[2]);
  if (allowEndOfDay && hours === 24 && minutes === 0) return 1440;
  if (hours > 23 || minutes > 59) return null;
  return hours * 60 + minutes;
}

function toBlockType(value: string): BlockType {
  const lower = value.trim().toLowerCase();
  return BLOCK_TYPES.find((t) => t === lower) ?? "flex";
}

const rawBlockSchema = z.object({
  start: z.string(),
  end: z.string(),
  type: z.string().default("flex"),
  description: z.string().default(""),
  priority: z.union([z.string(), z.number()]).optional(),
});

const timeBlockSchema = rawBlockSchema.transform((raw, ctx): TimeBlock => {
  const start = clockToMinutes(raw.start);
  const end = clockToMinutes(raw.end, true);
  if (start === null || end === null) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: `invalid block time ${raw.start}-${raw.end}` });
    return z.NEVER;
  }
  const block: TimeBlock = { start, end, type: toBlockType(raw.type), description: raw.description };
  if (raw.priority !== undefined) block.priority = String(raw.priority);
  return block;
});

const plannerDocumentSchema = z.object({
  planner_id: z.string().optional(),
  owner: z.string().optional(),
  month: z.string().optional(),
  recurring_patterns: z.object({
    daily: z.array(z.unknown()).optional(),
    weekly: z.record(z.string(), z.unknown()).optional(),
  }),
  events: z.record(z.string(), z.unknown()).optional().catch(undefined),
});

function parseBlocks(items: unknown): TimeBlock[] {
  if (!Array.isArray(items)) return [];
  const blocks: TimeBlock[] = [];
  for (const item of items) {
    const parsed = timeBlockSchema.safeParse(item);
    if (parsed.success) blocks.push(parsed.data);
  }
  return blocks;
}

function parseWeekly(raw: Record<string, unknown> | undefined): RecurringPatternSet["weekly"] {
  const weekly: RecurringPatternSet["weekly"] = {};
  if (!raw) return weekly;
  for (const [key, items] of Object.entries(raw)) {
    const day = WEEKDAYS.find((d) => d === key.trim().toLowerCase());
    if (!day) continue;
    weekly[day] = [...(weekly[day] ?? []), ...parseBlocks(items)];
  }
  return weekly;
}

function parseEvents(raw: Record<string, unknown> | undefined): Planner["events"] {
  const events: Planner["events"] = {};
  if (!raw) return events;
  for (const [date, items] of Object.entries(raw)) {
    const day = parseIsoDate(date);
    if (!day) continue;
    const blocks = parseBlocks(items);
    if (blocks.length > 0) events[formatIsoDate(day.year, day.month, day.day)] = blocks;
  }
  return events;
}

export function parsePlannerDocument(raw: unknown): Planner | null {
  const parsed = plannerDocumentSchema.safeParse(raw);
  if (!parsed.success) return null;
  const doc = parsed.data;
  return {
    plannerId: doc.planner_id ?? null,
    owner: doc.owner ?? null,
    month: doc.month ?? null,
    recurringPatterns: {
      daily: parseBlocks(doc.recurring_patterns.daily),
      weekly: parseWeekly(doc.recurring_patterns.weekly),
    },
    events: parseEvents(doc.events),
  };
}

export function plannerPath(env: TemporalEnv, owner: string): string {
  if (!SAFE_OWNER.test(owner) || owner.startsWith(".")) {
    throw new Error(`Invalid planner owner: ${owner}`);
  }
  return path.join(env.dataDir, "planner", "templates", `${owner}-template.json`);
}

/** Read fresh on every call; planners are edited by hand between queries. */
export async function loadPlanner(env: TemporalEnv, owner: string): Promise<Planner | null> {
  try {
    const file = plannerPath(env, owner);
    const data = await fs.readFile(file, "utf-8");
    const planner = parsePlannerDocument(JSON.parse(data));
    if (!planner) console.error("[plannerStore] invalid planner document", file);
    return planner;
  } catch (err) {
    if (!isMissingFile(err)) console.error("[plannerStore] load failed", err);
    return null;
  }
}
