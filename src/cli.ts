/**
 * Command surface for the engine. Every command returns its exit code instead of exiting, so the
 * bin wrapper owns process.exit.
 *
 *   temporal calendar-generate --year 2026 [--monthly]
 *   temporal calendar-generate --years 2026,2027
 *   temporal time-awareness [--json]
 *   temporal context [--json]
 *   temporal session-start --user <id>
 *   temporal activity-record --tool <name>
 *   temporal planner-view --user <id> [--date YYYY-MM-DD] [--min N] [--json]
 */

import type { TemporalEnv } from "./types.js";
import { CalendarWriteError, UsageError } from "./errors.js";
import { assertCalendarYear, generateCalendar } from "./services/calendarService.js";
import { getSessionTimeAwareness } from "./services/activityAnalysisService.js";
import { getTemporalContext } from "./services/temporalService.js";
import { buildDaySchedule, freeWindowsFor } from "./services/dayScheduleService.js";
import { formatDaySchedule, formatTemporalContext, formatTimeAwarenessReport } from "./services/reportService.js";
import { readSessionState, sessionIdFor, startSession } from "./stores/sessionStore.js";
import { appendActivityEvent } from "./stores/activityLogStore.js";
import { loadPlanner } from "./stores/plannerStore.js";
import { parseIsoDate } from "./utils/calendarMath.js";
import { describeInstant } from "./utils/zonedTime.js";

export const EXIT_OK = 0;
export const EXIT_FAILURE = 1;
export const EXIT_USAGE = 2;

export type CliIO = {
  out: (text: string) => void;
  err: (text: string) => void;
};

export const consoleIO: CliIO = {
  out: (text) => console.log(text),
  err: (text) => console.error(text),
};

const USAGE = `Temporal awareness CLI

Commands:
  calendar-generate --year <YYYY> [--monthly]     Generate the base calendar for one year
  calendar-generate --years <Y1,Y2,...> [--monthly]
  time-awareness [--json]                         Uptime / semi-downtime for the current session
  context [--json]                                Clock, session, schedule and calendar together
  session-start --user <id>                       Start a new session for a user
  activity-record --tool <name>                   Append an activity event to the current session
  planner-view --user <id> [--date <YYYY-MM-DD>] [--min <minutes>] [--json]
                                                  A day's planned blocks and free windows`;

const VALUE_FLAGS = new Set(["year", "years", "user", "tool", "date", "min"]);
const BOOLEAN_FLAGS = new Set(["monthly", "json"]);

type Flags = Map<string, string | true>;

export function parseFlags(args: string[]): Flags {
  const flags: Flags = new Map();
  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (!arg.startsWith("--")) throw new UsageError(`Unexpected argument: ${arg}`);
    const eq = arg.indexOf("=");
    const name = arg.slice(2, eq === -1 ? undefined : eq);

    if (BOOLEAN_FLAGS.has(name)) {
      if (eq !== -1) throw new UsageError(`--${name} takes no value`);
      flags.set(name, true);
      continue;
    }
    if (!VALUE_FLAGS.has(name)) throw new UsageError(`Unknown flag: --${name}`);

    const value = eq !== -1 ? arg.slice(eq + 1) : args[++i];
    if (value === undefined || value.startsWith("--") || !value.trim()) {
      throw new UsageError(`--${name} requires a value`);
    }
    flags.set(name, value.trim());
  }
  return flags;
}

function stringFlag(flags: Flags, name: string): string | null {
  const value = flags.get(name);
  return typeof value === "string" ? value : null;
}

function parseYear(raw: string): number {
  const trimmed = raw.trim();
  if (!/^\d+$/.test(trimmed)) throw new UsageError(`Invalid year: ${raw}`);
  const year = Number(trimmed);
  assertCalendarYear(year);
  return year;
}

export function parseCalendarYears(flags: Flags): number[] {
  const years = stringFlag(flags, "years");
  if (years !== null) return years.split(",").map(parseYear);
  const year = stringFlag(flags, "year");
  if (year !== null) return [parseYear(year)];
  throw new UsageError("Must specify --year or --years");
}

async function calendarGenerate(flags: Flags, env: TemporalEnv, io: CliIO): Promise<number> {
  const years = parseCalendarYears(flags);
  const monthly = flags.has("monthly");
  for (const year of years) {
    await generateCalendar(year, monthly, env);
    io.out(monthly ? `Generated ${year} calendar (12 monthly files)` : `Generated ${year} calendar`);
  }
  return EXIT_OK;
}

async function timeAwareness(flags: Flags, env: TemporalEnv, io: CliIO): Promise<number> {
  const report = await getSessionTimeAwareness(env);
  if (!report) {
    io.err("No active session (session state missing or unreadable)");
    return EXIT_FAILURE;
  }
  io.out(flags.has("json") ? JSON.stringify(report, null, 2) : formatTimeAwarenessReport(report, env.timeZone));
  return EXIT_OK;
}

async function context(flags: Flags, env: TemporalEnv, io: CliIO): Promise<number> {
  const ctx = await getTemporalContext(env);
  io.out(flags.has("json") ? JSON.stringify(ctx, null, 2) : formatTemporalContext(ctx));
  return EXIT_OK;
}

async function sessionStart(flags: Flags, env: TemporalEnv, io: CliIO): Promise<number> {
  const user = stringFlag(flags, "user");
  if (!user) throw new UsageError("Must specify --user");
  const state = await startSession(env, user);
  io.out(`Session ${state.session_id} started for ${user}`);
  return EXIT_OK;
}

async function activityRecord(flags: Flags, env: TemporalEnv, io: CliIO): Promise<number> {
  const tool = stringFlag(flags, "tool");
  if (!tool) throw new UsageError("Must specify --tool");
  const state = await readSessionState(env);
  const sessionId = state ? sessionIdFor(state, env.timeZone) : null;
  if (!sessionId) {
    io.err("No active session (run session-start first)");
    return EXIT_FAILURE;
  }
  const event = await appendActivityEvent(env, sessionId, tool);
  io.out(`Recorded ${tool} at ${event.ts}`);
  return EXIT_OK;
}

function parseMinMinutes(raw: string | null): number {
  if (raw === null) return 0;
  if (!/^\d+$/.test(raw)) throw new UsageError(`Invalid --min: ${raw}`);
  return Number(raw);
}

async function plannerView(flags: Flags, env: TemporalEnv, io: CliIO): Promise<number> {
  const user = stringFlag(flags, "user");
  if (!user) throw new UsageError("Must specify --user");
  const date = stringFlag(flags, "date") ?? describeInstant(env.clock.now(), env.timeZone).date;
  if (!parseIsoDate(date)) throw new UsageError(`Invalid date: ${date}`);
  const minMinutes = parseMinMinutes(stringFlag(flags, "min"));

  const planner = await loadPlanner(env, user);
  const schedule = planner ? buildDaySchedule(planner, date) : null;
  if (!schedule) {
    io.err(`No planner found for ${user}`);
    return EXIT_FAILURE;
  }
  const freeWindows = freeWindowsFor(schedule, minMinutes);
  io.out(
    flags.has("json")
      ? JSON.stringify({ ...schedule, freeWindows }, null, 2)
      : formatDaySchedule(schedule, freeWindows, minMinutes)
  );
  return EXIT_OK;
}

type CommandHandler = (flags: Flags, env: TemporalEnv, io: CliIO) => Promise<number>;

const COMMANDS = new Map<string, CommandHandler>([
  ["calendar-generate", calendarGenerate],
  ["time-awareness", timeAwareness],
  ["context", context],
  ["session-start", sessionStart],
  ["activity-record", activityRecord],
  ["planner-view", plannerView],
]);

export async function runCli(argv: string[], env: TemporalEnv, io: CliIO = consoleIO): Promise<number> {
  const [command, ...rest] = argv;
  if (!command || command === "help" || command === "--help") {
    io.out(USAGE);
    return command ? EXIT_OK : EXIT_USAGE;
  }

  const handler = COMMANDS.get(command);
  if (!handler) {
    io.err(`Unknown command: ${command}\n\n${USAGE}`);
    return EXIT_USAGE;
  }

  try {
    return await handler(parseFlags(rest), env, io);
  } catch (err) {
    if (err instanceof UsageError) {
      io.err(`${err.message}\n\n${USAGE}`);
      return EXIT_USAGE;
    }
    if (err instanceof CalendarWriteError) {
      io.err(err.message);
      return EXIT_FAILURE;
    }
    io.err(`Error: ${err instanceof Error ? err.message : String(err)}`);
    return EXIT_FAILURE;
  }
}
