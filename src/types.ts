export type Weekday =
  | "sunday"
  | "monday"
  | "tuesday"
  | "wednesday"
  | "thursday"
  | "friday"
  | "saturday";

export type TimeOfDay = "morning" | "afternoon" | "evening" | "night";
export type CircadianPhase = "peak" | "normal" | "low";
export type SessionPhase = "fresh" | "active" | "long";

export type BlockType = "work" | "sleep" | "meal" | "break" | "commitment" | "flex";

export type Clock = {
  now(): Date;
};

// Everything a store or service needs from the outside world, passed explicitly.
export type TemporalEnv = {
  dataDir: string;
  timeZone: string;
  clock: Clock;
};

export type Instant = {
  at: Date;
  hour: number;
  minute: number;
  minuteOfDay: number;
  weekday: Weekday;
  isoWeek: number;
  date: string; // YYYY-MM-DD in the configured zone
  timeOfDay: TimeOfDay;
  circadianPhase: CircadianPhase;
};

// ---- planner ----

export type TimeBlock = {
  start: number; // minutes since midnight
  end: number; // end < start wraps past midnight
  type: BlockType;
  description: string;
  priority?: string;
};

export type RecurringPatternSet = {
  daily: TimeBlock[];
  weekly: Partial<Record<Weekday, TimeBlock[]>>;
};

export type Planner = {
  plannerId: string | null;
  owner: string | null;
  month: string | null;
  recurringPatterns: RecurringPatternSet;
  events: Record<string, TimeBlock[]>; // one-time blocks keyed by YYYY-MM-DD
};

export type ScheduleMatch = {
  description: string;
  type: BlockType;
  inWorkWindow: boolean;
  expectedDowntime: boolean;
  source: "daily" | "weekly" | "default";
  block: TimeBlock | null;
};

export type NextActivity = {
  description: string;
  type: BlockType;
  startsAt: string; // HH:MM
  dayOffset: 0 | 1;
};

export type ScheduledBlock = TimeBlock & {
  source: "daily" | "weekly" | "event";
};

export type DaySchedule = {
  date: string;
  weekday: Weekday;
  blocks: ScheduledBlock[];
};

export type TimeWindow = {
  start: string; // HH:MM, "24:00" for end of day
  end: string;
  startMinute: number;
  endMinute: number;
  durationMinutes: number;
};

// ---- session + activity ----

export type SessionState = {
  session_id?: string;
  user_id: string;
  start_time: string;
  [key: string]: unknown;
};

export type ActivityEvent = {
  ts: string;
  tool: string;
};

export type ActivityGap = {
  start: string;
  end: string;
  durationMs: number;
};

export type AwarenessState = "uptime" | "semi_downtime";

export type TimeAwareness = {
  wallClockElapsedMs: number;
  activeUptimeMs: number;
  semiDowntimeMs: number;
  lastActivity: string | null;
  activityGaps: ActivityGap[];
  currentState: AwarenessState;
};

export type GapClassification = "expected" | "unexpected" | "unknown";

export type ClassifiedGap = ActivityGap & {
  classification: GapClassification;
  reason?: string;
};

// Multi-session work plan kept at schedule/current-schedule.json.
export type WorkSchedule = {
  workItem: string;
  totalDays: number;
  totalSessions: number;
  daysElapsed: number;
  sessionsCompleted: number;
  currentSessionNumber: number;
};

export type SessionTimeReport = {
  sessionId: string;
  userId: string;
  sessionStart: string;
  generatedAt: string;
  awareness: TimeAwareness;
  gaps: ClassifiedGap[];
  plannerAvailable: boolean;
  workSchedule: WorkSchedule | null;
};

// ---- base calendar ----

export type CalendarDateInfo = {
  date: string;
  year: number;
  month: number;
  day: number;
  weekday: string;
  week_number: number;
  is_weekend: boolean;
  is_holiday: boolean;
  holiday_name: string | null;
};

export type CalendarMonthInfo = {
  month: number;
  name: string;
  days_in_month: number;
  first_day: string;
  last_day: string;
  first_weekday: string;
};

export type CalendarMetadata = {
  created: string;
  timezone: string;
  observes_holidays: string[];
  total_days: number;
};

export type BaseCalendar = {
  year: number;
  metadata: CalendarMetadata;
  dates: Record<string, CalendarDateInfo>;
  months: Record<string, CalendarMonthInfo>;
};

// ---- aggregate ----

export type ExternalTime = {
  available: boolean;
  currentTime: string;
  formatted: string;
  hour: number;
  minute: number;
  weekday: Weekday;
  isoWeek: number;
  timeOfDay: TimeOfDay;
  circadianPhase: CircadianPhase;
};

export type InternalTime = {
  available: boolean;
  sessionStart: string | null;
  elapsedMs: number;
  elapsedFormatted: string;
  sessionPhase: SessionPhase | null;
};

export type InternalSchedule = {
  available: boolean;
  currentActivity: string;
  activityType: BlockType | null;
  nextActivity: string;
  nextActivityTime: string;
  inWorkWindow: boolean;
  expectedDowntime: boolean;
};

export type ExternalCalendar = {
  available: boolean;
  date: string;
  year: number;
  dayOfWeek: string;
  weekNumber: number;
  isHoliday: boolean;
  holidayName: string | null;
  monthName: string;
  dayOfMonth: number;
};

export type TemporalContext = {
  externalTime: ExternalTime;
  internalTime: InternalTime;
  internalSchedule: InternalSchedule;
  externalCalendar: ExternalCalendar;
};
