import fs from "fs/promises";
import os from "os";
import path from "path";
import type { TemporalEnv } from "../types.js";

export type TestEnv = TemporalEnv & {
  setNow: (iso: string) => void;
  writeJson: (relative: string, value: unknown) => Promise<string>;
  writeText: (relative: string, value: string) => Promise<string>;
  cleanup: () => Promise<void>;
};

/** A throwaway data dir plus a clock the test can move. */
export async function createTestEnv(now: string, timeZone = "UTC"): Promise<TestEnv> {
  const dataDir = await fs.mkdtemp(path.join(os.tmpdir(), "temporal-test-"));
  let current = Date.parse(now);

  const writeText = async (relative: string, value: string) => {
    const file = path.join(dataDir, relative);
    await fs.mkdir(path.dirname(file), { recursive: true });
    await fs.writeFile(file, value, "utf-8");
    return file;
  };

  return {
    dataDir,
    timeZone,
    clock: { now: () => new Date(current) },
    setNow: (iso) => {
      current = Date.parse(iso);
    },
    writeText,
    writeJson: (relative, value) => writeText(relative, JSON.stringify(value, null, 2)),
    cleanup: () => fs.rm(dataDir, { recursive: true, force: true }),
  };
}

export const SAMPLE_PLANNER = {
  planner_id: "sam-2026-10",
  owner: "sam",
  month: "2026-10",
  recurring_patterns: {
    daily: [
      { start: "23:00", end: "07:00", type: "sleep", description: "Sleep" },
      { start: "07:30", end: "09:00", type: "work", description: "Morning focus" },
      { start: "12:00", end: "13:00", type: "meal", description: "Lunch" },
    ],
    weekly: {
      monday: [{ start: "14:00", end: "15:00", type: "commitment", description: "Team sync" }],
    },
  },
};
