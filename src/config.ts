import dotenv from "dotenv";
import path from "path";
import { z } from "zod";
import type { Clock, TemporalEnv } from "./types.js";

dotenv.config();

function isValidTimeZone(tz: string): boolean {
  try {
    new Intl.DateTimeFormat("en-GB", { timeZone: tz });
    return true;
  } catch {
    return false;
  }
}

const envSchema = z.object({
  PORT: z.coerce.number().int().min(0).max(65535).default(4100),
  TEMPORAL_DATA_DIR: z.string().trim().min(1).optional(),
  TEMPORAL_TZ: z
    .string()
    .trim()
    .min(1)
    .refine(isValidTimeZone, { message: "TEMPORAL_TZ must be an IANA time zone" })
    .optional(),
  TEMPORAL_API_KEY: z.string().optional(),
});

function readEnv(source: NodeJS.ProcessEnv) {
  const parsed = envSchema.safeParse(source);
  if (!parsed.success) {
    const detail = parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join("; ");
    throw new Error(`Invalid environment: ${detail}`);
  }
  return parsed.data;
}

export const systemClock: Clock = {
  now: () => new Date(),
};

export function fixedClock(at: Date | string): Clock {
  const ms = typeof at === "string" ? Date.parse(at) : at.getTime();
  return { now: () => new Date(ms) };
}

export function hostTimeZone(): string {
  return Intl.DateTimeFormat().resolvedOptions().timeZone || "UTC";
}

export function loadTemporalEnv(source: NodeJS.ProcessEnv = process.env, clock: Clock = systemClock): TemporalEnv {
  const env = readEnv(source);
  return {
    dataDir: path.resolve(env.TEMPORAL_DATA_DIR ?? path.join(process.cwd(), "out")),
    timeZone: env.TEMPORAL_TZ ?? hostTimeZone(),
    clock,
  };
}

export function loadServerConfig(source: NodeJS.ProcessEnv = process.env) {
  const env = readEnv(source);
  const apiKey = env.TEMPORAL_API_KEY?.trim();
  return {
    port: env.PORT,
    apiKey: apiKey ? apiKey : null,
  };
}
