import { Router } from "express";
import { z } from "zod";
import type { TemporalEnv } from "../types.js";
import { parseRfc3339 } from "../utils/calendarMath.js";
import { describeInstant } from "../utils/zonedTime.js";
import { getTemporalContext } from "../services/temporalService.js";
import { getSessionTimeAwareness } from "../services/activityAnalysisService.js";
import { findNextActivity, matchCurrentActivity } from "../services/scheduleMatcher.js";
import { loadPlanner } from "../stores/plannerStore.js";
import { readSessionState } from "../stores/sessionStore.js";

const scheduleQuerySchema = z.object({
  at: z
    .string()
    .optional()
    .transform((value, ctx) => {
      if (value === undefined) return null;
      const parsed = parseRfc3339(value);
      if (!parsed) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: "at must be an RFC3339 timestamp" });
        return z.NEVER;
      }
      return parsed;
    }),
});

export function createTemporalRouter(env: TemporalEnv) {
  const router = Router();

  router.get("/temporal/context", async (_req, res) => {
    try {
      res.json(await getTemporalContext(env));
    } catch (err) {
      console.error("Error in /temporal/context:", err);
      res.status(500).json({ error: "Failed to build temporal context" });
    }
  });

  router.get("/temporal/awareness", async (_req, res) => {
    try {
      const report = await getSessionTimeAwareness(env);
      if (!report) return res.status(404).json({ error: "No active session" });
      res.json(report);
    } catch (err) {
      console.error("Error in /temporal/awareness:", err);
      res.status(500).json({ error: "Failed to analyze session time" });
    }
  });

  router.get("/temporal/schedule", async (req, res) => {
    try {
      const parsed = scheduleQuerySchema.safeParse(req.query);
      if (!parsed.success) {
        return res.status(400).json({ error: parsed.error.issues.map((i) => i.message).join("; ") });
      }

      const state = await readSessionState(env);
      const owner = state?.user_id.trim();
      if (!owner) return res.status(404).json({ error: "No active session" });

      const planner = await loadPlanner(env, owner);
      if (!planner) return res.status(404).json({ error: "Planner not found" });

      const at = parsed.data.at ?? env.clock.now();
      const instant = describeInstant(at, env.timeZone);
      res.json({
        at: at.toISOString(),
        owner,
        current: matchCurrentActivity(instant, planner),
        next: findNextActivity(instant, planner),
      });
    } catch (err) {
      console.error("Error in /temporal/schedule:", err);
      res.status(500).json({ error: "Failed to match schedule" });
    }
  });

  return router;
}
