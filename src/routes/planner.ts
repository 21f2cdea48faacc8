import { Router } from "express";
import { z } from "zod";
import type { TemporalEnv } from "../types.js";
import { parseIsoDate } from "../utils/calendarMath.js";
import { buildDaySchedule, freeWindowsFor } from "../services/dayScheduleService.js";
import { loadPlanner } from "../stores/plannerStore.js";

const dayParamsSchema = z.object({
  owner: z.string().min(1),
  date: z.string().refine((value) => parseIsoDate(value) !== null, { message: "date must be a valid YYYY-MM-DD" }),
});

const dayQuerySchema = z.object({
  min: z
    .string()
    .regex(/^\d+$/, "min must be a whole number of minutes")
    .transform(Number)
    .optional(),
});

export function createPlannerRouter(env: TemporalEnv) {
  const router = Router();

  router.get("/planner/:owner/:date", async (req, res) => {
    try {
      const params = dayParamsSchema.safeParse(req.params);
      if (!params.success) {
        return res.status(400).json({ error: params.error.issues.map((i) => i.message).join("; ") });
      }
      const query = dayQuerySchema.safeParse(req.query);
      if (!query.success) {
        return res.status(400).json({ error: query.error.issues.map((i) => i.message).join("; ") });
      }

      const planner = await loadPlanner(env, params.data.owner);
      const schedule = planner ? buildDaySchedule(planner, params.data.date) : null;
      if (!schedule) return res.status(404).json({ error: "Planner not found" });

      res.json({ ...schedule, freeWindows: freeWindowsFor(schedule, query.data.min ?? 0) });
    } catch (err) {
      console.error("Error in /planner/:owner/:date:", err);
      res.status(500).json({ error: "Failed to build day schedule" });
    }
  });

  return router;
}
