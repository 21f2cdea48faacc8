import { Router } from "express";
import { z } from "zod";
import type { TemporalEnv } from "../types.js";
import { daysInMonth } from "../utils/calendarMath.js";
import { lookupCalendarDay } from "../stores/calendarStore.js";

const dateParamSchema = z
  .string()
  .regex(/^\d{4}-\d{2}-\d{2}$/, "date must be YYYY-MM-DD")
  .transform((value) => value.split("-").map(Number))
  .refine(([year, month, day]) => month >= 1 && month <= 12 && day >= 1 && day <= daysInMonth(year, month), {
    message: "date does not exist",
  });

export function createCalendarRouter(env: TemporalEnv) {
  const router = Router();

  router.get("/calendar/:date", async (req, res) => {
    try {
      const parsed = dateParamSchema.safeParse(req.params.date);
      if (!parsed.success) {
        return res.status(400).json({ error: parsed.error.issues.map((i) => i.message).join("; ") });
      }
      const [year, month, day] = parsed.data;
      const entry = await lookupCalendarDay(env, year, month, day);
      if (!entry) return res.status(404).json({ error: `No calendar generated for ${req.params.date}` });
      res.json(entry);
    } catch (err) {
      console.error("Error in /calendar/:date:", err);
      res.status(500).json({ error: "Failed to read calendar" });
    }
  });

  return router;
}
